import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AbortError, LinkLostError } from "../errors/errors";
import { delay } from "./delay";

describe("delay", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves after the given time", async () => {
		const settled = vi.fn();
		const pending = delay(1000).then(settled);

		await vi.advanceTimersByTimeAsync(999);
		expect(settled).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(1);
		await pending;
		expect(settled).toHaveBeenCalled();
	});

	it("rejects at once when the signal is already aborted", async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(delay(1000, controller.signal)).rejects.toBeInstanceOf(
			AbortError,
		);
	});

	it("rejects with the abort reason when aborted while waiting", async () => {
		const controller = new AbortController();
		const pending = delay(1000, controller.signal);

		controller.abort(new LinkLostError("aa:bb"));

		await expect(pending).rejects.toBeInstanceOf(LinkLostError);
		expect(vi.getTimerCount()).toBe(0);
	});
});
