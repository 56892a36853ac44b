import { describe, expect, it } from "vitest";
import { InvalidStateError } from "../errors/errors";
import type { SessionState } from "../types";
import { createStateMachine } from "./state-machine";

describe("createStateMachine", () => {
	describe("initial state", () => {
		it("defaults to idle", () => {
			expect(createStateMachine().getState()).toBe("idle");
		});

		it("accepts custom initial state", () => {
			expect(createStateMachine("failed").getState()).toBe("failed");
		});
	});

	describe("valid transitions", () => {
		const valid: Array<[SessionState, SessionState]> = [
			["idle", "connecting"],
			["idle", "disconnected"],
			["connecting", "connected"],
			["connecting", "failed"],
			["connecting", "disconnected"],
			["connected", "servicesResolved"],
			["connected", "disconnected"],
			["servicesResolved", "busy"],
			["servicesResolved", "disconnected"],
			["busy", "servicesResolved"],
			["busy", "disconnected"],
			["failed", "connecting"],
			["failed", "disconnected"],
		];

		for (const [from, to] of valid) {
			it(`${from} -> ${to}`, () => {
				const sm = createStateMachine(from);
				expect(sm.canTransition(to)).toBe(true);
				sm.transition(to);
				expect(sm.getState()).toBe(to);
			});
		}
	});

	describe("invalid transitions", () => {
		it("idle cannot skip to connected", () => {
			expect(createStateMachine("idle").canTransition("connected")).toBe(false);
		});

		it("connected cannot go busy before services are resolved", () => {
			expect(createStateMachine("connected").canTransition("busy")).toBe(false);
		});

		it("disconnected is terminal", () => {
			const sm = createStateMachine("disconnected");
			const states: SessionState[] = [
				"idle",
				"connecting",
				"connected",
				"servicesResolved",
				"busy",
				"failed",
			];
			for (const to of states) {
				expect(sm.canTransition(to)).toBe(false);
			}
		});

		it("throws InvalidStateError and keeps the state", () => {
			const sm = createStateMachine("idle");
			expect(() => sm.transition("busy")).toThrow(InvalidStateError);
			expect(() => sm.transition("busy")).toThrow(
				"Cannot move to busy while session is idle",
			);
			expect(sm.getState()).toBe("idle");
		});
	});

	describe("full session lifecycle", () => {
		it("walks open, resolve, exchange and close", () => {
			const sm = createStateMachine();
			const visited: SessionState[] = [];

			for (const to of [
				"connecting",
				"connected",
				"servicesResolved",
				"busy",
				"servicesResolved",
				"disconnected",
			] as const) {
				sm.transition(to);
				visited.push(sm.getState());
			}

			expect(visited).toEqual([
				"connecting",
				"connected",
				"servicesResolved",
				"busy",
				"servicesResolved",
				"disconnected",
			]);
		});

		it("supports retrying after a failed open", () => {
			const sm = createStateMachine();

			sm.transition("connecting");
			sm.transition("failed");
			sm.transition("connecting");
			sm.transition("connected");

			expect(sm.getState()).toBe("connected");
		});
	});
});
