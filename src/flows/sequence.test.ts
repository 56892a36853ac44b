import { describe, expect, it } from "vitest";
import { echoPeripheral } from "../__tests__/fixtures";
import { createSimulatedRadio } from "../adapter/simulated";
import { createCentral } from "../central";
import { AbortError } from "../errors/errors";
import { bytesToHex, hex, text } from "../utils/bytes";
import { sendSequence } from "./sequence";

const ADDRESS = "aa:bb:cc:dd:ee:01";

describe("sendSequence", () => {
	it("sends every message in order over one connection", async () => {
		const radio = createSimulatedRadio({ peripherals: [echoPeripheral(ADDRESS)] });
		const central = createCentral(radio);

		const outcomes = await sendSequence(
			central,
			ADDRESS,
			[text("Hi"), text('{"type":"greeting"}'), hex("48656c6c6f")],
			{ intervalMs: 5 },
		);

		expect(outcomes.map((o) => o.ok)).toEqual([true, true, true]);
		expect(radio.stats.writes.map((w) => bytesToHex(w.data))).toEqual([
			"4869",
			"7b2274797065223a226772656574696e67227d",
			"48656c6c6f",
		]);
		expect(radio.stats.connects).toBe(1);
		expect(radio.openConnections).toBe(0);
	});

	it("records a bad message and carries on", async () => {
		const radio = createSimulatedRadio({ peripherals: [echoPeripheral(ADDRESS)] });
		const central = createCentral(radio);

		const outcomes = await sendSequence(
			central,
			ADDRESS,
			[text("one"), hex("zz"), text("three")],
			{ intervalMs: 1 },
		);

		expect(outcomes.map((o) => (o.ok ? "ok" : o.error.code))).toEqual([
			"ok",
			"MalformedPayload",
			"ok",
		]);
		expect(radio.stats.writes).toHaveLength(2);
	});

	it("stops once the link is lost", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				echoPeripheral(ADDRESS, {
					services: [
						{
							id: "fff0",
							characteristics: [
								{
									id: "fff1",
									capabilities: ["write"],
									writeDelayMs: 200,
								},
							],
						},
					],
				}),
			],
		});
		const central = createCentral(radio);
		const pending = sendSequence(
			central,
			ADDRESS,
			[text("a"), text("b"), text("c")],
			{ intervalMs: 1 },
		);
		setTimeout(() => radio.dropLink(ADDRESS), 50);

		const outcomes = await pending;

		expect(outcomes.map((o) => (o.ok ? "ok" : o.error.code))).toEqual([
			"LinkLost",
		]);
	});

	it("rejects when aborted between messages", async () => {
		const radio = createSimulatedRadio({ peripherals: [echoPeripheral(ADDRESS)] });
		const central = createCentral(radio);
		const controller = new AbortController();

		const pending = sendSequence(central, ADDRESS, [text("a"), text("b")], {
			intervalMs: 1000,
			signal: controller.signal,
		});
		setTimeout(() => controller.abort(), 50);

		await expect(pending).rejects.toBeInstanceOf(AbortError);
		expect(radio.stats.writes).toHaveLength(1);
		expect(radio.openConnections).toBe(0);
	});
});
