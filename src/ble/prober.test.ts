import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSimulatedRadio } from "../adapter/simulated";
import { toDevice } from "../registry/device-registry";
import type { Device } from "../types";
import { createOperationQueue, RADIO_LANE } from "./operation-queue";
import { createProber, type ProbeReport } from "./prober";

function device(address: string): Device {
	return toDevice({ address, rssi: -50 });
}

function codes(report: ProbeReport): string[] {
	return report.outcomes.map((o) => (o.ok ? "ok" : o.error.code));
}

describe("createProber", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("connects to each device, disconnects, and reports in input order", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: "aa:01", connectDelayMs: 50 },
				{ address: "aa:02", connectable: false, connectDelayMs: 50 },
				{ address: "aa:03", connectable: "timeout" },
			],
		});
		const prober = createProber(radio);
		const devices = ["aa:01", "aa:02", "aa:03", "aa:04"].map(device);

		const pending = prober.probe(devices, { perDeviceTimeoutMs: 1000 });
		await vi.advanceTimersByTimeAsync(2000);
		const report = await pending;

		expect(report.connectable.map((d) => d.address)).toEqual(["aa:01"]);
		expect(codes(report)).toEqual([
			"ok",
			"ConnectRefused",
			"ConnectTimeout",
			"ConnectRefused",
		]);
		expect(report.outcomes.map((o) => o.device)).toEqual(devices);
		expect(radio.stats.connects).toBe(1);
		expect(radio.stats.disconnects).toBe(1);
		expect(radio.openConnections).toBe(0);
		expect(radio.stats.peakPendingConnects).toBe(1);
	});

	it("returns an empty report for no devices", async () => {
		const prober = createProber(createSimulatedRadio());
		await expect(prober.probe([])).resolves.toEqual({
			connectable: [],
			outcomes: [],
		});
	});

	it("probes side by side when the radio allows it", async () => {
		const radio = createSimulatedRadio({
			concurrentConnects: true,
			maxConnections: 3,
			peripherals: [
				{ address: "aa:01", connectDelayMs: 300 },
				{ address: "aa:02", connectDelayMs: 100 },
				{ address: "aa:03", connectDelayMs: 100 },
				{ address: "aa:04", connectDelayMs: 100 },
			],
		});
		const prober = createProber(radio);
		const devices = ["aa:01", "aa:02", "aa:03", "aa:04"].map(device);

		const pending = prober.probe(devices);
		await vi.advanceTimersByTimeAsync(300);
		const report = await pending;

		expect(radio.stats.peakPendingConnects).toBe(3);
		expect(report.connectable.map((d) => d.address)).toEqual([
			"aa:01",
			"aa:02",
			"aa:03",
			"aa:04",
		]);
	});

	it("waits for the radio lane it shares with sessions", async () => {
		const radio = createSimulatedRadio({ peripherals: [{ address: "aa:01" }] });
		const queue = createOperationQueue();
		const prober = createProber(radio, { queue });
		let release = () => {};
		const busy = queue.enqueue(
			RADIO_LANE,
			() =>
				new Promise<void>((resolve) => {
					release = resolve;
				}),
		);

		const pending = prober.probe([device("aa:01")]);
		await vi.advanceTimersByTimeAsync(100);
		expect(radio.stats.connectAttempts).toBe(0);

		release();
		await busy;
		await vi.advanceTimersByTimeAsync(10);
		await expect(pending).resolves.toMatchObject({
			connectable: [{ address: "aa:01" }],
		});
	});

	it("reports devices left unprobed as aborted", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: "aa:01", connectDelayMs: 100 },
				{ address: "aa:02" },
			],
		});
		const prober = createProber(radio);
		const controller = new AbortController();

		const pending = prober.probe([device("aa:01"), device("aa:02")], {
			signal: controller.signal,
		});
		await vi.advanceTimersByTimeAsync(50);
		controller.abort(new Error("stop"));
		const report = await pending;

		expect(codes(report)).toEqual(["Aborted", "Aborted"]);
		expect(report.connectable).toEqual([]);
		expect(radio.stats.connectAttempts).toBe(1);
		expect(radio.openConnections).toBe(0);
	});
});
