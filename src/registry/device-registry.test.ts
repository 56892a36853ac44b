import * as fc from "fast-check";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSimulatedRadio } from "../adapter/simulated";
import { DiscoveryUnavailableError } from "../errors/errors";
import type { Device } from "../types";
import {
	compareDevices,
	createDeviceRegistry,
	toDevice,
} from "./device-registry";

describe("toDevice", () => {
	it("builds a frozen record from a sighting", () => {
		const seenAt = new Date(1_700_000_000_000);
		const device = toDevice(
			{
				address: "aa:01",
				name: "  Thermo ",
				rssi: -42,
				txPower: 4,
				manufacturerData: new Map([[0x004c, Uint8Array.of(1, 2)]]),
				serviceIds: ["0000180a-0000-1000-8000-00805f9b34fb"],
			},
			seenAt,
		);

		expect(Object.isFrozen(device)).toBe(true);
		expect(device.displayName).toBe("Thermo");
		expect(device.lastSeen).toBe(seenAt);
		expect(device.advertisement?.signalStrength).toBe(-42);
		expect(device.advertisement?.txPower).toBe(4);
		expect(device.advertisement?.manufacturerData.get(0x004c)).toEqual(
			Uint8Array.of(1, 2),
		);
		expect([...(device.advertisement?.serviceIds ?? [])]).toEqual([
			"0000180a-0000-1000-8000-00805f9b34fb",
		]);
	});

	it("treats a blank name as no name", () => {
		expect(toDevice({ address: "aa:01", name: "   ", rssi: -70 }).displayName)
			.toBeUndefined();
		expect(toDevice({ address: "aa:01", rssi: -70 }).displayName)
			.toBeUndefined();
	});
});

describe("compareDevices", () => {
	const named = (address: string, displayName: string) =>
		toDevice({ address, name: displayName, rssi: -50 });
	const unnamed = (address: string) => toDevice({ address, rssi: -50 });

	it("puts named devices first, by name, then unnamed by address", () => {
		const sorted = [
			unnamed("cc"),
			named("bb", "beta"),
			unnamed("aa"),
			named("dd", "Alpha"),
			named("ab", "beta"),
		].sort(compareDevices);

		expect(sorted.map((d) => d.address)).toEqual([
			"dd",
			"ab",
			"bb",
			"aa",
			"cc",
		]);
	});

	it("yields a total order consistent with the presentation rule", () => {
		const deviceArb = fc
			.record({
				address: fc.hexaString({ minLength: 1, maxLength: 4 }),
				name: fc.option(fc.string({ minLength: 1, maxLength: 6 }), {
					nil: undefined,
				}),
			})
			.map(({ address, name }) => toDevice({ address, name, rssi: -50 }));

		fc.assert(
			fc.property(fc.array(deviceArb, { maxLength: 20 }), (devices) => {
				const sorted = [...devices].sort(compareDevices);
				for (let i = 1; i < sorted.length; i++) {
					const prev = sorted[i - 1];
					const next = sorted[i];
					if (!prev || !next) continue;
					expect(compareDevices(prev, next)).toBeLessThanOrEqual(0);
					if (prev.displayName === undefined) {
						expect(next.displayName).toBeUndefined();
					}
				}
			}),
		);
	});
});

describe("createDeviceRegistry", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	async function drain(iterable: AsyncIterable<Device>): Promise<string[]> {
		const seen: string[] = [];
		for await (const device of iterable) {
			seen.push(device.address);
		}
		return seen;
	}

	it("yields each device once per discovery and keeps the latest sighting", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: "aa:01", name: "Beacon", advertiseEveryMs: 100, rssi: -40 },
				{ address: "aa:02", appearAfterMs: 300 },
			],
		});
		const registry = createDeviceRegistry(radio);

		const pending = drain(registry.startDiscovery(1000));
		await vi.advanceTimersByTimeAsync(150);
		radio.updatePeripheral("aa:01", { rssi: -80 });
		await vi.advanceTimersByTimeAsync(850);

		await expect(pending).resolves.toEqual(["aa:01", "aa:02"]);
		expect(registry.size).toBe(2);
		expect(registry.get("aa:01")?.advertisement?.signalStrength).toBe(-80);
	});

	it("hands out new objects for newer sightings and never mutates old ones", async () => {
		const radio = createSimulatedRadio({
			peripherals: [{ address: "aa:01", name: "First" }],
		});
		const registry = createDeviceRegistry(radio);

		const first = registry.discover(100);
		await vi.advanceTimersByTimeAsync(100);
		await first;
		const before = registry.get("aa:01");

		radio.updatePeripheral("aa:01", { name: "Second" });
		const second = registry.discover(100);
		await vi.advanceTimersByTimeAsync(100);
		await second;

		expect(before?.displayName).toBe("First");
		expect(registry.get("aa:01")?.displayName).toBe("Second");
		expect(registry.get("aa:01")).not.toBe(before);
	});

	it("returns the sorted snapshot from discover", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: "aa:03" },
				{ address: "aa:02", name: "Zeta" },
				{ address: "aa:01", name: "Alpha" },
			],
		});
		const registry = createDeviceRegistry(radio);

		const pending = registry.discover(500);
		await vi.advanceTimersByTimeAsync(500);
		const devices = await pending;

		expect(devices.map((d) => d.displayName ?? d.address)).toEqual([
			"Alpha",
			"Zeta",
			"aa:03",
		]);
		expect(registry.snapshot()).toEqual(devices);
	});

	it("filters by name prefix", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: "aa:01", name: "Sensor-1" },
				{ address: "aa:02", name: "Lamp" },
				{ address: "aa:03" },
			],
		});
		const registry = createDeviceRegistry(radio);

		const pending = registry.discover(200, { namePrefix: "Sensor" });
		await vi.advanceTimersByTimeAsync(200);

		await expect(pending).resolves.toMatchObject([{ address: "aa:01" }]);
	});

	it("asks the host for the advertised services only", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: "aa:01", advertisedServiceIds: ["180d"] },
				{ address: "aa:02", advertisedServiceIds: ["180a"] },
			],
		});
		const registry = createDeviceRegistry(radio);

		const pending = registry.discover(200, {
			serviceIds: ["0000180d-0000-1000-8000-00805f9b34fb"],
		});
		await vi.advanceTimersByTimeAsync(200);

		await expect(pending).resolves.toMatchObject([{ address: "aa:01" }]);
	});

	it("ends early without error when aborted", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: "aa:01" },
				{ address: "aa:02", appearAfterMs: 3000 },
			],
		});
		const registry = createDeviceRegistry(radio);
		const controller = new AbortController();

		const pending = registry.discover(5000, { signal: controller.signal });
		await vi.advanceTimersByTimeAsync(1000);
		controller.abort();

		await expect(pending).resolves.toMatchObject([{ address: "aa:01" }]);
		await vi.advanceTimersByTimeAsync(5000);
		expect(registry.size).toBe(1);
	});

	it("reports an unusable radio as DiscoveryUnavailableError", async () => {
		const radio = createSimulatedRadio({ available: false });
		const registry = createDeviceRegistry(radio);

		await expect(registry.discover(100)).rejects.toThrow(
			new DiscoveryUnavailableError("Radio is powered off").message,
		);
	});

	it("forgets everything on clear", async () => {
		const radio = createSimulatedRadio({ peripherals: [{ address: "aa:01" }] });
		const registry = createDeviceRegistry(radio);
		const pending = registry.discover(100);
		await vi.advanceTimersByTimeAsync(100);
		await pending;

		registry.clear();

		expect(registry.size).toBe(0);
		expect(registry.snapshot()).toEqual([]);
		expect(registry.get("aa:01")).toBeUndefined();
	});
});
