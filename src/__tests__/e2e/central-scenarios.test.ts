/**
 * End-to-end scenarios
 *
 * Whole caller journeys against the simulated radio, on fake timers so that
 * multi-second discovery windows and connection timeouts run instantly.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSimulatedRadio } from "../../adapter/simulated";
import { openWithRetry } from "../../ble";
import { createCentral } from "../../central";
import {
	ConnectTimeoutError,
	InvalidStateError,
	LinkLostError,
} from "../../errors";
import { decodeText, text } from "../../utils";
import { ECHO_CHAR, echoPeripheral, settle } from "../fixtures";

const X = "aa:bb:cc:dd:ee:01";
const Y = "cc:dd:ee:ff:00:02";

beforeEach(() => {
	vi.useFakeTimers();
	vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
	vi.useRealTimers();
});

describe("discover, probe, connect and write", () => {
	it("reaches the one connectable device and writes PING to it", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				echoPeripheral(X, { name: "X", connectDelayMs: 150 }),
				echoPeripheral(Y, { name: "Y", connectable: "timeout" }),
			],
		});
		const central = createCentral(radio);

		const devices = await settle(central.discover(), 5010);
		expect(devices.map((d) => [d.displayName, d.address])).toEqual([
			["X", X],
			["Y", Y],
		]);

		const report = await settle(
			central.probeConnectable(devices, { perDeviceTimeoutMs: 2000 }),
			2500,
		);
		expect(report.connectable.map((d) => d.address)).toEqual([X]);
		const failed = report.outcomes[1];
		expect(failed?.ok).toBe(false);
		if (failed && !failed.ok) {
			expect(failed.error).toBeInstanceOf(ConnectTimeoutError);
		}
		expect(radio.openConnections).toBe(0);

		const [target] = report.connectable;
		if (!target) throw new Error("no connectable device");
		const session = await settle(central.openSession(target), 500);
		await settle(central.resolve(session), 10);
		const characteristic = central.selectCharacteristic(session, "write");

		const ack = await settle(
			central.write(session, characteristic, text("PING")),
			10,
		);

		expect(ack).toEqual({
			characteristic,
			bytesWritten: 4,
			acknowledged: true,
		});
		expect(session.state).toBe("servicesResolved");
		expect(decodeText(radio.valueOf(X, ECHO_CHAR) ?? new Uint8Array())).toBe(
			"PING",
		);

		await settle(central.closeSession(session), 10);
		expect(radio.openConnections).toBe(0);
		expect(radio.stats.connects).toBe(radio.stats.disconnects);
	});
});

describe("cancellation", () => {
	it("ends a scan promptly and without error when aborted", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				{ address: X, name: "Early" },
				{ address: Y, name: "Late", appearAfterMs: 3000 },
			],
		});
		const central = createCentral(radio);
		const controller = new AbortController();
		setTimeout(() => controller.abort(), 1000);

		const devices = await settle(
			central.discover(undefined, { signal: controller.signal }),
			1000,
		);

		expect(devices.map((d) => d.address)).toEqual([X]);
		expect(vi.getTimerCount()).toBe(0);
	});
});

describe("link loss", () => {
	it("ends the notification stream and frees the slot for a new session", async () => {
		const radio = createSimulatedRadio({
			maxConnections: 1,
			peripherals: [echoPeripheral(X)],
		});
		const central = createCentral(radio);
		const session = await settle(central.openSession(X), 10);
		await settle(central.resolve(session), 10);
		const status = central.selectCharacteristic(session, "read");
		const subscription = await settle(
			central.subscribe(session, central.selectCharacteristic(session, "notify")),
			10,
		);

		radio.notify(X, ECHO_CHAR, new TextEncoder().encode("before"));
		radio.dropLink(X);

		const received: string[] = [];
		for await (const notification of subscription) {
			received.push(decodeText(notification.value));
		}
		expect(received).toEqual(["before"]);
		expect(session.state).toBe("disconnected");
		await expect(central.read(session, status)).rejects.toBeInstanceOf(
			InvalidStateError,
		);

		const next = await settle(central.openSession(X), 10);
		expect(next.state).toBe("connected");
		expect(central.sessions).toEqual([next]);
	});

	it("fails the exchange in flight with LinkLostError", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				echoPeripheral(X, {
					services: [
						{
							id: "fff0",
							characteristics: [
								{ id: "fff1", capabilities: ["read"], readDelayMs: 1000 },
							],
						},
					],
				}),
			],
		});
		const central = createCentral(radio);
		const session = await settle(central.openSession(X), 10);
		await settle(central.resolve(session), 10);

		const reading = central.read(session, central.selectCharacteristic(session, "read"));
		setTimeout(() => radio.dropLink(X), 100);

		await expect(settle(reading, 200)).rejects.toBeInstanceOf(LinkLostError);
		expect(session.state).toBe("disconnected");
		expect(radio.openConnections).toBe(0);
	});
});

describe("retrying a connection", () => {
	it("opens on a later attempt once the peripheral accepts", async () => {
		const radio = createSimulatedRadio({
			peripherals: [echoPeripheral(X, { connectable: false })],
		});
		const central = createCentral(radio);
		const onRetry = vi.fn(() => {
			radio.updatePeripheral(X, { connectable: true });
		});

		const session = await settle(
			openWithRetry(central, X, { initialDelayMs: 100, jitter: false, onRetry }),
			1000,
		);

		expect(session.state).toBe("connected");
		expect(onRetry).toHaveBeenCalledTimes(1);
		expect(radio.stats.connectAttempts).toBe(2);
		expect(central.sessions).toEqual([session]);
	});
});
