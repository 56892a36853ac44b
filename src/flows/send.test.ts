import { describe, expect, it } from "vitest";
import { ECHO_CHAR, echoPeripheral } from "../__tests__/fixtures";
import { createSimulatedRadio } from "../adapter/simulated";
import { createCentral } from "../central";
import {
	ConnectRefusedError,
	NoCapableCharacteristicError,
	WriteRejectedError,
} from "../errors/errors";
import { decodeText, hex, text } from "../utils/bytes";
import { sendToFirstCapable } from "./send";

const ADDRESS = "aa:bb:cc:dd:ee:01";

describe("sendToFirstCapable", () => {
	it("writes to the first writable characteristic and disconnects", async () => {
		const radio = createSimulatedRadio({ peripherals: [echoPeripheral(ADDRESS)] });
		const central = createCentral(radio);

		const result = await sendToFirstCapable(central, ADDRESS, text("PING"));

		expect(result.address).toBe(ADDRESS);
		expect(result.characteristic.id).toBe(ECHO_CHAR);
		expect(result.ack.bytesWritten).toBe(4);
		expect(result.response).toBeUndefined();
		expect(radio.stats.writes.map((w) => decodeText(w.data))).toEqual(["PING"]);
		expect(radio.openConnections).toBe(0);
		expect(central.sessions).toEqual([]);
	});

	it("reads the reply back when asked", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				echoPeripheral(ADDRESS, {
					services: [
						{
							id: "fff0",
							characteristics: [
								{
									id: "fff1",
									capabilities: ["read", "write"],
									respond: (written) =>
										new TextEncoder().encode(`ACK ${written.length}`),
								},
							],
						},
					],
				}),
			],
		});
		const central = createCentral(radio);

		const { response } = await sendToFirstCapable(
			central,
			ADDRESS,
			hex("010203"),
			{ readBack: true },
		);

		expect(response && decodeText(response)).toBe("ACK 3");
	});

	it("closes the session when the write is rejected", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				echoPeripheral(ADDRESS, {
					services: [
						{
							id: "fff0",
							characteristics: [
								{ id: "fff1", capabilities: ["write"], rejectWrites: 0x03 },
							],
						},
					],
				}),
			],
		});
		const central = createCentral(radio);

		await expect(
			sendToFirstCapable(central, ADDRESS, text("x")),
		).rejects.toBeInstanceOf(WriteRejectedError);
		expect(radio.openConnections).toBe(0);
	});

	it("fails when nothing is writable", async () => {
		const radio = createSimulatedRadio({
			peripherals: [
				echoPeripheral(ADDRESS, {
					services: [
						{
							id: "180a",
							characteristics: [{ id: "2a29", capabilities: ["read"] }],
						},
					],
				}),
			],
		});
		const central = createCentral(radio);

		await expect(
			sendToFirstCapable(central, ADDRESS, text("x")),
		).rejects.toThrow(
			new NoCapableCharacteristicError(["write", "writeWithoutResponse"])
				.message,
		);
		expect(radio.openConnections).toBe(0);
	});

	it("surfaces connection failures", async () => {
		const radio = createSimulatedRadio({
			peripherals: [echoPeripheral(ADDRESS, { connectable: false })],
		});
		const central = createCentral(radio);

		await expect(
			sendToFirstCapable(central, ADDRESS, text("x")),
		).rejects.toBeInstanceOf(ConnectRefusedError);
	});
});
