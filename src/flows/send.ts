import type { WriteAck } from "../ble/exchange";
import type { CallOptions, Central } from "../central";
import type { Characteristic, Device } from "../types";
import type { Payload } from "../utils/bytes";

export interface SendOptions extends CallOptions {
	/** Connection timeout; the central's default when unset */
	connectTimeoutMs?: number | undefined;
	/**
	 * Read the characteristic after writing, when it is readable.
	 * Peripherals that answer commands often leave the reply there.
	 * @default false
	 */
	readBack?: boolean | undefined;
}

export interface SendResult {
	readonly address: string;
	readonly characteristic: Characteristic;
	readonly ack: WriteAck;
	/** Value read after the write; only with `readBack` on a readable characteristic */
	readonly response?: Uint8Array | undefined;
}

/**
 * Connects, writes one payload to the first writable characteristic and
 * disconnects. Acknowledged writes are preferred over write commands.
 *
 * The session is closed on every path.
 *
 * @example
 * ```typescript
 * const { ack, response } = await sendToFirstCapable(
 *   central,
 *   "aa:bb:cc:dd:ee:ff",
 *   text("STATUS"),
 *   { readBack: true },
 * );
 * if (response) console.log(decodeText(response));
 * ```
 */
export async function sendToFirstCapable(
	central: Central,
	target: string | Device,
	payload: Payload,
	options: SendOptions = {},
): Promise<SendResult> {
	const { connectTimeoutMs, readBack = false, timeoutMs, signal } = options;
	const address = typeof target === "string" ? target : target.address;

	const session = await central.openSession(address, {
		timeoutMs: connectTimeoutMs,
		signal,
	});
	try {
		await central.resolve(session);
		const characteristic = central.selectCharacteristic(session);
		const ack = await central.write(session, characteristic, payload, {
			timeoutMs,
			signal,
		});

		let response: Uint8Array | undefined;
		if (readBack && characteristic.capabilities.has("read")) {
			response = await central.read(session, characteristic, { signal });
		}

		return {
			address,
			characteristic,
			ack,
			response,
		};
	} finally {
		await central.closeSession(session);
	}
}
