import type { WriteAck } from "../ble/exchange";
import type { CallOptions, Central } from "../central";
import { type BleError, toBleError } from "../errors/errors";
import type { Device } from "../types";
import type { Payload } from "../utils/bytes";
import { delay } from "../utils/delay";

/** Default pause between messages in milliseconds */
export const DEFAULT_SEQUENCE_INTERVAL_MS = 1000;

export type SequenceOutcome =
	| { readonly payload: Payload; readonly ok: true; readonly ack: WriteAck }
	| { readonly payload: Payload; readonly ok: false; readonly error: BleError };

export interface SequenceOptions extends CallOptions {
	/** @default 1000 */
	intervalMs?: number | undefined;
	connectTimeoutMs?: number | undefined;
}

/**
 * Sends several payloads over one connection, in order, pausing between them.
 *
 * A rejected write does not stop the sequence. It stops early when the
 * session disconnects; messages after that point have no outcome.
 * Aborting the signal rejects with the abort reason.
 *
 * @example Mixed encodings
 * ```typescript
 * const outcomes = await sendSequence(central, address, [
 *   text("Hello Device!"),
 *   text('{"type":"greeting"}'),
 *   hex("48656c6c6f20576f726c64"),
 * ]);
 * ```
 */
export async function sendSequence(
	central: Central,
	target: string | Device,
	messages: readonly Payload[],
	options: SequenceOptions = {},
): Promise<SequenceOutcome[]> {
	const {
		intervalMs = DEFAULT_SEQUENCE_INTERVAL_MS,
		connectTimeoutMs,
		timeoutMs,
		signal,
	} = options;

	const session = await central.openSession(target, {
		timeoutMs: connectTimeoutMs,
		signal,
	});
	const outcomes: SequenceOutcome[] = [];
	try {
		await central.resolve(session);
		const characteristic = central.selectCharacteristic(session);

		for (const [index, payload] of messages.entries()) {
			if (index > 0) {
				await delay(intervalMs, signal);
			}
			try {
				const ack = await central.write(session, characteristic, payload, {
					timeoutMs,
					signal,
				});
				outcomes.push({ payload, ok: true, ack });
			} catch (error) {
				if (signal?.aborted) throw error;
				outcomes.push({ payload, ok: false, error: toBleError(error) });
				if (session.state === "disconnected") break;
			}
		}
	} finally {
		await central.closeSession(session);
	}
	return outcomes;
}
