import type { Central } from "../central";
import { abortReason, type BleError, toBleError } from "../errors/errors";
import type { Device } from "../types";
import type { Payload } from "../utils/bytes";
import { type SendResult, sendToFirstCapable } from "./send";

export type BroadcastOutcome =
	| { readonly device: Device; readonly ok: true; readonly result: SendResult }
	| { readonly device: Device; readonly ok: false; readonly error: BleError };

export interface BroadcastReport {
	/** One outcome per discovered device, in snapshot order */
	readonly outcomes: BroadcastOutcome[];
	readonly delivered: number;
}

export interface BroadcastOptions {
	/** Discovery window; the central's default when unset */
	windowMs?: number | undefined;
	namePrefix?: string | undefined;
	serviceIds?: readonly string[] | undefined;
	connectTimeoutMs?: number | undefined;
	/** Write timeout per device */
	timeoutMs?: number | undefined;
	/** Stops the broadcast; devices not reached yet are reported as aborted */
	signal?: AbortSignal | undefined;
}

/**
 * Discovers devices and sends the same payload to each of them, one device
 * at a time. A failing device never stops the others.
 *
 * @example
 * ```typescript
 * const { delivered, outcomes } = await broadcast(central, text("ALERT"), {
 *   namePrefix: "Sensor",
 * });
 * console.log(`${delivered}/${outcomes.length} devices reached`);
 * ```
 */
export async function broadcast(
	central: Central,
	payload: Payload,
	options: BroadcastOptions = {},
): Promise<BroadcastReport> {
	const {
		windowMs,
		namePrefix,
		serviceIds,
		connectTimeoutMs,
		timeoutMs,
		signal,
	} = options;

	const devices = await central.discover(windowMs, {
		namePrefix,
		serviceIds,
		signal,
	});

	const outcomes: BroadcastOutcome[] = [];
	for (const device of devices) {
		if (signal?.aborted) {
			outcomes.push({ device, ok: false, error: abortReason(signal) });
			continue;
		}
		try {
			const result = await sendToFirstCapable(central, device, payload, {
				connectTimeoutMs,
				timeoutMs,
				signal,
			});
			outcomes.push({ device, ok: true, result });
		} catch (error) {
			outcomes.push({ device, ok: false, error: toBleError(error) });
		}
	}

	return {
		outcomes,
		delivered: outcomes.filter((o) => o.ok).length,
	};
}
