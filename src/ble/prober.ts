import {
	abortReason,
	type BleError,
	normalizeError,
	toBleError,
} from "../errors/errors";
import type { Device, RadioAdapter } from "../types";
import {
	createOperationQueue,
	type OperationQueue,
	RADIO_LANE,
} from "./operation-queue";
import { connectWithTimeout } from "./transport";

/** Default timeout for each connectability probe in milliseconds */
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

export type ProbeOutcome =
	| { readonly device: Device; readonly ok: true }
	| { readonly device: Device; readonly ok: false; readonly error: BleError };

export interface ProbeReport {
	/** Devices that accepted a connection, in input order */
	readonly connectable: Device[];
	/** One outcome per input device, in input order */
	readonly outcomes: ProbeOutcome[];
}

export interface ProbeOptions {
	/** @default 5000 */
	perDeviceTimeoutMs?: number | undefined;
	/** Stops probing; devices not probed yet are reported as aborted */
	signal?: AbortSignal | undefined;
}

export interface ProberOptions {
	/**
	 * Queue shared with sessions on the same radio.
	 * Defaults to a private queue.
	 */
	queue?: OperationQueue | undefined;
	/** Log prefix for warning messages */
	logPrefix?: string | undefined;
}

export interface Prober {
	/**
	 * Connects to each device and disconnects straight away.
	 * Never throws for a device's failure; see the outcomes instead.
	 */
	probe(
		devices: readonly Device[],
		options?: ProbeOptions,
	): Promise<ProbeReport>;
}

/**
 * Creates a connectability prober.
 *
 * Attempts go through the radio lane of the queue one at a time, unless the
 * adapter reports it can hold several connection attempts at once; then up
 * to `maxConnections` probes run side by side. The report order is the input
 * order either way.
 *
 * @example
 * ```typescript
 * const prober = createProber(adapter);
 * const { connectable, outcomes } = await prober.probe(registry.snapshot(), {
 *   perDeviceTimeoutMs: 3000,
 * });
 * for (const outcome of outcomes) {
 *   if (!outcome.ok) console.log(outcome.device.address, outcome.error.code);
 * }
 * ```
 */
export function createProber(
	adapter: RadioAdapter,
	options: ProberOptions = {},
): Prober {
	const {
		queue = createOperationQueue(),
		logPrefix = "[gatt-central-kit:prober]",
	} = options;

	const { maxConnections, concurrentConnects } = adapter.capabilities;
	const parallel = concurrentConnects && maxConnections > 1;
	const width = parallel ? maxConnections : 1;

	async function attempt(
		address: string,
		timeoutMs: number,
		signal: AbortSignal | undefined,
	): Promise<void> {
		const handle = await connectWithTimeout(adapter, address, {
			timeoutMs,
			signal,
			logPrefix,
		});
		try {
			await adapter.disconnect(handle);
		} catch (e) {
			console.warn(
				`${logPrefix} Error disconnecting after probing ${address}:`,
				normalizeError(e).message,
			);
		}
	}

	async function probeOne(
		device: Device,
		timeoutMs: number,
		signal: AbortSignal | undefined,
	): Promise<ProbeOutcome> {
		if (signal?.aborted) {
			return { device, ok: false, error: abortReason(signal) };
		}
		try {
			if (parallel) {
				await attempt(device.address, timeoutMs, signal);
			} else {
				await queue.enqueue(
					RADIO_LANE,
					() => attempt(device.address, timeoutMs, signal),
					{ signal },
				);
			}
			return { device, ok: true };
		} catch (error) {
			return { device, ok: false, error: toBleError(error) };
		}
	}

	async function probe(
		devices: readonly Device[],
		probeOptions: ProbeOptions = {},
	): Promise<ProbeReport> {
		const { perDeviceTimeoutMs = DEFAULT_PROBE_TIMEOUT_MS, signal } =
			probeOptions;

		const settled: Array<{ index: number; outcome: ProbeOutcome }> = [];
		let next = 0;

		// Each worker takes the next unprobed device until none are left
		async function worker(): Promise<void> {
			while (next < devices.length) {
				const index = next++;
				const device = devices[index];
				if (!device) continue;
				const outcome = await probeOne(device, perDeviceTimeoutMs, signal);
				settled.push({ index, outcome });
			}
		}

		await Promise.all(
			Array.from({ length: Math.min(width, devices.length) }, () => worker()),
		);

		const outcomes = settled
			.sort((a, b) => a.index - b.index)
			.map((entry) => entry.outcome);

		return {
			connectable: outcomes.filter((o) => o.ok).map((o) => o.device),
			outcomes,
		};
	}

	return { probe };
}
