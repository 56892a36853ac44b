import { AbortError, abortReason, normalizeError } from "../errors/errors";

/**
 * Lane shared by every outbound connection attempt on one radio.
 * Most host stacks reject a second connect while one is pending.
 */
export const RADIO_LANE = "radio";

export interface EnqueueOptions {
	/**
	 * Rejects this operation with the abort reason. If it has not started yet
	 * it is skipped; if it is running, its result is discarded.
	 */
	signal?: AbortSignal | undefined;
}

/**
 * A keyed operation queue: operations sharing a lane run one after another,
 * different lanes run independently.
 *
 * Used to serialize connection attempts on the radio (prober and session
 * open share {@link RADIO_LANE}).
 *
 * @example Serializing connects
 * ```typescript
 * const queue = createOperationQueue();
 *
 * const [a, b] = await Promise.all([
 *   queue.enqueue(RADIO_LANE, () => adapter.connect(addrA, { timeoutMs: 5000 })),
 *   queue.enqueue(RADIO_LANE, () => adapter.connect(addrB, { timeoutMs: 5000 })),
 * ]);
 * ```
 */
export interface OperationQueue {
	/**
	 * Enqueues an operation on a lane.
	 * The operation will be executed when all previous operations
	 * on the same lane have settled.
	 *
	 * @throws AbortError if the call's signal is aborted
	 */
	enqueue<T>(
		lane: string,
		operation: () => Promise<T>,
		options?: EnqueueOptions,
	): Promise<T>;
}

/**
 * Creates a keyed operation queue.
 */
export function createOperationQueue(): OperationQueue {
	// Promise chain per lane - acts as a mutex
	const lanes = new Map<string, Promise<void>>();

	function enqueue<T>(
		lane: string,
		operation: () => Promise<T>,
		enqueueOptions: EnqueueOptions = {},
	): Promise<T> {
		const { signal } = enqueueOptions;
		if (signal?.aborted) {
			return Promise.reject(abortReason(signal));
		}

		const tail = lanes.get(lane) ?? Promise.resolve();

		return new Promise<T>((resolve, reject) => {
			let settled = false;
			const settle = (fn: () => void) => {
				if (settled) return;
				settled = true;
				signal?.removeEventListener("abort", onAbort);
				fn();
			};
			const onAbort = () => {
				const reason = signal ? abortReason(signal) : new AbortError();
				settle(() => reject(reason));
			};
			signal?.addEventListener("abort", onAbort, { once: true });

			// The lane stays held until the operation itself settles, even when
			// its caller has already been rejected
			const next: Promise<void> = tail
				.then(async () => {
					if (settled) return;
					const result = await operation();
					settle(() => resolve(result));
				})
				.catch((error: unknown) => {
					settle(() => reject(normalizeError(error)));
				})
				.finally(() => {
					if (lanes.get(lane) === next) {
						lanes.delete(lane);
					}
				});

			lanes.set(lane, next);
		});
	}

	return { enqueue };
}
