import { abortReason } from "../errors/errors";

/**
 * Resolves after `ms` milliseconds, or rejects with the abort reason as soon
 * as the signal fires.
 *
 * @example
 * ```typescript
 * await delay(500, controller.signal);
 * ```
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			if (signal) reject(abortReason(signal));
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
