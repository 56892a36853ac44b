import pRetry, { AbortError as PRetryAbortError } from "p-retry";
import {
	AdapterCapacityExceededError,
	AdapterError,
	AdapterFailure,
	abortReason,
	type BleError,
	ConnectRefusedError,
	ConnectTimeoutError,
	isBleError,
	isTransientBLEError,
	normalizeError,
	raceWithAbort,
	TimeoutError,
	throwIfAborted,
	withTimeout,
} from "../errors/errors";
import type { ConnectionHandle, RadioAdapter } from "../types";

/** Default timeout for opening a GATT connection in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

export interface ConnectWithTimeoutOptions {
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
	/** Log prefix for warning messages */
	logPrefix?: string | undefined;
}

/**
 * Maps a failed connection attempt onto the error taxonomy.
 */
export function classifyConnectError(
	error: unknown,
	address: string,
	timeoutMs: number,
	maxConnections: number,
): BleError {
	if (error instanceof TimeoutError) {
		return new ConnectTimeoutError(address, timeoutMs);
	}
	if (error instanceof AdapterFailure) {
		switch (error.kind) {
			case "timeout":
				return new ConnectTimeoutError(address, timeoutMs);
			case "refused":
				return new ConnectRefusedError(address, error.message);
			case "capacity":
				return new AdapterCapacityExceededError(maxConnections);
			default:
				return new AdapterError(error.message);
		}
	}
	if (isBleError(error)) {
		return error;
	}
	return new AdapterError(normalizeError(error).message);
}

/**
 * Opens a connection through the adapter with a timeout and optional abort support.
 *
 * Host stacks do not always honour their own connect timeout, so the attempt
 * is also bounded here. A handle that arrives after the caller gave up is
 * disconnected straight away so it cannot leak.
 *
 * @throws ConnectTimeoutError if the attempt takes longer than `timeoutMs`
 * @throws ConnectRefusedError if the peripheral declined
 * @throws AbortError if the signal is aborted
 * @throws AdapterError for any other host failure
 */
export async function connectWithTimeout(
	adapter: RadioAdapter,
	address: string,
	options: ConnectWithTimeoutOptions = {},
): Promise<ConnectionHandle> {
	const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
	const logPrefix = options.logPrefix ?? "[gatt-central-kit:transport]";
	const { signal } = options;

	throwIfAborted(signal);

	const pending = adapter.connect(address, { timeoutMs, signal });
	try {
		return await raceWithAbort(
			withTimeout(pending, timeoutMs, `Connect to ${address}`),
			signal,
		);
	} catch (error) {
		pending
			.then(
				(lateHandle) => adapter.disconnect(lateHandle),
				(cause: unknown) => {
					if (cause !== error && !signal?.aborted) {
						console.warn(
							`${logPrefix} Connection attempt to ${address} failed after it was abandoned:`,
							normalizeError(cause).message,
						);
					}
				},
			)
			.catch((e: unknown) => {
				console.warn(
					`${logPrefix} Error releasing late connection to ${address}:`,
					normalizeError(e).message,
				);
			});

		if (signal?.aborted) {
			throw abortReason(signal);
		}
		throw classifyConnectError(
			error,
			address,
			timeoutMs,
			adapter.capabilities.maxConnections,
		);
	}
}

export interface RetryOptions {
	/** Attempts including the first. @default 3 */
	maxAttempts?: number;
	/** @default 1000 */
	initialDelayMs?: number;
	/** @default 30000 */
	maxDelayMs?: number;
	/** @default 2 */
	backoffMultiplier?: number;
	/** @default true */
	jitter?: boolean;
	signal?: AbortSignal | undefined;
	/** Called before each retry with the nominal (unjittered) delay */
	onRetry?: (attempt: number, delayMs: number, error: Error) => void;
	/** @default isTransientBLEError */
	isRetryable?: (error: Error) => boolean;
}

/**
 * Retries an operation with exponential backoff while its errors are
 * transient. The core never retries on its own; this is the caller's policy.
 *
 * @example
 * ```typescript
 * const value = await withRetry(() => central.read(session, characteristic), {
 *   maxAttempts: 5,
 *   initialDelayMs: 500,
 * });
 * ```
 *
 * @throws the first non-retryable error unchanged, the last error once
 * attempts run out, or the abort reason
 */
export async function withRetry<T>(
	operation: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		maxAttempts = 3,
		initialDelayMs = 1000,
		maxDelayMs = 30000,
		backoffMultiplier = 2,
		jitter = true,
		signal,
		onRetry,
		isRetryable = isTransientBLEError,
	} = options;

	if (maxAttempts < 1) {
		throw new RangeError(`maxAttempts must be >= 1, got ${maxAttempts}`);
	}
	throwIfAborted(signal);

	const firstDelayMs = Math.min(initialDelayMs, maxDelayMs);
	const nominalDelay = (attempt: number) =>
		Math.min(firstDelayMs * backoffMultiplier ** (attempt - 1), maxDelayMs);

	try {
		return await pRetry(
			async () => {
				try {
					return await operation();
				} catch (e) {
					const error = normalizeError(e);
					if (!isRetryable(error)) {
						throw new PRetryAbortError(error);
					}
					throw error;
				}
			},
			{
				retries: maxAttempts - 1,
				minTimeout: firstDelayMs,
				maxTimeout: maxDelayMs,
				factor: backoffMultiplier,
				randomize: jitter,
				...(signal && { signal }),
				onFailedAttempt: (error) => {
					if (error.retriesLeft > 0) {
						onRetry?.(
							error.attemptNumber,
							nominalDelay(error.attemptNumber),
							error,
						);
					}
				},
			},
		);
	} catch (e) {
		if (signal?.aborted) {
			throw abortReason(signal);
		}
		throw e;
	}
}

/**
 * Anything that can open a session by address, such as a `Central`.
 */
export interface SessionOpener<S> {
	openSession(
		address: string,
		options?: { timeoutMs?: number | undefined; signal?: AbortSignal | undefined },
	): Promise<S>;
}

export interface OpenRetryOptions extends RetryOptions {
	/** Timeout for each connection attempt in ms */
	timeoutMs?: number;
}

/**
 * Opens a session with automatic retry on transient connection failures
 * (timeouts, refusals, dropped links).
 *
 * Each attempt uses a fresh session, so a failed attempt never leaves a
 * half-open one behind.
 *
 * @example
 * ```typescript
 * const session = await openWithRetry(central, "aa:bb:cc:dd:ee:ff", {
 *   maxAttempts: 3,
 *   onRetry: (attempt, delay, error) => {
 *     console.log(`Connection attempt ${attempt} failed, retrying in ${delay}ms`);
 *   },
 * });
 * ```
 */
export async function openWithRetry<S>(
	opener: SessionOpener<S>,
	address: string,
	options: OpenRetryOptions = {},
): Promise<S> {
	const { timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS, ...retryOptions } = options;

	return withRetry(
		() => opener.openSession(address, { timeoutMs, signal: retryOptions.signal }),
		retryOptions,
	);
}
