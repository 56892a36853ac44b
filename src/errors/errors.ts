import type { Capability } from "../types";

/**
 * Discriminant carried by every error the library raises.
 */
export type BleErrorCode =
	| "DiscoveryUnavailable"
	| "ConnectTimeout"
	| "ConnectRefused"
	| "SessionBusy"
	| "NoCapableCharacteristic"
	| "MalformedPayload"
	| "WriteRejected"
	| "ReadError"
	| "LinkLost"
	| "AdapterCapacityExceeded"
	| "Timeout"
	| "PeerRejected"
	| "AdapterError"
	| "InvalidState"
	| "Aborted";

/**
 * Base class of the error taxonomy.
 * Switch on `code` rather than on `instanceof` when crossing package boundaries.
 */
export abstract class BleError extends Error {
	abstract readonly code: BleErrorCode;
}

export function isBleError(e: unknown): e is BleError {
	return e instanceof BleError;
}

/**
 * Custom error class for timeout operations.
 *
 * Note: The underlying BLE operation may still complete in the background
 * after a timeout is thrown. Host stacks rarely support true cancellation.
 */
export class TimeoutError extends BleError {
	readonly code = "Timeout" as const;

	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super(`${operation} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Error thrown when an operation is aborted via AbortSignal.
 */
export class AbortError extends BleError {
	readonly code = "Aborted" as const;

	constructor(message = "Operation aborted") {
		super(message);
		this.name = "AbortError";
	}
}

/**
 * The radio could not scan (powered off, missing, or not permitted).
 */
export class DiscoveryUnavailableError extends BleError {
	readonly code = "DiscoveryUnavailable" as const;

	constructor(public readonly detail: string) {
		super(`Discovery unavailable: ${detail}`);
		this.name = "DiscoveryUnavailableError";
	}
}

export class ConnectTimeoutError extends BleError {
	readonly code = "ConnectTimeout" as const;

	constructor(
		public readonly address: string,
		public readonly timeout: number,
	) {
		super(`Connection to ${address} timed out after ${timeout}ms`);
		this.name = "ConnectTimeoutError";
	}
}

export class ConnectRefusedError extends BleError {
	readonly code = "ConnectRefused" as const;

	constructor(
		public readonly address: string,
		public readonly detail: string,
	) {
		super(`Connection to ${address} refused: ${detail}`);
		this.name = "ConnectRefusedError";
	}
}

/**
 * The host stack failed in a way that fits no narrower category.
 */
export class AdapterError extends BleError {
	readonly code = "AdapterError" as const;

	constructor(public readonly detail: string) {
		super(`Adapter error: ${detail}`);
		this.name = "AdapterError";
	}
}

export class AdapterCapacityExceededError extends BleError {
	readonly code = "AdapterCapacityExceeded" as const;

	constructor(public readonly maxConnections: number) {
		super(
			`Maximum connections (${maxConnections}) reached. Close a session before opening another.`,
		);
		this.name = "AdapterCapacityExceededError";
	}
}

/**
 * An exchange was requested while another one is in flight on the same session.
 */
export class SessionBusyError extends BleError {
	readonly code = "SessionBusy" as const;

	constructor(public readonly address: string | undefined) {
		super(
			`Session${address ? ` for ${address}` : ""} is busy with another operation`,
		);
		this.name = "SessionBusyError";
	}
}

/**
 * Error thrown when an operation is not allowed in the session's current state
 * (e.g. reading before services are resolved, or opening twice).
 */
export class InvalidStateError extends BleError {
	readonly code = "InvalidState" as const;

	constructor(
		public readonly operation: string,
		public readonly state: string,
	) {
		super(`Cannot ${operation} while session is ${state}`);
		this.name = "InvalidStateError";
	}
}

export class NoCapableCharacteristicError extends BleError {
	readonly code = "NoCapableCharacteristic" as const;

	constructor(public readonly capabilities: readonly Capability[]) {
		super(
			`No characteristic supports ${capabilities.length > 0 ? capabilities.join(" or ") : "the requested operation"}`,
		);
		this.name = "NoCapableCharacteristicError";
	}
}

/**
 * The caller supplied a payload that cannot be encoded. No adapter call was made.
 */
export class MalformedPayloadError extends BleError {
	readonly code = "MalformedPayload" as const;

	constructor(public readonly detail: string) {
		super(`Malformed payload: ${detail}`);
		this.name = "MalformedPayloadError";
	}
}

export class WriteRejectedError extends BleError {
	readonly code = "WriteRejected" as const;

	constructor(
		public readonly characteristicId: string,
		public readonly detail: string,
		public readonly status?: number | undefined,
	) {
		super(`Write to ${characteristicId} rejected: ${detail}`);
		this.name = "WriteRejectedError";
	}
}

export class ReadError extends BleError {
	readonly code = "ReadError" as const;

	constructor(
		public readonly characteristicId: string,
		public readonly detail: string,
		public readonly status?: number | undefined,
	) {
		super(`Read from ${characteristicId} failed: ${detail}`);
		this.name = "ReadError";
	}
}

/**
 * The peer answered a GATT request with an error status.
 */
export class PeerRejectedError extends BleError {
	readonly code = "PeerRejected" as const;

	constructor(
		public readonly operation: string,
		public readonly detail: string,
		public readonly status?: number | undefined,
	) {
		super(`${operation} rejected by peer: ${detail}`);
		this.name = "PeerRejectedError";
	}
}

/**
 * The connection dropped. The session is disconnected when this surfaces.
 */
export class LinkLostError extends BleError {
	readonly code = "LinkLost" as const;

	constructor(public readonly address: string | undefined) {
		super(`Link${address ? ` to ${address}` : ""} lost`);
		this.name = "LinkLostError";
	}
}

// =============================================================================
// Adapter-side failures
// =============================================================================

/**
 * How a host stack failed.
 * - 'unavailable': radio missing, powered off, or not permitted
 * - 'timeout': the stack gave up waiting
 * - 'refused': the peer (or the stack on its behalf) declined the connection
 * - 'linkLost': the connection is gone
 * - 'gatt': the peer answered with a GATT error status
 * - 'capacity': no free connection slot
 */
export type AdapterFailureKind =
	| "unavailable"
	| "timeout"
	| "refused"
	| "linkLost"
	| "gatt"
	| "capacity";

/**
 * Thrown by `RadioAdapter` implementations. The core maps it onto a `BleError`.
 */
export class AdapterFailure extends Error {
	constructor(
		public readonly kind: AdapterFailureKind,
		message: string,
		public readonly status?: number | undefined,
	) {
		super(message);
		this.name = "AdapterFailure";
	}
}

// =============================================================================
// Helpers
// =============================================================================

function abortMessage(signal: AbortSignal): string {
	const reason: unknown = signal.reason;
	return reason instanceof Error
		? reason.message
		: typeof reason === "string"
			? reason
			: "Operation aborted";
}

/**
 * Converts an aborted signal's reason into the error to reject with.
 * A `BleError` reason (e.g. `LinkLostError`) is passed through unchanged.
 */
export function abortReason(signal: AbortSignal): BleError {
	const reason: unknown = signal.reason;
	if (reason instanceof BleError) {
		return reason;
	}
	return new AbortError(abortMessage(signal));
}

/**
 * Throws if the given signal is aborted.
 * Use this at the start of async operations to fail fast on abort.
 *
 * @example
 * ```typescript
 * async function myOperation(signal?: AbortSignal) {
 *   throwIfAborted(signal);
 *   // ... perform operation
 * }
 * ```
 *
 * @throws {AbortError} If the signal is aborted (or the `BleError` it was aborted with)
 */
export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw abortReason(signal);
	}
}

/**
 * Races a promise against an AbortSignal, rejecting if the signal fires first.
 *
 * Note: This does NOT cancel the underlying promise - it continues running
 * in the background.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * setTimeout(() => controller.abort(), 5000);
 *
 * try {
 *   const value = await raceWithAbort(adapter.readCharacteristic(handle, ref), controller.signal);
 * } catch (e) {
 *   if (e instanceof AbortError) {
 *     console.log('Operation was aborted');
 *   }
 * }
 * ```
 */
export function raceWithAbort<T>(
	promise: Promise<T>,
	signal?: AbortSignal,
): Promise<T> {
	if (!signal) return promise;

	return new Promise((resolve, reject) => {
		const abortHandler = () => {
			reject(abortReason(signal));
		};

		if (signal.aborted) {
			abortHandler();
			return;
		}

		signal.addEventListener("abort", abortHandler, { once: true });

		promise
			.then(resolve, reject)
			.finally(() => signal.removeEventListener("abort", abortHandler));
	});
}

/**
 * Normalizes any thrown value into an Error instance.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}

/**
 * Maps any thrown value onto the taxonomy. `BleError`s pass through;
 * everything else becomes an `AdapterError` carrying the original message.
 */
export function toBleError(e: unknown): BleError {
	if (e instanceof BleError) {
		return e;
	}
	return new AdapterError(normalizeError(e).message);
}

/**
 * Maps a failure from a GATT-level adapter call onto the taxonomy.
 *
 * - `AdapterFailure('linkLost')` becomes `LinkLostError`
 * - `AdapterFailure('timeout')` becomes `TimeoutError` (the link is kept)
 * - `AdapterFailure('gatt')` becomes `PeerRejectedError` with the status code
 * - `BleError`s pass through; anything else becomes `AdapterError`
 */
export function classifyAdapterFailure(
	error: unknown,
	operation: string,
	address?: string | undefined,
	timeoutMs = 0,
): BleError {
	if (error instanceof AdapterFailure) {
		switch (error.kind) {
			case "linkLost":
				return new LinkLostError(address);
			case "timeout":
				return new TimeoutError(operation, timeoutMs);
			case "gatt":
				return new PeerRejectedError(operation, error.message, error.status);
			default:
				return new AdapterError(error.message);
		}
	}
	return toBleError(error);
}

/**
 * Wraps a promise with a timeout.
 * If the promise doesn't settle within the specified time,
 * rejects with a TimeoutError.
 *
 * **Important:** This does NOT cancel the underlying operation.
 *
 * @param label - Descriptive label for the operation (used in error message)
 * @throws {TimeoutError} If the operation times out
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	label: string,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timeoutId = setTimeout(() => {
			reject(new TimeoutError(label, ms));
		}, ms);

		promise
			.then((value) => {
				clearTimeout(timeoutId);
				resolve(value);
			})
			.catch((error: unknown) => {
				clearTimeout(timeoutId);
				reject(error);
			});
	});
}

const TRANSIENT_CODES: ReadonlySet<BleErrorCode> = new Set<BleErrorCode>([
	"ConnectTimeout",
	"ConnectRefused",
	"Timeout",
	"LinkLost",
	"AdapterError",
]);

/**
 * Determines if an error is transient and worth retrying.
 *
 * Retries on connection timeouts and refusals, operation timeouts, link loss
 * and unclassified adapter errors.
 *
 * Does NOT retry on aborts, caller errors (malformed payloads, invalid state,
 * busy sessions), missing characteristics, capacity limits, peer rejections,
 * or errors from outside the taxonomy (fail-fast).
 */
export function isTransientBLEError(error: Error): boolean {
	if (error instanceof BleError) {
		return TRANSIENT_CODES.has(error.code);
	}
	return false;
}
