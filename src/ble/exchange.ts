import {
	AdapterFailure,
	type BleError,
	classifyAdapterFailure,
	InvalidStateError,
	NoCapableCharacteristicError,
	normalizeError,
	PeerRejectedError,
	ReadError,
	withTimeout,
	WriteRejectedError,
} from "../errors/errors";
import type {
	Capability,
	Characteristic,
	CharacteristicRef,
	RadioAdapter,
	SubscriptionHandle,
} from "../types";
import { encodePayload, type Payload } from "../utils/bytes";
import { createNotificationStream } from "./notification-stream";
import type { Session } from "./session";

/** Default timeout for BLE write operations in milliseconds */
export const DEFAULT_WRITE_TIMEOUT_MS = 10000;

/** Default timeout for BLE read operations in milliseconds */
export const DEFAULT_READ_TIMEOUT_MS = 5000;

/** Default timeout for enabling notifications in milliseconds */
export const DEFAULT_SUBSCRIBE_TIMEOUT_MS = 15000;

export interface WriteRequest {
	readonly operation: "write" | "writeWithoutResponse";
	readonly characteristic: Characteristic;
	readonly payload: Payload;
}

export interface ReadRequest {
	readonly operation: "read";
	readonly characteristic: Characteristic;
}

export interface SubscribeRequest {
	readonly operation: "subscribe";
	readonly characteristic: Characteristic;
}

/**
 * One data exchange with a characteristic.
 * The `operation` tag decides the result type of {@link execute}.
 */
export type ExchangeRequest = WriteRequest | ReadRequest | SubscribeRequest;

export type ExchangeOperation = ExchangeRequest["operation"];

export interface ExchangeOptions {
	/** Per-operation timeout; the default depends on the operation */
	timeoutMs?: number | undefined;
	/**
	 * Cancels the operation. Aborting an exchange in flight closes the session.
	 * For subscriptions the signal also ends the stream later on.
	 */
	signal?: AbortSignal | undefined;
	/** Log prefix for warning messages */
	logPrefix?: string | undefined;
}

/**
 * Result of a write.
 */
export interface WriteAck {
	readonly characteristic: Characteristic;
	readonly bytesWritten: number;
	/** True when the peer acknowledged (write with response) */
	readonly acknowledged: boolean;
}

/**
 * A value pushed by the peer.
 */
export interface Notification {
	readonly characteristic: Characteristic;
	readonly value: Uint8Array;
	readonly receivedAt: Date;
}

/**
 * A live notification registration.
 *
 * Iterate it to receive values in arrival order. Nothing is dropped or
 * coalesced; values wait in an unbounded buffer until consumed.
 * The iteration ends after `unsubscribe()`, when the signal given to
 * `subscribe` aborts, or when the session disconnects.
 *
 * @example
 * ```typescript
 * const subscription = await subscribe(session, characteristic);
 * for await (const { value } of subscription) {
 *   console.log(decodeText(value));
 *   if (done) await subscription.unsubscribe();
 * }
 * ```
 */
export interface Subscription extends AsyncIterable<Notification> {
	readonly characteristic: Characteristic;
	readonly active: boolean;
	/** Disables notifications. Idempotent. */
	unsubscribe(): Promise<void>;
}

export type ExchangeResult = WriteAck | Uint8Array | Subscription;

function refOf(characteristic: Characteristic): CharacteristicRef {
	return {
		serviceId: characteristic.service.id,
		characteristicId: characteristic.id,
	};
}

function requiredCapabilities(
	operation: ExchangeOperation,
): readonly Capability[] {
	switch (operation) {
		case "write":
			return ["write"];
		case "writeWithoutResponse":
			return ["writeWithoutResponse"];
		case "read":
			return ["read"];
		case "subscribe":
			return ["notify", "indicate"];
	}
}

function classifyExchangeError(
	error: unknown,
	operation: ExchangeOperation,
	characteristic: Characteristic,
	address: string | undefined,
	timeoutMs: number,
): BleError {
	const label = `${operation} ${characteristic.id}`;
	if (error instanceof AdapterFailure && error.kind === "gatt") {
		switch (operation) {
			case "write":
			case "writeWithoutResponse":
				return new WriteRejectedError(
					characteristic.id,
					error.message,
					error.status,
				);
			case "read":
				return new ReadError(characteristic.id, error.message, error.status);
			case "subscribe":
				return new PeerRejectedError(label, error.message, error.status);
		}
	}
	return classifyAdapterFailure(error, label, address, timeoutMs);
}

/**
 * Checks everything that can be checked without touching the radio.
 */
function validate(session: Session, request: ExchangeRequest): void {
	const { characteristic, operation } = request;
	if (session.services && !session.owns(characteristic)) {
		throw new InvalidStateError(
			`${operation} a characteristic from another connection`,
			session.state,
		);
	}
	const required = requiredCapabilities(operation);
	if (!required.some((cap) => characteristic.capabilities.has(cap))) {
		throw new NoCapableCharacteristicError(required);
	}
}

/**
 * Writes a payload. The payload is encoded before the session turns busy,
 * so a malformed payload never reaches the adapter.
 *
 * Without response, the promise settles once the host accepted the write.
 *
 * @throws MalformedPayloadError for malformed hex payloads
 * @throws WriteRejectedError when the peer declines
 * @throws TimeoutError | LinkLostError | SessionBusyError | InvalidStateError
 */
export async function write(
	session: Session,
	request: WriteRequest,
	options: ExchangeOptions = {},
): Promise<WriteAck> {
	const { characteristic, operation } = request;
	const timeoutMs = options.timeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
	const bytes = encodePayload(request.payload);
	validate(session, request);

	const withResponse = operation === "write";
	const { adapter } = session;
	return session.exclusive(
		operation,
		async ({ handle }) => {
			try {
				await withTimeout(
					adapter.writeCharacteristic(
						handle,
						refOf(characteristic),
						bytes,
						withResponse,
					),
					timeoutMs,
					`Write to ${characteristic.id}`,
				);
			} catch (error) {
				throw classifyExchangeError(
					error,
					operation,
					characteristic,
					session.targetAddress,
					timeoutMs,
				);
			}
			return {
				characteristic,
				bytesWritten: bytes.length,
				acknowledged: withResponse,
			};
		},
		{ signal: options.signal },
	);
}

/**
 * Reads the current value. Bytes are returned as received; see `decodeText`
 * and `bytesToHex` for rendering.
 *
 * @throws ReadError when the peer declines
 * @throws TimeoutError | LinkLostError | SessionBusyError | InvalidStateError
 */
export async function read(
	session: Session,
	request: ReadRequest,
	options: ExchangeOptions = {},
): Promise<Uint8Array> {
	const { characteristic } = request;
	const timeoutMs = options.timeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
	validate(session, request);

	const { adapter } = session;
	return session.exclusive(
		"read",
		async ({ handle }) => {
			try {
				return await withTimeout(
					adapter.readCharacteristic(handle, refOf(characteristic)),
					timeoutMs,
					`Read from ${characteristic.id}`,
				);
			} catch (error) {
				throw classifyExchangeError(
					error,
					"read",
					characteristic,
					session.targetAddress,
					timeoutMs,
				);
			}
		},
		{ signal: options.signal },
	);
}

function releaseLateSubscription(
	adapter: RadioAdapter,
	pending: Promise<SubscriptionHandle>,
	logPrefix: string,
): void {
	pending
		.then(
			(late) => adapter.unsubscribe(late),
			// Rejections here are reported to the subscriber already
			() => undefined,
		)
		.catch((e: unknown) => {
			console.warn(
				`${logPrefix} Error releasing abandoned subscription:`,
				normalizeError(e).message,
			);
		});
}

/**
 * Enables notifications and returns them as a stream.
 * The session is free for other exchanges again as soon as the registration
 * is in place.
 *
 * @throws PeerRejectedError when the peer declines
 * @throws TimeoutError | LinkLostError | SessionBusyError | InvalidStateError
 */
export async function subscribe(
	session: Session,
	request: SubscribeRequest,
	options: ExchangeOptions = {},
): Promise<Subscription> {
	const { characteristic } = request;
	const timeoutMs = options.timeoutMs ?? DEFAULT_SUBSCRIBE_TIMEOUT_MS;
	const logPrefix = options.logPrefix ?? "[gatt-central-kit:exchange]";
	const { signal } = options;
	validate(session, request);

	const { adapter } = session;
	const stream = createNotificationStream<Notification>();

	const registration = await session.exclusive(
		"subscribe",
		async ({ handle, signal: operationSignal }) => {
			const pending = adapter.subscribe(
				handle,
				refOf(characteristic),
				(value) => {
					stream.push({ characteristic, value, receivedAt: new Date() });
				},
			);
			try {
				const registered = await withTimeout(
					pending,
					timeoutMs,
					`Subscribe to ${characteristic.id}`,
				);
				if (operationSignal.aborted) {
					releaseLateSubscription(adapter, pending, logPrefix);
				}
				return registered;
			} catch (error) {
				releaseLateSubscription(adapter, pending, logPrefix);
				throw classifyExchangeError(
					error,
					"subscribe",
					characteristic,
					session.targetAddress,
					timeoutMs,
				);
			}
		},
		{ signal },
	);

	let stopping: Promise<void> | undefined;

	const stopOnDisconnect = session.onStateChange((_from, to) => {
		if (to === "disconnected") {
			void unsubscribe();
		}
	});
	const onAbort = () => {
		void unsubscribe();
	};
	signal?.addEventListener("abort", onAbort, { once: true });

	async function stop(): Promise<void> {
		stopOnDisconnect();
		signal?.removeEventListener("abort", onAbort);
		stream.end();
		try {
			await adapter.unsubscribe(registration);
		} catch (e) {
			console.warn(
				`${logPrefix} Error stopping notifications on ${characteristic.id}:`,
				normalizeError(e).message,
			);
		}
	}

	function unsubscribe(): Promise<void> {
		stopping ??= stop();
		return stopping;
	}

	if (session.state === "disconnected" || signal?.aborted) {
		await unsubscribe();
	}

	return {
		characteristic,
		get active() {
			return stopping === undefined;
		},
		unsubscribe,
		[Symbol.asyncIterator]: () => stream[Symbol.asyncIterator](),
	};
}

/**
 * Runs one exchange request on a session.
 *
 * The session must have its services resolved; it is `busy` for the
 * duration and returns to `servicesResolved` afterwards, unless the link
 * was lost or the caller aborted.
 *
 * @example
 * ```typescript
 * const ack = await execute(session, {
 *   operation: "write",
 *   characteristic,
 *   payload: hex("48656c6c6f"),
 * });
 * const reply = await execute(session, { operation: "read", characteristic });
 * ```
 */
export function execute(
	session: Session,
	request: WriteRequest,
	options?: ExchangeOptions,
): Promise<WriteAck>;
export function execute(
	session: Session,
	request: ReadRequest,
	options?: ExchangeOptions,
): Promise<Uint8Array>;
export function execute(
	session: Session,
	request: SubscribeRequest,
	options?: ExchangeOptions,
): Promise<Subscription>;
export function execute(
	session: Session,
	request: ExchangeRequest,
	options?: ExchangeOptions,
): Promise<ExchangeResult>;
export function execute(
	session: Session,
	request: ExchangeRequest,
	options: ExchangeOptions = {},
): Promise<ExchangeResult> {
	switch (request.operation) {
		case "write":
		case "writeWithoutResponse":
			return write(session, request, options);
		case "read":
			return read(session, request, options);
		case "subscribe":
			return subscribe(session, request, options);
	}
}
