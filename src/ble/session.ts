import {
	AbortError,
	abortReason,
	classifyAdapterFailure,
	InvalidStateError,
	LinkLostError,
	normalizeError,
	raceWithAbort,
	SessionBusyError,
	throwIfAborted,
	withTimeout,
} from "../errors/errors";
import { createEventEmitter, createStateMachine } from "../state";
import type {
	Characteristic,
	ConnectionHandle,
	RadioAdapter,
	Service,
	ServiceDescriptor,
	SessionState,
} from "../types";
import {
	createOperationQueue,
	type OperationQueue,
	RADIO_LANE,
} from "./operation-queue";
import type { SessionPool } from "./session-pool";
import { connectWithTimeout, DEFAULT_CONNECT_TIMEOUT_MS } from "./transport";

/** Default timeout for service resolution in milliseconds */
export const DEFAULT_RESOLVE_TIMEOUT_MS = 10000;

/**
 * Events emitted by a session.
 */
export interface SessionEvents extends Record<string, unknown> {
	stateChange: { from: SessionState; to: SessionState };
	/** The link dropped without the central asking for it */
	linkLost: { address: string };
}

export interface SessionOptions {
	/**
	 * Queue shared by everything that connects on the same radio.
	 * Defaults to a private queue.
	 */
	queue?: OperationQueue | undefined;
	/** Pool enforcing the simultaneous-connection limit */
	pool?: SessionPool<Session> | undefined;
	/** @default 10000 */
	resolveTimeoutMs?: number | undefined;
	/** Log prefix for warning messages */
	logPrefix?: string | undefined;
}

export interface OpenOptions {
	/** @default 10000 */
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
}

/**
 * Handed to the body of an exclusive operation.
 */
export interface ExclusiveContext {
	readonly handle: ConnectionHandle;
	/**
	 * Fires on link loss (with `LinkLostError`), on close, or when the
	 * caller's signal aborts.
	 */
	readonly signal: AbortSignal;
}

/**
 * One GATT connection to one peripheral, driven by a state machine.
 *
 * ```
 * idle ─open─▶ connecting ─▶ connected ─resolveServices─▶ servicesResolved ⇄ busy
 *                  │                                                │
 *                  ▼                                                ▼
 *               failed ─open─▶ connecting          close / link loss ─▶ disconnected
 * ```
 *
 * Every successful open is paired with exactly one `adapter.disconnect`.
 */
export interface Session {
	readonly adapter: RadioAdapter;
	readonly state: SessionState;
	/** Address passed to the latest `open` */
	readonly targetAddress: string | undefined;
	/** Resolved services; only set in `servicesResolved` and `busy` */
	readonly services: readonly Service[] | undefined;

	/**
	 * Connects to a peripheral. Allowed from `idle` and `failed`.
	 * Never retried here; see `openWithRetry`.
	 *
	 * @throws InvalidStateError if the session is not idle or failed
	 * @throws AdapterCapacityExceededError if every connection slot is taken
	 * @throws ConnectTimeoutError | ConnectRefusedError | AdapterError (session is `failed`)
	 * @throws AbortError if the signal fired (session is `disconnected`)
	 */
	open(address: string, options?: OpenOptions): Promise<void>;

	/**
	 * Enumerates services once per connection. Later calls return the cached list.
	 * A failed enumeration leaves the session `connected`, so it can be tried again.
	 */
	resolveServices(): Promise<readonly Service[]>;

	/**
	 * Runs `run` while holding the session `busy`.
	 *
	 * @throws SessionBusyError if another operation is in flight
	 * @throws InvalidStateError unless services are resolved
	 */
	exclusive<T>(
		operation: string,
		run: (context: ExclusiveContext) => Promise<T>,
		options?: { signal?: AbortSignal | undefined },
	): Promise<T>;

	/** Whether the characteristic came from this connection's service resolution */
	owns(characteristic: Characteristic): boolean;

	/** Closes the session. Idempotent; always releases the connection. */
	close(): Promise<void>;

	onStateChange(
		callback: (from: SessionState, to: SessionState) => void,
	): () => void;
	onLinkLost(callback: (address: string) => void): () => void;
}

/**
 * Builds frozen entities from the host's service listing.
 * Each characteristic keeps a back-reference to its service.
 */
function buildServices(
	descriptors: readonly ServiceDescriptor[],
): readonly Service[] {
	return Object.freeze(
		descriptors.map((descriptor) => {
			const characteristics: Characteristic[] = [];
			const service: Service = Object.freeze({
				id: descriptor.id,
				characteristics,
			});
			for (const c of descriptor.characteristics) {
				characteristics.push(
					Object.freeze({
						id: c.id,
						capabilities: new Set(c.capabilities),
						service,
					}),
				);
			}
			Object.freeze(characteristics);
			return service;
		}),
	);
}

/**
 * Creates a session bound to a radio adapter.
 *
 * @example One exchange
 * ```typescript
 * const session = createSession(adapter);
 * await session.open("aa:bb:cc:dd:ee:ff", { timeoutMs: 5000 });
 * try {
 *   const services = await session.resolveServices();
 *   // ...
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export function createSession(
	adapter: RadioAdapter,
	options: SessionOptions = {},
): Session {
	const {
		queue = createOperationQueue(),
		pool,
		resolveTimeoutMs = DEFAULT_RESOLVE_TIMEOUT_MS,
		logPrefix = "[gatt-central-kit:session]",
	} = options;

	const machine = createStateMachine("idle");
	const emitter = createEventEmitter<SessionEvents>(logPrefix);

	let targetAddress: string | undefined;
	let handle: ConnectionHandle | undefined;
	// Aborted when the current connection ends (close or link loss)
	let connection: AbortController | undefined;
	let unregisterLinkLost: (() => void) | undefined;
	let services: readonly Service[] | undefined;
	let resolving: Promise<readonly Service[]> | undefined;
	let openController: AbortController | undefined;
	let opening: Promise<void> | undefined;
	let closing: Promise<void> | undefined;

	function move(to: SessionState): void {
		const from = machine.getState();
		machine.transition(to);
		emitter.emit("stateChange", { from, to });
	}

	async function releaseConnection(): Promise<void> {
		unregisterLinkLost?.();
		unregisterLinkLost = undefined;
		services = undefined;
		resolving = undefined;

		const current = handle;
		handle = undefined;
		if (current) {
			try {
				await adapter.disconnect(current);
			} catch (e) {
				console.warn(
					`${logPrefix} Error disconnecting from ${current.address}:`,
					normalizeError(e).message,
				);
			}
		}
		pool?.release(session);
	}

	function handleLinkLost(): void {
		if (machine.getState() === "disconnected") return;
		const address = targetAddress ?? "";

		move("disconnected");
		connection?.abort(new LinkLostError(targetAddress));
		closing = releaseConnection();
		emitter.emit("linkLost", { address });
	}

	async function connect(
		address: string,
		timeoutMs: number,
		controller: AbortController,
	): Promise<ConnectionHandle> {
		const connected = await queue.enqueue(
			RADIO_LANE,
			async () => {
				const h = await connectWithTimeout(adapter, address, {
					timeoutMs,
					signal: controller.signal,
					logPrefix,
				});
				// The queue has already given up on us if the signal fired
				if (controller.signal.aborted) {
					await adapter.disconnect(h);
					throw abortReason(controller.signal);
				}
				return h;
			},
			{ signal: controller.signal },
		);

		if (controller.signal.aborted || machine.getState() !== "connecting") {
			await adapter.disconnect(connected);
			throw controller.signal.aborted
				? abortReason(controller.signal)
				: new AbortError("Session closed");
		}
		return connected;
	}

	async function open(
		address: string,
		openOptions: OpenOptions = {},
	): Promise<void> {
		const { timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS, signal } = openOptions;

		const state = machine.getState();
		if (state !== "idle" && state !== "failed") {
			throw new InvalidStateError("open", state);
		}
		throwIfAborted(signal);

		pool?.reserve(session);
		targetAddress = address;
		move("connecting");

		const controller = new AbortController();
		openController = controller;
		const onAbort = () => {
			if (signal) controller.abort(abortReason(signal));
		};
		signal?.addEventListener("abort", onAbort, { once: true });

		const attempt = (async () => {
			try {
				const h = await connect(address, timeoutMs, controller);
				handle = h;
				connection = new AbortController();
				unregisterLinkLost = adapter.onLinkLost(h, handleLinkLost);
				move("connected");
			} catch (error) {
				pool?.release(session);
				if (machine.getState() === "connecting") {
					move(controller.signal.aborted ? "disconnected" : "failed");
				}
				throw controller.signal.aborted
					? abortReason(controller.signal)
					: error;
			} finally {
				signal?.removeEventListener("abort", onAbort);
				openController = undefined;
			}
		})();

		opening = attempt;
		try {
			await attempt;
		} finally {
			if (opening === attempt) opening = undefined;
		}
	}

	async function resolveServices(): Promise<readonly Service[]> {
		const state = machine.getState();
		if ((state === "servicesResolved" || state === "busy") && services) {
			return services;
		}
		if (state !== "connected" || !handle || !connection) {
			throw new InvalidStateError("resolve services", state);
		}

		resolving ??= enumerate(handle, connection.signal);
		const pending = resolving;
		try {
			return await pending;
		} catch (error) {
			if (resolving === pending) resolving = undefined;
			throw error;
		}
	}

	async function enumerate(
		h: ConnectionHandle,
		signal: AbortSignal,
	): Promise<readonly Service[]> {
		try {
			const descriptors = await raceWithAbort(
				withTimeout(
					adapter.resolveServices(h),
					resolveTimeoutMs,
					"Service resolution",
				),
				signal,
			);
			if (signal.aborted) throw abortReason(signal);

			const resolved = buildServices(descriptors);
			services = resolved;
			move("servicesResolved");
			return resolved;
		} catch (error) {
			const classified = classifyAdapterFailure(
				error,
				"Service resolution",
				targetAddress,
				resolveTimeoutMs,
			);
			if (classified instanceof LinkLostError) handleLinkLost();
			throw classified;
		}
	}

	async function exclusive<T>(
		operation: string,
		run: (context: ExclusiveContext) => Promise<T>,
		exclusiveOptions: { signal?: AbortSignal | undefined } = {},
	): Promise<T> {
		const { signal } = exclusiveOptions;
		const state = machine.getState();
		if (state === "busy") {
			throw new SessionBusyError(targetAddress);
		}
		if (state !== "servicesResolved" || !handle || !connection) {
			throw new InvalidStateError(operation, state);
		}
		throwIfAborted(signal);

		const h = handle;
		const connectionSignal = connection.signal;
		const controller = new AbortController();
		const onConnectionEnd = () =>
			controller.abort(abortReason(connectionSignal));
		const onCallerAbort = () => {
			if (signal) controller.abort(abortReason(signal));
		};
		connectionSignal.addEventListener("abort", onConnectionEnd, {
			once: true,
		});
		signal?.addEventListener("abort", onCallerAbort, { once: true });

		move("busy");
		try {
			return await raceWithAbort(
				run({ handle: h, signal: controller.signal }),
				controller.signal,
			);
		} catch (error) {
			if (error instanceof LinkLostError) {
				handleLinkLost();
			} else if (signal?.aborted) {
				// An abandoned exchange leaves the link in an unknown state
				await close();
			}
			throw error;
		} finally {
			connectionSignal.removeEventListener("abort", onConnectionEnd);
			signal?.removeEventListener("abort", onCallerAbort);
			if (machine.getState() === "busy") {
				move("servicesResolved");
			}
		}
	}

	async function shutdown(): Promise<void> {
		if (machine.getState() !== "disconnected") {
			move("disconnected");
		}
		const reason = new AbortError("Session closed");
		openController?.abort(reason);
		connection?.abort(reason);

		const pendingOpen = opening;
		if (pendingOpen) {
			// The caller of open() receives its error
			await pendingOpen.then(
				() => undefined,
				() => undefined,
			);
		}
		await releaseConnection();
	}

	function close(): Promise<void> {
		closing ??= shutdown();
		return closing;
	}

	const session: Session = {
		adapter,
		get state() {
			return machine.getState();
		},
		get targetAddress() {
			return targetAddress;
		},
		get services() {
			const state = machine.getState();
			return state === "servicesResolved" || state === "busy"
				? services
				: undefined;
		},
		open,
		resolveServices,
		exclusive,
		owns(characteristic: Characteristic): boolean {
			return services?.includes(characteristic.service) ?? false;
		},
		close,
		onStateChange(callback) {
			return emitter.on("stateChange", ({ from, to }) => callback(from, to));
		},
		onLinkLost(callback) {
			return emitter.on("linkLost", ({ address }) => callback(address));
		},
	};

	return session;
}
