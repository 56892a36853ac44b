import {
	DEFAULT_READ_TIMEOUT_MS,
	DEFAULT_SUBSCRIBE_TIMEOUT_MS,
	DEFAULT_WRITE_TIMEOUT_MS,
	read as readExchange,
	type Subscription,
	subscribe as subscribeExchange,
	type WriteAck,
	write as writeExchange,
} from "./ble/exchange";
import { createOperationQueue } from "./ble/operation-queue";
import {
	createProber,
	DEFAULT_PROBE_TIMEOUT_MS,
	type ProbeOptions,
	type ProbeReport,
} from "./ble/prober";
import {
	findCharacteristic,
	selectFirst,
	selectOne,
	WRITABLE,
} from "./ble/selector";
import {
	createSession,
	DEFAULT_RESOLVE_TIMEOUT_MS,
	type OpenOptions,
	type Session,
} from "./ble/session";
import { createSessionPool, type SessionPool } from "./ble/session-pool";
import { DEFAULT_CONNECT_TIMEOUT_MS } from "./ble/transport";
import {
	InvalidStateError,
	normalizeError,
	toBleError,
} from "./errors/errors";
import {
	createDeviceRegistry,
	DEFAULT_DISCOVERY_WINDOW_MS,
	type DeviceRegistry,
	type DiscoveryOptions,
} from "./registry/device-registry";
import type {
	Capability,
	Characteristic,
	Device,
	RadioAdapter,
	Service,
} from "./types";
import type { Payload } from "./utils/bytes";

export interface CentralOptions {
	/** @default 5000 */
	discoveryWindowMs?: number;
	/** @default 10000 */
	connectTimeoutMs?: number;
	/** @default 5000 */
	probeTimeoutMs?: number;
	/** @default 10000 */
	resolveTimeoutMs?: number;
	/** @default 10000 */
	writeTimeoutMs?: number;
	/** @default 5000 */
	readTimeoutMs?: number;
	/** @default 15000 */
	subscribeTimeoutMs?: number;
	/**
	 * Simultaneous sessions allowed. Capped at what the adapter reports.
	 * @default adapter.capabilities.maxConnections
	 */
	maxConnections?: number;
	/** Log prefix for warning messages */
	logPrefix?: string;
}

/**
 * Per-call options for exchanges. Timeouts default to the central's settings.
 */
export interface CallOptions {
	timeoutMs?: number | undefined;
	signal?: AbortSignal | undefined;
}

export interface WriteOptions extends CallOptions {
	/**
	 * Write with or without response. By default acknowledged writes are used
	 * when the characteristic supports them.
	 */
	mode?: "write" | "writeWithoutResponse" | undefined;
}

/**
 * Caller-facing surface of the library: one radio, its device registry and
 * the sessions opened on it.
 *
 * Every method resolves with its result or rejects with a single `BleError`.
 */
export interface Central {
	readonly adapter: RadioAdapter;
	readonly registry: DeviceRegistry;
	/** Sessions currently holding a connection slot */
	readonly sessions: Session[];

	/** Scans for a window and returns the registry snapshot */
	discover(windowMs?: number, options?: DiscoveryOptions): Promise<Device[]>;

	/** Streams devices as they are first seen during a window */
	startDiscovery(
		windowMs?: number,
		options?: DiscoveryOptions,
	): AsyncIterable<Device>;

	/** Devices known so far, sorted for presentation */
	snapshot(): Device[];

	/** Narrows devices to the ones that accept a connection */
	probeConnectable(
		devices: readonly Device[],
		options?: ProbeOptions,
	): Promise<ProbeReport>;

	/**
	 * Opens a session. A failed open leaves nothing behind.
	 * @throws AdapterCapacityExceededError | ConnectTimeoutError | ConnectRefusedError | AbortError
	 */
	openSession(target: string | Device, options?: OpenOptions): Promise<Session>;

	/** Resolves services once per connection */
	resolve(session: Session): Promise<readonly Service[]>;

	/**
	 * Picks a characteristic among the resolved services.
	 *
	 * Without a preference, takes the first characteristic in enumeration
	 * order that accepts writes of either kind. A preference ranks
	 * capabilities explicitly, e.g. `["write", "writeWithoutResponse"]`.
	 *
	 * @throws InvalidStateError if services are not resolved
	 * @throws NoCapableCharacteristicError when nothing matches
	 */
	selectCharacteristic(
		session: Session,
		preference?: Capability | readonly Capability[],
	): Characteristic;

	/** Looks a characteristic up by UUID among the resolved services */
	findCharacteristic(
		session: Session,
		characteristicId: string,
		serviceId?: string,
	): Characteristic | undefined;

	write(
		session: Session,
		characteristic: Characteristic,
		payload: Payload,
		options?: WriteOptions,
	): Promise<WriteAck>;

	read(
		session: Session,
		characteristic: Characteristic,
		options?: CallOptions,
	): Promise<Uint8Array>;

	subscribe(
		session: Session,
		characteristic: Characteristic,
		options?: CallOptions,
	): Promise<Subscription>;

	unsubscribe(subscription: Subscription): Promise<void>;

	/** Closes a session. Idempotent. */
	closeSession(session: Session): Promise<void>;

	/** Closes every open session */
	shutdown(): Promise<void>;
}

async function guard<T>(run: () => Promise<T>): Promise<T> {
	try {
		return await run();
	} catch (error) {
		throw toBleError(error);
	}
}

/**
 * Creates a central on a radio adapter.
 *
 * @example Discover, connect, write
 * ```typescript
 * const central = createCentral(createNobleAdapter());
 *
 * const devices = await central.discover();
 * const { connectable } = await central.probeConnectable(devices);
 * const session = await central.openSession(connectable[0]);
 * try {
 *   await central.resolve(session);
 *   const target = central.selectCharacteristic(session);
 *   await central.write(session, target, text("PING"));
 * } finally {
 *   await central.closeSession(session);
 * }
 * ```
 */
export function createCentral(
	adapter: RadioAdapter,
	options: CentralOptions = {},
): Central {
	const {
		discoveryWindowMs = DEFAULT_DISCOVERY_WINDOW_MS,
		connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS,
		probeTimeoutMs = DEFAULT_PROBE_TIMEOUT_MS,
		resolveTimeoutMs = DEFAULT_RESOLVE_TIMEOUT_MS,
		writeTimeoutMs = DEFAULT_WRITE_TIMEOUT_MS,
		readTimeoutMs = DEFAULT_READ_TIMEOUT_MS,
		subscribeTimeoutMs = DEFAULT_SUBSCRIBE_TIMEOUT_MS,
		logPrefix = "[gatt-central-kit:central]",
	} = options;

	const adapterMax = adapter.capabilities.maxConnections;
	const maxConnections = Math.min(
		options.maxConnections ?? adapterMax,
		adapterMax,
	);

	const queue = createOperationQueue();
	const pool: SessionPool<Session> = createSessionPool({
		maxConnections,
		logPrefix,
	});
	const registry = createDeviceRegistry(adapter, { logPrefix });
	const prober = createProber(adapter, { queue, logPrefix });

	function servicesOf(session: Session, operation: string): readonly Service[] {
		const { services } = session;
		if (!services) {
			throw new InvalidStateError(operation, session.state);
		}
		return services;
	}

	async function openSession(
		target: string | Device,
		openOptions: OpenOptions = {},
	): Promise<Session> {
		const address = typeof target === "string" ? target : target.address;
		const session = createSession(adapter, {
			queue,
			pool,
			resolveTimeoutMs,
			logPrefix,
		});
		try {
			await session.open(address, {
				timeoutMs: openOptions.timeoutMs ?? connectTimeoutMs,
				signal: openOptions.signal,
			});
		} catch (error) {
			try {
				await session.close();
			} catch (e) {
				console.warn(
					`${logPrefix} Error cleaning up failed session to ${address}:`,
					normalizeError(e).message,
				);
			}
			throw toBleError(error);
		}
		return session;
	}

	return {
		adapter,
		registry,
		get sessions() {
			return pool.getSessions();
		},
		discover: (windowMs = discoveryWindowMs, discoveryOptions) =>
			guard(() => registry.discover(windowMs, discoveryOptions)),
		startDiscovery: (windowMs = discoveryWindowMs, discoveryOptions) =>
			registry.startDiscovery(windowMs, discoveryOptions),
		snapshot: () => registry.snapshot(),
		probeConnectable: (devices, probeOptions = {}) =>
			guard(() =>
				prober.probe(devices, {
					perDeviceTimeoutMs: probeOptions.perDeviceTimeoutMs ?? probeTimeoutMs,
					signal: probeOptions.signal,
				}),
			),
		openSession,
		resolve: (session) => guard(() => session.resolveServices()),
		selectCharacteristic(session, preference) {
			const services = servicesOf(session, "select a characteristic");
			return preference === undefined
				? selectFirst(services, WRITABLE)
				: selectOne(services, preference);
		},
		findCharacteristic(session, characteristicId, serviceId) {
			return findCharacteristic(
				servicesOf(session, "look up a characteristic"),
				characteristicId,
				serviceId,
			);
		},
		write: (session, characteristic, payload, writeOptions = {}) =>
			guard(() => {
				const operation =
					writeOptions.mode ??
					(characteristic.capabilities.has("write")
						? "write"
						: "writeWithoutResponse");
				return writeExchange(
					session,
					{ operation, characteristic, payload },
					{
						timeoutMs: writeOptions.timeoutMs ?? writeTimeoutMs,
						signal: writeOptions.signal,
						logPrefix,
					},
				);
			}),
		read: (session, characteristic, callOptions = {}) =>
			guard(() =>
				readExchange(
					session,
					{ operation: "read", characteristic },
					{
						timeoutMs: callOptions.timeoutMs ?? readTimeoutMs,
						signal: callOptions.signal,
						logPrefix,
					},
				),
			),
		subscribe: (session, characteristic, callOptions = {}) =>
			guard(() =>
				subscribeExchange(
					session,
					{ operation: "subscribe", characteristic },
					{
						timeoutMs: callOptions.timeoutMs ?? subscribeTimeoutMs,
						signal: callOptions.signal,
						logPrefix,
					},
				),
			),
		unsubscribe: (subscription) => guard(() => subscription.unsubscribe()),
		closeSession: (session) => guard(() => session.close()),
		shutdown: () => pool.closeAll(),
	};
}
