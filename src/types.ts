/**
 * @fileoverview Core type definitions for gatt-central-kit.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`undefined`**: not known or not applicable
 *   - `device.displayName` is `undefined` when the peripheral advertised no name
 *   - `session.services` is `undefined` until services are resolved
 *   - `registry.get()` returns `undefined` for an address never seen
 *
 * - **`null`** is not used by this library's public API.
 *
 * Every entity handed to callers (devices, services, characteristics) is
 * frozen. A newer sighting or a new connection produces new objects instead of
 * mutating the ones already returned.
 */

/**
 * What a characteristic lets a central do with it.
 * - 'read': value can be read on demand
 * - 'write': write with response (peer acknowledges)
 * - 'writeWithoutResponse': write command, no acknowledgment
 * - 'notify': peer pushes values without acknowledgment
 * - 'indicate': peer pushes values and expects an acknowledgment
 */
export type Capability =
	| "read"
	| "write"
	| "writeWithoutResponse"
	| "notify"
	| "indicate";

/**
 * Advertisement metadata observed for a device during discovery.
 */
export interface Advertisement {
	/** Received Signal Strength Indicator in dBm */
	readonly signalStrength: number;
	/** Transmit power level in dBm, when advertised */
	readonly txPower?: number | undefined;
	/** Manufacturer-specific data keyed by Bluetooth SIG company ID */
	readonly manufacturerData: ReadonlyMap<number, Uint8Array>;
	/** Service-specific data keyed by service UUID */
	readonly serviceData: ReadonlyMap<string, Uint8Array>;
	/** Service UUIDs advertised by the device */
	readonly serviceIds: ReadonlySet<string>;
}

/**
 * A peripheral seen during discovery.
 */
export interface Device {
	/** Opaque, stable identifier (MAC address or host-assigned UUID) */
	readonly address: string;
	/** Human-readable name from the advertisement, if any */
	readonly displayName?: string | undefined;
	/** When the sighting that produced this record arrived */
	readonly lastSeen: Date;
	readonly advertisement?: Advertisement | undefined;
}

/**
 * A GATT service resolved on a live connection.
 */
export interface Service {
	readonly id: string;
	/** Characteristics in the order the peripheral enumerated them */
	readonly characteristics: readonly Characteristic[];
}

/**
 * A GATT characteristic resolved on a live connection.
 */
export interface Characteristic {
	readonly id: string;
	readonly capabilities: ReadonlySet<Capability>;
	/** The service this characteristic belongs to (non-owning) */
	readonly service: Service;
}

/**
 * Session lifecycle state.
 * - 'idle': created, never opened
 * - 'connecting': connection attempt in progress
 * - 'connected': link established, services not resolved yet
 * - 'servicesResolved': services cached, ready for exchanges
 * - 'busy': an exchange operation is in flight
 * - 'failed': the last connection attempt failed (may open again)
 * - 'disconnected': closed or link lost (terminal)
 */
export type SessionState =
	| "idle"
	| "connecting"
	| "connected"
	| "servicesResolved"
	| "busy"
	| "failed"
	| "disconnected";

// =============================================================================
// Radio adapter contract
// =============================================================================

/**
 * One advertisement report from the host stack.
 */
export interface Sighting {
	readonly address: string;
	readonly name?: string | undefined;
	/** Signal strength in dBm */
	readonly rssi: number;
	readonly txPower?: number | undefined;
	readonly manufacturerData?: ReadonlyMap<number, Uint8Array> | undefined;
	readonly serviceData?: ReadonlyMap<string, Uint8Array> | undefined;
	readonly serviceIds?: readonly string[] | undefined;
}

/**
 * Characteristic as reported by the host stack during service resolution.
 */
export interface CharacteristicDescriptor {
	readonly id: string;
	readonly capabilities: readonly Capability[];
}

/**
 * Service as reported by the host stack during service resolution.
 */
export interface ServiceDescriptor {
	readonly id: string;
	readonly characteristics: readonly CharacteristicDescriptor[];
}

/**
 * Opaque handle to a live connection owned by the adapter.
 */
export interface ConnectionHandle {
	readonly id: string;
	readonly address: string;
}

/**
 * Opaque handle to a notification registration owned by the adapter.
 */
export interface SubscriptionHandle {
	readonly id: string;
}

/**
 * Addresses a characteristic on a connection.
 * Service IDs disambiguate characteristics that share a UUID.
 */
export interface CharacteristicRef {
	readonly serviceId: string;
	readonly characteristicId: string;
}

export interface ScanOptions {
	/** How long the host should keep scanning */
	durationMs: number;
	/** Only report peripherals advertising one of these services */
	serviceIds?: readonly string[] | undefined;
	/** Stops the scan early */
	signal?: AbortSignal | undefined;
}

export interface ConnectOptions {
	timeoutMs: number;
	signal?: AbortSignal | undefined;
}

/**
 * What the radio can do at once.
 */
export interface RadioCapabilities {
	/** Maximum simultaneous connections the host supports */
	readonly maxConnections: number;
	/** Whether several outbound connection attempts may be in flight at once */
	readonly concurrentConnects: boolean;
}

/**
 * Narrow interface over a BLE host stack.
 * Implement this to plug in a different backend (noble, BlueZ D-Bus, a test double).
 *
 * @remarks
 * Implementers should signal failures by throwing an `AdapterFailure` so the
 * core can classify them. Anything else is reported as a generic adapter error.
 *
 * - `scan()` must open an independent scan every time its result is iterated
 * - `disconnect()` must be idempotent and must not reject
 * - `onLinkLost()` fires only for drops the central did not initiate
 *
 * @example Skeleton
 * ```typescript
 * const adapter: RadioAdapter = {
 *   capabilities: { maxConnections: 1, concurrentConnects: false },
 *   scan: (options) => myStack.scan(options),
 *   connect: (address, options) => myStack.connect(address, options),
 *   disconnect: (handle) => myStack.disconnect(handle),
 *   // ...
 * };
 * ```
 */
export interface RadioAdapter {
	readonly capabilities: RadioCapabilities;

	/**
	 * Scans for advertisements.
	 * @throws AdapterFailure('unavailable') when the radio cannot scan
	 */
	scan(options: ScanOptions): AsyncIterable<Sighting>;

	/**
	 * Opens a GATT connection.
	 * @throws AdapterFailure('timeout' | 'refused' | 'unavailable' | 'capacity')
	 */
	connect(address: string, options: ConnectOptions): Promise<ConnectionHandle>;

	/** Releases a connection. Idempotent. */
	disconnect(handle: ConnectionHandle): Promise<void>;

	resolveServices(handle: ConnectionHandle): Promise<ServiceDescriptor[]>;

	readCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
	): Promise<Uint8Array>;

	/**
	 * Writes a value.
	 * With `withResponse` false the promise settles once the write is submitted.
	 */
	writeCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		data: Uint8Array,
		withResponse: boolean,
	): Promise<void>;

	/**
	 * Enables notifications and routes each value to `onNotify` in arrival order.
	 */
	subscribe(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		onNotify: (data: Uint8Array) => void,
	): Promise<SubscriptionHandle>;

	/** Disables notifications. Idempotent. */
	unsubscribe(subscription: SubscriptionHandle): Promise<void>;

	/**
	 * Registers a callback for a link drop on this connection.
	 * @returns A function to unregister the callback
	 */
	onLinkLost(handle: ConnectionHandle, callback: () => void): () => void;
}
