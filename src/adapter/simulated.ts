import { createNotificationStream } from "../ble/notification-stream";
import { AdapterFailure, abortReason } from "../errors/errors";
import type {
	Capability,
	CharacteristicRef,
	ConnectionHandle,
	ConnectOptions,
	RadioAdapter,
	RadioCapabilities,
	ScanOptions,
	ServiceDescriptor,
	Sighting,
	SubscriptionHandle,
} from "../types";
import { delay } from "../utils/delay";
import { uuidMatches } from "../utils/uuid";

/** GATT status: Write Not Permitted */
export const GATT_WRITE_NOT_PERMITTED = 0x03;
/** GATT status: Read Not Permitted */
export const GATT_READ_NOT_PERMITTED = 0x02;
/** GATT status: Attribute Not Found */
export const GATT_ATTRIBUTE_NOT_FOUND = 0x0a;

export interface SimulatedCharacteristic {
	id: string;
	capabilities: Capability[];
	/** Current value, returned by reads */
	value?: Uint8Array;
	/** Writes replace the value and are sent back as a notification */
	echo?: boolean;
	/** Computes the new value from what was written (e.g. a command reply) */
	respond?: (written: Uint8Array) => Uint8Array | undefined;
	/** Answer writes with this GATT status */
	rejectWrites?: number;
	/** Answer reads with this GATT status */
	rejectReads?: number;
	/** Answer subscription requests with this GATT status */
	rejectSubscribe?: number;
	readDelayMs?: number;
	writeDelayMs?: number;
	subscribeDelayMs?: number;
}

export interface SimulatedService {
	id: string;
	characteristics: SimulatedCharacteristic[];
}

export interface SimulatedPeripheral {
	address: string;
	name?: string | undefined;
	/** @default -60 */
	rssi?: number;
	txPower?: number;
	manufacturerData?: Map<number, Uint8Array>;
	serviceData?: Map<string, Uint8Array>;
	/** Service UUIDs put in the advertisement */
	advertisedServiceIds?: string[];
	/** Delay before the first advertisement of a scan */
	appearAfterMs?: number;
	/** Advertise again at this interval; once per scan when unset */
	advertiseEveryMs?: number;
	/**
	 * `false` refuses connections after `connectDelayMs`;
	 * `"timeout"` never answers.
	 * @default true
	 */
	connectable?: boolean | "timeout";
	connectDelayMs?: number;
	resolveDelayMs?: number;
	services?: SimulatedService[];
}

export interface SimulatedRadioOptions {
	peripherals?: SimulatedPeripheral[];
	/** @default 7 */
	maxConnections?: number;
	/** @default false */
	concurrentConnects?: boolean;
	/** Whether the radio is powered and usable. @default true */
	available?: boolean;
}

export interface RecordedWrite {
	readonly address: string;
	readonly characteristicId: string;
	readonly data: Uint8Array;
	readonly withResponse: boolean;
}

export interface SimulatedRadioStats {
	/** Calls to connect() */
	connectAttempts: number;
	/** Connections established */
	connects: number;
	/** Calls to disconnect(), including repeated ones */
	disconnectCalls: number;
	/** Connections actually released by disconnect() */
	disconnects: number;
	/** Highest number of connect() calls in flight at once */
	peakPendingConnects: number;
	scans: number;
	writes: RecordedWrite[];
}

/**
 * In-process radio with scripted peripherals.
 * Timing follows the real clock (or Vitest's fake one).
 */
export interface SimulatedRadio extends RadioAdapter {
	readonly stats: SimulatedRadioStats;
	/** Connections currently open */
	readonly openConnections: number;
	setAvailable(available: boolean): void;
	addPeripheral(peripheral: SimulatedPeripheral): void;
	/** Changes what a peripheral advertises from its next advertisement on */
	updatePeripheral(
		address: string,
		patch: Partial<Omit<SimulatedPeripheral, "address">>,
	): void;
	/** Pushes a value to every subscriber of the characteristic */
	notify(address: string, characteristicId: string, value: Uint8Array): void;
	/** Drops every connection to the peripheral, as if it went out of range */
	dropLink(address: string): void;
	/** Current value of a characteristic */
	valueOf(address: string, characteristicId: string): Uint8Array | undefined;
}

interface Connection {
	readonly handle: ConnectionHandle;
	readonly peripheral: SimulatedPeripheral;
	readonly linkLost: Set<() => void>;
}

interface Registration {
	readonly connectionId: string;
	readonly characteristic: SimulatedCharacteristic;
	readonly onNotify: (data: Uint8Array) => void;
}

function sightingOf(peripheral: SimulatedPeripheral): Sighting {
	return {
		address: peripheral.address,
		name: peripheral.name,
		rssi: peripheral.rssi ?? -60,
		txPower: peripheral.txPower,
		manufacturerData: peripheral.manufacturerData,
		serviceData: peripheral.serviceData,
		serviceIds: peripheral.advertisedServiceIds,
	};
}

// Writes mutate characteristic values, so fixtures are copied on the way in
function clonePeripheral(peripheral: SimulatedPeripheral): SimulatedPeripheral {
	return {
		...peripheral,
		services: peripheral.services?.map((service) => ({
			...service,
			characteristics: service.characteristics.map((c) => ({ ...c })),
		})),
	};
}

function describe(peripheral: SimulatedPeripheral): ServiceDescriptor[] {
	return (peripheral.services ?? []).map((service) => ({
		id: service.id,
		characteristics: service.characteristics.map((c) => ({
			id: c.id,
			capabilities: [...c.capabilities],
		})),
	}));
}

/**
 * Creates a simulated radio.
 *
 * @example An echo peripheral
 * ```typescript
 * const radio = createSimulatedRadio({
 *   peripherals: [{
 *     address: "aa:bb:cc:dd:ee:01",
 *     name: "Echo",
 *     services: [{
 *       id: "fff0",
 *       characteristics: [{ id: "fff1", capabilities: ["read", "write", "notify"], echo: true }],
 *     }],
 *   }],
 * });
 * const central = createCentral(radio);
 * ```
 */
export function createSimulatedRadio(
	options: SimulatedRadioOptions = {},
): SimulatedRadio {
	const capabilities: RadioCapabilities = {
		maxConnections: options.maxConnections ?? 7,
		concurrentConnects: options.concurrentConnects ?? false,
	};
	const peripherals = new Map<string, SimulatedPeripheral>();
	for (const p of options.peripherals ?? []) {
		peripherals.set(p.address, clonePeripheral(p));
	}
	let available = options.available ?? true;

	const connections = new Map<string, Connection>();
	const registrations = new Map<string, Registration>();
	let nextId = 1;
	let pendingConnects = 0;

	const stats: SimulatedRadioStats = {
		connectAttempts: 0,
		connects: 0,
		disconnectCalls: 0,
		disconnects: 0,
		peakPendingConnects: 0,
		scans: 0,
		writes: [],
	};

	function requireAvailable(): void {
		if (!available) {
			throw new AdapterFailure("unavailable", "Radio is powered off");
		}
	}

	function connectionFor(handle: ConnectionHandle): Connection {
		const connection = connections.get(handle.id);
		if (!connection) {
			throw new AdapterFailure(
				"linkLost",
				`Not connected to ${handle.address}`,
			);
		}
		return connection;
	}

	function characteristicFor(
		peripheral: SimulatedPeripheral,
		ref: CharacteristicRef,
	): SimulatedCharacteristic {
		for (const service of peripheral.services ?? []) {
			if (!uuidMatches(service.id, ref.serviceId)) continue;
			const match = service.characteristics.find((c) =>
				uuidMatches(c.id, ref.characteristicId),
			);
			if (match) return match;
		}
		throw new AdapterFailure(
			"gatt",
			`Characteristic ${ref.characteristicId} not found`,
			GATT_ATTRIBUTE_NOT_FOUND,
		);
	}

	function findCharacteristicById(
		address: string,
		characteristicId: string,
	): SimulatedCharacteristic | undefined {
		const peripheral = peripherals.get(address);
		for (const service of peripheral?.services ?? []) {
			const match = service.characteristics.find((c) =>
				uuidMatches(c.id, characteristicId),
			);
			if (match) return match;
		}
		return undefined;
	}

	function deliver(
		connectionId: string | undefined,
		characteristic: SimulatedCharacteristic,
		value: Uint8Array,
	): void {
		for (const registration of registrations.values()) {
			if (registration.characteristic !== characteristic) continue;
			if (
				connectionId !== undefined &&
				registration.connectionId !== connectionId
			) {
				continue;
			}
			registration.onNotify(Uint8Array.from(value));
		}
	}

	function dropConnection(id: string): Connection | undefined {
		const connection = connections.get(id);
		if (!connection) return undefined;
		connections.delete(id);
		for (const [subId, registration] of registrations) {
			if (registration.connectionId === id) registrations.delete(subId);
		}
		return connection;
	}

	async function* scan(
		scanOptions: ScanOptions,
	): AsyncGenerator<Sighting, void, undefined> {
		requireAvailable();
		stats.scans++;

		const { durationMs, serviceIds, signal } = scanOptions;
		if (signal?.aborted) return;

		const stream = createNotificationStream<Sighting>();
		const timers: ReturnType<typeof setTimeout>[] = [];

		const matches = (p: SimulatedPeripheral) =>
			!serviceIds ||
			serviceIds.length === 0 ||
			serviceIds.some((id) =>
				(p.advertisedServiceIds ?? []).some((own) => uuidMatches(own, id)),
			);

		const advertise = (address: string) => {
			const peripheral = peripherals.get(address);
			if (!peripheral || stream.ended) return;
			if (matches(peripheral)) {
				stream.push(sightingOf(peripheral));
			}
			if (peripheral.advertiseEveryMs !== undefined) {
				timers.push(
					setTimeout(() => advertise(address), peripheral.advertiseEveryMs),
				);
			}
		};

		for (const peripheral of peripherals.values()) {
			const address = peripheral.address;
			timers.push(
				setTimeout(() => advertise(address), peripheral.appearAfterMs ?? 0),
			);
		}

		const stop = () => stream.end();
		timers.push(setTimeout(stop, durationMs));
		signal?.addEventListener("abort", stop, { once: true });

		try {
			yield* stream;
		} finally {
			stream.end();
			for (const timer of timers) clearTimeout(timer);
			signal?.removeEventListener("abort", stop);
		}
	}

	async function connect(
		address: string,
		connectOptions: ConnectOptions,
	): Promise<ConnectionHandle> {
		stats.connectAttempts++;
		requireAvailable();
		const { timeoutMs, signal } = connectOptions;
		if (signal?.aborted) throw abortReason(signal);

		pendingConnects++;
		stats.peakPendingConnects = Math.max(
			stats.peakPendingConnects,
			pendingConnects,
		);
		try {
			const peripheral = peripherals.get(address);
			if (!peripheral) {
				throw new AdapterFailure("refused", `${address} is not in range`);
			}
			if (connections.size >= capabilities.maxConnections) {
				throw new AdapterFailure("capacity", "No free connection slot");
			}

			const connectable = peripheral.connectable ?? true;
			if (connectable === "timeout") {
				await delay(timeoutMs, signal);
				throw new AdapterFailure(
					"timeout",
					`${address} did not answer within ${timeoutMs}ms`,
				);
			}

			await delay(peripheral.connectDelayMs ?? 0, signal);
			if (!connectable) {
				throw new AdapterFailure(
					"refused",
					`${address} refused the connection`,
				);
			}

			const handle: ConnectionHandle = Object.freeze({
				id: `sim-${nextId++}`,
				address,
			});
			connections.set(handle.id, { handle, peripheral, linkLost: new Set() });
			stats.connects++;
			return handle;
		} finally {
			pendingConnects--;
		}
	}

	async function disconnect(handle: ConnectionHandle): Promise<void> {
		stats.disconnectCalls++;
		if (dropConnection(handle.id)) {
			stats.disconnects++;
		}
	}

	async function resolveServices(
		handle: ConnectionHandle,
	): Promise<ServiceDescriptor[]> {
		const { peripheral } = connectionFor(handle);
		await delay(peripheral.resolveDelayMs ?? 0);
		connectionFor(handle);
		return describe(peripheral);
	}

	async function readCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
	): Promise<Uint8Array> {
		const { peripheral } = connectionFor(handle);
		const characteristic = characteristicFor(peripheral, ref);
		await delay(characteristic.readDelayMs ?? 0);
		connectionFor(handle);
		if (characteristic.rejectReads !== undefined) {
			throw new AdapterFailure(
				"gatt",
				"Read not permitted",
				characteristic.rejectReads,
			);
		}
		return Uint8Array.from(characteristic.value ?? new Uint8Array(0));
	}

	async function writeCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		data: Uint8Array,
		withResponse: boolean,
	): Promise<void> {
		const { peripheral } = connectionFor(handle);
		const characteristic = characteristicFor(peripheral, ref);
		await delay(characteristic.writeDelayMs ?? 0);
		connectionFor(handle);
		if (characteristic.rejectWrites !== undefined) {
			throw new AdapterFailure(
				"gatt",
				"Write not permitted",
				characteristic.rejectWrites,
			);
		}

		const written = Uint8Array.from(data);
		stats.writes.push({
			address: handle.address,
			characteristicId: characteristic.id,
			data: written,
			withResponse,
		});

		if (characteristic.respond) {
			const reply = characteristic.respond(written);
			if (reply) characteristic.value = reply;
		} else if (characteristic.echo) {
			characteristic.value = written;
			deliver(handle.id, characteristic, written);
		}
	}

	async function subscribe(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		onNotify: (data: Uint8Array) => void,
	): Promise<SubscriptionHandle> {
		const { peripheral } = connectionFor(handle);
		const characteristic = characteristicFor(peripheral, ref);
		await delay(characteristic.subscribeDelayMs ?? 0);
		connectionFor(handle);
		if (characteristic.rejectSubscribe !== undefined) {
			throw new AdapterFailure(
				"gatt",
				"Notifications not permitted",
				characteristic.rejectSubscribe,
			);
		}

		const subscription: SubscriptionHandle = Object.freeze({
			id: `sim-sub-${nextId++}`,
		});
		registrations.set(subscription.id, {
			connectionId: handle.id,
			characteristic,
			onNotify,
		});
		return subscription;
	}

	async function unsubscribe(subscription: SubscriptionHandle): Promise<void> {
		registrations.delete(subscription.id);
	}

	function onLinkLost(
		handle: ConnectionHandle,
		callback: () => void,
	): () => void {
		const connection = connections.get(handle.id);
		if (!connection) {
			return () => undefined;
		}
		connection.linkLost.add(callback);
		return () => {
			connection.linkLost.delete(callback);
		};
	}

	return {
		capabilities,
		stats,
		get openConnections() {
			return connections.size;
		},
		scan,
		connect,
		disconnect,
		resolveServices,
		readCharacteristic,
		writeCharacteristic,
		subscribe,
		unsubscribe,
		onLinkLost,
		setAvailable(value: boolean): void {
			available = value;
		},
		addPeripheral(peripheral: SimulatedPeripheral): void {
			peripherals.set(peripheral.address, clonePeripheral(peripheral));
		},
		updatePeripheral(address, patch): void {
			const current = peripherals.get(address);
			if (!current) {
				throw new Error(`Unknown simulated peripheral ${address}`);
			}
			// Keeps the characteristic objects that open connections use
			const next = { ...current, ...patch, address };
			peripherals.set(address, patch.services ? clonePeripheral(next) : next);
		},
		notify(address: string, characteristicId: string, value: Uint8Array): void {
			const characteristic = findCharacteristicById(address, characteristicId);
			if (!characteristic) {
				throw new Error(
					`Unknown characteristic ${characteristicId} on ${address}`,
				);
			}
			deliver(undefined, characteristic, value);
		},
		dropLink(address: string): void {
			for (const [id, connection] of connections) {
				if (connection.handle.address !== address) continue;
				dropConnection(id);
				for (const callback of connection.linkLost) {
					callback();
				}
			}
		},
		valueOf(address: string, characteristicId: string): Uint8Array | undefined {
			return findCharacteristicById(address, characteristicId)?.value;
		},
	};
}
