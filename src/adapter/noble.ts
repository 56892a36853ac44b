import noble from "@abandonware/noble";
import type {
	Characteristic as NobleCharacteristic,
	Peripheral,
} from "@abandonware/noble";
import { createNotificationStream } from "../ble/notification-stream";
import { MAX_BLE_CONNECTIONS } from "../ble/session-pool";
import {
	AdapterFailure,
	abortReason,
	normalizeError,
	raceWithAbort,
	TimeoutError,
	throwIfAborted,
	withTimeout,
} from "../errors/errors";
import type {
	CharacteristicRef,
	ConnectionHandle,
	ConnectOptions,
	RadioAdapter,
	ScanOptions,
	ServiceDescriptor,
	Sighting,
	SubscriptionHandle,
} from "../types";
import { normalizeUuid } from "../utils/uuid";
import {
	addressOf,
	capabilitiesOf,
	releaseAbandonedConnect,
	toConnectFailure,
	toGattFailure,
	toNobleUuid,
	toSighting,
} from "./noble-mapping";

export interface NobleAdapterOptions {
	/**
	 * Connections the controller can hold at once.
	 * @default 7
	 */
	maxConnections?: number;
	/**
	 * How long to wait for the radio to power on before reporting it unavailable.
	 * @default 10000
	 */
	poweredOnTimeoutMs?: number;
	/** Log prefix for warning messages */
	logPrefix?: string;
}

interface NobleConnection {
	readonly handle: ConnectionHandle;
	readonly peripheral: Peripheral;
	readonly linkLost: Set<() => void>;
	readonly onDisconnect: () => void;
	/** Characteristics found by service resolution, keyed by `service|characteristic` */
	readonly characteristics: Map<string, NobleCharacteristic>;
	closing: boolean;
}

interface NobleSubscription {
	readonly connection: NobleConnection;
	readonly characteristic: NobleCharacteristic;
	readonly listener: (data: Buffer) => void;
}

function keyOf(serviceId: string, characteristicId: string): string {
	return `${normalizeUuid(serviceId)}|${normalizeUuid(characteristicId)}`;
}

/**
 * Radio adapter over the host's Bluetooth controller, through noble.
 *
 * Peripherals must have been seen by a scan before they can be connected,
 * since noble only hands out peripheral objects from discovery.
 *
 * @example
 * ```typescript
 * import { createCentral } from "gatt-central-kit";
 * import { createNobleAdapter } from "gatt-central-kit/noble";
 *
 * const central = createCentral(createNobleAdapter());
 * const devices = await central.discover(5000);
 * ```
 */
export function createNobleAdapter(
	options: NobleAdapterOptions = {},
): RadioAdapter {
	const {
		maxConnections = MAX_BLE_CONNECTIONS,
		poweredOnTimeoutMs = 10000,
		logPrefix = "[gatt-central-kit:noble]",
	} = options;

	const known = new Map<string, Peripheral>();
	const connections = new Map<string, NobleConnection>();
	const subscriptions = new Map<string, NobleSubscription>();
	let nextId = 1;

	async function waitForPoweredOn(signal?: AbortSignal): Promise<void> {
		if (noble.state === "poweredOn") return;
		throwIfAborted(signal);

		let onState: ((state: string) => void) | undefined;
		const poweredOn = new Promise<void>((resolve) => {
			onState = (state: string) => {
				if (state === "poweredOn") resolve();
			};
			noble.on("stateChange", onState);
		});
		try {
			await raceWithAbort(
				withTimeout(poweredOn, poweredOnTimeoutMs, "Waiting for Bluetooth"),
				signal,
			);
		} catch (error) {
			if (signal?.aborted) throw abortReason(signal);
			throw new AdapterFailure(
				"unavailable",
				`Bluetooth is ${noble.state}: ${normalizeError(error).message}`,
			);
		} finally {
			if (onState) noble.removeListener("stateChange", onState);
		}
	}

	function connectionFor(handle: ConnectionHandle): NobleConnection {
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
		connection: NobleConnection,
		ref: CharacteristicRef,
	): NobleCharacteristic {
		const characteristic = connection.characteristics.get(
			keyOf(ref.serviceId, ref.characteristicId),
		);
		if (!characteristic) {
			throw new AdapterFailure(
				"gatt",
				`Characteristic ${ref.characteristicId} not resolved on ${connection.handle.address}`,
			);
		}
		return characteristic;
	}

	function isConnected(connection: NobleConnection): boolean {
		return (
			connections.has(connection.handle.id) &&
			connection.peripheral.state === "connected"
		);
	}

	async function* scan(
		scanOptions: ScanOptions,
	): AsyncGenerator<Sighting, void, undefined> {
		const { durationMs, serviceIds = [], signal } = scanOptions;
		await waitForPoweredOn(signal);
		if (signal?.aborted) return;

		const stream = createNotificationStream<Sighting>();
		const onDiscover = (peripheral: Peripheral) => {
			known.set(addressOf(peripheral), peripheral);
			stream.push(toSighting(peripheral));
		};
		const stop = () => stream.end();

		noble.on("discover", onDiscover);
		const timer = setTimeout(stop, durationMs);
		signal?.addEventListener("abort", stop, { once: true });

		try {
			try {
				await noble.startScanningAsync(serviceIds.map(toNobleUuid), true);
			} catch (error) {
				throw new AdapterFailure("unavailable", normalizeError(error).message);
			}
			yield* stream;
		} finally {
			clearTimeout(timer);
			signal?.removeEventListener("abort", stop);
			noble.removeListener("discover", onDiscover);
			try {
				await noble.stopScanningAsync();
			} catch (e) {
				console.warn(
					`${logPrefix} Error stopping scan:`,
					normalizeError(e).message,
				);
			}
		}
	}

	async function connect(
		address: string,
		connectOptions: ConnectOptions,
	): Promise<ConnectionHandle> {
		const { timeoutMs, signal } = connectOptions;
		await waitForPoweredOn(signal);

		const peripheral = known.get(address);
		if (!peripheral) {
			throw new AdapterFailure(
				"refused",
				`${address} has not been discovered; scan before connecting`,
			);
		}
		if (connections.size >= maxConnections) {
			throw new AdapterFailure("capacity", "No free connection slot");
		}

		const pending = peripheral.connectAsync();
		try {
			await raceWithAbort(
				withTimeout(pending, timeoutMs, `Connect to ${address}`),
				signal,
			);
		} catch (error) {
			if (signal?.aborted || error instanceof TimeoutError) {
				void releaseAbandonedConnect(peripheral, pending, address, logPrefix);
			}
			if (signal?.aborted) throw abortReason(signal);
			throw toConnectFailure(error, noble.state === "poweredOn");
		}

		const handle: ConnectionHandle = Object.freeze({
			id: `noble-${nextId++}`,
			address,
		});
		const connection: NobleConnection = {
			handle,
			peripheral,
			linkLost: new Set(),
			characteristics: new Map(),
			closing: false,
			onDisconnect: () => {
				if (connection.closing) return;
				connections.delete(handle.id);
				for (const callback of connection.linkLost) {
					callback();
				}
			},
		};
		connections.set(handle.id, connection);
		peripheral.once("disconnect", connection.onDisconnect);
		return handle;
	}

	async function disconnect(handle: ConnectionHandle): Promise<void> {
		const connection = connections.get(handle.id);
		if (!connection) return;
		connection.closing = true;
		connections.delete(handle.id);
		connection.peripheral.removeListener("disconnect", connection.onDisconnect);

		for (const [id, subscription] of subscriptions) {
			if (subscription.connection !== connection) continue;
			subscriptions.delete(id);
			subscription.characteristic.removeListener("data", subscription.listener);
		}

		try {
			await connection.peripheral.disconnectAsync();
		} catch (e) {
			console.warn(
				`${logPrefix} Error disconnecting from ${handle.address}:`,
				normalizeError(e).message,
			);
		}
	}

	async function resolveServices(
		handle: ConnectionHandle,
	): Promise<ServiceDescriptor[]> {
		const connection = connectionFor(handle);
		try {
			const { services } =
				await connection.peripheral.discoverAllServicesAndCharacteristicsAsync();
			connection.characteristics.clear();
			return services.map((service) => ({
				id: normalizeUuid(service.uuid),
				characteristics: (service.characteristics ?? []).map((c) => {
					connection.characteristics.set(keyOf(service.uuid, c.uuid), c);
					return {
						id: normalizeUuid(c.uuid),
						capabilities: capabilitiesOf(c.properties),
					};
				}),
			}));
		} catch (error) {
			throw toGattFailure(error, isConnected(connection));
		}
	}

	async function readCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
	): Promise<Uint8Array> {
		const connection = connectionFor(handle);
		const characteristic = characteristicFor(connection, ref);
		try {
			const data = await characteristic.readAsync();
			return Uint8Array.from(data);
		} catch (error) {
			throw toGattFailure(error, isConnected(connection));
		}
	}

	async function writeCharacteristic(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		data: Uint8Array,
		withResponse: boolean,
	): Promise<void> {
		const connection = connectionFor(handle);
		const characteristic = characteristicFor(connection, ref);
		try {
			await characteristic.writeAsync(Buffer.from(data), !withResponse);
		} catch (error) {
			throw toGattFailure(error, isConnected(connection));
		}
	}

	async function subscribe(
		handle: ConnectionHandle,
		ref: CharacteristicRef,
		onNotify: (data: Uint8Array) => void,
	): Promise<SubscriptionHandle> {
		const connection = connectionFor(handle);
		const characteristic = characteristicFor(connection, ref);
		const listener = (data: Buffer) => onNotify(Uint8Array.from(data));

		characteristic.on("data", listener);
		try {
			await characteristic.subscribeAsync();
		} catch (error) {
			characteristic.removeListener("data", listener);
			throw toGattFailure(error, isConnected(connection));
		}

		const subscription: SubscriptionHandle = Object.freeze({
			id: `noble-sub-${nextId++}`,
		});
		subscriptions.set(subscription.id, { connection, characteristic, listener });
		return subscription;
	}

	async function unsubscribe(subscription: SubscriptionHandle): Promise<void> {
		const entry = subscriptions.get(subscription.id);
		if (!entry) return;
		subscriptions.delete(subscription.id);
		entry.characteristic.removeListener("data", entry.listener);
		if (!isConnected(entry.connection)) return;
		try {
			await entry.characteristic.unsubscribeAsync();
		} catch (e) {
			console.warn(
				`${logPrefix} Error stopping notifications:`,
				normalizeError(e).message,
			);
		}
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
		capabilities: { maxConnections, concurrentConnects: false },
		scan,
		connect,
		disconnect,
		resolveServices,
		readCharacteristic,
		writeCharacteristic,
		subscribe,
		unsubscribe,
		onLinkLost,
	};
}
