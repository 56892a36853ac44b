import {
	AdapterFailure,
	DiscoveryUnavailableError,
	isBleError,
	normalizeError,
} from "../errors/errors";
import type { Advertisement, Device, RadioAdapter, Sighting } from "../types";

/** Default discovery window in milliseconds */
export const DEFAULT_DISCOVERY_WINDOW_MS = 5000;

export interface DiscoveryOptions {
	/** Ends the discovery early, without error */
	signal?: AbortSignal | undefined;
	/** Only report devices whose advertised name starts with this */
	namePrefix?: string | undefined;
	/** Ask the host to report only peripherals advertising one of these services */
	serviceIds?: readonly string[] | undefined;
}

export interface DeviceRegistryOptions {
	/** Log prefix for warning messages */
	logPrefix?: string;
}

/**
 * In-memory catalog of devices seen during discovery.
 *
 * Entries are keyed by address. A newer sighting replaces the entry with a new
 * frozen `Device`; objects already handed out never change.
 */
export interface DeviceRegistry {
	/**
	 * Scans for `windowMs` and yields each device the first time this
	 * discovery sees it. Every iteration runs its own scan.
	 *
	 * @throws DiscoveryUnavailableError if the radio cannot scan
	 */
	startDiscovery(
		windowMs?: number,
		options?: DiscoveryOptions,
	): AsyncIterable<Device>;

	/**
	 * Runs a discovery to completion and returns the snapshot.
	 * @throws DiscoveryUnavailableError if the radio cannot scan
	 */
	discover(windowMs?: number, options?: DiscoveryOptions): Promise<Device[]>;

	/**
	 * Devices known so far: named devices by name (case-sensitive),
	 * then unnamed ones; ties broken by address.
	 */
	snapshot(): Device[];

	get(address: string): Device | undefined;

	/** Forgets every device */
	clear(): void;

	readonly size: number;
}

/**
 * Orders devices for presentation: named before unnamed, names in
 * code-unit order, address as tiebreaker.
 */
export function compareDevices(a: Device, b: Device): number {
	if (a.displayName !== undefined && b.displayName === undefined) return -1;
	if (a.displayName === undefined && b.displayName !== undefined) return 1;
	if (a.displayName !== undefined && b.displayName !== undefined) {
		if (a.displayName < b.displayName) return -1;
		if (a.displayName > b.displayName) return 1;
	}
	if (a.address < b.address) return -1;
	if (a.address > b.address) return 1;
	return 0;
}

/**
 * Turns a raw sighting into a frozen device record.
 * Blank names count as no name.
 */
export function toDevice(sighting: Sighting, seenAt = new Date()): Device {
	const name = sighting.name?.trim();
	const advertisement: Advertisement = Object.freeze({
		signalStrength: sighting.rssi,
		txPower: sighting.txPower,
		manufacturerData: new Map(sighting.manufacturerData ?? []),
		serviceData: new Map(sighting.serviceData ?? []),
		serviceIds: new Set(sighting.serviceIds ?? []),
	});
	return Object.freeze({
		address: sighting.address,
		displayName: name ? name : undefined,
		lastSeen: seenAt,
		advertisement,
	});
}

function toDiscoveryError(error: unknown): Error {
	if (isBleError(error)) {
		return error;
	}
	if (error instanceof AdapterFailure) {
		return new DiscoveryUnavailableError(error.message);
	}
	return new DiscoveryUnavailableError(normalizeError(error).message);
}

/**
 * Creates a device registry fed by an adapter's scans.
 *
 * @example Streaming discovery
 * ```typescript
 * const registry = createDeviceRegistry(adapter);
 *
 * for await (const device of registry.startDiscovery(5000)) {
 *   console.log(device.address, device.displayName ?? "(unnamed)");
 * }
 * console.log(registry.snapshot());
 * ```
 *
 * @example Cancelling early
 * ```typescript
 * const controller = new AbortController();
 * setTimeout(() => controller.abort(), 1000);
 * const devices = await registry.discover(10000, { signal: controller.signal });
 * ```
 */
export function createDeviceRegistry(
	adapter: RadioAdapter,
	options: DeviceRegistryOptions = {},
): DeviceRegistry {
	const { logPrefix = "[gatt-central-kit:device-registry]" } = options;
	const devices = new Map<string, Device>();

	async function* startDiscovery(
		windowMs = DEFAULT_DISCOVERY_WINDOW_MS,
		discoveryOptions: DiscoveryOptions = {},
	): AsyncGenerator<Device, void, undefined> {
		const { signal, namePrefix, serviceIds } = discoveryOptions;
		if (signal?.aborted) return;

		// Bounds the scan even if the host ignores durationMs
		const window = new AbortController();
		const deadline = setTimeout(() => window.abort(), windowMs);
		const onAbort = () => window.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		let iterator: AsyncIterator<Sighting> | undefined;
		const yielded = new Set<string>();
		const ended = new Promise<IteratorResult<Sighting>>((resolve) => {
			const finish = () => resolve({ value: undefined, done: true });
			if (window.signal.aborted) finish();
			window.signal.addEventListener("abort", finish, { once: true });
		});

		try {
			try {
				iterator = adapter
					.scan({ durationMs: windowMs, serviceIds, signal: window.signal })
					[Symbol.asyncIterator]();
			} catch (error) {
				throw toDiscoveryError(error);
			}

			while (!window.signal.aborted) {
				let result: IteratorResult<Sighting>;
				try {
					result = await Promise.race([iterator.next(), ended]);
				} catch (error) {
					// Hosts may reject a scan stopped by our own signal
					if (window.signal.aborted) break;
					throw toDiscoveryError(error);
				}
				if (result.done || window.signal.aborted) break;

				const sighting = result.value;
				if (
					namePrefix !== undefined &&
					!sighting.name?.startsWith(namePrefix)
				) {
					continue;
				}

				const device = toDevice(sighting);
				devices.set(device.address, device);

				if (!yielded.has(device.address)) {
					yielded.add(device.address);
					yield device;
				}
			}
		} finally {
			clearTimeout(deadline);
			signal?.removeEventListener("abort", onAbort);
			window.abort();
			const closing = iterator?.return?.();
			if (closing) {
				closing.catch((e: unknown) => {
					console.warn(
						`${logPrefix} Error stopping scan:`,
						normalizeError(e).message,
					);
				});
			}
		}
	}

	async function discover(
		windowMs = DEFAULT_DISCOVERY_WINDOW_MS,
		discoveryOptions: DiscoveryOptions = {},
	): Promise<Device[]> {
		for await (const _device of startDiscovery(windowMs, discoveryOptions)) {
			// drain
		}
		return snapshot();
	}

	function snapshot(): Device[] {
		return Array.from(devices.values()).sort(compareDevices);
	}

	return {
		startDiscovery,
		discover,
		snapshot,
		get(address: string): Device | undefined {
			return devices.get(address);
		},
		clear(): void {
			devices.clear();
		},
		get size(): number {
			return devices.size;
		},
	};
}
