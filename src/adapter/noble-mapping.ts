import type { Advertisement, Peripheral } from "@abandonware/noble";
import { AdapterFailure, normalizeError } from "../errors/errors";
import type { Capability, Sighting } from "../types";
import { readUint16LE } from "../utils/bytes";
import { BLUETOOTH_UUID_BASE, normalizeUuid } from "../utils/uuid";

const CAPABILITIES: ReadonlySet<string> = new Set<Capability>([
	"read",
	"write",
	"writeWithoutResponse",
	"notify",
	"indicate",
]);

function isCapability(property: string): property is Capability {
	return CAPABILITIES.has(property);
}

/**
 * Keeps the characteristic properties the library models
 * (drops `broadcast`, `authenticatedSignedWrites`, `extendedProperties`).
 */
export function capabilitiesOf(properties: readonly string[]): Capability[] {
	return properties.filter(isCapability);
}

/**
 * noble's UUID spelling: lower-case, no dashes, 16-bit ids shortened to 4 digits.
 *
 * @example
 * ```typescript
 * toNobleUuid("0000180a-0000-1000-8000-00805f9b34fb"); // "180a"
 * toNobleUuid("6E400001-B5A3-F393-E0A9-E50E24DCCA9E"); // "6e400001b5a3f393e0a9e50e24dcca9e"
 * ```
 */
export function toNobleUuid(id: string): string {
	const full = normalizeUuid(id);
	if (full.startsWith("0000") && full.endsWith(BLUETOOTH_UUID_BASE)) {
		return full.slice(4, 8);
	}
	return full.replaceAll("-", "");
}

/**
 * Stable address for a peripheral. macOS hides MAC addresses, so noble's
 * host-assigned id is used there.
 */
export function addressOf(
	peripheral: Pick<Peripheral, "id" | "address">,
): string {
	const { address, id } = peripheral;
	return address && address !== "unknown" ? address : id;
}

/**
 * Splits manufacturer-specific data into its little-endian company ID and body.
 * Payloads shorter than a company ID are dropped.
 */
export function splitManufacturerData(
	data: Uint8Array | undefined,
): Map<number, Uint8Array> {
	const result = new Map<number, Uint8Array>();
	if (!data) return result;
	const companyId = readUint16LE(data, 0);
	if (companyId !== undefined) {
		result.set(companyId, Uint8Array.from(data.subarray(2)));
	}
	return result;
}

export function toSighting(
	peripheral: Pick<Peripheral, "id" | "address" | "rssi"> & {
		advertisement: Partial<Advertisement>;
	},
): Sighting {
	const ad = peripheral.advertisement;
	const serviceData = new Map<string, Uint8Array>();
	for (const entry of ad.serviceData ?? []) {
		serviceData.set(normalizeUuid(entry.uuid), Uint8Array.from(entry.data));
	}
	return {
		address: addressOf(peripheral),
		name: ad.localName || undefined,
		rssi: peripheral.rssi,
		txPower: typeof ad.txPowerLevel === "number" ? ad.txPowerLevel : undefined,
		manufacturerData: splitManufacturerData(ad.manufacturerData),
		serviceData,
		serviceIds: (ad.serviceUuids ?? []).map(normalizeUuid),
	};
}

/**
 * Classifies an error thrown by a noble call on a connection.
 * noble reports no GATT status codes, only messages.
 */
export function toGattFailure(
	error: unknown,
	connected: boolean,
): AdapterFailure {
	if (error instanceof AdapterFailure) return error;
	const message = normalizeError(error).message;
	if (!connected) {
		return new AdapterFailure("linkLost", message);
	}
	if (/timed? ?out/i.test(message)) {
		return new AdapterFailure("timeout", message);
	}
	return new AdapterFailure("gatt", message);
}

/**
 * Classifies an error thrown while connecting.
 */
export function toConnectFailure(
	error: unknown,
	poweredOn: boolean,
): AdapterFailure {
	if (error instanceof AdapterFailure) return error;
	const message = normalizeError(error).message;
	if (!poweredOn) {
		return new AdapterFailure("unavailable", message);
	}
	if (/timed? ?out/i.test(message)) {
		return new AdapterFailure("timeout", message);
	}
	return new AdapterFailure("refused", message);
}

/** The part of a noble peripheral needed to give up on a connect */
export type AbandonablePeripheral = Pick<
	Peripheral,
	"cancelConnect" | "disconnectAsync"
>;

/**
 * Cleans up after a connect that timed out or was aborted while noble was
 * still connecting: cancels the attempt, and disconnects if it completes
 * anyway, since no handle was ever issued for it.
 */
export async function releaseAbandonedConnect(
	peripheral: AbandonablePeripheral,
	pending: Promise<void>,
	address: string,
	logPrefix: string,
): Promise<void> {
	try {
		peripheral.cancelConnect();
	} catch (e) {
		console.warn(
			`${logPrefix} Error cancelling connection to ${address}:`,
			normalizeError(e).message,
		);
	}

	const connected = await pending.then(
		() => true,
		// A late failure holds no link
		() => false,
	);
	if (!connected) return;
	try {
		await peripheral.disconnectAsync();
	} catch (e) {
		console.warn(
			`${logPrefix} Error disconnecting late connection to ${address}:`,
			normalizeError(e).message,
		);
	}
}
