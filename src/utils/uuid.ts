/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

const FULL_UUID_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Converts a short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0xfe00); // "0000fe00-0000-1000-8000-00805f9b34fb"
 * toFullUuid("180a"); // "0000180a-0000-1000-8000-00805f9b34fb"
 * ```
 */
export function toFullUuid(shortId: number | string): string {
	if (typeof shortId === "number") {
		if (!Number.isInteger(shortId) || shortId < 0 || shortId > 0xffff) {
			throw new RangeError(
				`Short UUID must be integer 0-65535, got ${shortId}`,
			);
		}
		return `0000${shortId.toString(16).padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	if (shortId.length === 0 || shortId.length > 4) {
		throw new Error(
			`Invalid short UUID length: ${shortId.length} (must be 1-4)`,
		);
	}

	if (!/^[0-9a-fA-F]+$/.test(shortId)) {
		throw new Error(`Invalid short UUID format: ${shortId} (must be hex)`);
	}

	return `0000${shortId.toLowerCase().padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Brings any UUID spelling to the canonical lower-case 128-bit form.
 *
 * Host stacks disagree on format: noble reports `180a` and
 * `6e400001b5a3f393e0a9e50e24dcca9e`, BlueZ reports dashed full UUIDs,
 * users type either. Strings that are not UUIDs are returned lower-cased.
 *
 * @example
 * ```typescript
 * normalizeUuid("180A");                               // "0000180a-0000-1000-8000-00805f9b34fb"
 * normalizeUuid("6E400001B5A3F393E0A9E50E24DCCA9E");  // "6e400001-b5a3-f393-e0a9-e50e24dcca9e"
 * ```
 */
export function normalizeUuid(id: string): string {
	const lower = id.trim().toLowerCase();

	if (/^[0-9a-f]{1,4}$/.test(lower)) {
		return toFullUuid(lower);
	}

	// 32-bit short form
	if (/^[0-9a-f]{8}$/.test(lower)) {
		return `${lower}${BLUETOOTH_UUID_BASE}`;
	}

	if (/^[0-9a-f]{32}$/.test(lower)) {
		return `${lower.slice(0, 8)}-${lower.slice(8, 12)}-${lower.slice(12, 16)}-${lower.slice(16, 20)}-${lower.slice(20)}`;
	}

	return lower;
}

/**
 * Checks whether two UUID spellings name the same attribute.
 *
 * @example
 * ```typescript
 * uuidMatches('0000fe00-0000-1000-8000-00805f9b34fb', 'fe00') // true
 * uuidMatches('00000001-0000-1000-8000-00805f9b34fb', '1')    // true
 * uuidMatches('6e400001b5a3f393e0a9e50e24dcca9e', '6E400001-B5A3-F393-E0A9-E50E24DCCA9E') // true
 * ```
 */
export function uuidMatches(a: string, b: string): boolean {
	return normalizeUuid(a) === normalizeUuid(b);
}

/**
 * Whether the string is a UUID in canonical or compact form.
 */
export function isUuid(id: string): boolean {
	return FULL_UUID_PATTERN.test(normalizeUuid(id));
}
