import { MalformedPayloadError } from "../errors/errors";

/**
 * How a write payload is turned into bytes.
 * - 'utf8': the payload is text, encoded as UTF-8
 * - 'hex': the payload is an even-length hexadecimal string
 * - 'raw': the payload is already bytes and is used unchanged
 */
export type PayloadEncoding = "utf8" | "hex" | "raw";

/**
 * A write payload tagged with its encoding.
 * Only the raw variant carries bytes, so a text payload can never be sent raw by mistake.
 */
export type Payload =
	| { readonly encoding: "utf8"; readonly value: string }
	| { readonly encoding: "hex"; readonly value: string }
	| { readonly encoding: "raw"; readonly value: Uint8Array };

/** Text payload, sent as UTF-8 */
export function text(value: string): Payload {
	return { encoding: "utf8", value };
}

/** Hex payload, e.g. `hex("48656c6c6f")` */
export function hex(value: string): Payload {
	return { encoding: "hex", value };
}

/** Bytes sent as-is */
export function raw(value: Uint8Array): Payload {
	return { encoding: "raw", value };
}

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * Parses a hexadecimal string into bytes.
 * Whitespace between digits is allowed (`"48 65 6c"`), as are upper-case digits.
 *
 * @throws MalformedPayloadError for odd length or non-hex characters
 */
export function hexToBytes(input: string): Uint8Array {
	const digits = input.replace(/\s+/g, "");
	if (!HEX_PATTERN.test(digits)) {
		throw new MalformedPayloadError(
			`"${input}" contains non-hexadecimal characters`,
		);
	}
	if (digits.length % 2 !== 0) {
		throw new MalformedPayloadError(
			`hex string must have an even number of digits, got ${digits.length}`,
		);
	}

	const bytes = new Uint8Array(digits.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}

/**
 * Renders bytes as lower-case hex without separators (`"48656c6c6f"`).
 */
export function bytesToHex(data: Uint8Array): string {
	let out = "";
	for (const byte of data) {
		out += byte.toString(16).padStart(2, "0");
	}
	return out;
}

/**
 * Decodes bytes as UTF-8 text. Invalid sequences become U+FFFD instead of throwing.
 * The library never decodes on its own; this is for callers presenting read
 * or notification values.
 */
export function decodeText(data: Uint8Array): string {
	return new TextDecoder("utf-8", { fatal: false }).decode(data);
}

/**
 * Encodes a payload into the bytes to write.
 * Returns a copy for raw payloads so later caller mutations cannot change
 * what is in flight. An empty payload is a valid zero-length write.
 *
 * @throws MalformedPayloadError for malformed hex
 */
export function encodePayload(payload: Payload): Uint8Array {
	let bytes: Uint8Array;
	switch (payload.encoding) {
		case "utf8":
			bytes = new TextEncoder().encode(payload.value);
			break;
		case "hex":
			bytes = hexToBytes(payload.value);
			break;
		case "raw":
			bytes = Uint8Array.from(payload.value);
			break;
	}
	return bytes;
}

/**
 * Reads a 16-bit little-endian value, returning undefined when out of range.
 * Used to split manufacturer data into its company ID and body.
 */
export function readUint16LE(
	data: Uint8Array,
	offset: number,
): number | undefined {
	if (offset < 0 || offset + 2 > data.length) {
		return undefined;
	}
	const b0 = data[offset];
	const b1 = data[offset + 1];
	if (b0 === undefined || b1 === undefined) {
		return undefined;
	}
	return b0 | (b1 << 8);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}
