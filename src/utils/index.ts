export {
	bytesEqual,
	bytesToHex,
	decodeText,
	encodePayload,
	hex,
	hexToBytes,
	type Payload,
	type PayloadEncoding,
	raw,
	readUint16LE,
	text,
} from "./bytes";

export { delay } from "./delay";

export {
	BLUETOOTH_UUID_BASE,
	isUuid,
	normalizeUuid,
	toFullUuid,
	uuidMatches,
} from "./uuid";
