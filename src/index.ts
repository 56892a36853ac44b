/**
 * gatt-central-kit - BLE central-role client for Node.js.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { createCentral, decodeText, text } from "gatt-central-kit";
 * import { createNobleAdapter } from "gatt-central-kit/noble";
 *
 * const central = createCentral(createNobleAdapter());
 * const devices = await central.discover(5000);
 * const { connectable } = await central.probeConnectable(devices);
 *
 * const session = await central.openSession(connectable[0]);
 * try {
 *   await central.resolve(session);
 *   const target = central.selectCharacteristic(session);
 *   await central.write(session, target, text("PING"));
 *   if (target.capabilities.has("read")) {
 *     console.log(decodeText(await central.read(session, target)));
 *   }
 * } finally {
 *   await central.closeSession(session);
 * }
 * ```
 */

// Adapters
export {
	createSimulatedRadio,
	GATT_ATTRIBUTE_NOT_FOUND,
	GATT_READ_NOT_PERMITTED,
	GATT_WRITE_NOT_PERMITTED,
	type RecordedWrite,
	type SimulatedCharacteristic,
	type SimulatedPeripheral,
	type SimulatedRadio,
	type SimulatedRadioOptions,
	type SimulatedRadioStats,
	type SimulatedService,
} from "./adapter";
// Sessions and exchanges
export {
	createNotificationStream,
	createOperationQueue,
	createProber,
	createSession,
	createSessionPool,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_PROBE_TIMEOUT_MS,
	DEFAULT_READ_TIMEOUT_MS,
	DEFAULT_RESOLVE_TIMEOUT_MS,
	DEFAULT_SUBSCRIBE_TIMEOUT_MS,
	DEFAULT_WRITE_TIMEOUT_MS,
	describeServices,
	type ExchangeOperation,
	type ExchangeOptions,
	type ExchangeRequest,
	type ExchangeResult,
	type ExclusiveContext,
	execute,
	findCharacteristic,
	MAX_BLE_CONNECTIONS,
	type Notification,
	type NotificationStream,
	type OpenOptions,
	type OpenRetryOptions,
	type OperationQueue,
	openWithRetry,
	type ProbeOptions,
	type ProbeOutcome,
	type ProbeReport,
	type Prober,
	RADIO_LANE,
	type ReadRequest,
	type RetryOptions,
	read,
	type ServiceSummary,
	type Session,
	type SessionEvents,
	type SessionOpener,
	type SessionPool,
	type SubscribeRequest,
	type Subscription,
	select,
	selectFirst,
	selectOne,
	subscribe,
	WRITABLE,
	type WriteAck,
	type WriteRequest,
	withRetry,
	write,
} from "./ble";
// Central facade
export {
	type CallOptions,
	type Central,
	type CentralOptions,
	createCentral,
	type WriteOptions,
} from "./central";
// Errors
export {
	AbortError,
	AdapterCapacityExceededError,
	AdapterError,
	AdapterFailure,
	type AdapterFailureKind,
	BleError,
	type BleErrorCode,
	ConnectRefusedError,
	ConnectTimeoutError,
	DiscoveryUnavailableError,
	InvalidStateError,
	isBleError,
	isTransientBLEError,
	LinkLostError,
	MalformedPayloadError,
	NoCapableCharacteristicError,
	PeerRejectedError,
	ReadError,
	SessionBusyError,
	TimeoutError,
	toBleError,
	WriteRejectedError,
} from "./errors";
// Flows
export {
	type BroadcastOptions,
	type BroadcastOutcome,
	type BroadcastReport,
	broadcast,
	DEFAULT_SEQUENCE_INTERVAL_MS,
	type FindConnectableOptions,
	findConnectable,
	type SendOptions,
	type SendResult,
	type SequenceOptions,
	type SequenceOutcome,
	sendSequence,
	sendToFirstCapable,
} from "./flows";
// Device registry
export {
	compareDevices,
	createDeviceRegistry,
	DEFAULT_DISCOVERY_WINDOW_MS,
	type DeviceRegistry,
	type DiscoveryOptions,
} from "./registry";
// State management
export {
	createEventEmitter,
	createStateMachine,
	type EventMap,
	type StateMachine,
	type TypedEventEmitter,
} from "./state";
// Types
export type {
	Advertisement,
	Capability,
	Characteristic,
	CharacteristicDescriptor,
	CharacteristicRef,
	ConnectionHandle,
	ConnectOptions,
	Device,
	RadioAdapter,
	RadioCapabilities,
	ScanOptions,
	Service,
	ServiceDescriptor,
	SessionState,
	Sighting,
	SubscriptionHandle,
} from "./types";
// Utils
export {
	BLUETOOTH_UUID_BASE,
	bytesEqual,
	bytesToHex,
	decodeText,
	delay,
	encodePayload,
	hex,
	hexToBytes,
	isUuid,
	normalizeUuid,
	type Payload,
	type PayloadEncoding,
	raw,
	text,
	toFullUuid,
	uuidMatches,
} from "./utils";
