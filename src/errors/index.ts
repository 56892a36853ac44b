export {
	AbortError,
	AdapterCapacityExceededError,
	AdapterError,
	AdapterFailure,
	type AdapterFailureKind,
	abortReason,
	BleError,
	classifyAdapterFailure,
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
	normalizeError,
	PeerRejectedError,
	ReadError,
	raceWithAbort,
	SessionBusyError,
	TimeoutError,
	throwIfAborted,
	toBleError,
	WriteRejectedError,
	withTimeout,
} from "./errors";
