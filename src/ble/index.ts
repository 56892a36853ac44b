export {
	DEFAULT_READ_TIMEOUT_MS,
	DEFAULT_SUBSCRIBE_TIMEOUT_MS,
	DEFAULT_WRITE_TIMEOUT_MS,
	type ExchangeOperation,
	type ExchangeOptions,
	type ExchangeRequest,
	type ExchangeResult,
	execute,
	type Notification,
	type ReadRequest,
	read,
	type SubscribeRequest,
	type Subscription,
	subscribe,
	type WriteAck,
	type WriteRequest,
	write,
} from "./exchange";
export {
	createNotificationStream,
	type NotificationStream,
} from "./notification-stream";
export {
	createOperationQueue,
	type EnqueueOptions,
	type OperationQueue,
	RADIO_LANE,
} from "./operation-queue";
export {
	createProber,
	DEFAULT_PROBE_TIMEOUT_MS,
	type ProbeOptions,
	type ProbeOutcome,
	type ProbeReport,
	type Prober,
	type ProberOptions,
} from "./prober";
export {
	describeServices,
	findCharacteristic,
	type ServiceSummary,
	select,
	selectFirst,
	selectOne,
	WRITABLE,
} from "./selector";
export {
	createSession,
	DEFAULT_RESOLVE_TIMEOUT_MS,
	type ExclusiveContext,
	type OpenOptions,
	type Session,
	type SessionEvents,
	type SessionOptions,
} from "./session";
export {
	createSessionPool,
	MAX_BLE_CONNECTIONS,
	type PooledSession,
	type SessionPool,
	type SessionPoolEvents,
	type SessionPoolOptions,
} from "./session-pool";
export {
	classifyConnectError,
	type ConnectWithTimeoutOptions,
	connectWithTimeout,
	DEFAULT_CONNECT_TIMEOUT_MS,
	type OpenRetryOptions,
	openWithRetry,
	type RetryOptions,
	type SessionOpener,
	withRetry,
} from "./transport";
