export {
	type BroadcastOptions,
	type BroadcastOutcome,
	type BroadcastReport,
	broadcast,
} from "./broadcast";
export {
	type FindConnectableOptions,
	findConnectable,
} from "./find-connectable";
export { type SendOptions, type SendResult, sendToFirstCapable } from "./send";
export {
	DEFAULT_SEQUENCE_INTERVAL_MS,
	type SequenceOptions,
	type SequenceOutcome,
	sendSequence,
} from "./sequence";
