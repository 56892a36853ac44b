export {
	createEventEmitter,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";

export {
	createStateMachine,
	type StateMachine,
} from "./state-machine";
