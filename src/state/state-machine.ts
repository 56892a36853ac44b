import { InvalidStateError } from "../errors/errors";
import type { SessionState } from "../types";

export interface StateMachine {
	getState(): SessionState;
	canTransition(to: SessionState): boolean;
	/** @throws InvalidStateError for a move the table does not allow */
	transition(to: SessionState): void;
}

/**
 * Valid state transitions:
 * - idle -> connecting | disconnected (closed before use)
 * - connecting -> connected | failed | disconnected (cancelled)
 * - connected -> servicesResolved | disconnected
 * - servicesResolved -> busy | disconnected
 * - busy -> servicesResolved | disconnected
 * - failed -> connecting (open again) | disconnected
 * - disconnected is terminal
 */
const VALID_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
	idle: ["connecting", "disconnected"],
	connecting: ["connected", "failed", "disconnected"],
	connected: ["servicesResolved", "disconnected"],
	servicesResolved: ["busy", "disconnected"],
	busy: ["servicesResolved", "disconnected"],
	failed: ["connecting", "disconnected"],
	disconnected: [],
};

/**
 * Creates the state machine that guards a session's lifecycle.
 * The session announces changes itself, through its event emitter.
 *
 * @example Connection flow
 * ```typescript
 * const machine = createStateMachine();
 *
 * machine.transition('connecting');
 * try {
 *   handle = await adapter.connect(address, { timeoutMs: 5000 });
 *   machine.transition('connected');
 * } catch (error) {
 *   machine.transition('failed');
 * }
 * ```
 */
export function createStateMachine(
	initialState: SessionState = "idle",
): StateMachine {
	let state: SessionState = initialState;

	function canTransition(to: SessionState): boolean {
		return VALID_TRANSITIONS[state].includes(to);
	}

	return {
		getState: () => state,
		canTransition,
		transition(to: SessionState): void {
			if (!canTransition(to)) {
				throw new InvalidStateError(`move to ${to}`, state);
			}
			state = to;
		},
	};
}
