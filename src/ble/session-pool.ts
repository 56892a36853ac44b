import { AdapterCapacityExceededError, normalizeError } from "../errors/errors";
import { createEventEmitter, type TypedEventEmitter } from "../state";

/**
 * Maximum concurrent BLE connections per Bluetooth adapter
 * on common controllers.
 */
export const MAX_BLE_CONNECTIONS = 7;

/**
 * What the pool needs to know about a session.
 */
export interface PooledSession {
	close(): Promise<void>;
}

/**
 * Events emitted by the session pool.
 */
export interface SessionPoolEvents<S extends PooledSession>
	extends Record<string, unknown> {
	/** A session took a connection slot */
	reserve: { session: S };
	/** A session gave its slot back */
	release: { session: S };
}

export interface SessionPoolOptions {
	/**
	 * Maximum concurrent connections.
	 * Never above what the radio reports.
	 * @default 7
	 */
	maxConnections?: number;
	/** Log prefix for warning messages */
	logPrefix?: string;
}

/**
 * Tracks which sessions hold a connection slot on the radio.
 *
 * A session reserves its slot before it starts connecting and releases it on
 * any exit (failed attempt, close, link loss), so in-flight attempts count
 * toward the limit.
 */
export interface SessionPool<S extends PooledSession> {
	/**
	 * Takes a slot for the session. Reserving twice for the same session is a no-op.
	 * @throws AdapterCapacityExceededError when every slot is taken
	 */
	reserve(session: S): void;

	/** Gives the session's slot back. No-op when it holds none. */
	release(session: S): void;

	has(session: S): boolean;

	/** Closes every session holding a slot */
	closeAll(): Promise<void>;

	/** Sessions currently holding a slot, in reservation order */
	getSessions(): S[];

	readonly activeCount: number;

	readonly maxConnections: number;

	/**
	 * @returns Unsubscribe function
	 */
	onReserve(callback: (session: S) => void): () => void;

	/**
	 * @returns Unsubscribe function
	 */
	onRelease(callback: (session: S) => void): () => void;
}

/**
 * Creates a session pool.
 *
 * @example Basic usage
 * ```typescript
 * const pool = createSessionPool({ maxConnections: adapter.capabilities.maxConnections });
 *
 * pool.onRelease((session) => {
 *   console.log(`Slot freed by ${session.targetAddress}`);
 * });
 *
 * console.log('Connected sessions:', pool.activeCount);
 * await pool.closeAll();
 * ```
 */
export function createSessionPool<S extends PooledSession>(
	options: SessionPoolOptions = {},
): SessionPool<S> {
	const {
		maxConnections = MAX_BLE_CONNECTIONS,
		logPrefix = "[gatt-central-kit:session-pool]",
	} = options;

	if (!Number.isInteger(maxConnections) || maxConnections < 1) {
		throw new RangeError(
			`maxConnections must be a positive integer, got ${maxConnections}`,
		);
	}

	const sessions = new Set<S>();
	const emitter: TypedEventEmitter<SessionPoolEvents<S>> =
		createEventEmitter(logPrefix);

	function reserve(session: S): void {
		if (sessions.has(session)) return;
		if (sessions.size >= maxConnections) {
			throw new AdapterCapacityExceededError(maxConnections);
		}
		sessions.add(session);
		emitter.emit("reserve", { session });
	}

	function release(session: S): void {
		if (!sessions.delete(session)) return;
		emitter.emit("release", { session });
	}

	async function closeAll(): Promise<void> {
		const results = await Promise.allSettled(
			Array.from(sessions, (session) => session.close()),
		);
		const failures = results.filter(
			(r): r is PromiseRejectedResult => r.status === "rejected",
		);
		if (failures.length > 0) {
			console.warn(
				`${logPrefix} ${failures.length} close(s) failed:`,
				failures.map((f) => normalizeError(f.reason).message).join("; "),
			);
		}
	}

	return {
		reserve,
		release,
		has(session: S): boolean {
			return sessions.has(session);
		},
		closeAll,
		getSessions(): S[] {
			return Array.from(sessions);
		},
		get activeCount(): number {
			return sessions.size;
		},
		get maxConnections(): number {
			return maxConnections;
		},
		onReserve(callback: (session: S) => void): () => void {
			return emitter.on("reserve", ({ session }) => callback(session));
		},
		onRelease(callback: (session: S) => void): () => void {
			return emitter.on("release", ({ session }) => callback(session));
		},
	};
}
