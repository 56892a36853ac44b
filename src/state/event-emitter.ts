export type EventMap = { [key: string]: unknown };

/**
 * A type-safe event emitter that provides compile-time checking for event names and payloads.
 *
 * @example Define typed events and create emitter
 * ```typescript
 * interface SessionEvents {
 *   stateChange: { from: SessionState; to: SessionState };
 *   linkLost: { address: string };
 * }
 *
 * const emitter = createEventEmitter<SessionEvents>();
 *
 * const off = emitter.on('linkLost', ({ address }) => {
 *   console.log('Lost', address);
 * });
 *
 * emitter.emit('linkLost', { address: 'aa:bb:cc:dd:ee:ff' });
 * off();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

interface Registration<V> {
	readonly callback: (data: V) => void;
	readonly once: boolean;
}

/**
 * Creates a typed event emitter.
 *
 * Listeners run synchronously in registration order. A listener that throws
 * does not stop the others; the error is reported asynchronously.
 * Registering the same callback twice for an event keeps a single registration.
 *
 * @param logPrefix - Prefix for listener error reports
 */
export function createEventEmitter<T extends EventMap>(
	logPrefix = "[gatt-central-kit:event-emitter]",
): TypedEventEmitter<T> {
	let registry: { [K in keyof T]?: Registration<T[K]>[] } = {};

	function add<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
		once: boolean,
	): () => void {
		const list = registry[event] ?? [];
		if (!list.some((entry) => entry.callback === callback)) {
			list.push({ callback, once });
		}
		registry[event] = list;
		return () => off(event, callback);
	}

	function on<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		return add(event, callback, false);
	}

	function once<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): () => void {
		return add(event, callback, true);
	}

	function off<K extends keyof T>(
		event: K,
		callback: (data: T[K]) => void,
	): void {
		const list = registry[event];
		if (!list) return;
		const remaining = list.filter((entry) => entry.callback !== callback);
		registry[event] = remaining.length > 0 ? remaining : undefined;
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event !== undefined) {
			registry[event] = undefined;
			return;
		}
		registry = {};
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const list = registry[event];
		if (!list) return;

		// Snapshot so listeners may unsubscribe while we iterate
		for (const entry of [...list]) {
			if (entry.once) {
				off(event, entry.callback);
			}
			try {
				entry.callback(data);
			} catch (err) {
				queueMicrotask(() => {
					console.error(`${logPrefix} Listener threw an error:`, err);
				});
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return registry[event]?.length ?? 0;
	}

	return {
		on,
		once,
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
