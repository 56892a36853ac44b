/**
 * An unbounded, order-preserving queue consumed as an async iterable.
 *
 * Producers `push()` values from callbacks; a single consumer pulls them with
 * `for await`. Values pushed before `end()` are still delivered; after the
 * buffer drains the iteration finishes. Breaking out of the loop does not end
 * the stream, so it can be iterated again later.
 *
 * @example Bridging a callback API
 * ```typescript
 * const stream = createNotificationStream<Uint8Array>();
 * adapter.subscribe(handle, ref, (data) => stream.push(data));
 *
 * for await (const value of stream) {
 *   console.log(bytesToHex(value));
 * }
 * ```
 */
export interface NotificationStream<T> extends AsyncIterable<T> {
	/** Queues a value. Ignored once the stream has ended. */
	push(value: T): void;
	/** Ends the stream. Idempotent. */
	end(): void;
	readonly ended: boolean;
	/** Values waiting for the consumer */
	readonly buffered: number;
}

export function createNotificationStream<T>(): NotificationStream<T> {
	const buffer: Array<{ readonly value: T }> = [];
	const waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
	let ended = false;

	function push(value: T): void {
		if (ended) return;
		const waiter = waiters.shift();
		if (waiter) {
			waiter({ value, done: false });
			return;
		}
		buffer.push({ value });
	}

	function end(): void {
		if (ended) return;
		ended = true;
		for (const waiter of waiters.splice(0)) {
			waiter({ value: undefined, done: true });
		}
	}

	function next(): Promise<IteratorResult<T, undefined>> {
		const entry = buffer.shift();
		if (entry) {
			return Promise.resolve({ value: entry.value, done: false });
		}
		if (ended) {
			return Promise.resolve({ value: undefined, done: true });
		}
		return new Promise((resolve) => {
			waiters.push(resolve);
		});
	}

	return {
		push,
		end,
		get ended() {
			return ended;
		},
		get buffered() {
			return buffer.length;
		},
		[Symbol.asyncIterator](): AsyncIterator<T, undefined> {
			return {
				next,
				return: () => Promise.resolve({ value: undefined, done: true }),
			};
		},
	};
}
