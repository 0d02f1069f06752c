/**
 * Bounded async queue between producers and a single consumer. `send` waits
 * while the buffer is full, which holds producers back when the consumer
 * falls behind.
 */
export interface Channel<T> extends AsyncIterable<T> {
	/** Resolves `true` once the value is queued, or `false` if the channel was closed first. */
	send(value: T): Promise<boolean>;
	/**
	 * Stop accepting values. Values already buffered are still delivered;
	 * senders that are still waiting are released with `false`.
	 */
	close(): void;
}

export function createChannel<T>(capacity: number): Channel<T> {
	if (!Number.isInteger(capacity) || capacity < 1)
		throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}.`);

	const buffer: T[] = [];
	const senders: { value: T; resolve: (queued: boolean) => void }[] = [];
	const receivers: ((result: IteratorResult<T, undefined>) => void)[] = [];
	let closed = false;

	const receive = (): Promise<IteratorResult<T, undefined>> => {
		if (buffer.length > 0) {
			const [value] = buffer.splice(0, 1);
			// Make room for the oldest waiting sender.
			const sender = senders.shift();
			if (sender) {
				buffer.push(sender.value);
				sender.resolve(true);
			}
			return Promise.resolve({ done: false, value });
		}
		if (closed) return Promise.resolve({ done: true, value: undefined });
		return new Promise((resolve) => receivers.push(resolve));
	};

	return {
		send(value) {
			if (closed) return Promise.resolve(false);

			const receiver = receivers.shift();
			if (receiver) {
				receiver({ done: false, value });
				return Promise.resolve(true);
			}
			if (buffer.length < capacity) {
				buffer.push(value);
				return Promise.resolve(true);
			}
			return new Promise((resolve) => senders.push({ value, resolve }));
		},

		close() {
			if (closed) return;
			closed = true;
			for (const sender of senders.splice(0)) sender.resolve(false);
			for (const receiver of receivers.splice(0))
				receiver({ done: true, value: undefined });
		},

		async *[Symbol.asyncIterator]() {
			for (;;) {
				const result = await receive();
				if (result.done) return;
				yield result.value;
			}
		},
	};
}
