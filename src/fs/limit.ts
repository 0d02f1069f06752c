/** Runs `task` once a permit is free and releases the permit when it settles. */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Creates a counting permit: at most `concurrency` tasks run at the same time,
 * the rest wait in FIFO order.
 */
export function createLimiter(concurrency: number): Limiter {
	if (!Number.isInteger(concurrency) || concurrency < 1)
		throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}.`);

	// Queue for managing concurrency.
	const opQueue: (() => void)[] = [];
	let activeOps = 0;

	const processQueue = () => {
		// Start new operations while under the concurrency limit.
		while (activeOps < concurrency && opQueue.length > 0) {
			const op = opQueue.shift();
			if (!op) break;
			activeOps++;
			op();
		}
	};

	return <T>(task: () => Promise<T>) =>
		new Promise<T>((resolve, reject) => {
			opQueue.push(() => {
				// The permit is released on every exit path, including a synchronous throw.
				Promise.resolve()
					.then(task)
					.then(resolve, reject)
					.finally(() => {
						activeOps--;
						processQueue();
					});
			});
			processQueue();
		});
}

/**
 * Single-assignment cell for the first error raised by any of several
 * concurrent tasks. Later errors are dropped.
 */
export class ErrorSlot {
	private error: unknown;
	private filled = false;

	/** Stores `error` if the slot is empty. Returns whether it was stored. */
	set(error: unknown): boolean {
		if (this.filled) return false;
		this.filled = true;
		this.error = error;
		return true;
	}

	get isSet(): boolean {
		return this.filled;
	}

	throwIfSet(): void {
		if (this.filled) throw this.error;
	}
}
