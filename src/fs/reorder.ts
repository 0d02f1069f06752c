/**
 * Holding area for results that finish out of order but must be consumed in
 * sequence order, without gaps.
 *
 * @example
 * ```typescript
 * const buffer = new ReorderBuffer<{ seq: number }>();
 * buffer.push({ seq: 1 });
 * [...buffer.takeReady()]; // []
 * buffer.push({ seq: 0 });
 * [...buffer.takeReady()]; // [{ seq: 0 }, { seq: 1 }]
 * ```
 */
export class ReorderBuffer<T extends { seq: number }> {
	private readonly pending = new Map<number, T>();
	private nextSeq = 0;

	/** The sequence number the buffer is waiting for. */
	get next(): number {
		return this.nextSeq;
	}

	/** Number of items held back because an earlier one has not arrived yet. */
	get held(): number {
		return this.pending.size;
	}

	push(item: T): void {
		if (
			!Number.isInteger(item.seq) ||
			item.seq < this.nextSeq ||
			this.pending.has(item.seq)
		)
			throw new Error(`Sequence number ${item.seq} was already received.`);

		this.pending.set(item.seq, item);
	}

	/** Removes and yields the contiguous run of items starting at {@link next}. */
	*takeReady(): Generator<T, void, undefined> {
		for (;;) {
			const item = this.pending.get(this.nextSeq);
			if (item === undefined) return;
			this.pending.delete(this.nextSeq);
			this.nextSeq++;
			yield item;
		}
	}
}
