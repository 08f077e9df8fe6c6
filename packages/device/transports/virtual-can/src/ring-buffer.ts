/**
 * Fixed-capacity FIFO. Pushing into a full buffer evicts the oldest entry.
 * Push and eviction are O(1); iteration yields oldest first.
 */
export class RingBuffer<T> implements Iterable<T> {
	private readonly slots: (T | undefined)[];
	private head = 0; // index of the oldest entry
	private count = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new Error(`Ring buffer capacity must be a positive integer (got ${capacity})`);
		}
		this.slots = new Array<T | undefined>(capacity);
	}

	get size(): number {
		return this.count;
	}

	/** Append an entry, overwriting the oldest one when the buffer is full */
	push(item: T): void {
		if (this.count < this.capacity) {
			this.slots[(this.head + this.count) % this.capacity] = item;
			this.count++;
			return;
		}

		this.slots[this.head] = item;
		this.head = (this.head + 1) % this.capacity;
	}

	clear(): void {
		this.slots.fill(undefined);
		this.head = 0;
		this.count = 0;
	}

	*[Symbol.iterator](): Iterator<T> {
		for (let i = 0; i < this.count; i++) {
			const item = this.slots[(this.head + i) % this.capacity];
			if (item !== undefined) yield item;
		}
	}

	/** Newest entries first, stopping as soon as `keep` returns false */
	*newestWhile(keep: (item: T) => boolean): Generator<T> {
		for (let i = this.count - 1; i >= 0; i--) {
			const item = this.slots[(this.head + i) % this.capacity];
			if (item === undefined || !keep(item)) return;
			yield item;
		}
	}

	toArray(): T[] {
		return Array.from(this);
	}
}
