/**
 * Fixed-capacity circular buffer over a preallocated Float64Array.
 *
 * The running sum makes `mean()` O(1). Each time the cursor wraps on a full
 * window the sum is rebuilt from the buffer, which keeps accumulated rounding
 * error bounded while the cost stays O(1) amortized.
 */
export class RollingWindow {
	private readonly buffer: Float64Array;
	private cursor = 0;
	private count = 0;
	private total = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(
				`RollingWindow capacity must be a positive integer, got ${capacity}`
			);
		}
		this.buffer = new Float64Array(capacity);
	}

	/** Appends a value and returns the one it evicted, if the window was full. */
	push(value: number): number | null {
		let evicted: number | null = null;
		if (this.count === this.capacity) {
			evicted = this.buffer[this.cursor];
			this.total -= evicted;
		} else {
			this.count += 1;
		}
		this.buffer[this.cursor] = value;
		this.total += value;
		this.cursor = (this.cursor + 1) % this.capacity;

		if (this.cursor === 0 && this.count === this.capacity) {
			this.resync();
		}
		return evicted;
	}

	get size(): number {
		return this.count;
	}

	get isFull(): boolean {
		return this.count === this.capacity;
	}

	get sum(): number {
		return this.total;
	}

	mean(): number | null {
		return this.count ? this.total / this.count : null;
	}

	/** `0` is the newest value, `size - 1` the oldest. */
	at(offsetFromLatest: number): number | null {
		if (offsetFromLatest < 0 || offsetFromLatest >= this.count) {
			return null;
		}
		const index =
			(this.cursor - 1 - offsetFromLatest + this.capacity * 2) % this.capacity;
		return this.buffer[index];
	}

	latest(): number | null {
		return this.at(0);
	}

	oldest(): number | null {
		return this.at(this.count - 1);
	}

	/** Oldest first. */
	toArray(): number[] {
		const values: number[] = [];
		for (let offset = this.count - 1; offset >= 0; offset -= 1) {
			const value = this.at(offset);
			if (value !== null) {
				values.push(value);
			}
		}
		return values;
	}

	clear(): void {
		this.buffer.fill(0);
		this.cursor = 0;
		this.count = 0;
		this.total = 0;
	}

	private resync(): void {
		let total = 0;
		for (let i = 0; i < this.count; i += 1) {
			total += this.buffer[i];
		}
		this.total = total;
	}
}
