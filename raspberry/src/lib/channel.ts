/**
 * Unbounded single-consumer queue. Producers push synchronously (e.g. from MQTT callbacks);
 * the consumer drains it with `for await`. Iteration ends once the channel is closed and empty.
 */
export class Channel<T> implements AsyncIterable<T> {
	private readonly buffer: T[] = [];
	private waiter: ((result: IteratorResult<T>) => void) | null = null;
	private closed = false;

	get size(): number {
		return this.buffer.length;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Returns false when the channel is already closed and the value was dropped. */
	push(value: T): boolean {
		if (this.closed) return false;

		if (this.waiter) {
			const resolve = this.waiter;
			this.waiter = null;
			resolve({ value, done: false });
			return true;
		}

		this.buffer.push(value);
		return true;
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;

		if (this.waiter) {
			const resolve = this.waiter;
			this.waiter = null;
			resolve({ value: undefined, done: true });
		}
	}

	next(): Promise<IteratorResult<T>> {
		if (this.buffer.length > 0) {
			const [value] = this.buffer.splice(0, 1);
			return Promise.resolve({ value, done: false });
		}
		if (this.closed) {
			return Promise.resolve({ value: undefined, done: true });
		}
		return new Promise(resolve => {
			this.waiter = resolve;
		});
	}

	[Symbol.asyncIterator](): AsyncIterator<T> {
		return { next: () => this.next() };
	}
}
