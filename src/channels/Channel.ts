/**
 * Bounded FIFO channel between the presentation loop and the backend
 * coordinator.
 *
 * `trySend` never waits: it hands the value to a waiting receiver, buffers it
 * if there is room, or drops it. `send` waits for room instead. After
 * `close()` the buffered values can still be received, then every receive
 * yields `undefined`.
 */

export class ChannelClosedError extends Error {
	constructor() {
		super("Channel is closed");
		this.name = "ChannelClosedError";
	}
}

interface PendingSend<T> {
	value: T;
	resolve: () => void;
	reject: (error: Error) => void;
}

export class Channel<T> {
	private buffer: T[] = [];
	private receivers: Array<(value: T | undefined) => void> = [];
	private senders: Array<PendingSend<T>> = [];
	private closed = false;

	constructor(readonly capacity: number = 1) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
		}
	}

	/**
	 * Deliver without waiting. Returns false when the value was dropped
	 * because the buffer is full or the channel is closed.
	 */
	trySend(value: T): boolean {
		if (this.closed) return false;

		const receiver = this.receivers.shift();
		if (receiver) {
			receiver(value);
			return true;
		}

		if (this.buffer.length < this.capacity) {
			this.buffer.push(value);
			return true;
		}

		return false;
	}

	/**
	 * Deliver, waiting for buffer space. Rejects with ChannelClosedError if
	 * the channel is (or becomes) closed before the value is accepted.
	 */
	send(value: T): Promise<void> {
		if (this.closed) {
			return Promise.reject(new ChannelClosedError());
		}
		if (this.trySend(value)) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve, reject) => {
			this.senders.push({ value, resolve, reject });
		});
	}

	/**
	 * Take the oldest buffered value, or undefined when nothing is buffered
	 */
	tryRecv(): T | undefined {
		if (this.buffer.length === 0) {
			return undefined;
		}
		const value = this.buffer.shift();
		this.admitWaitingSender();
		return value;
	}

	/**
	 * Wait for the next value. Resolves to undefined once the channel is
	 * closed and drained.
	 */
	recv(): Promise<T | undefined> {
		if (this.buffer.length > 0) {
			return Promise.resolve(this.tryRecv());
		}
		if (this.closed) {
			return Promise.resolve(undefined);
		}
		return new Promise<T | undefined>((resolve) => {
			this.receivers.push(resolve);
		});
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;

		for (const receiver of this.receivers) {
			receiver(undefined);
		}
		this.receivers = [];

		for (const sender of this.senders) {
			sender.reject(new ChannelClosedError());
		}
		this.senders = [];
	}

	isClosed(): boolean {
		return this.closed;
	}

	/** Number of buffered values */
	get size(): number {
		return this.buffer.length;
	}

	private admitWaitingSender(): void {
		const sender = this.senders.shift();
		if (!sender) return;
		this.buffer.push(sender.value);
		sender.resolve();
	}
}
