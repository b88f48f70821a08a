import { ChannelClosedError } from "../domain/errors.js";

/** Default number of buffered events before senders wait. */
export const DEFAULT_CHANNEL_CAPACITY = 100;

type Waiter<T> = (value: T | undefined) => void;

/**
 * Bounded multi-producer/single-consumer queue. Events from one producer are
 * received in the order they were sent; producers interleave arbitrarily.
 */
export class EventChannel<T> {
	private readonly buffer: T[] = [];
	private readonly senders: Array<{ value: T; resolve: () => void; reject: (error: Error) => void }> = [];
	private receiver: Waiter<T> | null = null;
	private closed = false;

	constructor(private readonly capacity = DEFAULT_CHANNEL_CAPACITY) {
		if (capacity < 1) throw new RangeError("Channel capacity must be at least 1");
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Number of buffered events not yet received. */
	get size(): number {
		return this.buffer.length + this.senders.length;
	}

	/**
	 * Enqueues `value`, waiting while the buffer is full.
	 * @throws ChannelClosedError if the channel is (or becomes) closed first.
	 */
	send(value: T): Promise<void> {
		if (this.closed) return Promise.reject(new ChannelClosedError());

		if (this.receiver) {
			const receiver = this.receiver;
			this.receiver = null;
			receiver(value);
			return Promise.resolve();
		}

		if (this.buffer.length < this.capacity) {
			this.buffer.push(value);
			return Promise.resolve();
		}

		return new Promise((resolve, reject) => {
			this.senders.push({ value, resolve, reject });
		});
	}

	/**
	 * Resolves with the next event, or `undefined` once the channel is closed and drained.
	 * Only one receive may be outstanding.
	 */
	recv(): Promise<T | undefined> {
		if (this.receiver) return Promise.reject(new Error("EventChannel supports a single consumer"));

		if (this.buffer.length > 0) {
			const value = this.buffer.shift();
			const sender = this.senders.shift();
			if (sender) {
				this.buffer.push(sender.value);
				sender.resolve();
			}
			return Promise.resolve(value);
		}

		if (this.closed) return Promise.resolve(undefined);

		return new Promise((resolve) => {
			this.receiver = resolve;
		});
	}

	/**
	 * Stops accepting events. Buffered events can still be received;
	 * senders blocked on a full buffer are rejected.
	 */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		for (const sender of this.senders.splice(0)) {
			sender.reject(new ChannelClosedError());
		}
		const receiver = this.receiver;
		this.receiver = null;
		receiver?.(undefined);
	}

	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		for (;;) {
			const value = await this.recv();
			if (value === undefined) return;
			yield value;
		}
	}
}
