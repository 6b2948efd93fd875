import { ChannelClosedError } from "./errors.ts";

export type ChannelCapacity = number | "unbounded";

export interface ChannelOptions {
	capacity: ChannelCapacity;
}

export interface Sender<T> {
	/** Queue a value, waiting while a bounded buffer is full. */
	send(value: T): Promise<void>;
	/** Another producer handle on the same channel. */
	clone(): Sender<T>;
	/** Drop this handle. The channel ends when the last one is dropped. */
	close(): void;
	readonly closed: boolean;
}

export interface Receiver<T> extends AsyncIterable<T> {
	recv(): Promise<IteratorResult<T, undefined>>;
}

export interface ChannelStats {
	buffered: number;
	senders: number;
	waitingSenders: number;
	closed: boolean;
}

type RecvWaiter<T> = (result: IteratorResult<T, undefined>) => void;

const END: IteratorReturnResult<undefined> = { done: true, value: undefined };

class Channel<T> {
	private buffer: T[] = [];
	private sendWaiters: Array<() => void> = [];
	private recvWaiters: RecvWaiter<T>[] = [];
	private senders = 0;
	private ended = false;
	readonly capacity: number;

	constructor(capacity: ChannelCapacity) {
		if (capacity !== "unbounded" && (!Number.isInteger(capacity) || capacity < 1)) {
			throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity === "unbounded" ? Number.POSITIVE_INFINITY : capacity;
	}

	attach(): void {
		this.senders++;
	}

	detach(): void {
		this.senders--;
		if (this.senders > 0) return;

		this.ended = true;
		// Only waiting receivers can exist here, which means the buffer is empty
		for (const waiter of this.recvWaiters) {
			waiter(END);
		}
		this.recvWaiters = [];
	}

	async send(value: T): Promise<void> {
		while (this.buffer.length >= this.capacity) {
			await new Promise<void>((resolve) => {
				this.sendWaiters.push(resolve);
			});
		}

		const receiver = this.recvWaiters.shift();
		if (receiver) {
			receiver({ done: false, value });
		} else {
			this.buffer.push(value);
		}
	}

	recv(): Promise<IteratorResult<T, undefined>> {
		if (this.buffer.length > 0) {
			const [value] = this.buffer.splice(0, 1);
			this.sendWaiters.shift()?.();
			return Promise.resolve({ done: false, value });
		}

		if (this.ended) {
			return Promise.resolve(END);
		}

		return new Promise((resolve) => {
			this.recvWaiters.push(resolve);
		});
	}

	get stats(): ChannelStats {
		return {
			buffered: this.buffer.length,
			senders: this.senders,
			waitingSenders: this.sendWaiters.length,
			closed: this.ended,
		};
	}
}

class ChannelSender<T> implements Sender<T> {
	private dropped = false;

	constructor(private readonly channel: Channel<T>) {
		channel.attach();
	}

	get closed(): boolean {
		return this.dropped;
	}

	send(value: T): Promise<void> {
		if (this.dropped) {
			return Promise.reject(new ChannelClosedError());
		}
		return this.channel.send(value);
	}

	clone(): Sender<T> {
		if (this.dropped) {
			throw new ChannelClosedError();
		}
		return new ChannelSender(this.channel);
	}

	close(): void {
		if (this.dropped) return;
		this.dropped = true;
		this.channel.detach();
	}
}

/**
 * Multi-producer, single-consumer queue.
 *
 * With a numeric capacity `send` suspends while that many items are waiting to
 * be received; with `"unbounded"` it never does. The receiver sees
 * end-of-stream once every sender handle is closed and the buffer is drained.
 */
export function createChannel<T>(options: ChannelOptions): {
	sender: Sender<T>;
	receiver: Receiver<T>;
	stats: () => ChannelStats;
} {
	const channel = new Channel<T>(options.capacity);
	const receiver: Receiver<T> = {
		recv: () => channel.recv(),
		[Symbol.asyncIterator]: () => ({
			next: () => channel.recv(),
		}),
	};

	return {
		sender: new ChannelSender(channel),
		receiver,
		stats: () => channel.stats,
	};
}
