import type { Feed } from "../types.ts";
import type { Receiver } from "./channel.ts";
import type { Logger } from "./logger.ts";
import type { FeedStore } from "./storage.ts";

export type ServoState = "idle" | "running" | "stopped";

export interface ServoStats {
	received: number;
	inserted: number;
	failed: number;
}

export function traceFeed(feed: Feed, log: Logger): void {
	log.info("New Feed", {
		id: feed.id,
		title: feed.title,
		author: feed.author,
		len: feed.content.length,
	});
}

/**
 * The only consumer of the ingestion channel and the only writer to storage.
 *
 * Each feed gets exactly one insert attempt. A failed insert is logged and the
 * feed is gone; the loop moves on to the next item.
 */
export class PersistenceServo {
	private current: ServoState = "idle";
	private readonly counters: ServoStats = { received: 0, inserted: 0, failed: 0 };

	constructor(
		private readonly feeds: Receiver<Feed>,
		private readonly store: FeedStore,
		private readonly log: Logger,
	) {}

	get state(): ServoState {
		return this.current;
	}

	get stats(): ServoStats {
		return { ...this.counters };
	}

	async run(): Promise<ServoStats> {
		if (this.current !== "idle") {
			throw new Error(`Servo already ${this.current}`);
		}
		this.current = "running";
		this.log.info("Starting");

		for await (const feed of this.feeds) {
			this.counters.received++;
			traceFeed(feed, this.log);
			try {
				await this.store.insert(feed);
				this.counters.inserted++;
			} catch (error) {
				this.counters.failed++;
				this.log.warn("Error inserting feed", error, { id: feed.id });
			}
		}

		this.current = "stopped";
		this.log.info("Stopping", { ...this.counters });
		return this.stats;
	}
}
