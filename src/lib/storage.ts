import { createStorage, type Storage } from "unstorage";
import fsLiteDriver from "unstorage/drivers/fs-lite";
import memoryDriver from "unstorage/drivers/memory";
import mongodbDriver from "unstorage/drivers/mongodb";
import type { Feed } from "../types.ts";

export type StorageDriverName = "fs" | "mongodb" | "memory";

export interface StorageConfig {
	driver: StorageDriverName;
	dataDir: string;
	mongoConStr: string;
	mongoDbName: string;
}

export interface ListOptions {
	limit: number;
	skip?: number;
	box?: string;
}

export interface FeedStore {
	insert(feed: Feed): Promise<void>;
	get(id: string): Promise<Feed | null>;
	/** Newest first. */
	list(options: ListOptions): Promise<Feed[]>;
	/** Every mailbox that has received a feed, in first-seen order. */
	boxes(): Promise<string[]>;
	close(): Promise<void>;
}

const FEEDS_INDEX = "index:feeds";
const BOXES_INDEX = "index:boxes";

const feedKey = (id: string) => `feed:${id}`;
// Box names are arbitrary strings; keep ":" and "/" out of the key namespace
const boxKey = (box: string) => `box:${encodeURIComponent(box)}`;

export function createKvStorage(config: StorageConfig): Storage {
	switch (config.driver) {
		case "memory":
			return createStorage({ driver: memoryDriver() });
		case "mongodb":
			return createStorage({
				driver: mongodbDriver({
					connectionString: config.mongoConStr,
					databaseName: config.mongoDbName,
					collectionName: "feeds",
				}),
			});
		default:
			return createStorage({ driver: fsLiteDriver({ base: config.dataDir }) });
	}
}

/**
 * Feed storage on a key/value backend. Each feed lives under `feed:<id>` and
 * is referenced from newest-first id lists, one global and one per box.
 *
 * The index updates are read-modify-write, so there must be a single writer.
 * Only the persistence servo calls `insert`.
 */
export class KvFeedStore implements FeedStore {
	constructor(private readonly kv: Storage) {}

	async insert(feed: Feed): Promise<void> {
		const existed = await this.kv.hasItem(feedKey(feed.id));
		await this.kv.setItem(feedKey(feed.id), feed);
		// Replacing a feed keeps its place in the indexes
		if (existed) return;

		const ids = await this.readList(FEEDS_INDEX);
		ids.unshift(feed.id);
		await this.kv.setItem(FEEDS_INDEX, ids);

		const boxIds = await this.readList(boxKey(feed.fromBox));
		boxIds.unshift(feed.id);
		await this.kv.setItem(boxKey(feed.fromBox), boxIds);

		const boxes = await this.readList(BOXES_INDEX);
		if (!boxes.includes(feed.fromBox)) {
			boxes.push(feed.fromBox);
			await this.kv.setItem(BOXES_INDEX, boxes);
		}
	}

	async get(id: string): Promise<Feed | null> {
		return this.kv.getItem<Feed>(feedKey(id));
	}

	async list({ limit, skip = 0, box }: ListOptions): Promise<Feed[]> {
		const ids = await this.readList(box === undefined ? FEEDS_INDEX : boxKey(box));

		const feeds: Feed[] = [];
		for (const id of ids.slice(skip, skip + limit)) {
			const feed = await this.get(id);
			if (feed) {
				feeds.push(feed);
			}
		}
		return feeds;
	}

	async boxes(): Promise<string[]> {
		return this.readList(BOXES_INDEX);
	}

	async close(): Promise<void> {
		await this.kv.dispose();
	}

	private async readList(key: string): Promise<string[]> {
		const value = await this.kv.getItem<string[]>(key);
		return Array.isArray(value) ? value : [];
	}
}
