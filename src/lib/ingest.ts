import type { Feed, ParsedMessage } from "../types.ts";
import type { Sender } from "./channel.ts";
import { EncodingError, RejectedError } from "./errors.ts";
import { buildFeed } from "./feed-builder.ts";
import type { Logger } from "./logger.ts";
import { type RoutingConfig, resolveMailbox } from "./mailbox.ts";
import { parseMessage } from "./mime.ts";

export type IngestOutcome =
	| { status: "queued"; feed: Feed }
	| { status: "blocked"; reason: string }
	| { status: "invalid"; reason: string };

export interface Ingestor {
	/**
	 * Route, build and queue one message. Resolves once the feed is in the
	 * channel, which may take a while when the channel is bounded and full.
	 *
	 * @throws RejectedError when no mailbox accepts the message
	 * @throws EncodingError when the message or its HTML is not UTF-8
	 */
	process(raw: Uint8Array, message: ParsedMessage): Promise<Feed>;
	/** Parse raw MIME and process it, reporting the expected failures as outcomes. */
	receive(raw: Buffer): Promise<IngestOutcome>;
	/** Drop this ingestor's producer handle. */
	close(): void;
}

export function createIngestor(
	config: RoutingConfig,
	sender: Sender<Feed>,
	log: Logger,
): Ingestor {
	async function processMessage(raw: Uint8Array, message: ParsedMessage): Promise<Feed> {
		const fromBox = resolveMailbox(message, config);
		const feed = buildFeed(raw, message, fromBox);
		await sender.send(feed);
		return feed;
	}

	async function receive(raw: Buffer): Promise<IngestOutcome> {
		const message = await parseMessage(raw);
		try {
			return { status: "queued", feed: await processMessage(raw, message) };
		} catch (error) {
			if (error instanceof RejectedError) {
				log.info("Blocked message", { subject: message.subject });
				return { status: "blocked", reason: error.message };
			}
			if (error instanceof EncodingError) {
				log.warn("Dropped message with bad encoding", error, {
					subject: message.subject,
				});
				return { status: "invalid", reason: error.message };
			}
			throw error;
		}
	}

	return {
		process: processMessage,
		receive,
		close: () => sender.close(),
	};
}
