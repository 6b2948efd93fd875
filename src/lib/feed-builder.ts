import { nanoid } from "nanoid";
import type { Feed, HeaderValue, ParsedMessage } from "../types.ts";
import { EncodingError } from "./errors.ts";

export const FEED_ID_LENGTH = 10;
export const UNKNOWN_TITLE = "Unknown Title";
export const UNKNOWN_AUTHOR = "Unknown";

export function createFeedId(): string {
	return nanoid(FEED_ID_LENGTH);
}

export function formatAuthor(from: HeaderValue): string {
	if (from.kind !== "address") {
		return UNKNOWN_AUTHOR;
	}

	const { address, name } = from.address;
	if (address && name) return `${address} (${name})`;
	if (name) return name;
	if (address) return address;
	return UNKNOWN_AUTHOR;
}

function decodeUtf8(bytes: Uint8Array, field: "raw" | "content"): string {
	try {
		return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
	} catch {
		throw new EncodingError(field);
	}
}

function concatBytes(parts: Uint8Array[]): Uint8Array {
	const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
	let offset = 0;
	for (const part of parts) {
		out.set(part, offset);
		offset += part.length;
	}
	return out;
}

/**
 * Build the persisted entry for a message that already has a mailbox.
 *
 * Missing subject or sender fall back to placeholders; only undecodable bytes
 * make it fail.
 */
export function buildFeed(
	raw: Uint8Array,
	message: ParsedMessage,
	fromBox: string,
	now: Date = new Date(),
): Feed {
	if (!fromBox) {
		throw new Error("Cannot build a feed without a mailbox");
	}

	const rawText = decodeUtf8(raw, "raw");
	const content = decodeUtf8(concatBytes(message.htmlBodies), "content");

	return {
		id: createFeedId(),
		createdAt: now.toISOString(),
		title: message.subject ?? UNKNOWN_TITLE,
		author: formatAuthor(message.from),
		content,
		raw: rawText,
		fromBox,
	};
}
