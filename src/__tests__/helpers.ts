import type { LogEntry, Logger } from "../lib/logger.ts";
import { createLogger } from "../lib/logger.ts";
import type { Addr, Feed, HeaderValue, ParsedMessage } from "../types.ts";

export function captureLogs(target = "test"): { log: Logger; entries: LogEntry[] } {
	const entries: LogEntry[] = [];
	return { log: createLogger(target, (entry) => entries.push(entry)), entries };
}

export function addresses(...list: string[]): HeaderValue {
	const addrs: Addr[] = list.map((address) => ({ address }));
	return addrs.length === 1
		? { kind: "address", address: addrs[0] }
		: { kind: "addressList", addresses: addrs };
}

export function message(overrides: Partial<ParsedMessage> = {}): ParsedMessage {
	return {
		from: { kind: "empty" },
		to: { kind: "empty" },
		htmlBodies: [],
		...overrides,
	};
}

export function feed(overrides: Partial<Feed> = {}): Feed {
	return {
		id: "abcdefghij",
		createdAt: "2026-01-05T10:00:00.000Z",
		title: "Weekly digest",
		author: "alerts@vendor.com (Alerts)",
		content: "<p>Hello</p>",
		raw: "Subject: Weekly digest\r\n\r\n<p>Hello</p>",
		fromBox: "news",
		...overrides,
	};
}

export const RAW_DIGEST = [
	"From: Alerts <alerts@vendor.com>",
	"To: nobody@other.com, Second <second@other.com>",
	"Subject: Weekly digest",
	"MIME-Version: 1.0",
	"Content-Type: text/html; charset=utf-8",
	"",
	"<p>Hello</p>",
	"",
].join("\r\n");

export const RAW_TO_DOMAIN = [
	"From: someone@x.com",
	"To: user@example.com",
	"Subject: Direct",
	"MIME-Version: 1.0",
	"Content-Type: text/html; charset=utf-8",
	"",
	"<p>Direct</p>",
	"",
].join("\r\n");
