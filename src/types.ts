export interface Feed {
	id: string;
	createdAt: string;
	title: string;
	author: string;
	content: string;
	raw: string;
	fromBox: string;
}

export interface FeedSummary {
	id: string;
	title: string;
	/** RFC 2822, e.g. `Mon, 5 Jan 2026 10:00:00 +0000` */
	create_at: string;
}

export type RuleFilter =
	| { type: "ByFrom"; params: string }
	| { type: "ByTo"; params: string };

export interface Rule {
	toBox: string;
	filter: RuleFilter[];
}

export interface Addr {
	name?: string;
	address?: string;
}

export interface Group {
	name?: string;
	addresses: Addr[];
}

/**
 * Every shape a parsed address header can take. Anything the parser could not
 * classify ends up as `empty`.
 */
export type HeaderValue =
	| { kind: "address"; address: Addr }
	| { kind: "addressList"; addresses: Addr[] }
	| { kind: "group"; group: Group }
	| { kind: "groupList"; groups: Group[] }
	| { kind: "text"; text: string }
	| { kind: "textList"; texts: string[] }
	| { kind: "empty" };

export interface ParsedMessage {
	from: HeaderValue;
	to: HeaderValue;
	subject?: string;
	// Decoded contents of each text/html part, in message order
	htmlBodies: Uint8Array[];
}
