import { beforeEach, describe, expect, it } from "vitest";
import type { Config } from "../lib/config.ts";
import type { IngestOutcome } from "../lib/ingest.ts";
import { createKvStorage, KvFeedStore } from "../lib/storage.ts";
import { createApp, escapeHtml, renderFeed, toAuthor, toRfc2822, toSummary } from "../web.ts";
import { captureLogs, feed } from "./helpers.ts";

const baseConfig: Readonly<Config> = {
	domain: "example.com",
	webDomain: "mail.example.com",
	webPort: 8080,
	smtpPort: 10000,
	perPage: 10,
	defaultPageLimit: 2,
	rules: [],
	channelCapacity: 256,
	storage: {
		driver: "memory",
		dataDir: "./unused",
		mongoConStr: "mongodb://unused",
		mongoDbName: "unused",
	},
};

const BASE = "http://localhost:8080";

function basic(username: string, password: string): string {
	return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

describe("web app", () => {
	let store: KvFeedStore;

	beforeEach(async () => {
		store = new KvFeedStore(createKvStorage(baseConfig.storage));
		await store.insert(feed({ id: "feed000001", title: "one", fromBox: "news" }));
		await store.insert(
			feed({ id: "feed000002", title: "two", fromBox: "user@example.com" }),
		);
		await store.insert(feed({ id: "feed000003", title: "three", fromBox: "news" }));
	});

	function app(overrides: Partial<Config> = {}, ingest?: IngestOutcome | Error) {
		const logs = captureLogs("web");
		let ingestor: { receive: () => Promise<IngestOutcome> } | undefined;
		if (ingest !== undefined) {
			const result = ingest;
			ingestor = {
				receive: async () => {
					if (result instanceof Error) throw result;
					return result;
				},
			};
		}
		const instance = createApp({
			config: { ...baseConfig, ...overrides },
			store,
			log: logs.log,
			ingestor,
		});
		const fetch = (path: string, init?: RequestInit) =>
			instance.fetch(new Request(`${BASE}${path}`, init));
		return { fetch, ...logs };
	}

	it("answers the health check", async () => {
		const response = await app().fetch("/health");
		expect(response.status).toBe(200);
		expect(await response.text()).toBe("OK");
	});

	it("warns when no auth is configured", () => {
		const { entries } = app();
		expect(entries[0]).toMatchObject({
			level: "warn",
			message: "No auth configured, this can be dangerous and should only be used in development",
		});
	});

	it("logs each request", async () => {
		const { fetch, entries } = app();
		await fetch("/health");
		expect(entries[1]).toMatchObject({
			level: "info",
			message: "request",
			fields: { method: "GET", route: "/health", status: 200 },
		});
	});

	it("lists summaries newest first with the default limit", async () => {
		const response = await app().fetch("/feeds");
		expect(response.headers.get("content-type")).toBe("application/json; charset=utf-8");
		expect(await response.json()).toEqual({
			items: [
				{ id: "feed000003", title: "three", create_at: "Mon, 5 Jan 2026 10:00:00 +0000" },
				{ id: "feed000002", title: "two", create_at: "Mon, 5 Jan 2026 10:00:00 +0000" },
			],
		});
	});

	it("honours limit and skip", async () => {
		const response = await app().fetch("/feeds?limit=5&skip=2");
		const body = await response.json();
		expect(body.items.map((item: { id: string }) => item.id)).toEqual(["feed000001"]);
	});

	it("rejects an invalid limit", async () => {
		const response = await app().fetch("/feeds?limit=0");
		expect(response.status).toBe(400);
		expect(await response.json()).toEqual({ error: "Invalid limit or skip" });
	});

	it("returns the raw message as text", async () => {
		const response = await app().fetch("/feeds/feed000002/raw");
		expect(response.status).toBe(200);
		expect(response.headers.get("content-type")).toBe("text/plain; charset=utf-8");
		expect(await response.text()).toBe("Subject: Weekly digest\r\n\r\n<p>Hello</p>");
	});

	it("renders the web view with the stored content", async () => {
		const response = await app().fetch("/feeds/feed000001");
		expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
		const html = await response.text();
		expect(html).toContain("<h1>one</h1>");
		expect(html).toContain('<a href="/feeds/feed000001/raw">View raw</a>');
	});

	it("reports a missing feed", async () => {
		const response = await app().fetch("/feeds/nothere123");
		expect(response.status).toBe(404);
		expect(await response.text()).toBe("Cannot find nothere123");
	});

	it("lists mailboxes in first-seen order", async () => {
		const response = await app().fetch("/boxes");
		expect(await response.json()).toEqual(["news", "user@example.com"]);
	});

	it("serves the RSS feed for one box", async () => {
		const response = await app().fetch("/rss/news");
		expect(response.headers.get("content-type")).toBe("application/rss+xml; charset=utf-8");
		const xml = await response.text();
		expect(xml).toContain("Mail List: news");
		expect(xml).toContain("<link>https://mail.example.com/feeds/feed000003</link>");
		expect(xml).toContain("<link>https://mail.example.com/feeds/feed000001</link>");
		expect(xml).not.toContain("feed000002");
	});

	it("serves Atom", async () => {
		const response = await app().fetch("/atom");
		expect(response.headers.get("content-type")).toBe("application/atom+xml; charset=utf-8");
		expect(await response.text()).toContain("http://www.w3.org/2005/Atom");
	});

	it("returns 404 for unknown paths and methods", async () => {
		const { fetch } = app();
		expect((await fetch("/nope")).status).toBe(404);
		expect((await fetch("/feeds", { method: "DELETE" })).status).toBe(404);
	});

	it("answers CORS preflight", async () => {
		const response = await app().fetch("/feeds", { method: "OPTIONS" });
		expect(response.status).toBe(204);
		expect(response.headers.get("access-control-allow-origin")).toBe("*");
	});

	it("redirects forwarded plain HTTP to the public https host", async () => {
		const response = await app().fetch("/feeds?limit=2", {
			headers: { "x-forwarded-proto": "http" },
		});
		expect(response.status).toBe(301);
		expect(response.headers.get("location")).toBe("https://mail.example.com/feeds?limit=2");
	});

	describe("with basic auth", () => {
		const auth = { username: "admin", password: "test-secret" };

		it("rejects missing or wrong credentials", async () => {
			const { fetch } = app({ auth });
			const missing = await fetch("/feeds");
			expect(missing.status).toBe(401);
			expect(missing.headers.get("www-authenticate")).toBe(
				'Basic realm="mail-list-rss", charset="UTF-8"',
			);
			const wrong = await fetch("/feeds", {
				headers: { authorization: basic("admin", "nope") },
			});
			expect(wrong.status).toBe(401);
		});

		it("accepts the configured credentials", async () => {
			const response = await app({ auth }).fetch("/boxes", {
				headers: { authorization: basic("admin", "test-secret") },
			});
			expect(response.status).toBe(200);
		});

		it("leaves the health check open", async () => {
			expect((await app({ auth }).fetch("/health")).status).toBe(200);
		});
	});

	describe("inbound webhook", () => {
		const webhookSecret = "test-secret";
		const post = (token: string) => ({
			method: "POST",
			headers: { "x-webhook-verification-token": token },
			body: "Subject: hi\r\n\r\nbody\r\n",
		});

		it("is not routed without a secret", async () => {
			const response = await app().fetch("/api/webhook/inbound", post("test-secret"));
			expect(response.status).toBe(404);
		});

		it("rejects a wrong token", async () => {
			const response = await app({ webhookSecret }, { status: "queued", feed: feed() }).fetch(
				"/api/webhook/inbound",
				post("wrong"),
			);
			expect(response.status).toBe(401);
			expect(await response.json()).toEqual({ error: "Invalid webhook signature" });
		});

		it("returns the id of a queued feed", async () => {
			const response = await app({ webhookSecret }, { status: "queued", feed: feed() }).fetch(
				"/api/webhook/inbound",
				post("test-secret"),
			);
			expect(response.status).toBe(201);
			expect(await response.json()).toEqual({ id: "abcdefghij" });
		});

		it("maps blocked and invalid outcomes", async () => {
			const blocked = await app(
				{ webhookSecret },
				{ status: "blocked", reason: "Not sending to example.com, blocked" },
			).fetch("/api/webhook/inbound", post("test-secret"));
			expect(blocked.status).toBe(403);
			expect(await blocked.json()).toEqual({ error: "Not sending to example.com, blocked" });

			const invalid = await app(
				{ webhookSecret },
				{ status: "invalid", reason: "Message raw is not valid UTF-8" },
			).fetch("/api/webhook/inbound", post("test-secret"));
			expect(invalid.status).toBe(422);
		});

		it("reports 503 without an ingestor and 500 on failure", async () => {
			const idle = await app({ webhookSecret }).fetch("/api/webhook/inbound", post("test-secret"));
			expect(idle.status).toBe(503);

			const failing = await app({ webhookSecret }, new Error("boom")).fetch(
				"/api/webhook/inbound",
				post("test-secret"),
			);
			expect(failing.status).toBe(500);
			expect(await failing.json()).toEqual({ error: "Failed to process webhook" });
		});
	});
});

describe("toSummary", () => {
	it("keeps id and title and formats the date", () => {
		expect(toSummary(feed())).toEqual({
			id: "abcdefghij",
			title: "Weekly digest",
			create_at: "Mon, 5 Jan 2026 10:00:00 +0000",
		});
	});
});

describe("renderFeed", () => {
	it("names the feed after the box and links items to their web view", () => {
		const rss = renderFeed([feed()], {
			link: "https://mail.example.com/rss/news",
			webDomain: "mail.example.com",
			box: "news",
		});
		expect(rss.options.title).toBe("Mail List: news");
		expect(rss.items).toHaveLength(1);
		expect(rss.items[0].link).toBe("https://mail.example.com/feeds/abcdefghij");
		expect(rss.items[0].author).toEqual([{ name: "Alerts", email: "alerts@vendor.com" }]);
	});

	it("writes the author into every RSS item", () => {
		const xml = renderFeed([feed(), feed({ id: "feed000009", author: "solo@vendor.com" })], {
			link: "https://mail.example.com/rss",
			webDomain: "mail.example.com",
		}).rss2();
		expect(xml).toContain("<author>alerts@vendor.com (Alerts)</author>");
		expect(xml).toContain("<author>solo@vendor.com (solo@vendor.com)</author>");
	});

	it("uses the plain title without a box", () => {
		const rss = renderFeed([], { link: "https://mail.example.com/rss", webDomain: "mail.example.com" });
		expect(rss.options.title).toBe("Mail List");
	});
});

describe("toAuthor", () => {
	it("splits the stored author forms", () => {
		expect(toAuthor("alerts@vendor.com (Alerts Team)")).toEqual({
			name: "Alerts Team",
			email: "alerts@vendor.com",
		});
		expect(toAuthor("solo@vendor.com")).toEqual({
			name: "solo@vendor.com",
			email: "solo@vendor.com",
		});
		expect(toAuthor("Only A Name")).toEqual({ name: "Only A Name" });
		expect(toAuthor("Unknown")).toEqual({ name: "Unknown" });
	});
});

describe("toRfc2822", () => {
	it("formats UTC dates without day padding", () => {
		expect(toRfc2822(new Date("2026-01-05T10:00:00.000Z"))).toBe(
			"Mon, 5 Jan 2026 10:00:00 +0000",
		);
		expect(toRfc2822(new Date("2026-10-19T23:05:09.000Z"))).toBe(
			"Mon, 19 Oct 2026 23:05:09 +0000",
		);
	});
});

describe("escapeHtml", () => {
	it("escapes markup characters", () => {
		expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
			"&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;",
		);
	});
});
