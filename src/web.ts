import { Feed as RSSFeed } from "feed";
import { z } from "zod";
import { verifyBasicAuth, safeEqual } from "./lib/auth.ts";
import type { Config } from "./lib/config.ts";
import type { Ingestor } from "./lib/ingest.ts";
import type { Logger } from "./lib/logger.ts";
import type { FeedStore } from "./lib/storage.ts";
import type { Feed, FeedSummary } from "./types.ts";

export interface AppDeps {
	config: Readonly<Config>;
	store: FeedStore;
	log: Logger;
	ingestor?: Pick<Ingestor, "receive">;
}

export interface App {
	fetch(request: Request): Promise<Response>;
}

type FeedFormat = "rss" | "atom";

const listQuerySchema = z.object({
	limit: z.coerce.number().int().min(1).max(1000).optional(),
	skip: z.coerce.number().int().min(0).optional(),
});

const CORS_HEADERS = {
	"access-control-allow-origin": "*",
	"access-control-allow-methods": "*",
	"access-control-allow-headers": "*",
};

export function createApp(deps: AppDeps): App {
	const { config, log } = deps;

	if (config.auth) {
		log.info("Using basic auth");
	} else {
		log.warn(
			"No auth configured, this can be dangerous and should only be used in development",
		);
	}

	return {
		async fetch(request: Request): Promise<Response> {
			const started = performance.now();
			const response = await route(request, deps);
			log.info("request", {
				method: request.method,
				route: new URL(request.url).pathname,
				status: response.status,
				time: Math.round(performance.now() - started),
			});
			return response;
		},
	};
}

async function route(request: Request, deps: AppDeps): Promise<Response> {
	const { config } = deps;
	const url = new URL(request.url);

	// Handle CORS preflight
	if (request.method === "OPTIONS") {
		return new Response(null, { status: 204, headers: CORS_HEADERS });
	}

	// Behind a TLS-terminating proxy, plain HTTP goes to the public https host
	const proto = request.headers.get("x-forwarded-proto");
	if (proto !== null && proto !== "https") {
		return new Response(null, {
			status: 301,
			headers: {
				location: `https://${config.webDomain}${url.pathname}${url.search}`,
			},
		});
	}

	if (url.pathname === "/health") {
		return textResponse("OK");
	}

	if (
		url.pathname === "/api/webhook/inbound" &&
		request.method === "POST" &&
		config.webhookSecret
	) {
		return handleInboundWebhook(request, deps, config.webhookSecret);
	}

	if (
		config.auth &&
		!verifyBasicAuth(request.headers.get("authorization"), config.auth)
	) {
		return new Response("Unauthorized", {
			status: 401,
			headers: {
				"content-type": "text/plain; charset=utf-8",
				"www-authenticate": 'Basic realm="mail-list-rss", charset="UTF-8"',
			},
		});
	}

	if (request.method !== "GET") {
		return jsonResponse({ error: "Not found" }, 404);
	}

	if (url.pathname === "/") {
		return handleIndex(deps);
	}

	if (url.pathname === "/feeds") {
		return handleList(url, deps);
	}

	if (url.pathname === "/boxes") {
		return jsonResponse(await deps.store.boxes());
	}

	const feedMatch = url.pathname.match(/^\/feeds\/([^/]+)(\/raw)?$/);
	if (feedMatch) {
		const id = decodeSegment(feedMatch[1]);
		if (id === null) {
			return jsonResponse({ error: "Bad feed id" }, 400);
		}
		return feedMatch[2] ? handleRaw(deps, id) : handleWebView(deps, id);
	}

	const rssMatch = url.pathname.match(/^\/(rss|atom)(?:\/([^/]+))?$/);
	if (rssMatch) {
		const format: FeedFormat = rssMatch[1] === "atom" ? "atom" : "rss";
		if (rssMatch[2] === undefined) {
			return handleGetFeed(deps, format);
		}
		const box = decodeSegment(rssMatch[2]);
		if (box === null) {
			return jsonResponse({ error: "Bad box name" }, 400);
		}
		return handleGetFeed(deps, format, box);
	}

	return jsonResponse({ error: "Not found" }, 404);
}

function decodeSegment(segment: string): string | null {
	try {
		return decodeURIComponent(segment);
	} catch {
		return null;
	}
}

function jsonResponse(data: unknown, status = 200): Response {
	return new Response(JSON.stringify(data), {
		status,
		headers: {
			"content-type": "application/json; charset=utf-8",
			...CORS_HEADERS,
		},
	});
}

function textResponse(
	body: string,
	status = 200,
	contentType = "text/plain",
): Response {
	return new Response(body, {
		status,
		headers: {
			"content-type": `${contentType}; charset=utf-8`,
			...CORS_HEADERS,
		},
	});
}

export function toRfc2822(date: Date): string {
	const [weekday, day, month, year, time] = date.toUTCString().split(" ");
	return `${weekday} ${Number(day)} ${month} ${year} ${time} +0000`;
}

export function toSummary(feed: Feed): FeedSummary {
	return {
		id: feed.id,
		title: feed.title,
		create_at: toRfc2822(new Date(feed.createdAt)),
	};
}

// "address (name)", "address", "name" or "Unknown", as the feed builder writes it
export function toAuthor(author: string): { name: string; email?: string } {
	const named = author.match(/^(\S+@\S+) \((.*)\)$/);
	if (named) {
		return { name: named[2], email: named[1] };
	}
	if (/^\S+@\S+$/.test(author)) {
		return { name: author, email: author };
	}
	return { name: author };
}

// Webhook handler

async function handleInboundWebhook(
	request: Request,
	deps: AppDeps,
	secret: string,
): Promise<Response> {
	const token = request.headers.get("x-webhook-verification-token") ?? "";
	if (!safeEqual(token, secret)) {
		return jsonResponse({ error: "Invalid webhook signature" }, 401);
	}

	if (!deps.ingestor) {
		return jsonResponse({ error: "Mail intake is not running" }, 503);
	}

	try {
		const raw = Buffer.from(await request.arrayBuffer());
		const outcome = await deps.ingestor.receive(raw);

		if (outcome.status === "queued") {
			return jsonResponse({ id: outcome.feed.id }, 201);
		}
		return jsonResponse(
			{ error: outcome.reason },
			outcome.status === "blocked" ? 403 : 422,
		);
	} catch (error) {
		deps.log.error("Webhook processing error", error);
		return jsonResponse({ error: "Failed to process webhook" }, 500);
	}
}

// Read handlers

async function handleList(url: URL, deps: AppDeps): Promise<Response> {
	const query = listQuerySchema.safeParse({
		limit: url.searchParams.get("limit") ?? undefined,
		skip: url.searchParams.get("skip") ?? undefined,
	});
	if (!query.success) {
		return jsonResponse({ error: "Invalid limit or skip" }, 400);
	}

	try {
		const feeds = await deps.store.list({
			limit: query.data.limit ?? deps.config.defaultPageLimit,
			skip: query.data.skip,
		});
		return jsonResponse({ items: feeds.map(toSummary) });
	} catch (error) {
		deps.log.error("List feeds error", error);
		return jsonResponse({ error: "Failed to list feeds" }, 500);
	}
}

async function handleRaw(deps: AppDeps, id: string): Promise<Response> {
	try {
		const feed = await deps.store.get(id);
		if (!feed) {
			return textResponse(`Cannot find ${id}`, 404);
		}
		return textResponse(feed.raw);
	} catch (error) {
		deps.log.error("Raw view error", error, { id });
		return textResponse("Error loading feed", 500);
	}
}

export function renderFeed(
	feeds: Feed[],
	options: { link: string; webDomain: string; box?: string },
): RSSFeed {
	const rssFeed = new RSSFeed({
		title: options.box ? `Mail List: ${options.box}` : "Mail List",
		description: options.box ? `Mail sent to ${options.box}` : "Mail List",
		id: options.link,
		link: options.link,
		language: "en",
		updated: feeds.length > 0 ? new Date(feeds[0].createdAt) : new Date(),
		generator: "mail-list-rss",
		copyright: "",
	});

	for (const feed of feeds) {
		const permalink = `https://${options.webDomain}/feeds/${feed.id}`;
		rssFeed.addItem({
			title: feed.title,
			id: permalink,
			link: permalink,
			content: feed.content,
			author: [toAuthor(feed.author)],
			date: new Date(feed.createdAt),
		});
	}

	return rssFeed;
}

async function handleGetFeed(
	deps: AppDeps,
	format: FeedFormat,
	box?: string,
): Promise<Response> {
	const { config } = deps;
	const path = box === undefined ? `/${format}` : `/${format}/${encodeURIComponent(box)}`;

	try {
		const feeds = await deps.store.list({ limit: config.perPage, box });
		const rssFeed = renderFeed(feeds, {
			link: `https://${config.webDomain}${path}`,
			webDomain: config.webDomain,
			box,
		});

		const contentType =
			format === "atom"
				? "application/atom+xml; charset=utf-8"
				: "application/rss+xml; charset=utf-8";

		const output = format === "atom" ? rssFeed.atom1() : rssFeed.rss2();

		return new Response(output, {
			headers: {
				"content-type": contentType,
				"cache-control": "public, max-age=300",
				...CORS_HEADERS,
			},
		});
	} catch (error) {
		deps.log.error("Feed generation error", error, { box });
		return jsonResponse({ error: "Failed to generate feed" }, 500);
	}
}

// HTML pages

const PAGE_STYLE = `
		:root {
			--ink: #1a1a1a;
			--paper: #fdfbf7;
			--accent: #d84315;
			--muted: #6b7280;
			--border: #e5dfd3;
		}
		* { margin: 0; padding: 0; box-sizing: border-box; }
		body {
			font-family: -apple-system, BlinkMacSystemFont, sans-serif;
			background: var(--paper);
			color: var(--ink);
			line-height: 1.6;
		}
		.header, .content, .footer {
			max-width: 800px;
			margin: 0 auto;
			padding: 2rem 1rem;
		}
		.header { border-bottom: 1px solid var(--border); }
		.header h1 {
			font-family: serif;
			font-size: 1.75rem;
			font-weight: 600;
			margin-bottom: 0.5rem;
		}
		.meta { color: var(--muted); font-size: 0.875rem; }
		a { color: var(--accent); text-decoration: none; }
		a:hover { text-decoration: underline; }
		.content img { max-width: 100%; height: auto; }
		.content li { list-style: none; padding: 0.5rem 0; border-bottom: 1px solid var(--border); }
		.footer {
			border-top: 1px solid var(--border);
			text-align: center;
			color: var(--muted);
			font-size: 0.875rem;
		}`;

function htmlPage(title: string, header: string, body: string): string {
	return `<!DOCTYPE html>
<html lang="en">
<head>
	<meta charset="UTF-8">
	<meta name="viewport" content="width=device-width, initial-scale=1.0">
	<title>${escapeHtml(title)}</title>
	<style>${PAGE_STYLE}
	</style>
</head>
<body>
	<header class="header">
		${header}
	</header>
	<main class="content">
		${body}
	</main>
	<footer class="footer">
		<p><a href="/rss">RSS</a> · <a href="/atom">Atom</a></p>
	</footer>
</body>
</html>`;
}

function formatDate(iso: string): string {
	return new Date(iso).toLocaleDateString("en-US", {
		weekday: "long",
		year: "numeric",
		month: "long",
		day: "numeric",
	});
}

async function handleIndex(deps: AppDeps): Promise<Response> {
	try {
		const [feeds, boxes] = await Promise.all([
			deps.store.list({ limit: deps.config.defaultPageLimit }),
			deps.store.boxes(),
		]);

		const items = feeds
			.map(
				(feed) =>
					`<li><a href="/feeds/${feed.id}">${escapeHtml(feed.title)}</a><br><span class="meta">${escapeHtml(feed.author)} · ${formatDate(feed.createdAt)}</span></li>`,
			)
			.join("\n\t\t");
		const boxLinks = boxes
			.map(
				(box) =>
					`<a href="/rss/${encodeURIComponent(box)}">${escapeHtml(box)}</a>`,
			)
			.join(" · ");

		const html = htmlPage(
			"Mail List",
			`<h1>Mail List</h1>\n\t\t<p class="meta">${boxLinks || "No mailboxes yet"}</p>`,
			items ? `<ul>\n\t\t${items}\n\t\t</ul>` : "<p>Nothing received yet.</p>",
		);
		return textResponse(html, 200, "text/html");
	} catch (error) {
		deps.log.error("Index error", error);
		return textResponse("Error loading feeds", 500);
	}
}

async function handleWebView(deps: AppDeps, id: string): Promise<Response> {
	try {
		const feed = await deps.store.get(id);
		if (!feed) {
			return textResponse(`Cannot find ${id}`, 404);
		}

		const html = htmlPage(
			feed.title,
			`<h1>${escapeHtml(feed.title)}</h1>
		<p class="meta">
			From: ${escapeHtml(feed.author)}<br>
			To: <a href="/rss/${encodeURIComponent(feed.fromBox)}">${escapeHtml(feed.fromBox)}</a><br>
			${formatDate(feed.createdAt)}<br>
			<a href="/feeds/${feed.id}/raw">View raw</a>
		</p>`,
			feed.content,
		);

		return new Response(html, {
			headers: {
				"content-type": "text/html; charset=utf-8",
				"cache-control": "public, max-age=3600",
			},
		});
	} catch (error) {
		deps.log.error("Web view error", error, { id });
		return textResponse("Error loading feed", 500);
	}
}

export function escapeHtml(str: string): string {
	return str
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&#039;");
}
