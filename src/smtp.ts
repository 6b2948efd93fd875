import type { Readable } from "node:stream";
import { SMTPServer } from "smtp-server";
import { extractErrorCode } from "./lib/errors.ts";
import type { Ingestor } from "./lib/ingest.ts";
import type { Logger } from "./lib/logger.ts";

export type SmtpError = Error & { responseCode: number };

export function smtpError(responseCode: number, message: string): SmtpError {
	return Object.assign(new Error(message), { responseCode });
}

export function collectStream(stream: Readable): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];

		stream.on("data", (chunk: Buffer | string) => {
			chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
		});

		stream.once("error", (error) => {
			stream.removeAllListeners("end");
			reject(error);
		});

		stream.once("end", () => {
			resolve(Buffer.concat(chunks));
		});
	});
}

/**
 * Hand one received message to the ingestor and translate the outcome into
 * an SMTP reply: resolve for 250, reject with a `responseCode` otherwise.
 */
export async function deliver(
	raw: Buffer,
	ingestor: Pick<Ingestor, "receive">,
	log: Logger,
): Promise<void> {
	let outcome: Awaited<ReturnType<Ingestor["receive"]>>;
	try {
		outcome = await ingestor.receive(raw);
	} catch (error) {
		if (extractErrorCode(error) === "CHANNEL_CLOSED") {
			throw smtpError(421, "Service shutting down, try again later");
		}
		log.error("Error processing message", error);
		throw smtpError(451, "Local error in processing");
	}

	if (outcome.status === "blocked") {
		throw smtpError(550, outcome.reason);
	}
	if (outcome.status === "invalid") {
		throw smtpError(554, outcome.reason);
	}
	log.debug("Queued message", { id: outcome.feed.id, box: outcome.feed.fromBox });
}

export function createSmtpServer(
	ingestor: Pick<Ingestor, "receive">,
	log: Logger,
): SMTPServer {
	return new SMTPServer({
		authOptional: true,
		disabledCommands: ["AUTH", "STARTTLS"],
		logger: false,
		onData(stream, session, callback) {
			collectStream(stream)
				.then((raw) => {
					log.debug("Received message", {
						session: session.id,
						bytes: raw.length,
					});
					return deliver(raw, ingestor, log);
				})
				.then(
					() => callback(),
					(error: unknown) =>
						callback(error instanceof Error ? error : new Error(String(error))),
				);
		},
	});
}

export function listenSmtp(server: SMTPServer, port: number): Promise<void> {
	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(port, () => {
			server.off("error", reject);
			resolve();
		});
	});
}

export function closeSmtp(server: SMTPServer): Promise<void> {
	return new Promise((resolve) => {
		server.close(() => resolve());
	});
}
