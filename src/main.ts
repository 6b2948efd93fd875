import { serve } from "@hono/node-server";
import { config as loadDotenv } from "dotenv";
import { createChannel } from "./lib/channel.ts";
import { loadConfig } from "./lib/config.ts";
import { createIngestor } from "./lib/ingest.ts";
import { createLogger } from "./lib/logger.ts";
import { PersistenceServo } from "./lib/servo.ts";
import { createKvStorage, KvFeedStore } from "./lib/storage.ts";
import { closeSmtp, createSmtpServer, listenSmtp } from "./smtp.ts";
import type { Feed } from "./types.ts";
import { createApp } from "./web.ts";

loadDotenv({ debug: false });

const log = createLogger("main");

async function main(): Promise<void> {
	const config = loadConfig(process.env, log.child("config"));

	const store = new KvFeedStore(createKvStorage(config.storage));
	const { sender, receiver } = createChannel<Feed>({
		capacity: config.channelCapacity,
	});

	const servo = new PersistenceServo(receiver, store, log.child("Database"));
	const servoDone = servo.run();
	servoDone.catch((error: unknown) => {
		log.error("Persistence servo failed", error);
		process.exit(1);
	});

	const ingestor = createIngestor(config, sender, log.child("ingest"));

	const smtp = createSmtpServer(ingestor, log.child("smtp"));
	await listenSmtp(smtp, config.smtpPort);
	log.child("smtp").info("Starting", { port: config.smtpPort, domain: config.domain });

	const app = createApp({ config, store, ingestor, log: log.child("web") });
	const web = serve({ fetch: app.fetch, port: config.webPort }, () => {
		log.child("web").info("Starting", { port: config.webPort });
	});

	let stopping = false;
	const shutdown = async (signal: string): Promise<void> => {
		if (stopping) return;
		stopping = true;
		log.info(`${signal} received, shutting down...`);

		await closeSmtp(smtp);
		await new Promise<void>((resolve) => {
			web.close(() => resolve());
		});

		// Last producer gone: the servo drains what is queued, then stops
		ingestor.close();
		const stats = await servoDone;
		await store.close();
		log.info("Stopped", { ...stats });
	};

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.on(signal, () => {
			shutdown(signal)
				.then(() => process.exit(0))
				.catch((error: unknown) => {
					log.error("Shutdown error", error);
					process.exit(1);
				});
		});
	}
}

main().catch((error: unknown) => {
	log.error("Fatal error", error);
	process.exit(1);
});
