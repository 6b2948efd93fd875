import { serve } from "@hono/node-server";
import { config } from "dotenv";
import { createLogger } from "../lib/logger.ts";
import { type AuthTarget, createAuthHandler, parseListen } from "../lib/mail-auth.ts";

config({ debug: false });

const log = createLogger("mail-auth");

const target: AuthTarget = {
	server: process.env.AUTH_SERVER || "127.0.0.1",
	port: process.env.AUTH_PORT || "10000",
};
const { hostname, port } = parseListen(process.env.LISTEN_ON || "127.0.0.1:3330");

log.info("Target SMTP server", { ...target });

serve({ fetch: createAuthHandler(target).fetch, hostname, port }, () => {
	log.info("Listening", { hostname, port });
});
