import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Rule } from "../types.ts";
import type { ChannelCapacity } from "./channel.ts";
import { ConfigError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { parseRules } from "./rules.ts";
import type { StorageDriverName } from "./storage.ts";

export interface Config {
	domain: string;
	webDomain: string;
	webPort: number;
	smtpPort: number;
	perPage: number;
	defaultPageLimit: number;
	auth?: { username: string; password: string };
	rules: readonly Rule[];
	channelCapacity: ChannelCapacity;
	storage: {
		driver: StorageDriverName;
		dataDir: string;
		mongoConStr: string;
		mongoDbName: string;
	};
	webhookSecret?: string;
}

const port = z.coerce.number().int().min(0).max(65535);
const pageSize = z.coerce.number().int().positive().max(1000);

// Empty variables count as unset, the way a blank line in .env reads
const optionalText = z
	.string()
	.optional()
	.transform((value) => (value === undefined || value === "" ? undefined : value));

export const envSchema = z.object({
	DOMAIN: z.string().min(1).default("example.com"),
	WEB_DOMAIN: optionalText,
	WEB_PORT: port.default(8080),
	SMTP_PORT: port.default(10000),
	PER_PAGE: pageSize.default(10),
	DEFAULT_PAGE_LIMIT: pageSize.default(20),
	AUTH_USERNAME: optionalText,
	AUTH_PASSWORD: optionalText,
	RULES: optionalText,
	RULES_FILE: optionalText,
	CHANNEL_CAPACITY: z
		.union([z.literal("unbounded"), z.coerce.number().int().positive()])
		.default(256),
	STORAGE_DRIVER: z.enum(["fs", "mongodb", "memory"]).default("fs"),
	DATA_DIR: z.string().min(1).default("./data"),
	MONGO_CON_STR: z.string().min(1).default("mongodb://localhost:27017"),
	MONGO_DB_NAME: z.string().min(1).default("mail-list-rss"),
	WEBHOOK_SECRET: optionalText,
});

function readRulesSource(
	env: z.infer<typeof envSchema>,
	log: Logger,
): string | undefined {
	if (env.RULES !== undefined) {
		return env.RULES;
	}
	if (env.RULES_FILE === undefined) {
		return undefined;
	}
	try {
		return readFileSync(env.RULES_FILE, "utf-8");
	} catch (error) {
		log.warn(`Cannot read rules file ${env.RULES_FILE}, using no rules`, error);
		return undefined;
	}
}

/**
 * Build the process-wide configuration from environment variables. Called once
 * at startup; the result is frozen.
 *
 * @throws ConfigError for unusable values, or when only one of
 * AUTH_USERNAME / AUTH_PASSWORD is set
 */
export function loadConfig(
	source: NodeJS.ProcessEnv,
	log: Logger,
): Readonly<Config> {
	const result = envSchema.safeParse(source);
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}
	const env = result.data;

	if ((env.AUTH_USERNAME === undefined) !== (env.AUTH_PASSWORD === undefined)) {
		throw new ConfigError([
			"AUTH_USERNAME and AUTH_PASSWORD must be set together or not at all",
		]);
	}

	const rules = parseRules(readRulesSource(env, log), log);
	log.info(`Loaded ${rules.length} rule(s)`);

	return Object.freeze({
		domain: env.DOMAIN,
		webDomain: env.WEB_DOMAIN ?? env.DOMAIN,
		webPort: env.WEB_PORT,
		smtpPort: env.SMTP_PORT,
		perPage: env.PER_PAGE,
		defaultPageLimit: env.DEFAULT_PAGE_LIMIT,
		auth:
			env.AUTH_USERNAME !== undefined && env.AUTH_PASSWORD !== undefined
				? { username: env.AUTH_USERNAME, password: env.AUTH_PASSWORD }
				: undefined,
		rules: Object.freeze(rules),
		channelCapacity: env.CHANNEL_CAPACITY,
		storage: {
			driver: env.STORAGE_DRIVER,
			dataDir: env.DATA_DIR,
			mongoConStr: env.MONGO_CON_STR,
			mongoDbName: env.MONGO_DB_NAME,
		},
		webhookSecret: env.WEBHOOK_SECRET,
	});
}
