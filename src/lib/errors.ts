export type ErrorCode =
	| "REJECTED"
	| "ENCODING"
	| "CHANNEL_CLOSED"
	| "INVALID_CONFIG";

export class MailListError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

/** The message targets neither the served domain nor any rule. */
export class RejectedError extends MailListError {
	constructor(domain: string) {
		super("REJECTED", `Not sending to ${domain}, blocked`);
	}
}

export class EncodingError extends MailListError {
	readonly field: "raw" | "content";

	constructor(field: "raw" | "content") {
		super("ENCODING", `Message ${field} is not valid UTF-8`);
		this.field = field;
	}
}

export class ChannelClosedError extends MailListError {
	constructor() {
		super("CHANNEL_CLOSED", "Channel is closed");
	}
}

export class ConfigError extends MailListError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`);
		this.issues = issues;
	}
}

export function extractErrorCode(err: unknown): string | undefined {
	if (!err || typeof err !== "object" || !("code" in err)) {
		return undefined;
	}
	return typeof err.code === "string" ? err.code : undefined;
}
