import type { ParsedMessage, Rule } from "../types.ts";
import { sortedAddresses } from "./addresses.ts";
import { RejectedError } from "./errors.ts";
import { findRule } from "./rules.ts";

export interface RoutingConfig {
	domain: string;
	rules: readonly Rule[];
}

/**
 * Decide which mailbox a message lands in.
 *
 * A recipient on the served domain always wins and becomes the mailbox itself.
 * Otherwise the first satisfied rule, in declaration order, names the box.
 * The domain test is a plain substring check on `@domain`.
 *
 * @throws RejectedError when neither the domain nor any rule accepts the message
 */
export function resolveMailbox(
	message: ParsedMessage,
	config: RoutingConfig,
): string {
	const suffix = `@${config.domain}`;
	const direct = sortedAddresses(message.to).find((address) =>
		address.includes(suffix),
	);
	if (direct !== undefined) {
		return direct;
	}

	const rule = findRule(config.rules, message);
	if (rule) {
		return rule.toBox;
	}

	throw new RejectedError(config.domain);
}
