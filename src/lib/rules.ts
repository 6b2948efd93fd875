import { z } from "zod";
import type { ParsedMessage, Rule, RuleFilter } from "../types.ts";
import { sortedAddresses } from "./addresses.ts";
import type { Logger } from "./logger.ts";

const ruleFilterSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("ByFrom"), params: z.string().min(1) }),
	z.object({ type: z.literal("ByTo"), params: z.string().min(1) }),
]);

// Same layout the routing file has always used: snake_case `to_box`,
// adjacently tagged filters.
export const ruleSchema = z
	.object({
		to_box: z.string().min(1),
		filter: z.array(ruleFilterSchema).min(1),
	})
	.transform(
		(rule): Rule => ({
			toBox: rule.to_box,
			filter: rule.filter,
		}),
	);

export const rulesSchema = z.array(ruleSchema);

export function filterMatches(
	filter: RuleFilter,
	message: ParsedMessage,
): boolean {
	const candidates =
		filter.type === "ByFrom"
			? sortedAddresses(message.from)
			: sortedAddresses(message.to);
	return candidates.includes(filter.params);
}

/** A rule is satisfied when any one of its filters matches. */
export function matchesRule(rule: Rule, message: ParsedMessage): boolean {
	return rule.filter.some((filter) => filterMatches(filter, message));
}

export function findRule(
	rules: readonly Rule[],
	message: ParsedMessage,
): Rule | undefined {
	return rules.find((rule) => matchesRule(rule, message));
}

/**
 * Parse the routing table from its JSON text. A malformed table is logged and
 * replaced by an empty one; rule trouble never stops the server.
 */
export function parseRules(source: string | undefined, log: Logger): Rule[] {
	if (source === undefined || source.trim() === "") {
		return [];
	}

	let json: unknown;
	try {
		json = JSON.parse(source);
	} catch (error) {
		log.warn("Rules are not valid JSON, using no rules", error);
		return [];
	}

	const result = rulesSchema.safeParse(json);
	if (!result.success) {
		log.warn("Rules do not match the expected shape, using no rules", undefined, {
			issues: result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		});
		return [];
	}

	return result.data;
}
