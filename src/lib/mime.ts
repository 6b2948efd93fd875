import {
	type AddressObject,
	type EmailAddress,
	type HeaderValue as MailHeaderValue,
	type ParsedMail,
	simpleParser,
} from "mailparser";
import type { Addr, Group, HeaderValue, ParsedMessage } from "../types.ts";

type AddressHeader = AddressObject | AddressObject[];

function isAddressObject(value: unknown): value is AddressObject {
	return (
		typeof value === "object" &&
		value !== null &&
		"value" in value &&
		Array.isArray(value.value)
	);
}

function isAddressHeader(value: unknown): value is AddressHeader {
	return Array.isArray(value)
		? value.length > 0 && value.every(isAddressObject)
		: isAddressObject(value);
}

function isStringList(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function toAddr(entry: EmailAddress): Addr {
	return {
		name: entry.name || undefined,
		address: entry.address || undefined,
	};
}

function toGroup(entry: EmailAddress): Group {
	if (entry.group) {
		return { name: entry.name || undefined, addresses: entry.group.map(toAddr) };
	}
	// A loose address next to groups becomes an unnamed group of one
	return { addresses: [toAddr(entry)] };
}

function fromAddressHeader(header: AddressHeader): HeaderValue {
	const entries = (Array.isArray(header) ? header : [header]).flatMap(
		(object) => object.value,
	);

	if (!entries.some((entry) => entry.group)) {
		const addresses = entries.map(toAddr);
		return addresses.length === 1
			? { kind: "address", address: addresses[0] }
			: { kind: "addressList", addresses };
	}

	const groups = entries.map(toGroup);
	return groups.length === 1
		? { kind: "group", group: groups[0] }
		: { kind: "groupList", groups };
}

/** Classify a mailparser header value into the shapes routing understands. */
export function toHeaderValue(
	value: MailHeaderValue | AddressObject[] | undefined,
): HeaderValue {
	if (value === undefined) {
		return { kind: "empty" };
	}
	if (typeof value === "string") {
		return { kind: "text", text: value };
	}
	if (isStringList(value)) {
		return { kind: "textList", texts: value };
	}
	if (isAddressHeader(value)) {
		return fromAddressHeader(value);
	}
	return { kind: "empty" };
}

export function toParsedMessage(mail: ParsedMail): ParsedMessage {
	// A text part with no HTML alternative is the HTML body
	const body = mail.html || mail.text;
	return {
		from: toHeaderValue(mail.from ?? mail.headers.get("from")),
		to: toHeaderValue(mail.to ?? mail.headers.get("to")),
		subject: mail.subject,
		htmlBodies: body ? [new TextEncoder().encode(body)] : [],
	};
}

export async function parseMessage(raw: Buffer): Promise<ParsedMessage> {
	return toParsedMessage(await simpleParser(raw));
}
