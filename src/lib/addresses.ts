import type { Addr, Group, HeaderValue } from "../types.ts";

function fromAddr(addr: Addr): string[] {
	return addr.address ? [addr.address] : [];
}

function fromGroup(group: Group): string[] {
	return group.addresses.flatMap(fromAddr);
}

// Flatten any header shape into the address (or text) strings it carries, in
// header order. Missing data is an empty list, never an error.
export function extractAddresses(value: HeaderValue): string[] {
	switch (value.kind) {
		case "address":
			return fromAddr(value.address);
		case "addressList":
			return value.addresses.flatMap(fromAddr);
		case "group":
			return fromGroup(value.group);
		case "groupList":
			return value.groups.flatMap(fromGroup);
		case "text":
			return [value.text];
		case "textList":
			return [...value.texts];
		default:
			return [];
	}
}

export function sortedAddresses(value: HeaderValue): string[] {
	return extractAddresses(value).sort();
}
