export interface BasicCredentials {
	username: string;
	password: string;
}

function base64ToBytes(base64: string): Uint8Array {
	const binary = atob(base64);
	const bytes = new Uint8Array(binary.length);
	for (let i = 0; i < binary.length; i++) {
		bytes[i] = binary.charCodeAt(i);
	}
	return bytes;
}

export function parseBasicAuth(
	header: string | null,
): BasicCredentials | null {
	if (!header || !header.startsWith("Basic ")) {
		return null;
	}

	let decoded: string;
	try {
		decoded = new TextDecoder().decode(base64ToBytes(header.slice(6).trim()));
	} catch {
		return null;
	}

	const separator = decoded.indexOf(":");
	if (separator === -1) {
		return null;
	}

	return {
		username: decoded.slice(0, separator),
		password: decoded.slice(separator + 1),
	};
}

// Constant-time comparison
export function safeEqual(a: string, b: string): boolean {
	if (a.length !== b.length) {
		return false;
	}

	let result = 0;
	for (let i = 0; i < a.length; i++) {
		result |= a.charCodeAt(i) ^ b.charCodeAt(i);
	}

	return result === 0;
}

export function verifyBasicAuth(
	header: string | null,
	expected: BasicCredentials,
): boolean {
	const credentials = parseBasicAuth(header);
	if (!credentials) {
		return false;
	}

	// Both comparisons always run
	const userOk = safeEqual(credentials.username, expected.username);
	const passOk = safeEqual(credentials.password, expected.password);
	return userOk && passOk;
}
