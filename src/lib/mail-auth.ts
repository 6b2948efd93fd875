// Answers nginx's mail auth_http requests: every client is sent to the same
// SMTP backend.

export interface AuthTarget {
	server: string;
	port: string;
}

export function createAuthHandler(target: AuthTarget) {
	return {
		fetch(): Response {
			return new Response(null, {
				status: 200,
				headers: {
					"auth-status": "OK",
					"auth-server": target.server,
					"auth-port": target.port,
				},
			});
		},
	};
}

export function parseListen(listen: string): { hostname: string; port: number } {
	const separator = listen.lastIndexOf(":");
	const portText = listen.slice(separator + 1);
	const port = Number(portText);
	if (separator <= 0 || !/^\d+$/.test(portText) || port > 65535) {
		throw new Error(`LISTEN_ON must be host:port, got ${listen}`);
	}
	return { hostname: listen.slice(0, separator), port };
}
