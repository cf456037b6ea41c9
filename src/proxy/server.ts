/**
 * Sidecar HTTP front.
 *
 * Two fixed paths are answered locally; everything else goes to `bw serve`:
 * - /healthz  liveness of the sidecar itself (never touches the vault)
 * - /sync     POST runs `bw sync`; other methods get 405
 * - /*        reverse proxy to 127.0.0.1:<bw serve port>
 */

import http from "node:http";

import { getChildLogger } from "../logging.js";
import type { SyncRunner } from "../vault/sync.js";
import { createReverseProxy, type RequestHandler } from "./reverse-proxy.js";

const logger = getChildLogger({ module: "proxy-server" });

export type RouteKind = "health" | "sync" | "proxy";

const ROUTES: ReadonlyMap<string, RouteKind> = new Map<string, RouteKind>([
	["/healthz", "health"],
	["/sync", "sync"],
]);

export function resolveRoute(url: string | undefined): RouteKind {
	const pathname = (url ?? "/").split("?")[0];
	return ROUTES.get(pathname) ?? "proxy";
}

export type ProxyServerOptions = {
	/** Port `bw serve` listens on. */
	targetPort: number;
	/** Address of `bw serve`. Default: 127.0.0.1 (it binds 0.0.0.0, IPv4 only). */
	targetHost?: string;
	syncRunner: SyncRunner;
};

function writeText(
	res: http.ServerResponse,
	status: number,
	body: string,
	extra?: http.OutgoingHttpHeaders,
): void {
	res.writeHead(status, {
		"Content-Type": "text/plain; charset=utf-8",
		"Content-Length": Buffer.byteLength(body),
		...extra,
	});
	res.end(body);
}

async function handleSync(
	req: http.IncomingMessage,
	res: http.ServerResponse,
	syncRunner: SyncRunner,
): Promise<void> {
	if (req.method !== "POST") {
		writeText(res, 405, "Method not allowed", { Allow: "POST" });
		return;
	}

	// The body is ignored; drain it so the connection can be reused.
	req.resume();

	const outcome = await syncRunner.run();
	if (outcome.ok) {
		writeText(res, 200, "Sync successful");
		return;
	}
	writeText(res, 500, `Sync failed: ${outcome.output}`);
}

export function createProxyServer(options: ProxyServerOptions): http.Server {
	const proxy: RequestHandler = createReverseProxy({
		host: options.targetHost ?? "127.0.0.1",
		port: options.targetPort,
	});

	return http.createServer((req, res) => {
		switch (resolveRoute(req.url)) {
			case "health":
				writeText(res, 200, "OK");
				return;
			case "sync":
				handleSync(req, res, options.syncRunner).catch((err: unknown) => {
					logger.error({ error: String(err) }, "sync handler failed");
					if (!res.headersSent) {
						writeText(res, 500, "Sync failed: internal error");
					} else {
						res.end();
					}
				});
				return;
			case "proxy":
				proxy(req, res);
				return;
		}
	});
}

export type StartProxyServerOptions = ProxyServerOptions & {
	port: number;
	/** Listen address. Default: all interfaces. */
	host?: string;
};

/**
 * Create the server and resolve once it is listening.
 */
export function startProxyServer(options: StartProxyServerOptions): Promise<http.Server> {
	const server = createProxyServer(options);

	return new Promise((resolve, reject) => {
		const onError = (err: Error) => {
			logger.error({ error: String(err), port: options.port }, "proxy server failed to listen");
			reject(err);
		};
		server.once("error", onError);

		const onListening = () => {
			server.off("error", onError);
			server.on("error", (err) => {
				logger.error({ error: String(err) }, "proxy server error");
			});
			logger.info(
				{ port: options.port, host: options.host ?? "0.0.0.0", targetPort: options.targetPort },
				"proxy server listening",
			);
			resolve(server);
		};

		if (options.host) {
			server.listen(options.port, options.host, onListening);
		} else {
			server.listen(options.port, onListening);
		}
	});
}
