/**
 * Single-host reverse proxy in front of `bw serve`.
 *
 * Requests are forwarded as streams with their method, path, query and headers.
 * The client's Host header is kept, so `bw serve` sees the name the caller used.
 * Upstream status, headers and body come back unmodified apart from hop-by-hop
 * headers.
 */

import http from "node:http";
import { pipeline } from "node:stream/promises";

import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "reverse-proxy" });

export type ReverseProxyTarget = {
	host: string;
	port: number;
};

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

// Connection-scoped headers (RFC 9110 §7.6.1); never forwarded in either direction.
const HOP_BY_HOP_HEADERS = new Set([
	"connection",
	"keep-alive",
	"proxy-authenticate",
	"proxy-authorization",
	"proxy-connection",
	"te",
	"trailer",
	"transfer-encoding",
	"upgrade",
]);

/**
 * Copy headers, dropping hop-by-hop ones and any listed in the Connection header.
 */
export function stripHopByHop(headers: http.IncomingHttpHeaders): http.OutgoingHttpHeaders {
	const connectionListed = new Set(
		(headers.connection ?? "")
			.split(",")
			.map((token) => token.trim().toLowerCase())
			.filter(Boolean),
	);

	const out: http.OutgoingHttpHeaders = {};
	for (const [key, value] of Object.entries(headers)) {
		if (value === undefined) continue;
		const lower = key.toLowerCase();
		if (HOP_BY_HOP_HEADERS.has(lower) || connectionListed.has(lower)) continue;
		out[key] = value;
	}
	return out;
}

function appendForwardedFor(existing: string | string[] | undefined, clientIp: string): string {
	const prior = Array.isArray(existing) ? existing.join(", ") : existing;
	return prior ? `${prior}, ${clientIp}` : clientIp;
}

function sendErrorResponse(res: http.ServerResponse, status: number, message: string): void {
	if (res.destroyed) return;
	if (!res.headersSent) {
		res.writeHead(status, { "Content-Type": "text/plain; charset=utf-8" });
		res.end(message);
	} else {
		res.destroy();
	}
}

export function createReverseProxy(target: ReverseProxyTarget): RequestHandler {
	return (req, res) => {
		const headers = stripHopByHop(req.headers);
		const clientIp = req.socket.remoteAddress;
		if (clientIp) {
			headers["x-forwarded-for"] = appendForwardedFor(req.headers["x-forwarded-for"], clientIp);
		}
		if (req.headers.host && !req.headers["x-forwarded-host"]) {
			headers["x-forwarded-host"] = req.headers.host;
		}
		if (!req.headers["x-forwarded-proto"]) {
			headers["x-forwarded-proto"] = "http";
		}

		const upstreamReq = http.request({
			host: target.host,
			port: target.port,
			method: req.method,
			path: req.url ?? "/",
			headers,
		});

		upstreamReq.on("response", (upstreamRes) => {
			res.writeHead(
				upstreamRes.statusCode ?? 502,
				upstreamRes.statusMessage,
				stripHopByHop(upstreamRes.headers),
			);
			pipeline(upstreamRes, res).catch((err: unknown) => {
				logger.debug(
					{ method: req.method, path: req.url, error: formatErrorSafe(err) },
					"response stream ended early",
				);
			});
		});

		upstreamReq.on("error", (err) => {
			logger.error(
				{ method: req.method, path: req.url, error: formatErrorSafe(err) },
				"upstream request failed",
			);
			sendErrorResponse(res, 502, "Bad gateway: upstream request failed");
		});

		// A client that goes away mid-request takes the upstream request with it.
		res.on("close", () => {
			if (!res.writableFinished) {
				upstreamReq.destroy();
			}
		});

		req.pipe(upstreamReq);
	};
}
