/**
 * Error classification for the sidecar's outbound HTTP calls.
 *
 * fetch() wraps socket failures in a generic "fetch failed" TypeError and keeps
 * the interesting part (ECONNREFUSED while `bw serve` is still booting, a timeout)
 * in `.cause`, so classification walks the cause chain.
 */

const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const TRANSIENT_MESSAGE_PATTERNS = [
	"fetch failed",
	"socket hang up",
	"other side closed",
	"timed out after",
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

/**
 * Collect an error and everything reachable through `.cause` / `.errors`
 * (AggregateError from dual-stack connects), breadth first.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth || item.value == null) continue;

		const val = item.value;
		if (!isRecord(val)) {
			candidates.push(val);
			continue;
		}
		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		if (val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if (Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

/**
 * True when the error (or anything in its cause chain) is a connection-level
 * failure or a timeout: the backing service is not there yet, or stopped answering.
 */
export function isTransientNetworkError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (isRecord(candidate)) {
			if (typeof candidate.code === "string" && TRANSIENT_NETWORK_CODES.has(candidate.code)) {
				return true;
			}
			if (candidate.name === "TimeoutError") {
				return true;
			}
		}
		const message = extractMessage(candidate);
		if (message && matchesTransientPattern(message)) {
			return true;
		}
	}
	return false;
}

/**
 * True for AbortError / ABORT_ERR, which is what a child process or request
 * killed through an AbortSignal rejects with.
 */
export function isAbortError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (!isRecord(candidate)) continue;
		if (candidate.name === "AbortError" || candidate.code === "ABORT_ERR") {
			return true;
		}
	}
	return false;
}

/**
 * Format an error for a log line, following the cause chain and truncating.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(msg, maxLength);
		}
		return truncate(String(err), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	if (isRecord(val) && typeof val.message === "string") return val.message;
	return null;
}

function matchesTransientPattern(message: string): boolean {
	const lower = message.toLowerCase();
	return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
