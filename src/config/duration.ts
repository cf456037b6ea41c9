/**
 * Duration strings as used by BW_SYNC_INTERVAL and BW_SERVE_WAIT_INTERVAL:
 * a sequence of decimal numbers, each with a unit, e.g. "2m", "1m30s", "1.5h", "250ms".
 */

const UNIT_MS: Record<string, number> = {
	ns: 1e-6,
	us: 1e-3,
	"µs": 1e-3, // U+00B5 micro sign
	"μs": 1e-3, // U+03BC greek mu
	ms: 1,
	s: 1000,
	m: 60_000,
	h: 3_600_000,
};

const DURATION_RE = /^[+-]?(?:(?:\d+(?:\.\d*)?|\.\d+)(?:ns|us|µs|μs|ms|s|m|h))+$/;
const SEGMENT_RE = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/g;

/**
 * Parse a duration string into milliseconds. Throws on anything that is not a
 * well-formed duration. A bare "0" is accepted; any other number needs a unit.
 */
export function parseDuration(input: string): number {
	const raw = input.trim();
	if (raw === "0" || raw === "+0" || raw === "-0") {
		return 0;
	}
	if (!DURATION_RE.test(raw)) {
		throw new Error(`invalid duration "${input}"`);
	}

	const sign = raw.startsWith("-") ? -1 : 1;
	let total = 0;
	for (const match of raw.matchAll(SEGMENT_RE)) {
		const [, value, unit] = match;
		total += Number.parseFloat(value) * UNIT_MS[unit];
	}
	return sign * total;
}

/**
 * Render milliseconds the way they are written in configuration ("2m0s", "1.5s", "250ms").
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) {
		return `${ms}ms`;
	}
	const hours = Math.floor(ms / 3_600_000);
	const minutes = Math.floor((ms % 3_600_000) / 60_000);
	const seconds = (ms % 60_000) / 1000;
	let out = "";
	if (hours > 0) out += `${hours}h`;
	if (hours > 0 || minutes > 0) out += `${minutes}m`;
	return `${out}${seconds}s`;
}
