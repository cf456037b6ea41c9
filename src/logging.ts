import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { readEnvValue } from "./utils.js";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	/** Log file path. Logs go to stdout when unset. */
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string | null;
};
export type LoggerResolvedSettings = ResolvedSettings;

type Destination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;
let cachedDestinationIsFile = false;
let overrideSettings: LoggerSettings | null = null;

function isLevel(value: string): value is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function resolveSettings(): ResolvedSettings {
	const level = normalizeLevel(overrideSettings?.level ?? readEnvValue(process.env, "LOG_LEVEL"));
	const file = overrideSettings?.file ?? readEnvValue(process.env, "LOG_FILE") ?? null;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination, isFile: boolean): void {
	dest.flushSync();
	// stdout stays open for the rest of the process; only file streams are ended.
	if (isFile) {
		dest.end();
	}
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination } {
	let destination: Destination;
	if (settings.file) {
		fs.mkdirSync(path.dirname(settings.file), { recursive: true });
		destination = pino.destination({ dest: settings.file, mkdir: true, sync: true });
	} else {
		destination = pino.destination({ dest: 1, sync: true });
	}
	const logger = pino(
		{
			name: "bw-serve-sidecar",
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: {
				paths: ["password", "clientSecret", "session", "*.password", "*.clientSecret", "*.session"],
				censor: "[redacted]",
			},
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination, cachedDestinationIsFile);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedDestinationIsFile = settings.file !== null;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function resetLogger() {
	closeLogger();
	overrideSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination, cachedDestinationIsFile);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
