/**
 * @title Logger Module
 * @description Structured logging for @view-preload/core.
 *
 * @module logging
 */

import { pino, type DestinationStream, type Logger } from "pino";

/** Levels the cache emits, most to least severe. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Resolve the root log level from a raw value, falling back to "info".
 * "silent" is accepted so embedding applications and tests can mute output.
 */
export function resolveLogLevel(raw: string | undefined): LogLevel | "silent" {
	const value = raw?.trim().toLowerCase();
	if (value === "silent") {
		return value;
	}
	const match = LOG_LEVELS.find((level) => level === value);
	return match ?? "info";
}

/**
 * Create a root logger.
 *
 * @param destination - Optional stream to write to (stdout by default)
 * @param level - Log level (defaults to LOG_LEVEL, then "info")
 */
export function createRootLogger(destination?: DestinationStream, level?: string): Logger {
	const options = {
		level: resolveLogLevel(level ?? process.env["LOG_LEVEL"]),
		formatters: {
			level(label: string) {
				return { level: label };
			},
		},
	};
	return destination ? pino(options, destination) : pino(options);
}

let rootLogger: Logger | undefined;

/**
 * Create a child logger bound to a context, e.g. `{ component: "preload-cache" }`.
 */
export function createLogger(context: Record<string, unknown>): Logger {
	rootLogger ??= createRootLogger();
	return rootLogger.child(context);
}

export type { Logger };
