/**
 * @description Preload cache configuration.
 *
 * Provides defaults, validation, and parsing of preload.yml files.
 *
 * @module config
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { ConfigurationError, getErrorMessage } from "../errors.js";

/** Default maximum number of retained entries. */
export const DEFAULT_CAPACITY = 10;

/** Default maximum loads started by one batch request. */
export const DEFAULT_BATCH_WIDTH = 3;

/** Default maximum duration of one assembly, in milliseconds. */
export const DEFAULT_LOAD_TIMEOUT = 8000;

/** Longest timer delay Node.js honours; larger delays fire after 1 ms. */
export const MAX_LOAD_TIMEOUT = 2147483647;

/** Supported configuration file names. */
const CONFIG_FILENAMES = ["preload.yml", "preload.yaml"] as const;

/**
 * Resolved cache configuration.
 */
export interface PreloadConfig {
	/** Maximum number of retained entries. */
	capacity: number;
	/** Maximum simultaneous loads triggered by one batch request. */
	batchWidth: number;
	/** Maximum duration allowed for one assembly, in milliseconds. */
	loadTimeout: number;
}

/**
 * Keys accepted in preload.yml.
 */
export type RawPreloadConfigKey = "capacity" | "batch-width" | "load-timeout";

function requirePositiveInteger(name: string, value: number, configPath?: string): number {
	if (!Number.isInteger(value) || value < 1) {
		throw new ConfigurationError(`${name} must be a positive integer, got ${String(value)}`, { configPath });
	}
	return value;
}

function requirePositiveDuration(name: string, value: number, configPath?: string): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(`${name} must be a positive number of milliseconds, got ${String(value)}`, {
			configPath,
		});
	}
	if (value > MAX_LOAD_TIMEOUT) {
		throw new ConfigurationError(
			`${name} must be at most ${String(MAX_LOAD_TIMEOUT)} milliseconds, got ${String(value)}`,
			{ configPath },
		);
	}
	return value;
}

/**
 * Merge a partial configuration with the defaults and validate it.
 *
 * @param overrides - Values to override
 * @param configPath - Source path for error messages (optional)
 * @returns Resolved configuration
 * @throws ConfigurationError if a value is out of range
 */
export function resolvePreloadConfig(overrides: Partial<PreloadConfig> = {}, configPath?: string): PreloadConfig {
	return {
		capacity: requirePositiveInteger("capacity", overrides.capacity ?? DEFAULT_CAPACITY, configPath),
		batchWidth: requirePositiveInteger("batch-width", overrides.batchWidth ?? DEFAULT_BATCH_WIDTH, configPath),
		loadTimeout: requirePositiveDuration("load-timeout", overrides.loadTimeout ?? DEFAULT_LOAD_TIMEOUT, configPath),
	};
}

function readNumber(raw: object, key: RawPreloadConfigKey, configPath?: string): number | undefined {
	const value: unknown = Reflect.get(raw, key);
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "number") {
		throw new ConfigurationError(`${key} must be a number, got ${typeof value}`, { configPath });
	}
	return value;
}

/**
 * Parse configuration content from a YAML string.
 *
 * @param content - YAML content
 * @param sourcePath - Source path for error messages (optional)
 * @returns Resolved configuration
 * @throws ConfigurationError if parsing or validation fails
 */
export function parsePreloadConfigContent(content: string, sourcePath?: string): PreloadConfig {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (error) {
		throw new ConfigurationError(`Failed to parse configuration: ${getErrorMessage(error)}`, {
			configPath: sourcePath,
			cause: error,
		});
	}

	// An empty file means "all defaults".
	if (raw === undefined || raw === null) {
		return resolvePreloadConfig({}, sourcePath);
	}
	if (typeof raw !== "object" || Array.isArray(raw)) {
		throw new ConfigurationError("Configuration file must contain a mapping", { configPath: sourcePath });
	}

	return resolvePreloadConfig(
		{
			capacity: readNumber(raw, "capacity", sourcePath),
			batchWidth: readNumber(raw, "batch-width", sourcePath),
			loadTimeout: readNumber(raw, "load-timeout", sourcePath),
		},
		sourcePath,
	);
}

/**
 * Find the configuration file in a directory.
 *
 * @param directory - Directory to search
 * @returns Path to the configuration file or null if not found
 */
export function findPreloadConfigFile(directory: string): string | null {
	for (const filename of CONFIG_FILENAMES) {
		const configPath = path.join(directory, filename);
		if (fs.existsSync(configPath)) {
			return configPath;
		}
	}
	return null;
}

/**
 * Read the configuration from a directory.
 *
 * @param directory - Directory containing preload.yml
 * @returns Resolved configuration or null if no file exists
 * @throws ConfigurationError if the file cannot be read or is invalid
 */
export function readPreloadConfig(directory: string): PreloadConfig | null {
	const configPath = findPreloadConfigFile(directory);

	if (!configPath) {
		return null;
	}

	let content: string;
	try {
		content = fs.readFileSync(configPath, "utf-8");
	} catch (error) {
		throw new ConfigurationError(`Failed to read configuration file: ${getErrorMessage(error)}`, {
			configPath,
			cause: error,
		});
	}

	return parsePreloadConfigContent(content, configPath);
}
