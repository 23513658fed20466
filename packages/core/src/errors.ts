/**
 * @title Errors
 * @description Error types for @view-preload/core.
 *
 * Load-time errors never reach preload callers as rejections; they are
 * recorded in the per-key status. These classes give those records a code.
 *
 * @module errors
 */

/**
 * Options for constructing a PreloadError.
 */
export interface PreloadErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all preload errors.
 */
export class PreloadError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: PreloadErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "PreloadError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Error when an assembly does not settle within the load timeout.
 */
export class LoadTimeoutError extends PreloadError {
	/** Timeout that elapsed, in milliseconds. */
	readonly timeoutMs: number;

	constructor(timeoutMs: number) {
		super(`Assembly timed out after ${timeoutMs}ms`, "TIMEOUT", {
			suggestion: "Increase load-timeout or make the assembler faster",
		});
		this.name = "LoadTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Error raised by (or on behalf of) an assembler.
 */
export class AssemblyError extends PreloadError {
	/** Short reason recorded in the failed status. */
	readonly reason: string;

	constructor(reason: string, options?: { cause?: unknown }) {
		super(reason, "ASSEMBLY_ERROR", { cause: options?.cause });
		this.name = "AssemblyError";
		this.reason = reason;
	}
}

/**
 * Error passed as the abort reason when a load is invalidated or cleared
 * while it is still in flight.
 */
export class CancellationError extends PreloadError {
	constructor(message = "Load cancelled.") {
		super(message, "CANCELLED");
		this.name = "CancellationError";
	}
}

/**
 * Error when cache configuration is invalid.
 */
export class ConfigurationError extends PreloadError {
	/** Path to the configuration file, when one was read. */
	readonly configPath?: string;

	constructor(message: string, options?: { configPath?: string; cause?: unknown }) {
		super(message, "CONFIG_ERROR", {
			suggestion: options?.configPath ? `Check the configuration file at: ${options.configPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "ConfigurationError";
		this.configPath = options?.configPath;
	}
}

/**
 * Check if an error is a CancellationError.
 */
export function isCancellationError(error: unknown): error is CancellationError {
	return error instanceof CancellationError;
}

/**
 * Check if an error is a PreloadError.
 */
export function isPreloadError(error: unknown): error is PreloadError {
	return error instanceof PreloadError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a PreloadError.
 */
export function wrapError(error: unknown, context?: string): PreloadError {
	if (isPreloadError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new PreloadError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}

/**
 * Normalise whatever an assembler threw into an AssemblyError.
 */
export function toAssemblyError(error: unknown): AssemblyError {
	if (error instanceof AssemblyError) {
		return error;
	}
	return new AssemblyError(getErrorMessage(error), { cause: error });
}
