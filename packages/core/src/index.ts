/**
 * @view-preload/core - Preload cache for per-entity view state.
 *
 * This library provides functionality for:
 * - Background assembly of values ahead of use (single and bounded batch)
 * - Per-key load status with timeout and failure capture
 * - Capacity-bounded retention with oldest-first eviction
 * - Configuration from preload.yml files
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	PreloadError,
	LoadTimeoutError,
	AssemblyError,
	CancellationError,
	ConfigurationError,
	isPreloadError,
	isCancellationError,
	getErrorMessage,
	wrapError,
	toAssemblyError,
} from "./errors.js";

// Cache exports
export * from "./cache/index.js";

// Config exports
export * from "./config/index.js";

// Logging exports
export * from "./logging/index.js";
