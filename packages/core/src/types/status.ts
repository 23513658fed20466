/**
 * @title Status Types
 * @description Per-key load status.
 *
 * @module types
 */

import { type AssemblyError, LoadTimeoutError } from "../errors.js";

/** Reason recorded when the load timer wins the race. */
export const TIMEOUT_REASON = "timeout";

/**
 * Load progress for one key.
 */
export type PreloadStatus =
	| { state: "not-started" }
	| { state: "loading" }
	| { state: "completed" }
	| { state: "failed"; reason: string; error: AssemblyError | LoadTimeoutError };

export type PreloadState = PreloadStatus["state"];

export const NOT_STARTED: PreloadStatus = Object.freeze({ state: "not-started" } as const);
export const LOADING: PreloadStatus = Object.freeze({ state: "loading" } as const);
export const COMPLETED: PreloadStatus = Object.freeze({ state: "completed" } as const);

/**
 * Build a failed status from the error that ended the load.
 */
export function failedStatus(error: AssemblyError | LoadTimeoutError): PreloadStatus {
	const reason = error instanceof LoadTimeoutError ? TIMEOUT_REASON : error.message;
	return { state: "failed", reason, error };
}

/**
 * Whether a key in this status may be scheduled again.
 * Loading and completed keys are skipped; failed keys are retried on request.
 */
export function isSchedulable(status: PreloadStatus): boolean {
	return status.state === "not-started" || status.state === "failed";
}

/**
 * Format a status for log lines.
 */
export function formatStatus(status: PreloadStatus): string {
	return status.state === "failed" ? `failed(${status.reason})` : status.state;
}
