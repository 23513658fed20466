/**
 * Public type exports for @view-preload/core.
 */

export {
	type PreloadStatus,
	type PreloadState,
	TIMEOUT_REASON,
	NOT_STARTED,
	LOADING,
	COMPLETED,
	failedStatus,
	isSchedulable,
	formatStatus,
} from "./status.js";
