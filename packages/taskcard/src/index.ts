/**
 * @view-preload/taskcard - Preloaded task detail cards.
 *
 * This library provides functionality for:
 * - Task card view state types and the backend capability they need
 * - Assembling view state from concurrent fetches
 * - Preloading cards as task rows appear, with placeholders for cards not yet ready
 */

// Type exports
export * from "./types.js";

export {
	DEFAULT_FOCUS_MINUTES,
	MAX_FOCUS_MINUTES,
	suggestFocusMinutes,
	buildViewState,
	createPlaceholderViewState,
} from "./view-state.js";

export { assembleTaskCard, createTaskCardAssembler, createTaskListAssembler } from "./assembler.js";

export { type TaskCardPreloaderOptions, TaskCardPreloader } from "./preloader.js";
