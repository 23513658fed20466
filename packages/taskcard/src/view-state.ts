/**
 * @title View State Module
 * @description Build task card view state from fetched pieces.
 *
 * @module view-state
 */

import type { SubTask, TaskCardViewState, TaskSnapshot } from "./types.js";

/** Focus session length when the task carries no estimate. */
export const DEFAULT_FOCUS_MINUTES = 25;

/** Longest focus session suggested. */
export const MAX_FOCUS_MINUTES = 90;

/**
 * Suggest a focus session length.
 *
 * The estimate is split evenly across open sub-tasks, so a task with several
 * open steps suggests a session for the next one rather than the whole task.
 */
export function suggestFocusMinutes(task: TaskSnapshot, subTasks: readonly SubTask[]): number {
	const estimate = task.estimatedMinutes && task.estimatedMinutes > 0 ? task.estimatedMinutes : DEFAULT_FOCUS_MINUTES;
	const open = subTasks.filter((subTask) => !subTask.done).length;
	const perStep = open > 1 ? Math.ceil(estimate / open) : estimate;
	return Math.min(perStep, MAX_FOCUS_MINUTES);
}

export function buildViewState(task: TaskSnapshot, insight: string | null, subTasks: SubTask[]): TaskCardViewState {
	return {
		task,
		insight,
		subTasks,
		completedSubTasks: subTasks.filter((subTask) => subTask.done).length,
		focusMinutes: suggestFocusMinutes(task, subTasks),
		loaded: true,
	};
}

/**
 * View state shown while the real one is assembled.
 */
export function createPlaceholderViewState(task: TaskSnapshot): TaskCardViewState {
	return {
		task,
		insight: null,
		subTasks: [],
		completedSubTasks: 0,
		focusMinutes: suggestFocusMinutes(task, []),
		loaded: false,
	};
}
