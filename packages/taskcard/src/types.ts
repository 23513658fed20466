/**
 * @title Types
 * @description Task card view state and the backend capability it is built from.
 *
 * @module types
 */

/**
 * The fields of a task the detail card needs.
 */
export interface TaskSnapshot {
	/** Stable task identifier, used as the cache key. */
	id: string;
	title: string;
	notes?: string;
	/** User-provided estimate, in minutes. */
	estimatedMinutes?: number;
	/** Last modification time (ISO 8601); a change means cached state is stale. */
	updatedAt: string;
}

export interface SubTask {
	id: string;
	title: string;
	done: boolean;
}

/**
 * Remote data behind a task card. Implementations should stop work when the
 * signal is aborted.
 */
export interface TaskCardSource {
	/** AI-generated insight for the task, or null when none exists. */
	fetchInsight(task: TaskSnapshot, signal: AbortSignal): Promise<string | null>;
	/** Sub-tasks in display order. */
	fetchSubTasks(taskId: string, signal: AbortSignal): Promise<SubTask[]>;
}

/**
 * Everything the detail card renders.
 */
export interface TaskCardViewState {
	task: TaskSnapshot;
	insight: string | null;
	subTasks: SubTask[];
	completedSubTasks: number;
	/** Suggested length of the next focus session, in minutes. */
	focusMinutes: number;
	/** False for a placeholder built before the data arrived. */
	loaded: boolean;
}
