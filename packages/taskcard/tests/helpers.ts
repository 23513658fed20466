import { createRootLogger } from "@view-preload/core";
import type { SubTask, TaskCardSource, TaskSnapshot } from "../src/types.js";

export const silentLogger = createRootLogger(undefined, "silent");

export function makeTask(id: string, overrides: Partial<TaskSnapshot> = {}): TaskSnapshot {
	return {
		id,
		title: `Task ${id}`,
		updatedAt: "2026-01-05T09:00:00.000Z",
		...overrides,
	};
}

/**
 * In-memory stand-in for the backend.
 */
export class FakeTaskCardSource implements TaskCardSource {
	readonly insightCalls: string[] = [];
	readonly subTaskCalls: string[] = [];
	readonly signals: AbortSignal[] = [];

	constructor(
		private readonly insights: Record<string, string> = {},
		private readonly subTasks: Record<string, SubTask[]> = {},
		private readonly failing = new Set<string>(),
	) {}

	async fetchInsight(task: TaskSnapshot, signal: AbortSignal): Promise<string | null> {
		this.insightCalls.push(task.id);
		this.signals.push(signal);
		return this.insights[task.id] ?? null;
	}

	async fetchSubTasks(taskId: string, signal: AbortSignal): Promise<SubTask[]> {
		this.subTaskCalls.push(taskId);
		this.signals.push(signal);
		if (this.failing.has(taskId)) {
			throw new Error("subtasks request failed");
		}
		return this.subTasks[taskId] ?? [];
	}
}
