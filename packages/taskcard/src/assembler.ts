/**
 * @title Assembler Module
 * @description Assemble task card view state for the preload cache.
 *
 * @module assembler
 */

import { AssemblyError, getErrorMessage, type Assembler } from "@view-preload/core";
import type { TaskCardSource, TaskCardViewState, TaskSnapshot } from "./types.js";
import { buildViewState } from "./view-state.js";

/**
 * Fetch the pieces of one task card concurrently and build its view state.
 *
 * @param source - Backend capability
 * @param task - Task to assemble
 * @param signal - Aborted when the load times out or is cancelled
 * @returns Assembled view state
 * @throws AssemblyError if a fetch fails; the abort reason if the signal fired
 */
export async function assembleTaskCard(
	source: TaskCardSource,
	task: TaskSnapshot,
	signal: AbortSignal,
): Promise<TaskCardViewState> {
	signal.throwIfAborted();

	try {
		const [insight, subTasks] = await Promise.all([
			source.fetchInsight(task, signal),
			source.fetchSubTasks(task.id, signal),
		]);
		signal.throwIfAborted();
		return buildViewState(task, insight, subTasks);
	} catch (error) {
		if (signal.aborted) {
			throw signal.reason;
		}
		throw new AssemblyError(`Could not assemble card for task ${task.id}: ${getErrorMessage(error)}`, {
			cause: error,
		});
	}
}

/**
 * Create an assembler for a single known task.
 */
export function createTaskCardAssembler(source: TaskCardSource, task: TaskSnapshot): Assembler<string, TaskCardViewState> {
	return (_taskId, signal) => assembleTaskCard(source, task, signal);
}

/**
 * Create an assembler that resolves keys against a set of tasks.
 */
export function createTaskListAssembler(
	source: TaskCardSource,
	tasks: Iterable<TaskSnapshot>,
): Assembler<string, TaskCardViewState> {
	const byId = new Map<string, TaskSnapshot>();
	for (const task of tasks) {
		byId.set(task.id, task);
	}

	return async (taskId, signal) => {
		const task = byId.get(taskId);
		if (!task) {
			throw new AssemblyError(`Unknown task ${taskId}`);
		}
		return assembleTaskCard(source, task, signal);
	};
}
