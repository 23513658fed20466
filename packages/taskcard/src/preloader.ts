/**
 * @title Task Card Preloader
 * @description Preload task detail cards as their rows come into view.
 *
 * Rows call {@link TaskCardPreloader.onRowAppear} (or the list calls
 * {@link TaskCardPreloader.onRowsVisible}); the detail card calls
 * {@link TaskCardPreloader.viewStateFor} when it opens.
 *
 * @module preloader
 */

import {
	PreloadCache,
	createLogger,
	isSchedulable,
	readPreloadConfig,
	type PreloadCacheOptions,
	type PreloadStats,
	type PreloadStatus,
} from "@view-preload/core";
import { createTaskCardAssembler, createTaskListAssembler } from "./assembler.js";
import type { TaskCardSource, TaskCardViewState, TaskSnapshot } from "./types.js";
import { createPlaceholderViewState } from "./view-state.js";

/**
 * Options for constructing a TaskCardPreloader.
 */
export interface TaskCardPreloaderOptions extends PreloadCacheOptions<string> {
	/** Backend capability the cards are assembled from. */
	source: TaskCardSource;
}

export class TaskCardPreloader {
	private readonly source: TaskCardSource;
	private readonly cache: PreloadCache<string, TaskCardViewState>;
	/** updatedAt of the snapshot each loading card is assembled from. */
	private readonly assembling = new Map<string, string>();

	constructor(options: TaskCardPreloaderOptions) {
		const { source, logger, ...cacheOptions } = options;
		this.source = source;
		this.cache = new PreloadCache<string, TaskCardViewState>({
			...cacheOptions,
			logger: logger ?? createLogger({ component: "taskcard-preloader" }),
		});
	}

	/**
	 * Create a preloader configured from a preload.yml in `directory`, if present.
	 * Values given in `options` take precedence over the file.
	 *
	 * @throws ConfigurationError if the file exists but is invalid
	 */
	static fromConfigDirectory(directory: string, options: TaskCardPreloaderOptions): TaskCardPreloader {
		const config = readPreloadConfig(directory);
		const { capacity, batchWidth, loadTimeout, ...rest } = options;
		return new TaskCardPreloader({
			...rest,
			capacity: capacity ?? config?.capacity,
			batchWidth: batchWidth ?? config?.batchWidth,
			loadTimeout: loadTimeout ?? config?.loadTimeout,
		});
	}

	/**
	 * Preload one row's card. Never rejects.
	 */
	async onRowAppear(task: TaskSnapshot): Promise<void> {
		this.dropIfStale(task);
		this.track(task);
		await this.cache.preload(task.id, createTaskCardAssembler(this.source, task));
	}

	/**
	 * Preload the cards of visible rows, at most `batchWidth` per call.
	 */
	async onRowsVisible(tasks: readonly TaskSnapshot[]): Promise<void> {
		for (const task of tasks) {
			this.dropIfStale(task);
			this.track(task);
		}
		await this.cache.preloadBatch(
			tasks.map((task) => task.id),
			createTaskListAssembler(this.source, tasks),
		);
	}

	/**
	 * View state for an opening card: the preloaded state when ready, otherwise
	 * a placeholder while the state is assembled in the background.
	 */
	viewStateFor(task: TaskSnapshot): TaskCardViewState {
		this.dropIfStale(task);
		this.track(task);
		return this.cache.getOrCreate(task.id, createTaskCardAssembler(this.source, task), () =>
			createPlaceholderViewState(task),
		);
	}

	/**
	 * Wait for a card that is being assembled.
	 */
	whenReady(taskId: string): Promise<TaskCardViewState | undefined> {
		return this.cache.whenReady(taskId);
	}

	status(taskId: string): PreloadStatus {
		return this.cache.status(taskId);
	}

	isReady(taskId: string): boolean {
		return this.cache.isReady(taskId);
	}

	/**
	 * Drop a card after its task was edited or deleted.
	 */
	onTaskChanged(taskId: string): void {
		this.assembling.delete(taskId);
		this.cache.invalidate(taskId);
	}

	stats(): PreloadStats {
		return this.cache.stats();
	}

	/**
	 * Drop every card, e.g. on sign-out.
	 */
	reset(): void {
		this.assembling.clear();
		this.cache.clear();
	}

	private track(task: TaskSnapshot): void {
		if (isSchedulable(this.cache.status(task.id))) {
			this.assembling.set(task.id, task.updatedAt);
		}
	}

	/**
	 * Invalidate a card, loaded or still loading, built from an older snapshot.
	 */
	private dropIfStale(task: TaskSnapshot): void {
		let builtFrom: string | undefined;
		if (this.cache.status(task.id).state === "loading") {
			builtFrom = this.assembling.get(task.id);
		} else {
			this.assembling.delete(task.id);
			builtFrom = this.cache.peek(task.id)?.task.updatedAt;
		}
		if (builtFrom !== undefined && builtFrom !== task.updatedAt) {
			this.cache.invalidate(task.id);
		}
	}
}
