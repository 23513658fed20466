/**
 * @title Preload Cache Module
 * @description Capacity-bounded cache that assembles per-key values ahead of use.
 *
 * Loads are deduplicated per key through an in-flight table, bounded per batch
 * request, and raced against a timeout. Completed entries are evicted oldest
 * first (insertion order) once the capacity is exceeded.
 *
 * @module cache
 */

import { CancellationError, LoadTimeoutError, toAssemblyError } from "../errors.js";
import { resolvePreloadConfig, type PreloadConfig } from "../config/config.js";
import { createLogger, type Logger } from "../logging/logger.js";
import {
	COMPLETED,
	LOADING,
	NOT_STARTED,
	TIMEOUT_REASON,
	failedStatus,
	formatStatus,
	isSchedulable,
	type PreloadStatus,
} from "../types/status.js";
import { raceWithTimeout } from "./timeout.js";

/**
 * Builds the value for a key. The signal is aborted when the load times out or
 * is invalidated; the assembler is responsible for releasing what it opened.
 */
export type Assembler<K, V> = (key: K, signal: AbortSignal) => Promise<V>;

/**
 * Notification emitted when an entry changes state.
 */
export type PreloadEvent<K> =
	| { type: "loaded"; key: K }
	| { type: "failed"; key: K; reason: string }
	| { type: "evicted"; key: K }
	| { type: "invalidated"; key: K };

/**
 * Options for constructing a PreloadCache.
 */
export interface PreloadCacheOptions<K> extends Partial<PreloadConfig> {
	/** Logger (defaults to a child logger for the "preload-cache" component). */
	logger?: Logger;
	/** Listener for entry state changes. */
	onEvent?: (event: PreloadEvent<K>) => void;
}

/**
 * Lifetime counters.
 */
export interface PreloadStats {
	/** getOrCreate calls answered from a completed entry. */
	hits: number;
	/** getOrCreate calls answered with a placeholder. */
	misses: number;
	/** Assemblies started. */
	loads: number;
	/** Assemblies that failed (timeouts excluded). */
	failures: number;
	/** Assemblies that timed out. */
	timeouts: number;
	/** Entries removed to respect the capacity. */
	evictions: number;
}

interface InFlightLoad<V> {
	controller: AbortController;
	promise: Promise<V | undefined>;
}

export class PreloadCache<K, V> {
	readonly config: Readonly<PreloadConfig>;

	private readonly entries = new Map<K, V>();
	private readonly statuses = new Map<K, PreloadStatus>();
	private readonly inFlight = new Map<K, InFlightLoad<V>>();
	private readonly logger: Logger;
	private readonly onEvent?: (event: PreloadEvent<K>) => void;
	private readonly counters: PreloadStats = {
		hits: 0,
		misses: 0,
		loads: 0,
		failures: 0,
		timeouts: 0,
		evictions: 0,
	};

	/**
	 * @throws ConfigurationError if capacity, batchWidth or loadTimeout is out of range
	 */
	constructor(options: PreloadCacheOptions<K> = {}) {
		const { logger, onEvent, ...overrides } = options;
		this.config = Object.freeze(resolvePreloadConfig(overrides));
		this.logger = logger ?? createLogger({ component: "preload-cache" });
		this.onEvent = onEvent;
	}

	/** Number of retained (completed) entries. */
	get size(): number {
		return this.entries.size;
	}

	/**
	 * Start loading a key in the background.
	 *
	 * Returns at once when the key is already loading or completed. Never
	 * rejects: failures and timeouts are recorded in {@link status}.
	 */
	async preload(key: K, assemble: Assembler<K, V>): Promise<void> {
		const load = this.schedule(key, assemble);
		if (load) {
			await load.promise;
		}
	}

	/**
	 * Load at most `batchWidth` of the keys that are neither loading nor
	 * completed, in the order given, and wait for all of them to settle.
	 *
	 * Keys beyond the width are not queued; call again to pick them up.
	 */
	async preloadBatch(keys: Iterable<K>, assemble: Assembler<K, V>): Promise<void> {
		const selected: K[] = [];
		const seen = new Set<K>();
		let remaining = 0;

		for (const key of keys) {
			if (seen.has(key)) {
				continue;
			}
			seen.add(key);
			if (!isSchedulable(this.status(key))) {
				continue;
			}
			if (selected.length < this.config.batchWidth) {
				selected.push(key);
			} else {
				remaining++;
			}
		}

		if (selected.length === 0) {
			return;
		}

		this.logger.debug({ scheduled: selected.length, deferred: remaining }, "preload batch");
		await Promise.allSettled(selected.map((key) => this.preload(key, assemble)));
	}

	/**
	 * Get the completed value for a key, or a placeholder when it is not ready.
	 *
	 * The placeholder is returned synchronously and a background load is
	 * started. The placeholder is never filled in: once {@link isReady} turns
	 * true, look the key up again (or await {@link whenReady}).
	 */
	getOrCreate(key: K, assemble: Assembler<K, V>, placeholder: (key: K) => V): V {
		if (this.isReady(key)) {
			const value = this.entries.get(key);
			if (value !== undefined) {
				this.counters.hits++;
				return value;
			}
		}

		this.counters.misses++;
		void this.preload(key, assemble);
		return placeholder(key);
	}

	/**
	 * Check whether a completed value is cached for a key.
	 */
	isReady(key: K): boolean {
		return this.statuses.get(key)?.state === "completed" && this.entries.has(key);
	}

	/**
	 * Get the load status of a key ("not-started" if never scheduled).
	 */
	status(key: K): PreloadStatus {
		return this.statuses.get(key) ?? NOT_STARTED;
	}

	/**
	 * Get the cached value without triggering a load.
	 */
	peek(key: K): V | undefined {
		return this.isReady(key) ? this.entries.get(key) : undefined;
	}

	/**
	 * Wait for the current load of a key to settle.
	 *
	 * @returns The cached value, or undefined if the key is not loaded and
	 * its load failed, was cancelled, or was never started
	 */
	async whenReady(key: K): Promise<V | undefined> {
		const load = this.inFlight.get(key);
		if (load) {
			return load.promise;
		}
		return this.peek(key);
	}

	/**
	 * Keys of the retained entries, oldest first.
	 */
	keys(): K[] {
		return [...this.entries.keys()];
	}

	/**
	 * Snapshot of the lifetime counters.
	 */
	stats(): PreloadStats {
		return { ...this.counters };
	}

	/**
	 * Remove a key's value and status. An in-flight load is aborted and its
	 * eventual result is discarded.
	 */
	invalidate(key: K): void {
		const load = this.inFlight.get(key);
		const known = this.statuses.has(key) || this.entries.has(key);

		this.inFlight.delete(key);
		this.entries.delete(key);
		this.statuses.delete(key);

		if (load) {
			load.controller.abort(new CancellationError(`Load for ${String(key)} was invalidated.`));
		}
		if (known) {
			this.logger.debug({ key: String(key), inFlight: load !== undefined }, "invalidated");
			this.emit({ type: "invalidated", key });
		}
	}

	/**
	 * Remove every entry and status, aborting all in-flight loads.
	 */
	clear(): void {
		const loads = [...this.inFlight.values()];

		this.inFlight.clear();
		this.entries.clear();
		this.statuses.clear();

		for (const load of loads) {
			load.controller.abort(new CancellationError("Cache cleared."));
		}
		this.logger.debug({ aborted: loads.length }, "cleared");
	}

	private schedule(key: K, assemble: Assembler<K, V>): InFlightLoad<V> | undefined {
		const current = this.status(key);
		if (!isSchedulable(current)) {
			return undefined;
		}

		// The status flip and the in-flight registration happen in one
		// synchronous step, so a second caller always sees "loading".
		this.statuses.set(key, LOADING);
		this.counters.loads++;
		this.logger.debug({ key: String(key), previous: formatStatus(current) }, "load scheduled");

		const controller = new AbortController();
		const load: InFlightLoad<V> = {
			controller,
			promise: this.runLoad(key, assemble, controller),
		};
		this.inFlight.set(key, load);
		return load;
	}

	private async runLoad(key: K, assemble: Assembler<K, V>, controller: AbortController): Promise<V | undefined> {
		try {
			const value = await raceWithTimeout((signal) => assemble(key, signal), this.config.loadTimeout, controller);
			if (!this.isCurrent(key, controller)) {
				this.logger.debug({ key: String(key) }, "discarded result of a cancelled load");
				return undefined;
			}

			this.inFlight.delete(key);
			this.entries.set(key, value);
			this.statuses.set(key, COMPLETED);
			this.logger.debug({ key: String(key) }, "load completed");
			this.emit({ type: "loaded", key });
			this.cleanupOldEntries();
			return value;
		} catch (error) {
			if (!this.isCurrent(key, controller)) {
				return undefined;
			}

			this.inFlight.delete(key);
			const failure = error instanceof LoadTimeoutError ? error : toAssemblyError(error);
			const status = failedStatus(failure);
			this.statuses.set(key, status);

			if (failure instanceof LoadTimeoutError) {
				this.counters.timeouts++;
			} else {
				this.counters.failures++;
			}
			this.logger.warn({ key: String(key), status: formatStatus(status), err: failure }, "load failed");
			this.emit({ type: "failed", key, reason: failure instanceof LoadTimeoutError ? TIMEOUT_REASON : failure.reason });
			return undefined;
		}
	}

	/**
	 * Whether a settling load still owns its key (not invalidated or cleared).
	 */
	private isCurrent(key: K, controller: AbortController): boolean {
		return this.inFlight.get(key)?.controller === controller;
	}

	/**
	 * Evict the oldest completed entries until the capacity is respected.
	 */
	private cleanupOldEntries(): void {
		const excess = this.entries.size - this.config.capacity;
		if (excess <= 0) {
			return;
		}

		const victims = [...this.entries.keys()].slice(0, excess);
		for (const key of victims) {
			this.entries.delete(key);
			this.statuses.delete(key);
			this.counters.evictions++;
			this.logger.debug({ key: String(key) }, "evicted");
			this.emit({ type: "evicted", key });
		}
	}

	private emit(event: PreloadEvent<K>): void {
		if (!this.onEvent) {
			return;
		}
		try {
			this.onEvent(event);
		} catch (error) {
			this.logger.warn({ event: event.type, err: error }, "preload event listener threw");
		}
	}
}
