import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { ConfigurationError } from "@view-preload/core";
import { TaskCardPreloader } from "../src/preloader.js";
import { FakeTaskCardSource, makeTask, silentLogger } from "./helpers.js";

describe("TaskCardPreloader", () => {
	let source: FakeTaskCardSource;
	let preloader: TaskCardPreloader;

	beforeEach(() => {
		source = new FakeTaskCardSource(
			{ t1: "Do this first thing tomorrow", t2: "Pair it with the weekly review" },
			{ t1: [{ id: "s1", title: "Draft agenda", done: true }] },
			new Set(["broken"]),
		);
		preloader = new TaskCardPreloader({ source, logger: silentLogger, capacity: 3, batchWidth: 2 });
	});

	it("preloads a card when its row appears", async () => {
		await preloader.onRowAppear(makeTask("t1"));

		expect(preloader.isReady("t1")).toBe(true);
		const state = preloader.viewStateFor(makeTask("t1"));
		expect(state.loaded).toBe(true);
		expect(state.insight).toBe("Do this first thing tomorrow");
		expect(state.completedSubTasks).toBe(1);
	});

	it("returns a placeholder for a card that is not ready", async () => {
		const task = makeTask("t2");

		const placeholder = preloader.viewStateFor(task);

		expect(placeholder.loaded).toBe(false);
		expect(placeholder.task).toBe(task);
		expect(preloader.status("t2")).toEqual({ state: "loading" });

		const ready = await preloader.whenReady("t2");
		expect(ready?.insight).toBe("Pair it with the weekly review");
		expect(preloader.viewStateFor(task)).toBe(ready);
	});

	it("preloads at most batchWidth visible rows per call", async () => {
		const rows = ["t1", "t2", "t3", "t4"].map((id) => makeTask(id));

		await preloader.onRowsVisible(rows);

		expect(preloader.isReady("t1")).toBe(true);
		expect(preloader.isReady("t2")).toBe(true);
		expect(preloader.status("t3")).toEqual({ state: "not-started" });
		expect(source.insightCalls).toEqual(["t1", "t2"]);

		await preloader.onRowsVisible(rows);

		expect(preloader.isReady("t3")).toBe(true);
		expect(preloader.isReady("t4")).toBe(true);
		expect(preloader.isReady("t1")).toBe(false);
	});

	it("records a failed card without throwing", async () => {
		await expect(preloader.onRowAppear(makeTask("broken"))).resolves.toBeUndefined();

		expect(preloader.status("broken")).toMatchObject({
			state: "failed",
			reason: "Could not assemble card for task broken: subtasks request failed",
		});
		expect(preloader.viewStateFor(makeTask("broken")).loaded).toBe(false);
	});

	it("reassembles a card whose task was modified", async () => {
		await preloader.onRowAppear(makeTask("t1"));

		const edited = makeTask("t1", { title: "Renamed", updatedAt: "2026-01-05T10:00:00.000Z" });
		const state = preloader.viewStateFor(edited);

		expect(state.loaded).toBe(false);
		expect(state.task.title).toBe("Renamed");
		expect((await preloader.whenReady("t1"))?.task.title).toBe("Renamed");
		expect(source.insightCalls).toEqual(["t1", "t1"]);
	});

	it("restarts a card still loading from an older snapshot", async () => {
		const pending = preloader.onRowAppear(makeTask("t1"));

		const edited = makeTask("t1", { title: "Renamed", updatedAt: "2026-01-05T10:00:00.000Z" });
		const state = preloader.viewStateFor(edited);
		await pending;

		expect(state.loaded).toBe(false);
		expect(source.signals[0]?.aborted).toBe(true);
		expect((await preloader.whenReady("t1"))?.task.title).toBe("Renamed");
		expect(source.insightCalls).toEqual(["t1", "t1"]);
		expect(preloader.stats().loads).toBe(2);
	});

	it("keeps a loading card when the snapshot is unchanged", async () => {
		const pending = preloader.onRowAppear(makeTask("t1"));

		preloader.viewStateFor(makeTask("t1"));
		await pending;

		expect(preloader.isReady("t1")).toBe(true);
		expect(preloader.stats().loads).toBe(1);
	});

	it("drops a card after its task changes", async () => {
		await preloader.onRowAppear(makeTask("t1"));

		preloader.onTaskChanged("t1");

		expect(preloader.status("t1")).toEqual({ state: "not-started" });
	});

	it("aborts in-flight assemblies on reset", async () => {
		const pending = preloader.onRowAppear(makeTask("t1"));

		preloader.reset();
		await pending;

		expect(source.signals.every((signal) => signal.aborted)).toBe(true);
		expect(preloader.isReady("t1")).toBe(false);
		expect(preloader.stats().loads).toBe(1);
	});

	describe("fromConfigDirectory", () => {
		let tempDir: string;

		beforeEach(async () => {
			tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "taskcard-config-test-"));
		});

		afterEach(async () => {
			await fs.promises.rm(tempDir, { recursive: true, force: true });
		});

		it("applies batch-width from preload.yml", async () => {
			await fs.promises.writeFile(path.join(tempDir, "preload.yml"), "batch-width: 1\n");
			const configured = TaskCardPreloader.fromConfigDirectory(tempDir, { source, logger: silentLogger });

			await configured.onRowsVisible([makeTask("t1"), makeTask("t2")]);

			expect(configured.isReady("t1")).toBe(true);
			expect(configured.status("t2")).toEqual({ state: "not-started" });
		});

		it("keeps the file value when an option is left undefined", async () => {
			await fs.promises.writeFile(path.join(tempDir, "preload.yml"), "batch-width: 1\n");
			const configured = TaskCardPreloader.fromConfigDirectory(tempDir, {
				source,
				logger: silentLogger,
				batchWidth: undefined,
			});

			await configured.onRowsVisible([makeTask("t1"), makeTask("t2")]);

			expect(configured.isReady("t1")).toBe(true);
			expect(configured.status("t2")).toEqual({ state: "not-started" });
		});

		it("lets options override the file", async () => {
			await fs.promises.writeFile(path.join(tempDir, "preload.yml"), "batch-width: 1\n");
			const configured = TaskCardPreloader.fromConfigDirectory(tempDir, {
				source,
				logger: silentLogger,
				batchWidth: 2,
			});

			await configured.onRowsVisible([makeTask("t1"), makeTask("t2")]);

			expect(configured.isReady("t2")).toBe(true);
		});

		it("rejects an invalid file", async () => {
			await fs.promises.writeFile(path.join(tempDir, "preload.yml"), "capacity: 0\n");

			expect(() => TaskCardPreloader.fromConfigDirectory(tempDir, { source, logger: silentLogger })).toThrow(
				ConfigurationError,
			);
		});
	});
});
