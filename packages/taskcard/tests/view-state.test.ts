import { describe, it, expect } from "vitest";
import {
	DEFAULT_FOCUS_MINUTES,
	buildViewState,
	createPlaceholderViewState,
	suggestFocusMinutes,
} from "../src/view-state.js";
import { makeTask } from "./helpers.js";

describe("suggestFocusMinutes", () => {
	it("uses the default without an estimate", () => {
		expect(suggestFocusMinutes(makeTask("t1"), [])).toBe(DEFAULT_FOCUS_MINUTES);
	});

	it("splits the estimate across open sub-tasks", () => {
		const task = makeTask("t1", { estimatedMinutes: 50 });
		const subTasks = [
			{ id: "s1", title: "Outline", done: true },
			{ id: "s2", title: "Draft", done: false },
			{ id: "s3", title: "Review", done: false },
			{ id: "s4", title: "Send", done: false },
		];

		expect(suggestFocusMinutes(task, subTasks)).toBe(17);
	});

	it("caps long sessions", () => {
		expect(suggestFocusMinutes(makeTask("t1", { estimatedMinutes: 240 }), [])).toBe(90);
	});
});

describe("buildViewState", () => {
	it("counts completed sub-tasks", () => {
		const state = buildViewState(makeTask("t1"), "Start with the hardest part", [
			{ id: "s1", title: "One", done: true },
			{ id: "s2", title: "Two", done: false },
		]);

		expect(state.completedSubTasks).toBe(1);
		expect(state.insight).toBe("Start with the hardest part");
		expect(state.loaded).toBe(true);
	});
});

describe("createPlaceholderViewState", () => {
	it("is marked as not loaded", () => {
		const task = makeTask("t1", { estimatedMinutes: 30 });

		expect(createPlaceholderViewState(task)).toEqual({
			task,
			insight: null,
			subTasks: [],
			completedSubTasks: 0,
			focusMinutes: 30,
			loaded: false,
		});
	});
});
