import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		exclude: [...configDefaults.exclude, "dist/**"],
	},
});
