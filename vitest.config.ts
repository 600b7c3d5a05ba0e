// CHANGE: Vitest configuration for the conformance engine test suite
// WHY: Tests live under test/ mirroring src/; explicit imports keep test files type-checked by tsc
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: independent(test) ⇒ mocks are reset between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},

		// CHANGE: Clear mocks between tests
		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
