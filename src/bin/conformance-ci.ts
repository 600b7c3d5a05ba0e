#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper around runCI
// WHY: APP returns ExitCode; BIN is the only place that exits the process
// FORMAT THEOREM: ∀run: runCI returns exitCode ∈ {0,1,2,3,4} → process.exit(exitCode) exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: No process.exit in APP or CORE

import { Effect } from "effect";

import { runCI } from "../app/run-ci.js";
import { EXIT_RUNTIME_ERROR } from "../core/models.js";

/**
 * CLI entry point for conformance-ci.
 *
 * @pure false (process termination and console I/O)
 * @postcondition process terminates exactly once
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(runCI(process.argv.slice(2), process.env));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error instanceof Error ? error.message : String(error));
		process.exit(EXIT_RUNTIME_ERROR);
	}
})();
