// CHANGE: The latest conformance report
// PURITY: SHELL
// EFFECT: Effect<A, StoreError>

import { Effect } from "effect";

import {
	type ConformanceReport,
	reportFromDocument,
	reportToDocument,
} from "../../core/conformance/summary.js";
import { describeError, type StoreError } from "../../core/errors.js";
import { writeYamlAtomic } from "../fs/atomic.js";
import { readYamlFile } from "../fs/yaml.js";
import { logWarning } from "../utils/log.js";

/**
 * @postcondition missing or unparseable report ⇒ null
 */
export function readReport(file: string): Effect.Effect<ConformanceReport | null, StoreError> {
	return readYamlFile(file).pipe(
		Effect.map((doc) => (doc === null ? null : reportFromDocument(doc))),
		Effect.catchTag("ConfigError", (error) => {
			logWarning("store", `Ignoring report ${describeError(error)}`);
			return Effect.succeed(null);
		}),
	);
}

export function writeReport(file: string, report: ConformanceReport): Effect.Effect<void, StoreError> {
	return writeYamlAtomic(file, reportToDocument(report));
}
