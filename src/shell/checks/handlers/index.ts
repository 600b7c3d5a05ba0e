// CHANGE: The built-in handler set
// PURITY: SHELL

import { CheckHandlerRegistry } from "../registry.js";
import { circularImportHandler } from "./circular-import.js";
import { commandHandler } from "./command.js";
import { constructorInjectionHandler } from "./constructor-injection.js";
import { createCustomHandler, CustomCheckRegistry } from "./custom.js";
import { domainPurityHandler } from "./domain-purity.js";
import { fileExistsHandler } from "./file-exists.js";
import { layerImportHandler } from "./layer-import.js";
import { nestedContractHandler } from "./nested-contract.js";
import { patternHandler } from "./pattern.js";
import { structuralMetricHandler } from "./structural-metric.js";

export { CustomCheckRegistry } from "./custom.js";
export type { CustomCheckFunction, CustomFinding } from "./custom.js";

/**
 * Registry holding one handler per built-in check type.
 */
export function createDefaultHandlers(
	customChecks: CustomCheckRegistry = new CustomCheckRegistry(),
): CheckHandlerRegistry {
	return new CheckHandlerRegistry([
		patternHandler,
		commandHandler,
		fileExistsHandler,
		structuralMetricHandler,
		createCustomHandler(customChecks),
		nestedContractHandler,
		layerImportHandler,
		constructorInjectionHandler,
		domainPurityHandler,
		circularImportHandler,
	]);
}
