// CHANGE: Load the CI configuration file
// PURITY: SHELL
// EFFECT: Effect<CIConfig, ConfigError | StoreError>
// INVARIANT: Missing file ⇒ defaults; malformed file ⇒ ConfigError

import { Effect } from "effect";

import { type CIConfig, ciConfigFromRecord, DEFAULT_CI_CONFIG } from "../../core/ci/config.js";
import type { ConfigError, StoreError } from "../../core/errors.js";
import { readYamlFile } from "../fs/yaml.js";
import { path } from "../utils/node-mods.js";

export const DEFAULT_CI_CONFIG_PATH = ".conformance/ci.yaml";

export function loadCIConfig(
	repoRoot: string,
	configPath: string = DEFAULT_CI_CONFIG_PATH,
	base: CIConfig = DEFAULT_CI_CONFIG,
): Effect.Effect<CIConfig, ConfigError | StoreError> {
	const file = path.resolve(repoRoot, configPath);
	return Effect.flatMap(readYamlFile(file), (doc) => ciConfigFromRecord(doc, file, base));
}
