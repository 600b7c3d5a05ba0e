// CHANGE: On-disk layout of the conformance state directory
// PURITY: CORE helper
// INVARIANT: Every path lives under <repo>/.conformance except .gitignore

import { path } from "../utils/node-mods.js";

export const STATE_DIRECTORY = ".conformance";
export const LOCAL_CONFIG_ENTRY = ".conformance/local.yaml";

export interface ConformanceLayout {
	readonly root: string;
	readonly violations: string;
	readonly exemptions: string;
	readonly history: string;
	readonly report: string;
	readonly local: string;
	readonly gitignore: string;
}

/**
 * @pure true
 */
export function conformanceLayout(repoRoot: string): ConformanceLayout {
	const root = path.join(repoRoot, STATE_DIRECTORY);
	return {
		root,
		violations: path.join(root, "violations"),
		exemptions: path.join(root, "exemptions"),
		history: path.join(root, "history"),
		report: path.join(root, "conformance_report.yaml"),
		local: path.join(root, "local.yaml"),
		gitignore: path.join(repoRoot, ".gitignore"),
	};
}
