// CHANGE: Warning and debug loggers for shell modules
// WHY: Debug output stays silent unless CONFORMANCE_DEBUG=1
// PURITY: SHELL
// INVARIANT: debugLog writes only when the flag is set; warnings always reach stderr

const ENV: NodeJS.ProcessEnv & { CONFORMANCE_DEBUG?: string } = process.env;

export function isDebugEnabled(): boolean {
	return ENV.CONFORMANCE_DEBUG === "1";
}

export function debugLog(scope: string, message: string): void {
	if (isDebugEnabled()) {
		console.error(`[${scope}]`, message);
	}
}

export function logWarning(scope: string, message: string): void {
	console.warn(`Warning: ${message}`);
	debugLog(scope, message);
}
