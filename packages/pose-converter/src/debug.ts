declare global {
	// Global debug flag for all pose-keyframes modules
	var poseKeyframesDebug: boolean | undefined;
}

export interface DebugLogger {
	log(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

/** Enable or disable debug output from every module. Off by default. */
export function setDebugLogging(enabled: boolean): void {
	globalThis.poseKeyframesDebug = enabled;
}

export function isDebugLogging(): boolean {
	return globalThis.poseKeyframesDebug === true;
}

/**
 * Prefixed console logger. log/warn are gated by the global debug flag.
 */
export function createDebugLogger(prefix: string): DebugLogger {
	return {
		log(...args: unknown[]): void {
			if (isDebugLogging()) console.log(prefix, ...args);
		},
		warn(...args: unknown[]): void {
			if (isDebugLogging()) console.warn(prefix, ...args);
		},
		error(...args: unknown[]): void {
			// Always log errors
			console.error(prefix, ...args);
		}
	};
}
