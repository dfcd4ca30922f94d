// src/yeelight/logger.ts

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests.
 */
export interface YeelightLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(prefix: string): YeelightLogger {
	const tag = `[${prefix}]`;
	return {
		debug: (message: string, ...args: unknown[]) => console.debug(tag, message, ...args),
		info: (message: string, ...args: unknown[]) => console.info(tag, message, ...args),
		warn: (message: string, ...args: unknown[]) => console.warn(tag, message, ...args),
		error: (message: string, ...args: unknown[]) => console.error(tag, message, ...args),
	};
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
