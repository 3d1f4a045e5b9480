// src/hub/logger.ts
import type { Logger } from 'homebridge';

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests and standalone scripts.
 */
export interface HubLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(prefix = '[homehub]', debugLogging = false): HubLogger {
	return {
		debug: (message: string, ...args: unknown[]) => {
			if (debugLogging) {
				console.debug(prefix, message, ...args);
			}
		},
		info: (message: string, ...args: unknown[]) => console.info(prefix, message, ...args),
		warn: (message: string, ...args: unknown[]) => console.warn(prefix, message, ...args),
		error: (message: string, ...args: unknown[]) => console.error(prefix, message, ...args),
	};
}

// With debugLogging on, wire dumps show up without starting Homebridge in -D mode.
export function toHubLogger(log: Logger, debugLogging = false): HubLogger {
	return {
		debug: debugLogging ? log.info.bind(log) : log.debug.bind(log),
		info: log.info.bind(log),
		warn: log.warn.bind(log),
		error: log.error.bind(log),
	};
}

export const silentLogger: HubLogger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
