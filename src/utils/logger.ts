/**
 * Debug logger.
 *
 * Writes through console only when debug mode is on:
 * - globalThis.__TABULA_DEBUG = true
 * - process.env.TABULA_DEBUG set to anything but "" / "0" / "false"
 */

declare global {
	// eslint-disable-next-line no-var
	var __TABULA_DEBUG: boolean | undefined;
}

export class Logger {
	private readonly prefix: string;
	private readonly forceEnable: boolean;

	constructor(prefix: string, forceEnable = false) {
		this.prefix = prefix;
		this.forceEnable = forceEnable;
	}

	get enabled(): boolean {
		return this.forceEnable || isDebugMode();
	}

	/** Log a message if debug mode is enabled. */
	debug(...args: unknown[]): void {
		if (this.enabled) {
			console.debug(`[${this.prefix}]`, ...args);
		}
	}

	/** Warnings are always written. */
	warn(...args: unknown[]): void {
		console.warn(`[${this.prefix}]`, ...args);
	}
}

export function isDebugMode(): boolean {
	if (globalThis.__TABULA_DEBUG === true) return true;
	const flag = process.env.TABULA_DEBUG;
	return flag !== undefined && flag !== "" && flag !== "0" && flag.toLowerCase() !== "false";
}

export function createLogger(prefix: string, forceEnable = false): Logger {
	return new Logger(prefix, forceEnable);
}
