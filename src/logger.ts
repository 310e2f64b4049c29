/* eslint-disable no-console */

const PREFIX = "[deck-compiler]";

/**
 * Debug output is opt-in through the DECK_COMPILER_DEBUG environment variable.
 */
export function isDebugEnabled(): boolean {
	const value = process.env.DECK_COMPILER_DEBUG;
	return value !== undefined && value !== "" && value !== "0";
}

/**
 * Prefixed console logging. Messages accept printf-style placeholders
 * (%s, %d, %o) followed by their arguments.
 */
export const logger = {
	info(message: string, ...args: unknown[]): void {
		console.log(`${PREFIX} ${message}`, ...args);
	},
	warn(message: string, ...args: unknown[]): void {
		console.warn(`${PREFIX} ${message}`, ...args);
	},
	error(message: string, ...args: unknown[]): void {
		console.error(`${PREFIX} ${message}`, ...args);
	},
	debug(message: string, ...args: unknown[]): void {
		if (isDebugEnabled()) {
			console.log(`${PREFIX} ${message}`, ...args);
		}
	},
};
