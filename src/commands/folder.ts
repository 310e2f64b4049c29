import { access } from "node:fs/promises";
import { resolve } from "node:path";

export const CONTAINER_MARKER = "/.dockerenv";
export const CONTAINER_PREFIX = "/opt";

export async function isInContainer(): Promise<boolean> {
	try {
		await access(CONTAINER_MARKER);
		return true;
	} catch {
		return false;
	}
}

/**
 * Resolve the deck folder argument. Inside a container the folder is mounted
 * under /opt, so `./anki`, `anki` and `/anki` all become `/opt/anki`.
 */
export function resolveFolderArg(folder: string, inContainer: boolean): string {
	if (!inContainer) {
		return resolve(folder);
	}
	const trimmed = folder.replace(/^\.\//, "").replace(/^\//, "");
	return `${CONTAINER_PREFIX}/${trimmed}`;
}
