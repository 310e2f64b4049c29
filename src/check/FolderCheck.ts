import { readFile, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { loadDeckConfig } from "../config/ConfigLoader";
import {
	DECKS_DIR,
	listDeckFiles,
	parseHeader,
	parseSubdeck,
} from "../decks/CsvDeckReader";
import { ASSETS_DIR } from "../server/AssetServer";
import { DeckCompilerError, ValidationError, errorMessage } from "../errors";
import type { CardTemplates, DeckConfig } from "../types";

export const CARD_DIR = "card";

export const CARD_FILES = {
	front: "front.html",
	back: "back.html",
	css: "style.css",
} as const satisfies Record<keyof CardTemplates, string>;

export interface CheckResult {
	errors: string[];
	warnings: string[];
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch {
		return false;
	}
}

/**
 * Check a deck folder before anything is sent to the remote API.
 * Collects every problem instead of stopping at the first one.
 */
export async function checkFolder(folder: string): Promise<CheckResult> {
	const result: CheckResult = { errors: [], warnings: [] };

	if (!(await isDirectory(folder))) {
		result.errors.push(`${folder} is not a directory`);
		return result;
	}

	let config: DeckConfig | null = null;
	try {
		config = await loadDeckConfig(folder);
	} catch (error) {
		if (!(error instanceof DeckCompilerError)) throw error;
		result.errors.push(error.message);
	}

	for (const file of Object.values(CARD_FILES)) {
		const path = join(folder, CARD_DIR, file);
		if (!(await isFile(path))) {
			result.errors.push(`Missing card template ${path}`);
		}
	}

	const decksDir = join(folder, DECKS_DIR);
	if (!(await isDirectory(decksDir))) {
		result.errors.push(`Missing decks directory ${decksDir}`);
	} else {
		const csvFiles = await listDeckFiles(folder);
		if (csvFiles.length === 0) {
			result.errors.push(`No .csv files in ${decksDir}`);
		}
		if (config) {
			for (const path of csvFiles) {
				await checkDeckFile(path, config, result);
			}
		}
	}

	if (config?.webserver.enabled) {
		const assetsDir = join(folder, ASSETS_DIR);
		if (!(await isDirectory(assetsDir))) {
			result.errors.push(
				`Webserver is enabled but ${assetsDir} does not exist`,
			);
		}
	}

	return result;
}

async function checkDeckFile(
	path: string,
	config: DeckConfig,
	result: CheckResult,
): Promise<void> {
	const text = await readFile(path, "utf-8");
	const name = basename(path, extname(path));

	if (name.includes("::")) {
		result.errors.push(`${path}: deck file names must not contain "::"`);
	}

	try {
		parseSubdeck(name, text, config.fields, path);
	} catch (error) {
		if (!(error instanceof DeckCompilerError)) throw error;
		result.errors.push(error.message);
		return;
	}

	const columns = new Set(parseHeader(text));
	const present = config.fields.filter((f) => columns.has(f));
	if (present.length === 0) {
		result.errors.push(
			`${path}: header has none of the configured fields (${config.fields.join(", ")})`,
		);
		return;
	}

	const missing = config.fields.filter((f) => !columns.has(f));
	if (missing.length > 0) {
		result.warnings.push(
			`${path}: header lacks configured fields ${missing.join(", ")}`,
		);
	}
}

/**
 * Run the folder check and throw if it found any error.
 */
export async function assertFolderValid(folder: string): Promise<CheckResult> {
	const result = await checkFolder(folder);
	if (result.errors.length > 0) {
		throw new ValidationError(result.errors);
	}
	return result;
}

/**
 * Read the card templates of a checked folder.
 */
export async function readCardTemplates(folder: string): Promise<CardTemplates> {
	const read = (file: string) => readFile(join(folder, CARD_DIR, file), "utf-8");
	try {
		return {
			front: await read(CARD_FILES.front),
			back: await read(CARD_FILES.back),
			css: await read(CARD_FILES.css),
		};
	} catch (error) {
		throw new ValidationError([
			`Cannot read card templates: ${errorMessage(error)}`,
		]);
	}
}
