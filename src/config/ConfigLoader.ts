import { access, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { ConfigError } from "../errors";
import { classifyField } from "../media/MediaFieldClassifier";
import { logger } from "../logger";
import {
	DEFAULT_URL_CHECK,
	DEFAULT_WEBSERVER,
	type DeckConfig,
	type UrlCheckConfig,
	type WebserverConfig,
} from "../types";

export const CONFIG_FILE_NAMES = ["config.yaml", "config.yml"] as const;

const REQUIRED_STRING_KEYS = [
	"masterDeckName",
	"modelName",
	"modelNameDescriptive",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Locate the configuration document at the folder root.
 * config.yaml wins over config.yml when both exist.
 */
export async function findConfigFile(folder: string): Promise<string | null> {
	for (const name of CONFIG_FILE_NAMES) {
		const candidate = join(folder, name);
		try {
			await access(candidate);
			return candidate;
		} catch {
			continue;
		}
	}
	return null;
}

/**
 * Read and validate the configuration of a deck folder.
 */
export async function loadDeckConfig(folder: string): Promise<DeckConfig> {
	const path = await findConfigFile(folder);
	if (!path) {
		throw new ConfigError(
			`No ${CONFIG_FILE_NAMES.join(" or ")} found in ${folder}`,
		);
	}

	const source = await readFile(path, "utf-8");
	const config = parseDeckConfig(source, basename(path));
	logger.debug(
		"Loaded %s: deck %s, model %s, %d fields",
		path,
		config.masterDeckName,
		config.modelName,
		config.fields.length,
	);
	return config;
}

/**
 * Parse a YAML configuration document into a DeckConfig, applying defaults
 * for the optional urlCheck and webserver settings.
 *
 * @param fileName Used in error messages only
 * @throws ConfigError on syntax errors, missing required keys or bad values
 */
export function parseDeckConfig(source: string, fileName: string): DeckConfig {
	let doc: unknown;
	try {
		doc = parseYaml(source);
	} catch (error) {
		const detail =
			error instanceof YAMLParseError ? error.message : String(error);
		throw new ConfigError(`${fileName}: invalid YAML: ${detail}`);
	}

	if (!isRecord(doc)) {
		throw new ConfigError(`${fileName}: expected a mapping at the top level`);
	}

	const strings: Record<(typeof REQUIRED_STRING_KEYS)[number], string> = {
		masterDeckName: "",
		modelName: "",
		modelNameDescriptive: "",
	};
	for (const key of REQUIRED_STRING_KEYS) {
		const value = doc[key];
		if (value === undefined || value === null) {
			throw new ConfigError(`${fileName}: missing required key "${key}"`);
		}
		if (typeof value !== "string" || value.trim() === "") {
			throw new ConfigError(
				`${fileName}: "${key}" must be a non-empty string`,
			);
		}
		strings[key] = value;
	}

	if (strings.masterDeckName.includes("::")) {
		throw new ConfigError(
			`${fileName}: "masterDeckName" must not contain "::"`,
		);
	}

	return {
		...strings,
		fields: parseFields(doc.fields, fileName),
		urlCheck: parseUrlCheck(doc.urlCheck, fileName),
		webserver: parseWebserver(doc.webserver, doc.webserverPort, fileName),
	};
}

function parseFields(value: unknown, fileName: string): string[] {
	if (value === undefined || value === null) {
		throw new ConfigError(`${fileName}: missing required key "fields"`);
	}
	if (!Array.isArray(value)) {
		throw new ConfigError(`${fileName}: "fields" must be a list`);
	}
	if (value.length === 0) {
		throw new ConfigError(`${fileName}: "fields" must not be empty`);
	}

	const fields: string[] = [];
	const seen = new Set<string>();
	value.forEach((entry: unknown, index) => {
		if (typeof entry !== "string" || entry.trim() === "") {
			throw new ConfigError(
				`${fileName}: fields[${index}] must be a non-empty string`,
			);
		}
		if (seen.has(entry)) {
			throw new ConfigError(`${fileName}: duplicate field "${entry}"`);
		}
		try {
			classifyField(entry);
		} catch (error) {
			if (error instanceof ConfigError) {
				throw new ConfigError(`${fileName}: ${error.message}`);
			}
			throw error;
		}
		seen.add(entry);
		fields.push(entry);
	});
	return fields;
}

function parseUrlCheck(value: unknown, fileName: string): UrlCheckConfig {
	if (value === undefined || value === null) {
		return { ...DEFAULT_URL_CHECK };
	}
	if (!isRecord(value)) {
		throw new ConfigError(`${fileName}: "urlCheck" must be a mapping`);
	}

	const enabled = value.enabled ?? DEFAULT_URL_CHECK.enabled;
	if (typeof enabled !== "boolean") {
		throw new ConfigError(`${fileName}: "urlCheck.enabled" must be a boolean`);
	}

	const timeout = value.timeout ?? DEFAULT_URL_CHECK.timeout;
	if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout <= 0) {
		throw new ConfigError(
			`${fileName}: "urlCheck.timeout" must be a positive number of seconds`,
		);
	}

	return { enabled, timeout };
}

/**
 * Accepts `webserver: true` with a top-level `webserverPort`, or
 * `webserver: { enabled, port }`. A port inside the mapping wins.
 */
function parseWebserver(
	value: unknown,
	topLevelPort: unknown,
	fileName: string,
): WebserverConfig {
	let enabled: unknown = DEFAULT_WEBSERVER.enabled;
	let port: unknown = topLevelPort ?? DEFAULT_WEBSERVER.port;

	if (isRecord(value)) {
		enabled = value.enabled ?? DEFAULT_WEBSERVER.enabled;
		port = value.port ?? port;
	} else if (value !== undefined && value !== null) {
		enabled = value;
	}

	if (typeof enabled !== "boolean") {
		throw new ConfigError(`${fileName}: "webserver" must be a boolean`);
	}
	if (
		typeof port !== "number" ||
		!Number.isInteger(port) ||
		port < 1 ||
		port > 65535
	) {
		throw new ConfigError(
			`${fileName}: "webserverPort" must be an integer between 1 and 65535`,
		);
	}

	return { enabled, port };
}
