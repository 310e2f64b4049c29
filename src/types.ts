/**
 * Media kinds a note field can carry. The remote API downloads the file
 * from the field's URL and writes the reference into the field.
 */
export type MediaKind = "image" | "audio";

/**
 * URL precheck settings.
 */
export interface UrlCheckConfig {
	enabled: boolean;
	timeout: number; // seconds
}

/**
 * Local asset server settings.
 */
export interface WebserverConfig {
	enabled: boolean;
	port: number;
}

/**
 * Deck configuration, loaded once from config.yaml.
 *
 * Example:
 * ```yaml
 * masterDeckName: Spanish
 * modelName: spanish-vocab
 * modelNameDescriptive: Spanish vocabulary
 * fields: [word, translation, sentenceAudio, image]
 * urlCheck:
 *   enabled: true
 *   timeout: 2
 * webserver: true
 * webserverPort: 1233
 * ```
 */
export interface DeckConfig {
	readonly masterDeckName: string;
	readonly modelName: string;
	readonly modelNameDescriptive: string;
	readonly fields: readonly string[];
	readonly urlCheck: Readonly<UrlCheckConfig>;
	readonly webserver: Readonly<WebserverConfig>;
}

export const DEFAULT_URL_CHECK: UrlCheckConfig = {
	enabled: true,
	timeout: 1,
};

export const DEFAULT_WEBSERVER: WebserverConfig = {
	enabled: false,
	port: 1233,
};

/**
 * Card template sources read from the folder's card/ directory.
 */
export interface CardTemplates {
	front: string;
	back: string;
	css: string;
}

/**
 * One CSV data row reduced to the configured fields.
 */
export interface NoteRecord {
	row: number; // row in the CSV file, the header is row 1
	fields: Record<string, string>;
}

/**
 * A subdeck built from one CSV file.
 */
export interface Subdeck {
	name: string; // file name without extension
	sourcePath: string;
	notes: NoteRecord[];
}

/**
 * Outcome of probing a media URL before it is handed to the remote API.
 */
export type MediaCheckResult =
	| { status: "valid" }
	| { status: "invalid"; reason: string }
	| { status: "skipped" };

export interface NoteFailure {
	subdeck: string;
	row: number;
	message: string;
}

export interface DroppedMedia {
	subdeck: string;
	row: number;
	field: string;
	url: string;
	reason: string;
}

/**
 * Summary of an assemble run.
 */
export interface AssemblyReport {
	modelCreated: boolean;
	decks: string[];
	notesCreated: number;
	failures: NoteFailure[];
	droppedMedia: DroppedMedia[];
	exportPath: string;
}

/**
 * Remote deck name of a subdeck, `master::sub`.
 */
export function subdeckName(masterDeckName: string, subdeck: string): string {
	return `${masterDeckName}::${subdeck}`;
}
