import type { MediaKind } from "../types";

/**
 * A note type definition: ordered fields plus one front/back template.
 */
export interface ModelSpec {
	modelName: string;
	fields: readonly string[];
	css: string;
	templateName: string;
	front: string;
	back: string;
}

/**
 * Media the remote API downloads by URL and references in `fields`.
 */
export interface MediaAttachment {
	kind: MediaKind;
	url: string;
	filename: string;
	fields: string[];
}

export interface NoteSubmission {
	deckName: string;
	modelName: string;
	fields: Record<string, string>;
	media: MediaAttachment[];
}

/**
 * The remote deck API operations a compile run needs. Implementations throw
 * RemoteAPIError, with `connection` set when the endpoint is unreachable.
 */
export interface DeckApi {
	requestPermission(): Promise<boolean>;
	modelNames(): Promise<string[]>;
	createModel(spec: ModelSpec): Promise<void>;
	createDeck(name: string): Promise<void>;
	/** Returns the id of the created note. */
	addNote(note: NoteSubmission): Promise<number>;
	/** Returns false when the remote side reports the export failed. */
	exportDeck(
		deck: string,
		path: string,
		includeScheduling: boolean,
	): Promise<boolean>;
}
