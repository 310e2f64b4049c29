import { RemoteAPIError, errorMessage } from "../errors";
import { logger } from "../logger";
import {
	classifyField,
	mediaFilenameFromUrl,
} from "../media/MediaFieldClassifier";
import type { UrlPrechecker } from "../media/UrlPrechecker";
import {
	subdeckName,
	type AssemblyReport,
	type CardTemplates,
	type DeckConfig,
	type DroppedMedia,
	type NoteRecord,
	type Subdeck,
} from "../types";
import type { DeckApi, MediaAttachment, NoteSubmission } from "./DeckApi";

export interface AssembleOptions {
	config: DeckConfig;
	templates: CardTemplates;
	subdecks: Subdeck[];
	exportPath: string;
	includeScheduling?: boolean;
}

/**
 * Drives the remote deck API: model, decks, notes, then the export.
 *
 * Model and deck failures abort the run. A failed note is recorded and the
 * run continues, unless the endpoint became unreachable.
 */
export class DeckAssembler {
	private api: DeckApi;
	private prechecker: UrlPrechecker;

	constructor(api: DeckApi, prechecker: UrlPrechecker) {
		this.api = api;
		this.prechecker = prechecker;
	}

	async assemble(options: AssembleOptions): Promise<AssemblyReport> {
		const { config, templates, subdecks, exportPath } = options;
		const report: AssemblyReport = {
			modelCreated: false,
			decks: [],
			notesCreated: 0,
			failures: [],
			droppedMedia: [],
			exportPath,
		};

		logger.info("Checking for AnkiConnect permissions...");
		if (!(await this.api.requestPermission())) {
			throw new RemoteAPIError(
				"requestPermission",
				"AnkiConnect does not grant permissions to this client",
			);
		}

		report.modelCreated = await this.ensureModel(config, templates);

		await this.api.createDeck(config.masterDeckName);
		report.decks.push(config.masterDeckName);
		for (const subdeck of subdecks) {
			const name = subdeckName(config.masterDeckName, subdeck.name);
			await this.api.createDeck(name);
			report.decks.push(name);
		}

		for (const subdeck of subdecks) {
			const deckName = subdeckName(config.masterDeckName, subdeck.name);
			logger.info(
				"Processing deck %s (%d notes)",
				deckName,
				subdeck.notes.length,
			);

			for (const note of subdeck.notes) {
				const submission = await this.buildSubmission(
					config,
					deckName,
					subdeck.name,
					note,
					report.droppedMedia,
				);

				try {
					await this.api.addNote(submission);
					report.notesCreated++;
				} catch (error) {
					if (error instanceof RemoteAPIError && error.connection) {
						throw error;
					}
					const message = errorMessage(error);
					logger.warn(
						"%s row %d: note not created: %s",
						subdeck.sourcePath,
						note.row,
						message,
					);
					report.failures.push({
						subdeck: subdeck.name,
						row: note.row,
						message,
					});
				}
			}
		}

		logger.info("Exporting deck to '%s'", exportPath);
		const exported = await this.api.exportDeck(
			config.masterDeckName,
			exportPath,
			options.includeScheduling ?? false,
		);
		if (!exported) {
			throw new RemoteAPIError(
				"exportPackage",
				`could not export "${config.masterDeckName}" to ${exportPath}`,
			);
		}

		return report;
	}

	/**
	 * Create the note model unless one with the configured name exists.
	 * Returns whether it was created.
	 */
	private async ensureModel(
		config: DeckConfig,
		templates: CardTemplates,
	): Promise<boolean> {
		const existing = await this.api.modelNames();
		if (existing.includes(config.modelName)) {
			logger.info("Model %s already exists", config.modelName);
			return false;
		}

		logger.info("Creating model %s", config.modelName);
		await this.api.createModel({
			modelName: config.modelName,
			fields: config.fields,
			css: templates.css,
			templateName: config.modelNameDescriptive,
			front: templates.front,
			back: templates.back,
		});
		return true;
	}

	/**
	 * Map a note record to a submission. Media fields become URL downloads
	 * with an empty field value; media that fails the precheck is dropped.
	 */
	private async buildSubmission(
		config: DeckConfig,
		deckName: string,
		subdeck: string,
		note: NoteRecord,
		dropped: DroppedMedia[],
	): Promise<NoteSubmission> {
		const fields: Record<string, string> = {};
		const media: MediaAttachment[] = [];

		for (const [field, value] of Object.entries(note.fields)) {
			const kind = classifyField(field);
			const url = value.trim();
			if (kind === null || url === "") {
				fields[field] = value;
				continue;
			}

			const result = await this.prechecker.check(url, kind);
			if (result.status === "invalid") {
				logger.warn(
					"%s row %d: dropping %s '%s': %s",
					subdeck,
					note.row,
					field,
					url,
					result.reason,
				);
				dropped.push({
					subdeck,
					row: note.row,
					field,
					url,
					reason: result.reason,
				});
				continue;
			}

			fields[field] = "";
			media.push({
				kind,
				url,
				filename: mediaFilenameFromUrl(url),
				fields: [field],
			});
		}

		return {
			deckName,
			modelName: config.modelName,
			fields,
			media,
		};
	}
}
