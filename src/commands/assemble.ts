import { join } from "node:path";
import type { CommandModule } from "yargs";
import { AnkiConnectDeckApi } from "../anki/AnkiConnectDeckApi";
import type { DeckApi } from "../anki/DeckApi";
import { DeckAssembler } from "../anki/DeckAssembler";
import { assertFolderValid, readCardTemplates } from "../check/FolderCheck";
import { loadDeckConfig } from "../config/ConfigLoader";
import { readSubdecks } from "../decks/CsvDeckReader";
import { DeckCompilerError, errorMessage } from "../errors";
import { logger } from "../logger";
import { UrlPrechecker } from "../media/UrlPrechecker";
import {
	ASSETS_DIR,
	startAssetServer,
	type RunningAssetServer,
} from "../server/AssetServer";
import type { AssemblyReport } from "../types";
import { isInContainer, resolveFolderArg } from "./folder";

export const DEFAULT_EXPORT_PATH = "anki.apkg";
export const DEFAULT_HOST = "localhost:8765";

export interface AssembleRunOptions {
	folder: string;
	exportPath: string;
	host: string;
	includeScheduling: boolean;
}

export interface AssembleDependencies {
	createApi: (host: string) => DeckApi;
	/** Host the asset server binds to; 0.0.0.0 unless overridden. */
	assetHost?: string;
}

const defaultDependencies: AssembleDependencies = {
	createApi: (host) => new AnkiConnectDeckApi(host),
};

function printSummary(report: AssemblyReport): void {
	logger.info(
		"Created %d note(s) in %d subdeck(s)",
		report.notesCreated,
		report.decks.length - 1,
	);
	if (report.droppedMedia.length > 0) {
		logger.warn("%d media reference(s) dropped:", report.droppedMedia.length);
		for (const media of report.droppedMedia) {
			logger.warn(
				"  %s row %d, %s: %s (%s)",
				media.subdeck,
				media.row,
				media.field,
				media.url,
				media.reason,
			);
		}
	}
	if (report.failures.length > 0) {
		logger.warn("%d note(s) were not created:", report.failures.length);
		for (const failure of report.failures) {
			logger.warn(
				"  %s row %d: %s",
				failure.subdeck,
				failure.row,
				failure.message,
			);
		}
	}
	logger.info("Deck exported to '%s'", report.exportPath);
}

/**
 * Check the folder, then build and export the deck.
 * Returns the process exit code.
 */
export async function runAssemble(
	options: AssembleRunOptions,
	deps: AssembleDependencies = defaultDependencies,
): Promise<number> {
	if (!options.exportPath.toLowerCase().endsWith(".apkg")) {
		logger.error("[X] Export path '%s' is not an .apkg file", options.exportPath);
		return 1;
	}

	logger.info(
		"Rendering '%s' to '%s' with AnkiConnect at '%s'",
		options.folder,
		options.exportPath,
		options.host,
	);

	let server: RunningAssetServer | null = null;
	try {
		const { warnings } = await assertFolderValid(options.folder);
		for (const warning of warnings) {
			logger.warn("[!] %s", warning);
		}

		const config = await loadDeckConfig(options.folder);
		const templates = await readCardTemplates(options.folder);
		const subdecks = await readSubdecks(options.folder, config);

		if (config.webserver.enabled) {
			server = await startAssetServer({
				directory: join(options.folder, ASSETS_DIR),
				port: config.webserver.port,
				host: deps.assetHost,
			});
		}

		const assembler = new DeckAssembler(
			deps.createApi(options.host),
			new UrlPrechecker({
				enabled: config.urlCheck.enabled,
				timeoutSeconds: config.urlCheck.timeout,
			}),
		);
		const report = await assembler.assemble({
			config,
			templates,
			subdecks,
			exportPath: options.exportPath,
			includeScheduling: options.includeScheduling,
		});

		printSummary(report);
		logger.info("All done.");
		return 0;
	} catch (error) {
		if (error instanceof DeckCompilerError) {
			logger.error("[X] %s", error.message);
		} else {
			logger.error("[X] Unexpected error: %s", errorMessage(error));
			if (error instanceof Error && error.stack) {
				logger.debug("%s", error.stack);
			}
		}
		return 1;
	} finally {
		await server?.close();
	}
}

interface AssembleArgs {
	folder: string;
	export_path: string;
	host: string;
	"include-scheduling": boolean;
}

const assembleCommand: CommandModule<object, AssembleArgs> = {
	command: "assemble <folder> [export_path] [host]",
	describe: "Build the deck through AnkiConnect and export it",
	builder: (yargs) =>
		yargs
			.positional("folder", {
				type: "string",
				demandOption: true,
				describe: "Deck folder containing config.yaml, card/ and decks/",
			})
			.positional("export_path", {
				type: "string",
				default: DEFAULT_EXPORT_PATH,
				describe: "Path of the exported .apkg, as seen by Anki",
			})
			.positional("host", {
				type: "string",
				default: DEFAULT_HOST,
				describe: "AnkiConnect <host>:<port>",
			})
			.option("include-scheduling", {
				type: "boolean",
				default: false,
				describe: "Include scheduling information in the export",
			}),
	handler: async (argv) => {
		const folder = resolveFolderArg(argv.folder, await isInContainer());
		process.exitCode = await runAssemble({
			folder,
			exportPath: argv.export_path,
			host: argv.host,
			includeScheduling: argv["include-scheduling"],
		});
	},
};

export default assembleCommand;
