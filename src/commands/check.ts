import type { CommandModule } from "yargs";
import { checkFolder } from "../check/FolderCheck";
import { logger } from "../logger";
import { isInContainer, resolveFolderArg } from "./folder";

interface CheckArgs {
	folder: string;
}

/**
 * Check a deck folder and print what was found.
 * Returns the process exit code.
 */
export async function runCheck(folder: string): Promise<number> {
	logger.info("Checking '%s'", folder);
	const result = await checkFolder(folder);

	for (const warning of result.warnings) {
		logger.warn("[!] %s", warning);
	}
	for (const error of result.errors) {
		logger.error("[X] %s", error);
	}

	if (result.errors.length > 0) {
		logger.error("Check failed with %d error(s)", result.errors.length);
		return 1;
	}
	logger.info("Check passed");
	return 0;
}

const checkCommand: CommandModule<object, CheckArgs> = {
	command: "check <folder>",
	describe: "Validate the folder structure and configuration",
	builder: (yargs) =>
		yargs.positional("folder", {
			type: "string",
			demandOption: true,
			describe: "Deck folder containing config.yaml, card/ and decks/",
		}),
	handler: async (argv) => {
		const folder = resolveFolderArg(argv.folder, await isInContainer());
		process.exitCode = await runCheck(folder);
	},
};

export default checkCommand;
