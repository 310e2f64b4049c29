import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import assembleCommand from "./commands/assemble";
import checkCommand from "./commands/check";
import { errorMessage } from "./errors";
import { logger } from "./logger";

yargs(hideBin(process.argv))
	.command(checkCommand)
	.command(assembleCommand)
	.scriptName("deck-compiler")
	.demandCommand(1, "You must provide a valid command.")
	.strict()
	.help()
	.alias("h", "help")
	.version(false)
	.parseAsync()
	.catch((error: unknown) => {
		logger.error("[X] %s", errorMessage(error));
		process.exitCode = 1;
	});
