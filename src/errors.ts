/**
 * Error taxonomy for a compile run.
 *
 * Configuration and structural errors are raised before any remote call is
 * made. Remote errors carry whether the endpoint itself was unreachable, which
 * is what decides between skipping a note and aborting the run.
 */
export class DeckCompilerError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Missing or invalid configuration document.
 */
export class ConfigError extends DeckCompilerError {}

/**
 * A deck CSV with the wrong delimiter or malformed rows.
 */
export class CSVFormatError extends DeckCompilerError {
	readonly file: string;
	readonly row: number;

	constructor(file: string, row: number, detail: string) {
		super(`${file}, row ${row}: ${detail}`);
		this.file = file;
		this.row = row;
	}
}

/**
 * A failed call to the remote deck API.
 * `connection` is true when the endpoint could not be reached at all.
 */
export class RemoteAPIError extends DeckCompilerError {
	readonly action: string;
	readonly connection: boolean;

	constructor(action: string, detail: string, connection = false) {
		super(`${action} failed: ${detail}`);
		this.action = action;
		this.connection = connection;
	}
}

/**
 * One or more problems found by the folder check.
 */
export class ValidationError extends DeckCompilerError {
	readonly problems: string[];

	constructor(problems: string[]) {
		super(
			`Folder check failed with ${problems.length} error(s):\n` +
				problems.map((p) => `  - ${p}`).join("\n"),
		);
		this.problems = problems;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
