import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { CSVFormatError } from "../errors";
import { logger } from "../logger";
import type { DeckConfig, NoteRecord, Subdeck } from "../types";

export const DECKS_DIR = "decks";
export const CSV_DELIMITER = ";";

const BOM = "\uFEFF";
const CANDIDATE_DELIMITERS: readonly string[] = [";", ",", "\t", "|"];

function describeDelimiter(delimiter: string): string {
	return delimiter === "\t" ? "tab" : `"${delimiter}"`;
}

/**
 * Candidate delimiters that occur outside quotes in a header line, in order
 * of first appearance.
 */
function headerDelimiters(headerLine: string): string[] {
	const found: string[] = [];
	let inQuotes = false;
	for (const char of headerLine) {
		if (char === '"') {
			inQuotes = !inQuotes;
			continue;
		}
		if (
			!inQuotes &&
			CANDIDATE_DELIMITERS.includes(char) &&
			!found.includes(char)
		) {
			found.push(char);
		}
	}
	return found;
}

/**
 * Find the delimiter used in a header line: the first candidate that occurs
 * outside quotes. Returns null for a single-column header.
 */
export function detectDelimiter(headerLine: string): string | null {
	return headerDelimiters(headerLine)[0] ?? null;
}

export interface CsvRecord {
	/** Line of the file the record starts on, 1-based. */
	line: number;
	values: string[];
}

/**
 * Split CSV text into records. Supports quoted values with doubled quotes,
 * delimiters and line breaks inside quotes, and CRLF line endings.
 * A quote opens a quoted value only as the first character of a value;
 * anywhere else it is kept literally. Blank lines are skipped.
 */
export function parseCsvRecords(text: string, delimiter: string): CsvRecord[] {
	const source = text.startsWith(BOM) ? text.slice(1) : text;
	const records: CsvRecord[] = [];
	let record: string[] = [];
	let value = "";
	let inQuotes = false;
	let valueQuoted = false;
	let recordHasContent = false;
	let line = 1;
	let recordLine = 1;

	const endRecord = () => {
		record.push(value);
		if (recordHasContent || record.length > 1 || value !== "") {
			records.push({ line: recordLine, values: record });
		}
		record = [];
		value = "";
		valueQuoted = false;
		recordHasContent = false;
	};

	for (let i = 0; i < source.length; i++) {
		const char = source[i];

		if (inQuotes) {
			if (char === '"') {
				if (source[i + 1] === '"') {
					value += '"';
					i++;
				} else {
					inQuotes = false;
				}
			} else {
				if (char === "\n" || (char === "\r" && source[i + 1] !== "\n")) {
					line++;
				}
				value += char;
			}
			continue;
		}

		if (char === '"' && value === "" && !valueQuoted) {
			inQuotes = true;
			valueQuoted = true;
			recordHasContent = true;
		} else if (char === delimiter) {
			record.push(value);
			value = "";
			valueQuoted = false;
		} else if (char === "\n" || char === "\r") {
			if (char === "\r" && source[i + 1] === "\n") {
				i++;
			}
			endRecord();
			line++;
			recordLine = line;
		} else {
			value += char;
		}
	}

	if (value !== "" || record.length > 0 || recordHasContent) {
		endRecord();
	}

	return records;
}

/**
 * Values of each record of CSV text; see {@link parseCsvRecords}.
 */
export function parseCsv(text: string, delimiter: string): string[][] {
	return parseCsvRecords(text, delimiter).map((record) => record.values);
}

function firstLine(text: string): string {
	const source = text.startsWith(BOM) ? text.slice(1) : text;
	return source.split(/\r?\n/, 1)[0] ?? "";
}

/**
 * Column names of a `;`-delimited CSV text.
 */
export function parseHeader(text: string): string[] {
	return parseCsv(text, CSV_DELIMITER)[0] ?? [];
}

/**
 * Build a subdeck from CSV text. Each data row keeps only the columns whose
 * header equals a configured field name; other columns are ignored.
 *
 * @param file Shown in error messages
 * @throws CSVFormatError on a wrong delimiter, an empty file, or a row whose
 * column count differs from the header's
 */
export function parseSubdeck(
	name: string,
	text: string,
	fields: readonly string[],
	file: string,
): Subdeck {
	const header = firstLine(text);
	if (header.trim() === "") {
		throw new CSVFormatError(file, 1, "file has no header row");
	}

	const [detected, ...others] = headerDelimiters(header);
	if (detected !== undefined && detected !== CSV_DELIMITER) {
		const alsoFound = others.includes(CSV_DELIMITER)
			? ` before ${describeDelimiter(CSV_DELIMITER)}`
			: "";
		throw new CSVFormatError(
			file,
			1,
			`expected ${describeDelimiter(CSV_DELIMITER)} as delimiter but the header uses ${describeDelimiter(detected)}${alsoFound}`,
		);
	}

	const [headerRecord, ...rows] = parseCsvRecords(text, CSV_DELIMITER);
	const columns = headerRecord?.values ?? [];
	const wanted = new Set(fields);
	const kept = columns
		.map((column, index) => ({ column, index }))
		.filter(({ column }) => wanted.has(column));

	const notes: NoteRecord[] = rows.map(({ line: row, values }) => {
		if (values.length !== columns.length) {
			throw new CSVFormatError(
				file,
				row,
				`expected ${columns.length} columns but found ${values.length}`,
			);
		}

		const noteFields: Record<string, string> = {};
		for (const { column, index } of kept) {
			noteFields[column] = values[index] ?? "";
		}
		return { row, fields: noteFields };
	});

	return { name, sourcePath: file, notes };
}

/**
 * CSV files under <folder>/decks, sorted by file name.
 */
export async function listDeckFiles(folder: string): Promise<string[]> {
	const dir = join(folder, DECKS_DIR);
	const entries = await readdir(dir, { withFileTypes: true });
	return entries
		.filter(
			(entry) =>
				entry.isFile() && extname(entry.name).toLowerCase() === ".csv",
		)
		.map((entry) => entry.name)
		.sort((a, b) => a.localeCompare(b))
		.map((name) => join(dir, name));
}

/**
 * Read one CSV file as a subdeck named after the file.
 */
export async function readSubdeck(
	path: string,
	fields: readonly string[],
): Promise<Subdeck> {
	const text = await readFile(path, "utf-8");
	const name = basename(path, extname(path));
	const subdeck = parseSubdeck(name, text, fields, path);
	logger.debug("Read %d notes from %s", subdeck.notes.length, path);
	return subdeck;
}

/**
 * Read every subdeck of a folder, in file name order.
 */
export async function readSubdecks(
	folder: string,
	config: DeckConfig,
): Promise<Subdeck[]> {
	const subdecks: Subdeck[] = [];
	for (const path of await listDeckFiles(folder)) {
		subdecks.push(await readSubdeck(path, config.fields));
	}
	return subdecks;
}
