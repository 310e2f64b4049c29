import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	detectDelimiter,
	listDeckFiles,
	parseCsv,
	parseCsvRecords,
	parseSubdeck,
	readSubdecks,
} from "./CsvDeckReader";
import { CSVFormatError } from "../errors";
import type { DeckConfig } from "../types";

const FIELDS = ["word", "translation", "sentenceAudio"];

describe("detectDelimiter", () => {
	it("finds the first delimiter outside quotes", () => {
		expect(detectDelimiter("word;translation")).toBe(";");
		expect(detectDelimiter("word,translation")).toBe(",");
		expect(detectDelimiter("word\ttranslation")).toBe("\t");
		expect(detectDelimiter('"a,b";c')).toBe(";");
	});

	it("returns null for a single column", () => {
		expect(detectDelimiter("word")).toBeNull();
	});
});

describe("parseCsv", () => {
	it("splits records and values", () => {
		expect(parseCsv("a;b\n1;2\n", ";")).toEqual([
			["a", "b"],
			["1", "2"],
		]);
	});

	it("handles quotes, escaped quotes and embedded line breaks", () => {
		const text = 'a;b\r\n"x;y";"say ""hi"""\r\n"line1\nline2";z\r\n';
		expect(parseCsv(text, ";")).toEqual([
			["a", "b"],
			["x;y", 'say "hi"'],
			["line1\nline2", "z"],
		]);
	});

	it("skips blank lines and strips a byte order mark", () => {
		expect(parseCsv("\uFEFFa;b\n\n1;2\n\n", ";")).toEqual([
			["a", "b"],
			["1", "2"],
		]);
	});

	it("keeps a quote inside an unquoted value literally", () => {
		expect(parseCsv('a;b\nzoll;5" inch\n1;2\n', ";")).toEqual([
			["a", "b"],
			["zoll", '5" inch'],
			["1", "2"],
		]);
	});

	it("appends text after a closing quote to the value", () => {
		expect(parseCsv('"ab"c;d\n', ";")).toEqual([["abc", "d"]]);
	});

	it("records the file line each record starts on", () => {
		const text = 'a;b\r\n\r\n"x\r\ny";1\n\n2;3\n';
		expect(parseCsvRecords(text, ";")).toEqual([
			{ line: 1, values: ["a", "b"] },
			{ line: 3, values: ["x\r\ny", "1"] },
			{ line: 6, values: ["2", "3"] },
		]);
	});

	it("keeps a last record without a trailing newline", () => {
		expect(parseCsv("a;b\n1;", ";")).toEqual([
			["a", "b"],
			["1", ""],
		]);
	});
});

describe("parseSubdeck", () => {
	it("keeps only configured columns regardless of column order", () => {
		const text = [
			"notes;translation;word;extra",
			"n1;dog;perro;x",
			"n2;cat;gato;y",
		].join("\n");

		const subdeck = parseSubdeck("Animals", text, FIELDS, "Animals.csv");

		expect(subdeck.name).toBe("Animals");
		expect(subdeck.notes).toEqual([
			{ row: 2, fields: { translation: "dog", word: "perro" } },
			{ row: 3, fields: { translation: "cat", word: "gato" } },
		]);
	});

	it("matches header names case-sensitively", () => {
		const text = "Word;translation\nperro;dog\n";
		const subdeck = parseSubdeck("A", text, FIELDS, "A.csv");

		expect(subdeck.notes[0]?.fields).toEqual({ translation: "dog" });
	});

	it("rejects a comma-delimited file", () => {
		const text = "word,translation\nperro,dog\n";

		expect(() => parseSubdeck("A", text, FIELDS, "A.csv")).toThrow(
			CSVFormatError,
		);
		expect(() => parseSubdeck("A", text, FIELDS, "A.csv")).toThrow(
			'A.csv, row 1: expected ";" as delimiter but the header uses ","',
		);
	});

	it("rejects a row with a different column count", () => {
		const text = "word;translation\nperro;dog\ngato\n";

		let caught: unknown;
		try {
			parseSubdeck("A", text, FIELDS, "A.csv");
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(CSVFormatError);
		expect(caught).toMatchObject({
			file: "A.csv",
			row: 3,
			message: "A.csv, row 3: expected 2 columns but found 1",
		});
	});

	it("keeps every row when a value contains a stray quote", () => {
		const text = 'word;translation\nzoll;5" inch\nperro;dog\ngato;cat\n';

		expect(parseSubdeck("A", text, FIELDS, "A.csv").notes).toEqual([
			{ row: 2, fields: { word: "zoll", translation: '5" inch' } },
			{ row: 3, fields: { word: "perro", translation: "dog" } },
			{ row: 4, fields: { word: "gato", translation: "cat" } },
		]);
	});

	it("numbers rows by file line across blank lines and line breaks in values", () => {
		const text = 'word;translation\n"el\nperro";dog\n\ngato;cat\n';

		expect(parseSubdeck("A", text, FIELDS, "A.csv").notes).toEqual([
			{ row: 2, fields: { word: "el\nperro", translation: "dog" } },
			{ row: 5, fields: { word: "gato", translation: "cat" } },
		]);
	});

	it("reports the file line of a short row after a blank line", () => {
		const text = "word;translation\n\nperro;dog\ngato\n";

		expect(() => parseSubdeck("A", text, FIELDS, "A.csv")).toThrow(
			"A.csv, row 4: expected 2 columns but found 1",
		);
	});

	it('names both delimiters when another one precedes ";"', () => {
		expect(() => parseSubdeck("A", "a,b;c\n", FIELDS, "A.csv")).toThrow(
			'A.csv, row 1: expected ";" as delimiter but the header uses "," before ";"',
		);
	});

	it("rejects an empty file", () => {
		expect(() => parseSubdeck("A", "", FIELDS, "A.csv")).toThrow(
			"A.csv, row 1: file has no header row",
		);
	});

	it("accepts a header-only file", () => {
		expect(parseSubdeck("A", "word;translation\n", FIELDS, "A.csv").notes).toEqual(
			[],
		);
	});
});

describe("readSubdecks", () => {
	let folder: string;
	const config: DeckConfig = {
		masterDeckName: "Spanish",
		modelName: "spanish-vocab",
		modelNameDescriptive: "Spanish vocabulary",
		fields: FIELDS,
		urlCheck: { enabled: false, timeout: 1 },
		webserver: { enabled: false, port: 1233 },
	};

	beforeEach(async () => {
		folder = await mkdtemp(join(tmpdir(), "deck-csv-"));
		await mkdir(join(folder, "decks"));
	});

	afterEach(async () => {
		await rm(folder, { recursive: true, force: true });
	});

	it("reads one subdeck per CSV file in name order", async () => {
		await writeFile(join(folder, "decks", "B.csv"), "word;translation\ngato;cat\n");
		await writeFile(
			join(folder, "decks", "A.csv"),
			"word;translation\nperro;dog\nvaca;cow\n",
		);
		await writeFile(join(folder, "decks", "notes.txt"), "ignored");

		expect(await listDeckFiles(folder)).toEqual([
			join(folder, "decks", "A.csv"),
			join(folder, "decks", "B.csv"),
		]);

		const subdecks = await readSubdecks(folder, config);
		expect(subdecks.map((s) => s.name)).toEqual(["A", "B"]);
		expect(subdecks[0]?.notes.map((n) => n.fields.word)).toEqual([
			"perro",
			"vaca",
		]);
		expect(subdecks[1]?.notes.map((n) => n.fields.word)).toEqual(["gato"]);
	});
});
