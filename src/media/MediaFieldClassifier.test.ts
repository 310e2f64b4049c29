import { describe, it, expect } from "vitest";
import {
	classifyField,
	isMediaField,
	mediaFilenameFromUrl,
} from "./MediaFieldClassifier";
import { ConfigError } from "../errors";

describe("classifyField", () => {
	it("classifies audio fields by substring", () => {
		expect(classifyField("sentenceAudio")).toBe("audio");
		expect(classifyField("auxilliaryaudio")).toBe("audio");
		expect(classifyField("AUDIO")).toBe("audio");
	});

	it("classifies image fields by substring", () => {
		expect(classifyField("image_fieldX")).toBe("image");
		expect(classifyField("wordImage")).toBe("image");
	});

	it("returns null for plain text fields", () => {
		expect(classifyField("question")).toBeNull();
		expect(classifyField("picture")).toBeNull();
		expect(classifyField("")).toBeNull();
	});

	it("rejects a name containing both tokens", () => {
		expect(() => classifyField("imageAudio")).toThrow(ConfigError);
		expect(() => classifyField("audio_image")).toThrow(
			/both "image" and "audio"/,
		);
	});
});

describe("isMediaField", () => {
	it("is true only for image and audio fields", () => {
		expect(isMediaField("sentenceAudio")).toBe(true);
		expect(isMediaField("image")).toBe(true);
		expect(isMediaField("translation")).toBe(false);
	});
});

describe("mediaFilenameFromUrl", () => {
	it("uses the last path segment", () => {
		expect(mediaFilenameFromUrl("https://cdn.example.com/a/b/cat.png")).toBe(
			"cat.png",
		);
	});

	it("ignores the query string and decodes escapes", () => {
		expect(
			mediaFilenameFromUrl(
				"http://localhost:1233/hola%20mundo.mp3?token=test-secret",
			),
		).toBe("hola mundo.mp3");
	});

	it("falls back when the URL has no file name", () => {
		expect(mediaFilenameFromUrl("https://example.com/")).toBe("media");
	});

	it("handles values that are not absolute URLs", () => {
		expect(mediaFilenameFromUrl("sounds/bark.ogg?x=1")).toBe("bark.ogg");
	});
});
