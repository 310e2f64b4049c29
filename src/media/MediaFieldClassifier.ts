import { ConfigError } from "../errors";
import type { MediaKind } from "../types";

const IMAGE_TOKEN = "image";
const AUDIO_TOKEN = "audio";
const FALLBACK_FILENAME = "media";

/**
 * Classify a field name as an image field, an audio field, or neither.
 * Matching is a case-insensitive substring test, so `auxilliaryaudio`
 * counts as audio.
 *
 * @throws ConfigError when the name contains both tokens
 */
export function classifyField(name: string): MediaKind | null {
	const lower = name.toLowerCase();
	const isImage = lower.includes(IMAGE_TOKEN);
	const isAudio = lower.includes(AUDIO_TOKEN);

	if (isImage && isAudio) {
		throw new ConfigError(
			`Field "${name}" contains both "${IMAGE_TOKEN}" and "${AUDIO_TOKEN}"; rename it so its media kind is unambiguous`,
		);
	}
	if (isImage) return "image";
	if (isAudio) return "audio";
	return null;
}

export function isMediaField(name: string): boolean {
	return classifyField(name) !== null;
}

/**
 * File name the remote API stores downloaded media under:
 * the decoded last path segment of the URL.
 */
export function mediaFilenameFromUrl(url: string): string {
	let pathname: string;
	try {
		pathname = new URL(url).pathname;
	} catch {
		pathname = url.split(/[?#]/)[0] ?? "";
	}

	const segment = pathname.split("/").pop() ?? "";
	return decodeSegment(segment).trim() || FALLBACK_FILENAME;
}

function decodeSegment(segment: string): string {
	try {
		return decodeURIComponent(segment);
	} catch {
		// Malformed escapes are kept as written
		return segment;
	}
}
