import { logger } from "../logger";
import type { MediaCheckResult, MediaKind } from "../types";

export type FetchLike = (
	input: string,
	init?: RequestInit,
) => Promise<Response>;

export interface UrlPrecheckerOptions {
	enabled: boolean;
	timeoutSeconds: number;
	fetch?: FetchLike;
}

const CONTENT_TYPE_PREFIX: Record<MediaKind, string> = {
	image: "image/",
	audio: "audio/",
};

/**
 * Probes media URLs with a HEAD request before they are handed to the
 * remote API. Every failure is reported as an invalid result, never thrown.
 */
export class UrlPrechecker {
	private readonly enabled: boolean;
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchLike;

	constructor(options: UrlPrecheckerOptions) {
		this.enabled = options.enabled;
		this.timeoutMs = Math.round(options.timeoutSeconds * 1000);
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
	}

	async check(url: string, kind: MediaKind): Promise<MediaCheckResult> {
		if (!this.enabled) {
			return { status: "skipped" };
		}

		let response: Response;
		try {
			response = await this.fetchImpl(url, {
				method: "HEAD",
				redirect: "follow",
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (error) {
			const reason = this.describeRequestError(error);
			logger.debug("HEAD %s failed: %s", url, reason);
			return { status: "invalid", reason };
		}

		if (!response.ok) {
			return { status: "invalid", reason: `HTTP ${response.status}` };
		}

		const contentType = response.headers.get("content-type");
		const expected = CONTENT_TYPE_PREFIX[kind];
		if (!contentType) {
			return {
				status: "invalid",
				reason: `no content type, expected ${expected}*`,
			};
		}
		if (!contentType.trim().toLowerCase().startsWith(expected)) {
			return {
				status: "invalid",
				reason: `content type "${contentType}" is not ${expected}*`,
			};
		}

		return { status: "valid" };
	}

	private describeRequestError(error: unknown): string {
		if (error instanceof Error) {
			if (error.name === "TimeoutError" || error.name === "AbortError") {
				return `no response within ${this.timeoutMs} ms`;
			}
			// fetch wraps network failures in a TypeError whose cause has the detail
			const cause: unknown = error.cause;
			if (cause instanceof Error && cause.message) {
				return `${error.message} (${cause.message})`;
			}
			return error.message;
		}
		return String(error);
	}
}
