import { YankiConnect } from "yanki-connect";
import { RemoteAPIError, errorMessage } from "../errors";
import { logger } from "../logger";
import type {
	DeckApi,
	MediaAttachment,
	ModelSpec,
	NoteSubmission,
} from "./DeckApi";

export const DEFAULT_ANKI_CONNECT_PORT = 8765;

const CONNECTION_ERROR_CODES = [
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"EHOSTUNREACH",
	"ETIMEDOUT",
	"EAI_AGAIN",
];

/**
 * Split a `<host>:<port>` argument into the protocol-qualified host and port
 * the client expects. `localhost:8765` becomes `http://localhost` and 8765.
 */
export function parseHost(value: string): { host: string; port: number } {
	const withProtocol = /^[a-z][a-z0-9+.-]*:\/\//i.test(value)
		? value
		: `http://${value}`;

	let url: URL;
	try {
		url = new URL(withProtocol);
	} catch {
		throw new RemoteAPIError("connect", `invalid host "${value}"`, true);
	}

	const port = url.port ? Number(url.port) : DEFAULT_ANKI_CONNECT_PORT;
	return { host: `${url.protocol}//${url.hostname}`, port };
}

/**
 * Whether an error means the endpoint could not be reached, as opposed to
 * the remote API rejecting a request.
 */
export function isConnectionError(error: unknown): boolean {
	let current: unknown = error;
	for (let depth = 0; current instanceof Error && depth < 5; depth++) {
		if (current.name === "TypeError" && current.message === "fetch failed") {
			return true;
		}
		const code: unknown = Reflect.get(current, "code");
		const text = `${typeof code === "string" ? code : ""} ${current.message}`;
		if (CONNECTION_ERROR_CODES.some((c) => text.includes(c))) {
			return true;
		}
		current = current.cause;
	}
	return false;
}

function toMediaItems(media: MediaAttachment[]) {
	return media.map(({ url, filename, fields }) => ({ url, filename, fields }));
}

/**
 * DeckApi backed by an AnkiConnect endpoint.
 */
export class AnkiConnectDeckApi implements DeckApi {
	private client: YankiConnect;
	readonly endpoint: string;

	constructor(hostArg: string) {
		const { host, port } = parseHost(hostArg);
		this.endpoint = `${host}:${port}`;
		this.client = new YankiConnect({ host, port });
	}

	private async call<T>(action: string, run: () => Promise<T>): Promise<T> {
		logger.debug("AnkiConnect %s -> %s", action, this.endpoint);
		try {
			return await run();
		} catch (error) {
			if (error instanceof RemoteAPIError) throw error;
			const connection = isConnectionError(error);
			const detail = connection
				? `cannot reach AnkiConnect at ${this.endpoint} (${errorMessage(error)})`
				: errorMessage(error);
			throw new RemoteAPIError(action, detail, connection);
		}
	}

	async requestPermission(): Promise<boolean> {
		const answer = await this.call("requestPermission", () =>
			this.client.miscellaneous.requestPermission(),
		);
		return answer.permission === "granted";
	}

	async modelNames(): Promise<string[]> {
		return this.call("modelNames", () => this.client.model.modelNames());
	}

	async createModel(spec: ModelSpec): Promise<void> {
		await this.call("createModel", () =>
			this.client.model.createModel({
				modelName: spec.modelName,
				inOrderFields: [...spec.fields],
				css: spec.css,
				isCloze: false,
				cardTemplates: [
					{
						Name: spec.templateName,
						Front: spec.front,
						Back: spec.back,
					},
				],
			}),
		);
	}

	async createDeck(name: string): Promise<void> {
		await this.call("createDeck", () =>
			this.client.deck.createDeck({ deck: name }),
		);
	}

	async addNote(note: NoteSubmission): Promise<number> {
		const pictures = note.media.filter((m) => m.kind === "image");
		const audio = note.media.filter((m) => m.kind === "audio");

		const id = await this.call("addNote", () =>
			this.client.note.addNote({
				note: {
					deckName: note.deckName,
					modelName: note.modelName,
					fields: note.fields,
					...(pictures.length > 0 && { picture: toMediaItems(pictures) }),
					...(audio.length > 0 && { audio: toMediaItems(audio) }),
				},
			}),
		);
		if (id === null) {
			throw new RemoteAPIError("addNote", "note was not created");
		}
		return id;
	}

	async exportDeck(
		deck: string,
		path: string,
		includeScheduling: boolean,
	): Promise<boolean> {
		return this.call("exportPackage", () =>
			this.client.miscellaneous.exportPackage({
				deck,
				path,
				includeSched: includeScheduling,
			}),
		);
	}
}
