import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { startAssetServer, type RunningAssetServer } from "./AssetServer";

describe("startAssetServer", () => {
	let directory: string;
	let server: RunningAssetServer | null = null;

	beforeEach(async () => {
		directory = await mkdtemp(join(tmpdir(), "deck-assets-"));
		await writeFile(join(directory, "bark.mp3"), "not really audio");
		await writeFile(join(directory, "cat.png"), "not really an image");
	});

	afterEach(async () => {
		await server?.close();
		server = null;
		await rm(directory, { recursive: true, force: true });
	});

	it("serves files by name at the root", async () => {
		server = await startAssetServer({ directory, port: 0, host: "127.0.0.1" });

		const response = await fetch(`http://127.0.0.1:${server.port}/bark.mp3`);
		expect(response.status).toBe(200);
		expect(response.headers.get("content-type")).toBe("audio/mpeg");
		expect(await response.text()).toBe("not really audio");

		const head = await fetch(`http://127.0.0.1:${server.port}/cat.png`, {
			method: "HEAD",
		});
		expect(head.status).toBe(200);
		expect(head.headers.get("content-type")).toBe("image/png");
	});

	it("answers 404 for unknown files and the directory itself", async () => {
		server = await startAssetServer({ directory, port: 0, host: "127.0.0.1" });

		const missing = await fetch(`http://127.0.0.1:${server.port}/nope.mp3`);
		expect(missing.status).toBe(404);

		const root = await fetch(`http://127.0.0.1:${server.port}/`);
		expect(root.status).toBe(404);
	});

	it("rejects when the port is taken", async () => {
		server = await startAssetServer({ directory, port: 0, host: "127.0.0.1" });

		await expect(
			startAssetServer({ directory, port: server.port, host: "127.0.0.1" }),
		).rejects.toThrow(
			`Asset server could not listen on 127.0.0.1:${server.port}`,
		);
	});
});
