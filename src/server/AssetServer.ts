import express from "express";
import type { Server } from "node:http";
import { logger } from "../logger";

export const ASSETS_DIR = "assets";

export interface AssetServerOptions {
	directory: string;
	port: number;
	host?: string;
}

export interface RunningAssetServer {
	port: number;
	close(): Promise<void>;
}

/**
 * Serve the files of an assets directory by file name at the server root,
 * so the remote API can download them while notes are created.
 * Resolves once the server is listening.
 */
export function startAssetServer(
	options: AssetServerOptions,
): Promise<RunningAssetServer> {
	const host = options.host ?? "0.0.0.0";
	const app = express();
	app.disable("x-powered-by");
	app.use(express.static(options.directory, { index: false, dotfiles: "ignore" }));

	return new Promise((resolve, reject) => {
		const server: Server = app.listen(options.port, host);

		const onError = (error: Error) => {
			reject(
				new Error(
					`Asset server could not listen on ${host}:${options.port}: ${error.message}`,
				),
			);
		};

		server.once("error", onError);
		server.once("listening", () => {
			server.off("error", onError);
			const address = server.address();
			const port =
				typeof address === "object" && address !== null
					? address.port
					: options.port;
			logger.info(
				"Serving %s on http://%s:%d",
				options.directory,
				host,
				port,
			);
			resolve({
				port,
				close: () => closeServer(server),
			});
		});
	});
}

function closeServer(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close((error) => {
			if (error) {
				reject(error);
				return;
			}
			logger.debug("Asset server stopped");
			resolve();
		});
		server.closeAllConnections();
	});
}
