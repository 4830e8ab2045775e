import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { settings } from "./config/settings";
import { createDefaultEngine } from "./services/log-engine";
import { logger } from "./utils/logger";

const engine = createDefaultEngine();
const app = createApp(engine);

function startServer() {
	const port = settings.server.port;
	const host = settings.server.host;

	logger.info("Starting server", { host, port, sources: engine.listSources() });

	const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
		logger.info("Server running", { address: info.address, port: info.port });
	});

	const shutdown = (signal: string) => {
		logger.info("Shutting down gracefully", { signal });
		server.close();
		process.exit(0);
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
}

startServer();

export { app, engine };
