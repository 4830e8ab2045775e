import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { errorBody, statusForError } from "./api/errors";
import { diagnosticsRoutes } from "./api/routes/diagnostics";
import { healthRoutes } from "./api/routes/health";
import { logRoutes } from "./api/routes/logs";
import type { LogEngine } from "./services/log-engine";
import { logger } from "./utils/logger";

export function createApp(engine: LogEngine): Hono {
	const app = new Hono();

	app.onError((err, c) => {
		if (err instanceof HTTPException) {
			return err.getResponse();
		}
		const status = statusForError(err);
		if (status === 500) {
			logger.error("Unhandled request error", err, { path: c.req.path });
		} else {
			logger.warn("Request failed", {
				path: c.req.path,
				status,
				error: err.message,
			});
		}
		return c.json(errorBody(err), status);
	});

	app.notFound((c) => c.json({ error: "not_found" }, 404));

	app.use("*", async (c, next) => {
		c.set("logEngine", engine);
		await next();
	});

	app.route("/", healthRoutes);
	app.route("/", logRoutes);
	app.route("/", diagnosticsRoutes);

	return app;
}
