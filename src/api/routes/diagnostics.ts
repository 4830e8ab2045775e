import { Hono } from "hono";
import type { LogEngine } from "../../services/log-engine";
import { logger } from "../../utils/logger";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		logEngine: LogEngine;
	}
}

app.get("/sources", (c) => {
	const engine = c.get("logEngine");
	return c.json({ sources: engine.listSources() });
});

app.get("/diagnostics", (c) => {
	const engine = c.get("logEngine");
	return c.json(engine.getDiagnostics());
});

app.post("/diagnostics/reset", (c) => {
	const engine = c.get("logEngine");
	engine.resetDiagnostics();
	logger.info("Normalization statistics reset");
	return c.json({ status: "ok", diagnostics: engine.getDiagnostics() });
});

export const diagnosticsRoutes = app;
