import { Hono } from "hono";

const app = new Hono();
const SERVICE_NAME = "loglens";
const SERVICE_VERSION = "0.2.0";

app.get("/", (c) => {
	return c.json({
		status: "ok",
		service: SERVICE_NAME,
		version: SERVICE_VERSION,
	});
});

app.get("/health", (c) => {
	return c.json({
		status: "healthy",
		version: SERVICE_VERSION,
		timestamp: new Date().toISOString(),
	});
});

export const healthRoutes = app;
