import { Hono } from "hono";
import { stream } from "hono/streaming";
import { z } from "zod";
import { settings } from "../../config/settings";
import type { LogEngine } from "../../services/log-engine";
import type { SourceParams } from "../../sources/source";
import type { FilterCriteria, LogRecord } from "../../types";
import { logger } from "../../utils/logger";
import { errorBody } from "../errors";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		logEngine: LogEngine;
	}
}

const BooleanFlag = z
	.enum(["true", "false", "1", "0"])
	.transform((value) => value === "true" || value === "1");

const LogsQuerySchema = z.object({
	source: z.string().min(1).default(settings.engine.defaultSource),
	since: z.string().min(1).optional(),
	until: z.string().min(1).optional(),
	priority: z.string().min(1).optional(),
	path: z.string().min(1).optional(),
	mode: z.enum(["text", "jsonl"]).optional(),
	encoding: z.string().min(1).optional(),
	severity: z.string().min(1).optional(),
	min_severity: z.string().min(1).optional(),
	keyword: z.string().optional(),
	case_sensitive: BooleanFlag.optional(),
	search_raw: BooleanFlag.optional(),
	category: z.string().min(1).optional(),
	limit: z.coerce.number().int().min(0).optional(),
	include_raw: BooleanFlag.optional(),
	follow: BooleanFlag.optional(),
});

type LogsQuery = z.output<typeof LogsQuerySchema>;

/** Only the parameters the caller actually set reach the source. */
function sourceParams(query: LogsQuery, units: string[]): SourceParams {
	const params: SourceParams = {};
	const entries: [string, unknown][] = [
		["since", query.since],
		["until", query.until],
		["priority", query.priority],
		["path", query.path],
		["mode", query.mode],
		["encoding", query.encoding],
		["follow", query.follow],
	];
	for (const [key, value] of entries) {
		if (value !== undefined) params[key] = value;
	}
	if (units.length > 0) params.units = units;
	return params;
}

function criteria(query: LogsQuery): FilterCriteria {
	return {
		severity: query.severity,
		minSeverity: query.min_severity,
		keyword: query.keyword,
		caseSensitive: query.case_sensitive,
		searchRaw: query.search_raw,
		category: query.category,
	};
}

app.get("/logs", async (c) => {
	const result = LogsQuerySchema.omit({ follow: true }).safeParse(c.req.query());
	if (!result.success) {
		return c.json({ error: "Invalid query", details: result.error }, 400);
	}

	const engine = c.get("logEngine");
	const query = result.data;
	const records: LogRecord[] = [];
	for await (const record of engine.fetchAndFilterLogs(
		query.source,
		sourceParams(query, c.req.queries("unit") ?? []),
		criteria(query),
		{
			limit: query.limit ?? settings.server.defaultLimit,
			includeRaw: query.include_raw ?? false,
		},
	)) {
		records.push(record);
	}

	return c.json({ count: records.length, records });
});

app.get("/logs/stream", (c) => {
	const result = LogsQuerySchema.safeParse(c.req.query());
	if (!result.success) {
		return c.json({ error: "Invalid query", details: result.error }, 400);
	}

	const engine = c.get("logEngine");
	const query = result.data;
	const controller = new AbortController();
	// Construction errors (unknown source, bad parameters) surface before the
	// response starts, so they still get a proper status.
	const records = engine.fetchAndFilterLogs(
		query.source,
		sourceParams(query, c.req.queries("unit") ?? []),
		criteria(query),
		{
			limit: query.limit,
			includeRaw: query.include_raw ?? false,
			signal: controller.signal,
		},
	);

	c.header("Content-Type", "application/x-ndjson");
	return stream(c, async (s) => {
		s.onAbort(() => {
			logger.debug("Log stream client disconnected", { source: query.source });
			controller.abort();
		});

		try {
			for await (const record of records) {
				await s.writeln(JSON.stringify(record));
			}
		} catch (error) {
			logger.error("Log stream failed", error, { source: query.source });
			await s.writeln(JSON.stringify(errorBody(error)));
		}
	});
});

export const logRoutes = app;
