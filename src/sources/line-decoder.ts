import type { ReadStats } from "../core/stats";
import { logger } from "../utils/logger";

export type DecodedLine =
	| { kind: "event"; fields: Record<string, unknown> }
	| { kind: "empty" }
	| { kind: "malformed"; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeJsonLine(line: string): DecodedLine {
	const text = line.trim();
	if (text === "") {
		return { kind: "empty" };
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		return {
			kind: "malformed",
			reason: error instanceof Error ? error.message : String(error),
		};
	}
	if (!isRecord(parsed)) {
		return { kind: "malformed", reason: "line is not a JSON object" };
	}
	return { kind: "event", fields: parsed };
}

/**
 * Shared JSON-Lines bookkeeping for the journal and jsonl file sources: every
 * line is counted, blank and malformed lines are skipped and counted, and
 * nothing thrown by a single line escapes.
 */
export class LineDecoder {
	constructor(
		private readonly stats: ReadStats,
		private readonly options: { warnOnErrors: boolean; origin: string },
	) {}

	json(line: string): Record<string, unknown> | null {
		this.stats.increment("linesRead");
		const decoded = decodeJsonLine(line);
		switch (decoded.kind) {
			case "empty":
				this.stats.increment("emptyLines");
				return null;
			case "malformed":
				this.stats.increment("parseErrors");
				if (this.options.warnOnErrors) {
					logger.warn("Skipped malformed JSON line", {
						origin: this.options.origin,
						reason: decoded.reason,
						skipped: this.stats.snapshot().parseErrors,
					});
				}
				return null;
			case "event":
				this.stats.increment("eventsYielded");
				return decoded.fields;
		}
	}

	text(line: string): string | null {
		this.stats.increment("linesRead");
		if (line.trim() === "") {
			this.stats.increment("emptyLines");
			return null;
		}
		this.stats.increment("eventsYielded");
		return line;
	}
}
