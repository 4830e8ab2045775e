import type { LogRecord, RawEvent, RawFields, SourceType } from "../types";
import { logger } from "../utils/logger";
import { resolveCategory } from "./category";
import {
	DEFAULT_SEVERITY,
	isSeverity,
	lookupLabel,
	numberToLabel,
	type Severity,
} from "./severity";
import { NormalizationStats } from "./stats";
import { formatLocalIso, fromEpochMicros, parseTimestamp } from "./timestamps";

export interface NormalizeOptions {
	/** Emit one warning line per degraded field. */
	warnOnErrors?: boolean;
	/** Keep the original field mapping on the record. */
	includeRaw?: boolean;
}

interface FieldLayout {
	priority: readonly string[];
	priorityLabels: boolean;
	realtime: readonly string[];
	timestamp: readonly string[];
	message: readonly string[];
}

const REALTIME_FIELDS = [
	"_SOURCE_REALTIME_TIMESTAMP",
	"__REALTIME_TIMESTAMP",
] as const;

const JOURNAL_LAYOUT: FieldLayout = {
	priority: ["PRIORITY"],
	priorityLabels: false,
	realtime: REALTIME_FIELDS,
	timestamp: [],
	message: ["MESSAGE"],
};

const JSON_LAYOUT: FieldLayout = {
	priority: ["PRIORITY", "priority", "level", "severity"],
	priorityLabels: true,
	realtime: REALTIME_FIELDS,
	timestamp: ["timestamp", "time", "@timestamp", "ts"],
	message: ["MESSAGE", "message", "msg", "log"],
};

const TEXT_LAYOUT: FieldLayout = {
	priority: ["priority"],
	priorityLabels: false,
	realtime: [],
	timestamp: ["timestamp"],
	message: ["message"],
};

const SYSLOG_PRI = /^<(\d{1,3})>/;
const ISO_PREFIX =
	/^(\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?)(?=\s|$)/;

type Resolution<T> =
	| { status: "ok"; value: T }
	| { status: "missing" }
	| { status: "invalid"; input: unknown };

function layoutFor(sourceType: SourceType): FieldLayout {
	switch (sourceType) {
		case "journalctl":
			return JOURNAL_LAYOUT;
		case "file_text":
			return TEXT_LAYOUT;
		default:
			return JSON_LAYOUT;
	}
}

function isAbsent(value: unknown): boolean {
	return value === undefined || value === null || value === "";
}

/**
 * Plain text lines carry no fields, so priority and timestamp come from an
 * optional `<N>` syslog prefix and a leading ISO-8601 token.
 */
function textLineFields(fields: RawFields): Record<string, unknown> {
	const line = fields.line;
	if (typeof line !== "string") {
		return {};
	}

	const derived: Record<string, unknown> = { message: line };
	let rest = line;
	const pri = SYSLOG_PRI.exec(rest);
	if (pri) {
		const code = Number(pri[1]);
		derived.priority = code <= 191 ? code % 8 : code;
		rest = rest.slice(pri[0].length).trimStart();
	}
	const iso = ISO_PREFIX.exec(rest);
	if (iso) {
		derived.timestamp = iso[1];
	}
	return derived;
}

function parsePriority(value: unknown, allowLabels: boolean): Resolution<Severity> {
	if (typeof value === "number") {
		return isSeverity(value)
			? { status: "ok", value }
			: { status: "invalid", input: value };
	}
	if (typeof value === "string") {
		const text = value.trim();
		if (/^-?\d+$/.test(text)) {
			const numeric = Number(text);
			return isSeverity(numeric)
				? { status: "ok", value: numeric }
				: { status: "invalid", input: value };
		}
		const labelled = allowLabels ? lookupLabel(text) : undefined;
		if (labelled !== undefined) {
			return { status: "ok", value: labelled };
		}
	}
	return { status: "invalid", input: value };
}

function resolvePriority(
	fields: RawFields,
	layout: FieldLayout,
): Resolution<Severity> {
	for (const key of layout.priority) {
		const value = fields[key];
		if (!isAbsent(value)) {
			return parsePriority(value, layout.priorityLabels);
		}
	}
	return { status: "missing" };
}

function resolveTimestamp(
	fields: RawFields,
	layout: FieldLayout,
): Resolution<Date> {
	let seen: unknown;
	for (const key of layout.realtime) {
		const value = fields[key];
		if (isAbsent(value)) continue;
		const date = fromEpochMicros(value);
		if (date) return { status: "ok", value: date };
		seen ??= value;
	}
	for (const key of layout.timestamp) {
		const value = fields[key];
		if (isAbsent(value)) continue;
		const date = parseTimestamp(value);
		if (date) return { status: "ok", value: date };
		seen ??= value;
	}
	return seen === undefined
		? { status: "missing" }
		: { status: "invalid", input: seen };
}

function stringifyMessage(value: unknown): string {
	if (typeof value === "string") {
		return value;
	}
	// The journal encodes non-UTF-8 payloads as an array of byte values.
	if (
		Array.isArray(value) &&
		value.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)
	) {
		return Buffer.from(value).toString("utf8");
	}
	if (typeof value === "object") {
		return JSON.stringify(value);
	}
	return String(value);
}

function resolveMessage(
	fields: RawFields,
	layout: FieldLayout,
): Resolution<string> {
	for (const key of layout.message) {
		const value = fields[key];
		if (value !== undefined && value !== null) {
			return { status: "ok", value: stringifyMessage(value) };
		}
	}
	return { status: "missing" };
}

/**
 * Turns raw source events into LogRecords. Never throws: every field that is
 * missing or unusable falls back to a default and is counted on the shared
 * statistics.
 */
export class Normalizer {
	constructor(private readonly stats: NormalizationStats = new NormalizationStats()) {}

	get statistics(): NormalizationStats {
		return this.stats;
	}

	normalize(event: RawEvent, options: NormalizeOptions = {}): LogRecord {
		this.stats.increment("total");
		const warn = options.warnOnErrors === true;
		const layout = layoutFor(event.sourceType);
		const fields =
			event.sourceType === "file_text"
				? textLineFields(event.fields)
				: event.fields;
		const context = { sourceType: event.sourceType, ...event.metadata };

		let severity: Severity = DEFAULT_SEVERITY;
		const priority = resolvePriority(fields, layout);
		if (priority.status === "ok") {
			severity = priority.value;
		} else if (priority.status === "missing") {
			this.stats.increment("missingPriority");
			if (warn) {
				logger.warn("Log entry has no priority, defaulting to INFO", context);
			}
		} else {
			this.stats.increment("invalidPriority");
			if (warn) {
				logger.warn(
					`Invalid priority ${JSON.stringify(priority.input)}, defaulting to INFO`,
					context,
				);
			}
		}

		let timestamp: Date;
		const resolved = resolveTimestamp(fields, layout);
		if (resolved.status === "ok") {
			timestamp = resolved.value;
		} else {
			timestamp = new Date();
			this.stats.increment("missingTimestamp");
			if (warn) {
				logger.warn(
					resolved.status === "missing"
						? "Log entry has no timestamp, using current time"
						: `Unparseable timestamp ${JSON.stringify(resolved.input)}, using current time`,
					context,
				);
			}
		}

		let message = "";
		const text = resolveMessage(fields, layout);
		if (text.status === "ok") {
			message = text.value;
		} else {
			this.stats.increment("missingMessage");
			if (warn) {
				logger.warn("Log entry has no message", context);
			}
		}

		return Object.freeze({
			timestamp: formatLocalIso(timestamp),
			severity,
			severityLabel: numberToLabel(severity),
			message,
			category: resolveCategory(event.fields),
			raw: options.includeRaw ? event.fields : null,
		});
	}
}
