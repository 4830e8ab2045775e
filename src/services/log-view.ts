import { format, isValid, parseISO } from "date-fns";
import { settings } from "../config/settings";
import { compileCriteria } from "../core/filter-engine";
import type { SeverityInput, SeverityLabel } from "../core/severity";
import { sortableTime } from "../core/timestamps";
import type { LogSource, SourceParams } from "../sources/source";
import type { FilterCriteria, LogRecord } from "../types";
import { logger } from "../utils/logger";
import type { LogEngine } from "./log-engine";

const DISPLAY_PATTERN = "yyyy-MM-dd HH:mm:ss";

const DETAIL_FIELDS = [
	"_SYSTEMD_UNIT",
	"SYSLOG_IDENTIFIER",
	"_COMM",
	"_PID",
	"_UID",
	"_GID",
	"_HOSTNAME",
	"_BOOT_ID",
] as const;

export interface ViewFilters {
	severity?: SeverityInput;
	minSeverity?: SeverityInput;
	keyword?: string;
	caseSensitive: boolean;
	category?: string;
}

export interface LogViewOptions {
	/** Buffer cap; null keeps everything. */
	maxBuffer?: number | null;
}

export interface LoadResult {
	loaded: number;
}

export interface RowSummary {
	time: string;
	severity: SeverityLabel;
	message: string;
}

function displayTime(timestamp: string): string {
	const date = parseISO(timestamp);
	return isValid(date) ? format(date, DISPLAY_PATTERN) : timestamp.slice(0, 19);
}

function newestFirst(a: LogRecord, b: LogRecord): number {
	const ta = sortableTime(a.timestamp);
	const tb = sortableTime(b.timestamp);
	if (Number.isNaN(ta)) return Number.isNaN(tb) ? 0 : 1;
	if (Number.isNaN(tb)) return -1;
	return tb - ta;
}

/**
 * In-memory buffer and view state behind an interactive log browser.
 * Severity and keyword filters are applied while loading; the category
 * filter is applied on read.
 */
export class LogView {
	private records: LogRecord[] = [];
	private readonly maxBuffer: number | null;
	private cap: number | null;

	filters: ViewFilters = { caseSensitive: false };
	follow = false;
	showRaw = false;
	error: string | null = null;

	constructor(
		private readonly engine: LogEngine,
		options: LogViewOptions = {},
	) {
		this.maxBuffer =
			options.maxBuffer === undefined ? settings.view.maxBuffer : options.maxBuffer;
		this.cap = this.maxBuffer;
	}

	get size(): number {
		return this.records.length;
	}

	/**
	 * Replaces the buffer with a fresh fetch. A time range (`since`) loads the
	 * whole window; otherwise the first load is capped at the initial limit.
	 */
	async load(
		source: string | LogSource,
		params: SourceParams = {},
		options: { limit?: number } = {},
	): Promise<LoadResult> {
		const hasRange = typeof params.since === "string" && params.since !== "";
		this.cap = hasRange ? null : this.maxBuffer;
		const requested = options.limit ?? (hasRange ? undefined : settings.view.initialLimit);
		const limit =
			this.cap === null ? requested : Math.min(requested ?? this.cap, this.cap);

		const criteria: FilterCriteria = {
			severity: this.filters.severity,
			minSeverity: this.filters.minSeverity,
			keyword: this.filters.keyword,
			caseSensitive: this.filters.caseSensitive,
		};
		const sourceParams = this.follow ? { ...params, follow: true } : params;

		this.error = null;
		try {
			const loaded: LogRecord[] = [];
			for await (const record of this.engine.fetchAndFilterLogs(
				source,
				sourceParams,
				criteria,
				{ limit, includeRaw: true },
			)) {
				loaded.push(record);
			}
			this.records = loaded;
			return { loaded: loaded.length };
		} catch (error) {
			this.error = error instanceof Error ? error.message : String(error);
			logger.error("Failed to load logs", error, { limit });
			throw error;
		}
	}

	/** Follow-mode intake. Drops the oldest records past the cap. */
	append(records: Iterable<LogRecord>): void {
		for (const record of records) {
			this.records.push(record);
		}
		if (this.cap !== null && this.records.length > this.cap) {
			this.records.splice(0, this.records.length - this.cap);
		}
	}

	clear(): void {
		this.records = [];
	}

	visibleRecords(): LogRecord[] {
		const { category } = this.filters;
		const visible =
			category === undefined
				? [...this.records]
				: this.records.filter(compileCriteria({ category }));
		return visible.sort(newestFirst);
	}

	categories(): string[] {
		return Array.from(new Set(this.records.map((record) => record.category))).sort();
	}

	toggleCategory(category: string): void {
		this.filters = {
			...this.filters,
			category: this.filters.category === category ? undefined : category,
		};
	}

	setFilters(patch: Partial<ViewFilters>): void {
		this.filters = { ...this.filters, ...patch };
	}

	toggleFollow(): boolean {
		this.follow = !this.follow;
		return this.follow;
	}

	toggleRaw(): boolean {
		this.showRaw = !this.showRaw;
		return this.showRaw;
	}

	describe(record: LogRecord): string {
		if (this.showRaw) {
			return JSON.stringify(record.raw ?? {}, null, 2);
		}

		const lines = [
			`Timestamp: ${displayTime(record.timestamp)}`,
			`Severity: ${record.severityLabel} (${record.severity})`,
			`Message:\n${record.message}`,
		];
		const raw = record.raw;
		if (raw && Object.keys(raw).length > 0) {
			lines.push("", "Additional Fields:");
			for (const field of DETAIL_FIELDS) {
				const value = raw[field];
				if (value !== undefined && value !== null && value !== "") {
					lines.push(`  ${field}: ${String(value)}`);
				}
			}
		}
		return lines.join("\n");
	}

	summarizeRow(record: LogRecord): RowSummary {
		const max = settings.view.messagePreviewLength;
		return {
			time: displayTime(record.timestamp),
			severity: record.severityLabel,
			message:
				record.message.length > max
					? `${record.message.slice(0, max)}...`
					: record.message,
		};
	}
}
