import type { Severity, SeverityInput, SeverityLabel } from "./core/severity";

export type RawFields = Readonly<Record<string, unknown>>;

export type SourceType = "journalctl" | "file_text" | "file_jsonl" | (string & {});

/**
 * A source-native entry before normalization. Frozen once produced.
 */
export interface RawEvent {
	readonly fields: RawFields;
	readonly sourceType: SourceType;
	readonly metadata: Readonly<Record<string, unknown>>;
}

export interface LogRecord {
	/** ISO-8601 in local time with offset, e.g. 2024-02-15T12:26:40.000+00:00 */
	readonly timestamp: string;
	readonly severity: Severity;
	readonly severityLabel: SeverityLabel;
	readonly message: string;
	readonly category: string;
	readonly raw: RawFields | null;
}

export interface FilterCriteria {
	severity?: SeverityInput;
	minSeverity?: SeverityInput;
	keyword?: string;
	caseSensitive?: boolean;
	searchRaw?: boolean;
	category?: string;
}

export interface ReadStatistics {
	linesRead: number;
	emptyLines: number;
	parseErrors: number;
	eventsYielded: number;
}

export interface NormalizationStatistics {
	total: number;
	missingPriority: number;
	invalidPriority: number;
	missingTimestamp: number;
	missingMessage: number;
}

export interface SourceDiagnostics {
	name: string;
	sourceType: SourceType;
	stats: Readonly<ReadStatistics>;
}

export interface Diagnostics {
	normalization: Readonly<NormalizationStatistics>;
	source: Readonly<SourceDiagnostics> | null;
}

export function createRawEvent(
	sourceType: SourceType,
	fields: Record<string, unknown>,
	metadata: Record<string, unknown> = {},
): RawEvent {
	return Object.freeze({
		fields: Object.freeze({ ...fields }),
		sourceType,
		metadata: Object.freeze({ ...metadata }),
	});
}
