import { compileCriteria, filterLogs, matchesCriteria } from "./core/filter-engine";
import { createDefaultEngine, type FetchOptions } from "./services/log-engine";
import type { LogSource, SourceFactory, SourceParams } from "./sources/source";
import type { Diagnostics, FilterCriteria, LogRecord } from "./types";

/** Process-wide engine with the journal and file sources registered. */
export const engine = createDefaultEngine();

export function fetchLogs(
	source: string | LogSource,
	params?: SourceParams,
	options?: FetchOptions,
): AsyncGenerator<LogRecord, void, undefined> {
	return engine.fetchLogs(source, params, options);
}

export function fetchAndFilterLogs(
	source: string | LogSource,
	params?: SourceParams,
	criteria?: FilterCriteria,
	options?: FetchOptions,
): AsyncGenerator<LogRecord, void, undefined> {
	return engine.fetchAndFilterLogs(source, params, criteria, options);
}

export function getDiagnostics(): Readonly<Diagnostics> {
	return engine.getDiagnostics();
}

export function resetDiagnostics(): void {
	engine.resetDiagnostics();
}

export function registerSource(name: string, factory: SourceFactory): void {
	engine.registerSource(name, factory);
}

export function listSources(): string[] {
	return engine.listSources();
}

export { compileCriteria, filterLogs, matchesCriteria };

export { resolveCategory, UNKNOWN_CATEGORY } from "./core/category";
export {
	InvalidSeverityError,
	NotSupportedError,
	SourceError,
	SourceNotFoundError,
	SourcePermissionError,
} from "./core/errors";
export { Normalizer, type NormalizeOptions } from "./core/normalizer";
export {
	isAtLeastAsSevere,
	isSeverity,
	labelToNumber,
	numberToLabel,
	SEVERITY_LABELS,
	type Severity,
	type SeverityInput,
	type SeverityLabel,
} from "./core/severity";
export { NormalizationStats, ReadStats } from "./core/stats";
export { createDefaultEngine, LogEngine, type FetchOptions } from "./services/log-engine";
export { LogView, type LoadResult, type LogViewOptions } from "./services/log-view";
export {
	FileSource,
	JournalSource,
	SourceRegistry,
	type FileSourceOptions,
	type JournalSourceOptions,
	type LogSource,
	type SourceFactory,
	type SourceParams,
} from "./sources";
export { createRawEvent } from "./types";
export type {
	Diagnostics,
	FilterCriteria,
	LogRecord,
	NormalizationStatistics,
	RawEvent,
	RawFields,
	ReadStatistics,
	SourceDiagnostics,
	SourceType,
} from "./types";
