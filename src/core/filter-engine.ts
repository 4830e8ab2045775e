import { settings } from "../config/settings";
import type { FilterCriteria, LogRecord } from "../types";
import { isAtLeastAsSevere, labelToNumber } from "./severity";

export type RecordPredicate = (record: LogRecord) => boolean;

/**
 * Validates the criteria once and returns the per-record test. Unset criteria
 * are skipped; the rest are ANDed in a fixed order: exact severity, minimum
 * severity, keyword, category.
 */
export function compileCriteria(criteria: FilterCriteria = {}): RecordPredicate {
	const checks: RecordPredicate[] = [];

	if (criteria.severity !== undefined) {
		const exact = labelToNumber(criteria.severity);
		checks.push((record) => record.severity === exact);
	}

	if (criteria.minSeverity !== undefined) {
		const threshold = labelToNumber(criteria.minSeverity);
		checks.push((record) => isAtLeastAsSevere(record.severity, threshold));
	}

	if (criteria.keyword !== undefined && criteria.keyword !== "") {
		const caseSensitive = criteria.caseSensitive === true;
		const searchRaw = criteria.searchRaw ?? settings.filter.searchRawFields;
		const needle = caseSensitive ? criteria.keyword : criteria.keyword.toLowerCase();
		const contains = (haystack: string) =>
			(caseSensitive ? haystack : haystack.toLowerCase()).includes(needle);

		checks.push(
			(record) =>
				contains(record.message) ||
				(searchRaw && record.raw !== null && contains(JSON.stringify(record.raw))),
		);
	}

	if (criteria.category !== undefined) {
		const category = criteria.category;
		checks.push((record) => record.category === category);
	}

	return (record) => checks.every((check) => check(record));
}

export function matchesCriteria(
	record: LogRecord,
	criteria: FilterCriteria,
): boolean {
	return compileCriteria(criteria)(record);
}

async function* applyPredicate(
	records: Iterable<LogRecord> | AsyncIterable<LogRecord>,
	predicate: RecordPredicate,
): AsyncGenerator<LogRecord, void, undefined> {
	for await (const record of records) {
		if (predicate(record)) {
			yield record;
		}
	}
}

/**
 * Lazily yields the records matching every set criterion, in input order.
 * Invalid severities throw here, before any record is pulled.
 */
export function filterLogs(
	records: Iterable<LogRecord> | AsyncIterable<LogRecord>,
	criteria: FilterCriteria = {},
): AsyncGenerator<LogRecord, void, undefined> {
	return applyPredicate(records, compileCriteria(criteria));
}
