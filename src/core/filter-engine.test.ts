import { describe, expect, it } from "vitest";
import type { LogRecord } from "../types";
import { InvalidSeverityError } from "./errors";
import { compileCriteria, filterLogs, matchesCriteria } from "./filter-engine";
import { numberToLabel, type Severity } from "./severity";

function record(overrides: Partial<LogRecord> = {}): LogRecord {
	const severity = overrides.severity ?? 6;
	return {
		timestamp: "2024-02-15T12:00:00.000+00:00",
		severity,
		severityLabel: numberToLabel(severity),
		message: "service started",
		category: "app.service",
		raw: null,
		...overrides,
	};
}

async function collect(source: AsyncIterable<LogRecord>): Promise<LogRecord[]> {
	const out: LogRecord[] = [];
	for await (const item of source) out.push(item);
	return out;
}

const ALL_SEVERITIES: Severity[] = [0, 1, 2, 3, 4, 5, 6, 7];

describe("filterLogs", () => {
	it("keeps records at least as severe as the minimum, in order", async () => {
		const input = [...ALL_SEVERITIES].reverse().map((severity) => record({ severity }));
		const output = await collect(filterLogs(input, { minSeverity: "error" }));

		expect(output.map((r) => r.severity)).toEqual([3, 2, 1, 0]);
	});

	it("matches an exact severity", async () => {
		const input = ALL_SEVERITIES.map((severity) => record({ severity }));
		const output = await collect(filterLogs(input, { severity: "warning" }));

		expect(output.map((r) => r.severity)).toEqual([4]);
	});

	it("combines exact and minimum severity with AND", async () => {
		const input = ALL_SEVERITIES.map((severity) => record({ severity }));

		expect(
			(await collect(filterLogs(input, { severity: 2, minSeverity: "err" }))).length,
		).toBe(1);
		expect(
			(await collect(filterLogs(input, { severity: 5, minSeverity: "err" }))).length,
		).toBe(0);
	});

	it("matches keywords case-insensitively by default", async () => {
		const input = [
			record({ message: "connection error" }),
			record({ message: "all good" }),
		];

		const loose = await collect(filterLogs(input, { keyword: "ERROR" }));
		const strict = await collect(
			filterLogs(input, { keyword: "ERROR", caseSensitive: true }),
		);

		expect(loose.map((r) => r.message)).toEqual(["connection error"]);
		expect(strict).toEqual([]);
	});

	it("searches raw fields only when asked", async () => {
		const input = [record({ message: "login", raw: { _COMM: "sshd" } })];

		expect(await collect(filterLogs(input, { keyword: "sshd" }))).toEqual([]);
		expect(
			(await collect(filterLogs(input, { keyword: "sshd", searchRaw: true }))).length,
		).toBe(1);
	});

	it("ignores an empty keyword", async () => {
		const input = [record(), record({ message: "other" })];
		expect((await collect(filterLogs(input, { keyword: "" }))).length).toBe(2);
	});

	it("filters by category", async () => {
		const input = [record({ category: "a" }), record({ category: "b" })];
		const output = await collect(filterLogs(input, { category: "b" }));
		expect(output.map((r) => r.category)).toEqual(["b"]);
	});

	it("passes everything through without criteria", async () => {
		const input = [record(), record({ severity: 0 })];
		expect(await collect(filterLogs(input))).toEqual(input);
	});

	it("rejects an invalid severity before reading any record", () => {
		let pulled = 0;
		function* source() {
			pulled++;
			yield record();
		}

		expect(() => filterLogs(source(), { minSeverity: "loud" })).toThrow(
			InvalidSeverityError,
		);
		expect(pulled).toBe(0);
	});

	it("pulls lazily from async sources", async () => {
		const pulled: number[] = [];
		async function* source() {
			for (const severity of ALL_SEVERITIES) {
				pulled.push(severity);
				yield record({ severity });
			}
		}

		const filtered = filterLogs(source(), { minSeverity: 1 });
		const first = await filtered.next();
		await filtered.return(undefined);

		expect(first.value).toMatchObject({ severity: 0 });
		expect(pulled).toEqual([0]);
	});
});

describe("matchesCriteria", () => {
	it("evaluates a single record", () => {
		expect(matchesCriteria(record({ severity: 3 }), { minSeverity: "err" })).toBe(true);
		expect(matchesCriteria(record({ severity: 4 }), { minSeverity: "err" })).toBe(false);
	});

	it("reuses a compiled predicate", () => {
		const predicate = compileCriteria({ keyword: "start" });
		expect(predicate(record())).toBe(true);
		expect(predicate(record({ message: "stop" }))).toBe(false);
	});
});
