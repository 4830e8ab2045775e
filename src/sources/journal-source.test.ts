import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { settings } from "../config/settings";
import {
	InvalidSeverityError,
	SourceError,
	SourceNotFoundError,
	SourcePermissionError,
} from "../core/errors";
import { LogEngine } from "../services/log-engine";
import type { RawEvent } from "../types";
import { JournalSource, type SpawnedProcess, type SpawnProcess } from "./journal-source";

class FakeProcess extends EventEmitter implements SpawnedProcess {
	readonly stdout = new PassThrough();
	readonly stderr = new PassThrough();
	exitCode: number | null = null;
	signalCode: NodeJS.Signals | null = null;
	readonly signals: (NodeJS.Signals | number | undefined)[] = [];

	constructor(
		readonly command: string,
		readonly args: readonly string[],
	) {
		super();
	}

	kill(signal?: NodeJS.Signals | number): boolean {
		this.signals.push(signal);
		if (this.exitCode === null && this.signalCode === null) {
			this.finish(null, typeof signal === "string" ? signal : "SIGTERM");
		}
		return true;
	}

	finish(code: number | null, signal: NodeJS.Signals | null = null): void {
		this.exitCode = code;
		this.signalCode = signal;
		this.stdout.end();
		this.stderr.end();
		setImmediate(() => this.emit("close", code, signal));
	}
}

interface Script {
	lines?: string[];
	stderr?: string;
	/** Exit code; undefined keeps the process running until killed. */
	code?: number;
	spawnError?: string;
}

function fakeJournal(script: Script) {
	const processes: FakeProcess[] = [];
	const spawnProcess: SpawnProcess = (command, args) => {
		const child = new FakeProcess(command, args);
		processes.push(child);
		setImmediate(() => {
			if (script.spawnError) {
				child.emit(
					"error",
					Object.assign(new Error(`spawn ${command} ${script.spawnError}`), {
						code: script.spawnError,
					}),
				);
				return;
			}
			child.emit("spawn");
			if (script.stderr) child.stderr.write(script.stderr);
			for (const line of script.lines ?? []) child.stdout.write(`${line}\n`);
			if (script.code !== undefined) child.finish(script.code);
		});
		return child;
	};
	return { spawnProcess, processes };
}

async function collect(source: JournalSource): Promise<RawEvent[]> {
	const events: RawEvent[] = [];
	for await (const event of source.read()) events.push(event);
	return events;
}

describe("JournalSource", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("builds the journal query from its parameters", () => {
		const source = new JournalSource({
			since: "2024-02-15 00:00:00",
			until: "2024-02-16 00:00:00",
			units: ["sshd.service", "cron.service"],
			priority: "err",
			follow: true,
		});

		expect(source.args).toEqual([
			"--output=json",
			"--no-pager",
			"--since",
			"2024-02-15 00:00:00",
			"--until",
			"2024-02-16 00:00:00",
			"--unit",
			"sshd.service",
			"--unit",
			"cron.service",
			"--priority",
			"3",
			"--follow",
		]);
	});

	it("defaults to the last 24 hours", () => {
		vi.useFakeTimers();
		vi.setSystemTime(new Date("2024-03-01T08:00:00Z"));

		const source = new JournalSource();
		expect(source.args).toEqual([
			"--output=json",
			"--no-pager",
			"--since",
			"2024-02-29 08:00:00",
		]);
	});

	it("rejects an unknown priority", () => {
		expect(() => new JournalSource({ priority: "loud" })).toThrow(InvalidSeverityError);
	});

	it("yields one event per JSON line and counts the rest", async () => {
		const { spawnProcess, processes } = fakeJournal({
			lines: ['{"MESSAGE":"a","PRIORITY":"6"}', "not json", "", '{"MESSAGE":"b"}'],
			code: 0,
		});
		const source = new JournalSource({ since: "today" }, spawnProcess);

		const events = await collect(source);
		await source.close();

		expect(processes[0].command).toBe("journalctl");
		expect(processes[0].args).toEqual(["--output=json", "--no-pager", "--since", "today"]);
		expect(events.map((e) => e.fields.MESSAGE)).toEqual(["a", "b"]);
		expect(events[0].sourceType).toBe("journalctl");
		expect(events[0].metadata).toEqual({
			command: ["journalctl", "--output=json", "--no-pager", "--since", "today"],
		});
		expect(source.stats).toEqual({
			linesRead: 4,
			emptyLines: 1,
			parseErrors: 1,
			eventsYielded: 2,
		});
	});

	it("treats exit code 1 without output as an empty result", async () => {
		const { spawnProcess } = fakeJournal({ code: 1 });
		const source = new JournalSource({ since: "today" }, spawnProcess);

		expect(await collect(source)).toEqual([]);
	});

	it("reports a missing binary as not found", async () => {
		const { spawnProcess } = fakeJournal({ spawnError: "ENOENT" });
		const source = new JournalSource({ since: "today" }, spawnProcess);

		await expect(source.open()).rejects.toBeInstanceOf(SourceNotFoundError);
		await expect(new JournalSource({ since: "today" }, spawnProcess).open()).rejects.toThrow(
			"journalctl not found. Is systemd installed?",
		);
	});

	it("reports permission problems from stderr", async () => {
		const { spawnProcess } = fakeJournal({
			stderr: "Failed to open journal: Permission denied\n",
			code: 1,
		});
		const source = new JournalSource({ since: "today" }, spawnProcess);

		await expect(collect(source)).rejects.toBeInstanceOf(SourcePermissionError);
	});

	it("reports other failures with the exit code and stderr", async () => {
		const { spawnProcess } = fakeJournal({ stderr: "bad option", code: 2 });
		const source = new JournalSource({ since: "today" }, spawnProcess);

		const failure = collect(source);
		await expect(failure).rejects.toBeInstanceOf(SourceError);
		await expect(failure).rejects.toThrow("journalctl exited with code 2: bad option");
	});

	it("terminates a running query on close", async () => {
		const { spawnProcess, processes } = fakeJournal({
			lines: ['{"MESSAGE":"live"}'],
		});
		const source = new JournalSource({ since: "today", follow: true }, spawnProcess);

		const reader = source.read();
		const first = await reader.next();
		await source.close();
		await reader.return(undefined);

		expect(first).toMatchObject({ done: false, value: { fields: { MESSAGE: "live" } } });
		expect(processes[0].signals).toEqual(["SIGTERM"]);
		await source.close();
		expect(processes[0].signals).toEqual(["SIGTERM"]);
		await expect(source.open()).rejects.toThrow("Journal source is already closed");
	});

	it("ends a follow-mode fetch when the signal aborts", async () => {
		const { spawnProcess, processes } = fakeJournal({
			lines: ['{"MESSAGE":"first"}'],
		});
		const source = new JournalSource({ since: "today", follow: true }, spawnProcess);
		const controller = new AbortController();
		const records = new LogEngine().fetchLogs(source, {}, { signal: controller.signal });

		const first = await records.next();
		controller.abort();
		const after = await records.next();

		expect(first).toMatchObject({ done: false, value: { message: "first" } });
		expect(after).toEqual({ done: true, value: undefined });
		expect(processes[0].signals).toEqual(["SIGTERM"]);
	});

	it("keeps at most the configured amount of stderr", async () => {
		const { spawnProcess } = fakeJournal({
			stderr: "x".repeat(settings.journal.maxStderrBytes + 4096),
			code: 2,
		});
		const source = new JournalSource({ since: "today" }, spawnProcess);

		await expect(collect(source)).rejects.toThrow(
			new RegExp(`^journalctl exited with code 2: x{${settings.journal.maxStderrBytes}}$`),
		);
	});

	it("leaves a finished process alone on close", async () => {
		const { spawnProcess, processes } = fakeJournal({ code: 0 });
		const source = new JournalSource({ since: "today" }, spawnProcess);

		await collect(source);
		await source.close();

		expect(processes[0].signals).toEqual([]);
	});
});
