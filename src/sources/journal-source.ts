import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { format, subHours } from "date-fns";
import { z } from "zod";
import { settings } from "../config/settings";
import {
	errnoCode,
	SourceError,
	SourceNotFoundError,
	SourcePermissionError,
} from "../core/errors";
import { labelToNumber, type Severity } from "../core/severity";
import { ReadStats } from "../core/stats";
import { createRawEvent, type RawEvent, type ReadStatistics } from "../types";
import { logger } from "../utils/logger";
import { LineDecoder } from "./line-decoder";
import { type LogSource, parseSourceParams, type SourceParams } from "./source";

/**
 * The slice of ChildProcess the journal source uses, so tests can hand in a
 * fake process.
 */
export interface SpawnedProcess extends EventEmitter {
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	readonly exitCode: number | null;
	readonly signalCode: NodeJS.Signals | null;
	kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (
	command: string,
	args: readonly string[],
) => SpawnedProcess;

const spawnJournal: SpawnProcess = (command, args) =>
	spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

const JournalSourceOptionsSchema = z.object({
	since: z.string().min(1).optional(),
	until: z.string().min(1).optional(),
	units: z.array(z.string().min(1)).default([]),
	priority: z.union([z.number(), z.string().min(1)]).optional(),
	follow: z.boolean().default(false),
	warnOnErrors: z.boolean().default(false),
	executable: z.string().min(1).default(settings.journal.executable),
});

export type JournalSourceOptions = z.input<typeof JournalSourceOptionsSchema>;

interface ExitStatus {
	code: number | null;
	signal: NodeJS.Signals | null;
}

const PERMISSION_PATTERN = /permission denied|access denied|not permitted/i;

function defaultSince(): string {
	return format(
		subHours(new Date(), settings.journal.defaultWindowHours),
		"yyyy-MM-dd HH:mm:ss",
	);
}

function spawnFailure(error: unknown, executable: string): SourceError {
	const code = errnoCode(error);
	if (code === "ENOENT") {
		return new SourceNotFoundError(
			`${executable} not found. Is systemd installed?`,
			{ cause: error },
		);
	}
	if (code === "EACCES" || code === "EPERM") {
		return new SourcePermissionError(`Not allowed to run ${executable}`, {
			cause: error,
		});
	}
	return new SourceError(`Failed to start ${executable}`, { cause: error });
}

/**
 * Reads the systemd journal through `journalctl --output=json`, one event per
 * output line. Time bounds, units and priority go into the query itself.
 */
export class JournalSource implements LogSource {
	readonly sourceType = "journalctl";
	readonly args: readonly string[];

	private readonly options: z.output<typeof JournalSourceOptionsSchema>;
	private readonly readStats = new ReadStats();
	private readonly decoder: LineDecoder;
	private child: SpawnedProcess | null = null;
	private exit: Promise<ExitStatus> | null = null;
	private stderrText = "";
	private closing = false;

	constructor(
		params: SourceParams = {},
		private readonly spawnProcess: SpawnProcess = spawnJournal,
	) {
		this.options = parseSourceParams(
			JournalSourceOptionsSchema,
			params,
			"journalctl",
		);
		const priority =
			this.options.priority === undefined
				? undefined
				: labelToNumber(this.options.priority);
		this.args = this.buildArgs(priority);
		this.decoder = new LineDecoder(this.readStats, {
			warnOnErrors: this.options.warnOnErrors,
			origin: this.options.executable,
		});
	}

	get stats(): Readonly<ReadStatistics> {
		return this.readStats.snapshot();
	}

	get follow(): boolean {
		return this.options.follow;
	}

	private buildArgs(priority: Severity | undefined): string[] {
		const args = ["--output=json", "--no-pager"];
		args.push("--since", this.options.since ?? defaultSince());
		if (this.options.until) {
			args.push("--until", this.options.until);
		}
		for (const unit of this.options.units) {
			args.push("--unit", unit);
		}
		if (priority !== undefined) {
			args.push("--priority", String(priority));
		}
		if (this.options.follow) {
			args.push("--follow");
		}
		return args;
	}

	async open(): Promise<void> {
		if (this.child) return;
		if (this.closing) {
			throw new SourceError("Journal source is already closed");
		}

		const executable = this.options.executable;
		let child: SpawnedProcess;
		try {
			child = this.spawnProcess(executable, this.args);
		} catch (error) {
			throw spawnFailure(error, executable);
		}

		this.exit = new Promise<ExitStatus>((resolve) => {
			child.once("close", (code: number | null, signal: NodeJS.Signals | null) =>
				resolve({ code, signal }),
			);
		});

		await new Promise<void>((resolve, reject) => {
			const onSpawn = () => {
				child.off("error", onError);
				resolve();
			};
			const onError = (error: unknown) => {
				child.off("spawn", onSpawn);
				reject(spawnFailure(error, executable));
			};
			child.once("spawn", onSpawn);
			child.once("error", onError);
		});

		child.on("error", (error: unknown) => {
			logger.warn("journalctl process error", {
				error: error instanceof Error ? error.message : String(error),
			});
		});
		child.stderr?.setEncoding("utf8");
		child.stderr?.on("data", (chunk: string) => {
			const max = settings.journal.maxStderrBytes;
			if (this.stderrText.length < max) {
				this.stderrText = (this.stderrText + chunk).slice(0, max);
			}
		});
		this.child = child;
		logger.debug("Started journal query", { executable, args: this.args });
	}

	async *read(): AsyncGenerator<RawEvent, void, undefined> {
		await this.open();
		const stdout = this.child?.stdout;
		if (!stdout) {
			throw new SourceError("journalctl was started without an output pipe");
		}

		const lines = createInterface({ input: stdout, crlfDelay: Infinity });
		const metadata = { command: [this.options.executable, ...this.args] };
		try {
			for await (const line of lines) {
				const fields = this.decoder.json(line);
				if (fields) {
					yield createRawEvent(this.sourceType, fields, metadata);
				}
			}
		} catch (error) {
			if (error instanceof SourceError) throw error;
			throw new SourceError("Failed to read journalctl output", {
				cause: error,
			});
		} finally {
			lines.close();
		}

		await this.checkExit();
	}

	private async checkExit(): Promise<void> {
		if (this.closing || !this.exit) return;
		const { code, signal } = await this.exit;
		if (this.closing || code === 0) return;

		const stderr = this.stderrText.trim();
		// journalctl exits 1 without a message when nothing matched
		if (code === 1 && stderr === "") return;

		if (PERMISSION_PATTERN.test(stderr)) {
			throw new SourcePermissionError(
				`Permission denied reading the journal. Try: sudo usermod -a -G systemd-journal $USER\n${stderr}`,
			);
		}
		throw new SourceError(
			`journalctl exited with ${code === null ? `signal ${signal}` : `code ${code}`}: ${stderr}`,
		);
	}

	/**
	 * Stops the query. A running process gets SIGTERM, its leftover output is
	 * drained, and SIGKILL follows if it has not exited in time.
	 */
	async close(): Promise<void> {
		if (this.closing) return;
		this.closing = true;

		const child = this.child;
		const exit = this.exit;
		if (child && exit && child.exitCode === null && child.signalCode === null) {
			child.stdout?.resume();
			child.kill("SIGTERM");
			const timer = setTimeout(() => {
				child.kill("SIGKILL");
			}, settings.journal.terminateTimeoutMs);
			try {
				await exit;
			} finally {
				clearTimeout(timer);
			}
		}
		this.child = null;
		this.readStats.freeze();
	}
}
