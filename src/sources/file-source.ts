import type { ReadStream } from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import { createInterface, type Interface } from "node:readline";
import { z } from "zod";
import { settings } from "../config/settings";
import {
	errnoCode,
	NotSupportedError,
	SourceError,
	SourceNotFoundError,
	SourcePermissionError,
} from "../core/errors";
import { ReadStats } from "../core/stats";
import { createRawEvent, type RawEvent, type ReadStatistics } from "../types";
import { LineDecoder } from "./line-decoder";
import { type LogSource, parseSourceParams, type SourceParams } from "./source";

const EncodingSchema = z.custom<BufferEncoding>(
	(value) => typeof value === "string" && Buffer.isEncoding(value),
	{ message: "Unsupported encoding" },
);

const FileSourceOptionsSchema = z.object({
	path: z.string().min(1),
	mode: z.enum(["text", "jsonl"]).default("text"),
	encoding: EncodingSchema.default(settings.file.defaultEncoding),
	follow: z.boolean().default(false),
	warnOnErrors: z.boolean().default(false),
});

export type FileSourceOptions = z.input<typeof FileSourceOptionsSchema>;

function openFailure(error: unknown, path: string): SourceError {
	switch (errnoCode(error)) {
		case "ENOENT":
			return new SourceNotFoundError(`File not found: ${path}`, {
				cause: error,
			});
		case "EACCES":
		case "EPERM":
			return new SourcePermissionError(`Permission denied reading ${path}`, {
				cause: error,
			});
		default:
			return new SourceError(`Failed to read ${path}`, { cause: error });
	}
}

/**
 * Reads a local log file, either one event per text line or one JSON object
 * per line.
 */
export class FileSource implements LogSource {
	readonly sourceType: "file_text" | "file_jsonl";

	private readonly options: z.output<typeof FileSourceOptionsSchema>;
	private readonly readStats = new ReadStats();
	private readonly decoder: LineDecoder;
	private handle: FileHandle | null = null;
	private reading: { input: ReadStream; lines: Interface } | null = null;
	private closed = false;

	constructor(params: SourceParams = {}) {
		this.options = parseSourceParams(FileSourceOptionsSchema, params, "file");
		this.sourceType = this.options.mode === "jsonl" ? "file_jsonl" : "file_text";
		this.decoder = new LineDecoder(this.readStats, {
			warnOnErrors: this.options.warnOnErrors,
			origin: this.options.path,
		});
	}

	get stats(): Readonly<ReadStatistics> {
		return this.readStats.snapshot();
	}

	get path(): string {
		return this.options.path;
	}

	private assertReadable(): void {
		if (this.options.follow) {
			throw new NotSupportedError("Follow mode is not supported for file sources");
		}
		if (this.closed) {
			throw new SourceError(`File source for ${this.options.path} is already closed`);
		}
	}

	async open(): Promise<void> {
		this.assertReadable();
		if (this.handle) return;

		const path = this.options.path;
		let handle: FileHandle;
		try {
			handle = await open(path, "r");
		} catch (error) {
			throw openFailure(error, path);
		}

		try {
			const info = await handle.stat();
			if (!info.isFile()) {
				throw new SourceError(`Not a regular file: ${path}`);
			}
		} catch (error) {
			await handle.close();
			if (error instanceof SourceError) throw error;
			throw openFailure(error, path);
		}
		this.handle = handle;
	}

	async *read(): AsyncGenerator<RawEvent, void, undefined> {
		this.assertReadable();
		await this.open();
		const handle = this.handle;
		if (!handle) {
			throw new SourceError(`File source for ${this.options.path} is not open`);
		}

		const { path, mode, encoding } = this.options;
		const input = handle.createReadStream({ encoding, autoClose: false });
		const lines = createInterface({ input, crlfDelay: Infinity });
		this.reading = { input, lines };
		let lineNumber = 0;
		try {
			for await (const line of lines) {
				// close() may run mid-read; lines readline already buffered are dropped
				if (this.closed) break;
				lineNumber++;
				const metadata = { path, line: lineNumber };
				if (mode === "jsonl") {
					const fields = this.decoder.json(line);
					if (fields) {
						yield createRawEvent("file_jsonl", fields, metadata);
					}
				} else {
					const text = this.decoder.text(line);
					if (text !== null) {
						yield createRawEvent("file_text", { line: text }, metadata);
					}
				}
			}
		} catch (error) {
			throw openFailure(error, path);
		} finally {
			this.stopReading();
		}
	}

	private stopReading(): void {
		const reading = this.reading;
		this.reading = null;
		if (reading) {
			reading.lines.close();
			reading.input.destroy();
		}
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		// Closing readline ends a pending iteration; destroying the stream alone does not.
		this.stopReading();
		const handle = this.handle;
		this.handle = null;
		this.readStats.freeze();
		if (handle) {
			await handle.close();
		}
	}
}
