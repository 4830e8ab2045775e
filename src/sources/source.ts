import type { ZodTypeAny, z } from "zod";
import { SourceError } from "../core/errors";
import type { RawEvent, ReadStatistics, SourceType } from "../types";

/**
 * Capability set every log source provides. Sources are single-pass: reading
 * again means constructing a new one.
 */
export interface LogSource {
	readonly sourceType: SourceType;
	/** Live counters; frozen once close() has run. */
	readonly stats: Readonly<ReadStatistics>;
	/** Acquire the underlying feed. Safe to call more than once. */
	open(): Promise<void>;
	read(): AsyncGenerator<RawEvent, void, undefined>;
	/** Release the feed. Safe to call more than once. */
	close(): Promise<void>;
}

export type SourceParams = Record<string, unknown>;

export type SourceFactory = (params: SourceParams) => LogSource;

/**
 * Validates constructor parameters; a bad parameter is a setup failure and
 * surfaces as a SourceError carrying the zod error.
 */
export function parseSourceParams<Schema extends ZodTypeAny>(
	schema: Schema,
	params: SourceParams,
	sourceName: string,
): z.output<Schema> {
	const result = schema.safeParse(params);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`)
			.join("; ");
		throw new SourceError(`Invalid ${sourceName} source parameters: ${details}`, {
			cause: result.error,
		});
	}
	return result.data;
}
