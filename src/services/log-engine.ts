import { filterLogs } from "../core/filter-engine";
import { type NormalizeOptions, Normalizer } from "../core/normalizer";
import { NormalizationStats } from "../core/stats";
import { registerBuiltinSources, SourceRegistry } from "../sources/registry";
import type { LogSource, SourceFactory, SourceParams } from "../sources/source";
import type { Diagnostics, FilterCriteria, LogRecord } from "../types";
import { logger } from "../utils/logger";

export interface FetchOptions extends NormalizeOptions {
	/** Stop after this many records. Unset means stream until the source ends. */
	limit?: number;
	/** Aborting closes the source, which ends the sequence. */
	signal?: AbortSignal;
}

interface ActiveSource {
	name: string;
	source: LogSource;
}

/**
 * Wires sources, the normalizer and the filter engine together. Every
 * sequence it returns is lazy and closes its source exactly once, however
 * iteration ends.
 */
export class LogEngine {
	private readonly registry: SourceRegistry;
	private readonly stats: NormalizationStats;
	private readonly normalizer: Normalizer;
	private lastSource: ActiveSource | null = null;

	constructor(
		options: { registry?: SourceRegistry; stats?: NormalizationStats } = {},
	) {
		this.registry = options.registry ?? new SourceRegistry();
		this.stats = options.stats ?? new NormalizationStats();
		this.normalizer = new Normalizer(this.stats);
	}

	registerSource(name: string, factory: SourceFactory): void {
		this.registry.register(name, factory);
	}

	listSources(): string[] {
		return this.registry.list();
	}

	/**
	 * Resolves and constructs the source right away, so unknown names and bad
	 * parameters fail here; the source is opened on the first pull.
	 */
	fetchLogs(
		source: string | LogSource,
		params: SourceParams = {},
		options: FetchOptions = {},
	): AsyncGenerator<LogRecord, void, undefined> {
		if (
			options.limit !== undefined &&
			(!Number.isInteger(options.limit) || options.limit < 0)
		) {
			throw new RangeError(
				`limit must be a non-negative integer, got ${options.limit}`,
			);
		}

		const active: ActiveSource =
			typeof source === "string"
				? { name: source, source: this.registry.create(source, params) }
				: { name: source.sourceType, source };
		return this.stream(active, options);
	}

	fetchAndFilterLogs(
		source: string | LogSource,
		params: SourceParams = {},
		criteria: FilterCriteria = {},
		options: FetchOptions = {},
	): AsyncGenerator<LogRecord, void, undefined> {
		return filterLogs(this.fetchLogs(source, params, options), criteria);
	}

	getDiagnostics(): Readonly<Diagnostics> {
		const last = this.lastSource;
		return Object.freeze({
			normalization: this.stats.snapshot(),
			source: last
				? Object.freeze({
						name: last.name,
						sourceType: last.source.sourceType,
						stats: last.source.stats,
					})
				: null,
		});
	}

	/** Zeroes the normalization counters; source statistics are untouched. */
	resetDiagnostics(): void {
		this.stats.reset();
	}

	private async *stream(
		active: ActiveSource,
		options: FetchOptions,
	): AsyncGenerator<LogRecord, void, undefined> {
		const { source, name } = active;
		const { limit, signal } = options;
		const normalizeOptions: NormalizeOptions = {
			warnOnErrors: options.warnOnErrors,
			includeRaw: options.includeRaw,
		};

		let closing: Promise<void> | undefined;
		const closeSource = (): Promise<void> => (closing ??= source.close());
		const onAbort = () => {
			closeSource().catch((error: unknown) => {
				logger.warn("Failed to close aborted source", {
					source: name,
					error: error instanceof Error ? error.message : String(error),
				});
			});
		};

		this.lastSource = active;
		signal?.addEventListener("abort", onAbort, { once: true });
		let count = 0;
		try {
			if (signal?.aborted || limit === 0) return;
			await source.open();
			for await (const event of source.read()) {
				if (signal?.aborted) break;
				yield this.normalizer.normalize(event, normalizeOptions);
				count++;
				if (limit !== undefined && count >= limit) break;
			}
		} finally {
			signal?.removeEventListener("abort", onAbort);
			await closeSource();
			logger.debug("Fetch finished", {
				source: name,
				records: count,
				stats: source.stats,
			});
		}
	}
}

export function createDefaultEngine(): LogEngine {
	const registry = new SourceRegistry();
	registerBuiltinSources(registry);
	return new LogEngine({ registry });
}
