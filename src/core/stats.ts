import type { NormalizationStatistics, ReadStatistics } from "../types";

function emptyNormalizationStatistics(): NormalizationStatistics {
	return {
		total: 0,
		missingPriority: 0,
		invalidPriority: 0,
		missingTimestamp: 0,
		missingMessage: 0,
	};
}

/**
 * Data-quality counters shared by every normalization in the process.
 * Only an explicit reset() clears them.
 */
export class NormalizationStats {
	private counters: NormalizationStatistics = emptyNormalizationStatistics();

	increment(key: keyof NormalizationStatistics): void {
		this.counters[key]++;
	}

	snapshot(): Readonly<NormalizationStatistics> {
		return Object.freeze({ ...this.counters });
	}

	reset(): void {
		this.counters = emptyNormalizationStatistics();
	}
}

/**
 * Per-source counters. Mutated while the source is read and frozen when it
 * closes; increments after freeze() are dropped.
 */
export class ReadStats {
	private counters: ReadStatistics = {
		linesRead: 0,
		emptyLines: 0,
		parseErrors: 0,
		eventsYielded: 0,
	};
	private frozen = false;

	increment(key: keyof ReadStatistics): void {
		if (this.frozen) return;
		this.counters[key]++;
	}

	freeze(): void {
		this.frozen = true;
	}

	get isFrozen(): boolean {
		return this.frozen;
	}

	snapshot(): Readonly<ReadStatistics> {
		return Object.freeze({ ...this.counters });
	}
}
