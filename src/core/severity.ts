import { InvalidSeverityError } from "./errors";

/**
 * Syslog priorities in numeric order: 0 is the most severe, 7 the least.
 */
export const SEVERITY_LABELS = [
	"EMERG",
	"ALERT",
	"CRIT",
	"ERROR",
	"WARNING",
	"NOTICE",
	"INFO",
	"DEBUG",
] as const;

export type SeverityLabel = (typeof SEVERITY_LABELS)[number];
export type Severity = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

/** Number or label, as accepted by filters and source parameters. */
export type SeverityInput = Severity | number | string;

export const DEFAULT_SEVERITY: Severity = 6;

const LABEL_ALIASES: Record<string, Severity> = {
	emerg: 0,
	emergency: 0,
	panic: 0,
	alert: 1,
	crit: 2,
	critical: 2,
	err: 3,
	error: 3,
	warn: 4,
	warning: 4,
	notice: 5,
	info: 6,
	informational: 6,
	debug: 7,
};

export function isSeverity(value: unknown): value is Severity {
	return (
		typeof value === "number" &&
		Number.isInteger(value) &&
		value >= 0 &&
		value <= 7
	);
}

/** Label or abbreviation lookup, without numeric codes. */
export function lookupLabel(label: string): Severity | undefined {
	const key = label.trim().toLowerCase();
	return Object.hasOwn(LABEL_ALIASES, key) ? LABEL_ALIASES[key] : undefined;
}

export function numberToLabel(value: number): SeverityLabel {
	if (!isSeverity(value)) {
		throw new InvalidSeverityError(value);
	}
	return SEVERITY_LABELS[value];
}

/**
 * Resolves a label, abbreviation or numeric code to its priority number.
 * Labels are matched case-insensitively.
 */
export function labelToNumber(input: SeverityInput): Severity {
	if (typeof input === "number") {
		if (isSeverity(input)) {
			return input;
		}
		throw new InvalidSeverityError(input);
	}

	const key = input.trim().toLowerCase();
	if (/^\d+$/.test(key)) {
		const numeric = Number(key);
		if (isSeverity(numeric)) {
			return numeric;
		}
		throw new InvalidSeverityError(input);
	}

	const severity = lookupLabel(key);
	if (severity === undefined) {
		throw new InvalidSeverityError(input);
	}
	return severity;
}

/**
 * True when `severity` is at least as severe as `threshold`. Severity runs
 * backwards: a lower number is more urgent, so the test is `<=`.
 */
export function isAtLeastAsSevere(
	severity: Severity,
	threshold: Severity,
): boolean {
	return severity <= threshold;
}
