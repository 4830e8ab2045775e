import { format, isValid, parseISO } from "date-fns";

const ISO_LOCAL_PATTERN = "yyyy-MM-dd'T'HH:mm:ss.SSSxxx";
const DIGITS = /^\d+$/;
const EPOCH_SECONDS = /^\d+(\.\d+)?$/;
// Larger epoch numbers are milliseconds (1e11 seconds is past the year 5000).
const EPOCH_MILLIS_THRESHOLD = 1e11;
const MAX_TIME = Date.UTC(9999, 11, 31, 23, 59, 59, 999);

/** Only four-digit years format as ISO-8601. */
function inRange(date: Date): Date | undefined {
	return isValid(date) && date.getTime() <= MAX_TIME ? date : undefined;
}

/** ISO-8601 in the process's local timezone, offset included. */
export function formatLocalIso(date: Date): string {
	return format(date, ISO_LOCAL_PATTERN);
}

/**
 * Journal realtime fields: microseconds since the epoch, usually sent as a
 * decimal string.
 */
export function fromEpochMicros(value: unknown): Date | undefined {
	let micros: number;
	if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
		micros = value;
	} else if (typeof value === "string" && DIGITS.test(value.trim())) {
		micros = Number(value.trim());
	} else {
		return undefined;
	}
	return inRange(new Date(Math.floor(micros / 1000)));
}

/**
 * Generic timestamp fields: ISO-8601 strings, or epoch seconds (milliseconds
 * past 1e11) as a number or numeric string.
 */
export function parseTimestamp(value: unknown): Date | undefined {
	if (typeof value === "number") {
		if (!Number.isFinite(value) || value < 0) return undefined;
		const millis = value >= EPOCH_MILLIS_THRESHOLD ? value : value * 1000;
		return inRange(new Date(millis));
	}
	if (typeof value !== "string") {
		return undefined;
	}

	const text = value.trim();
	if (text === "") return undefined;
	if (EPOCH_SECONDS.test(text)) {
		return parseTimestamp(Number(text));
	}
	return inRange(parseISO(text));
}

/** Milliseconds for sorting; NaN when the value does not parse. */
export function sortableTime(timestamp: string): number {
	const date = parseISO(timestamp);
	return isValid(date) ? date.getTime() : Number.NaN;
}
