import {
	errorCode,
	InvalidSeverityError,
	NotSupportedError,
	SourceError,
	SourceNotFoundError,
	SourcePermissionError,
} from "../core/errors";

export type ErrorStatus = 400 | 403 | 404 | 500 | 502;

export function statusForError(error: unknown): ErrorStatus {
	if (
		error instanceof InvalidSeverityError ||
		error instanceof NotSupportedError ||
		error instanceof RangeError
	) {
		return 400;
	}
	if (error instanceof SourceNotFoundError) return 404;
	if (error instanceof SourcePermissionError) return 403;
	if (error instanceof SourceError) return 502;
	return 500;
}

/** Response body for a failed request. Internal errors are not echoed. */
export function errorBody(error: unknown): { error: string; code?: string } {
	if (statusForError(error) === 500) {
		return { error: "internal_error" };
	}
	const message = error instanceof Error ? error.message : String(error);
	const code = errorCode(error);
	return code === undefined ? { error: message } : { error: message, code };
}
