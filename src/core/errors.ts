/**
 * Base error for anything that goes wrong while opening or reading a log
 * source. Per-entry problems (one malformed line, one missing field) are
 * counted instead and never surface as errors.
 */
export class SourceError extends Error {
	public readonly code: string;

	constructor(message: string, options?: { cause?: unknown; code?: string }) {
		super(message, { cause: options?.cause });
		this.name = "SourceError";
		this.code = options?.code ?? "SOURCE_ERROR";
	}
}

/**
 * Missing journal binary, missing file, or a source name nobody registered.
 */
export class SourceNotFoundError extends SourceError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, { cause: options?.cause, code: "SOURCE_NOT_FOUND" });
		this.name = "SourceNotFoundError";
	}
}

export class SourcePermissionError extends SourceError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, {
			cause: options?.cause,
			code: "SOURCE_PERMISSION_DENIED",
		});
		this.name = "SourcePermissionError";
	}
}

/**
 * A severity filter argument that is neither a 0-7 number nor a known label.
 */
export class InvalidSeverityError extends Error {
	public readonly code = "INVALID_SEVERITY";

	constructor(public readonly input: unknown) {
		super(
			`Unknown severity: ${JSON.stringify(input)}. Expected 0-7 or one of emerg, alert, crit, err, warning, notice, info, debug`,
		);
		this.name = "InvalidSeverityError";
	}
}

/**
 * Raised when a source is asked for a capability it does not have, such as
 * follow mode on a file.
 */
export class NotSupportedError extends Error {
	public readonly code = "NOT_SUPPORTED";

	constructor(message: string) {
		super(message);
		this.name = "NotSupportedError";
	}
}

export function errorCode(error: unknown): string | undefined {
	if (
		error instanceof SourceError ||
		error instanceof InvalidSeverityError ||
		error instanceof NotSupportedError
	) {
		return error.code;
	}
	return undefined;
}

/** The `code` of a Node system error (ENOENT, EACCES, ...), if any. */
export function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
