export type TrendlineErrorCode =
	| "SEQUENCE"
	| "DATA"
	| "SIZING"
	| "CONFIG";

export class TrendlineError extends Error {
	readonly code: TrendlineErrorCode;
	readonly details: Record<string, unknown>;

	constructor(
		code: TrendlineErrorCode,
		message: string,
		details: Record<string, unknown> = {}
	) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.details = details;
	}
}

/** Out-of-order or duplicate bar. Aborts the run. */
export class SequenceError extends TrendlineError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("SEQUENCE", message, details);
	}
}

/** Malformed bar fields. Aborts the run. */
export class DataError extends TrendlineError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("DATA", message, details);
	}
}

/** Degenerate sizing input; only the offending intent is dropped. */
export class SizingError extends TrendlineError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("SIZING", message, details);
	}
}

export class ConfigError extends TrendlineError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("CONFIG", message, details);
	}
}

export const isFatal = (error: unknown): boolean =>
	error instanceof SequenceError ||
	error instanceof DataError ||
	error instanceof ConfigError ||
	!(error instanceof TrendlineError);

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
