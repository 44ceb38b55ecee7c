/**
 * Typed error hierarchy for gridwriter.
 * Provides structured error types with codes, causes, and context.
 */

/**
 * Error codes for categorizing errors.
 */
export const ErrorCode = {
	GRID_ERROR: "GRID_ERROR",
	OUTPUT_ERROR: "GRID_OUTPUT_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Options for creating a GridError.
 */
export interface GridErrorOptions {
	code?: string;
	cause?: unknown;
	context?: Record<string, unknown>;
}

/**
 * Base error class for all gridwriter errors.
 * Supports error chaining via `cause` and arbitrary context data.
 */
export class GridError extends Error {
	override readonly name: string = "GridError";
	readonly code: string;
	readonly context?: Record<string, unknown>;

	constructor(message: string, options?: GridErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = options?.code ?? ErrorCode.GRID_ERROR;
		this.context = options?.context;

		// istanbul ignore next -- Error.captureStackTrace always exists in Node.js
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

/**
 * Options for creating a GridOutputError.
 */
export interface GridOutputErrorOptions extends GridErrorOptions {
	/** Zero-based index of the line whose write failed */
	line: number;
}

/**
 * Error for failures of the output sink while a table is rendered.
 */
export class GridOutputError extends GridError {
	override readonly name = "GridOutputError";
	readonly line: number;

	constructor(message: string, options: GridOutputErrorOptions) {
		super(message, { ...options, code: options.code ?? ErrorCode.OUTPUT_ERROR });
		this.line = options.line;
	}
}

/**
 * Describe an unknown thrown value for messages and logs.
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
