/**
 * Typed error hierarchy for the layout engine.
 * Every error carries a code and optional context describing the offending call.
 */

/**
 * Error codes for categorizing errors.
 */
export const ErrorCode = {
	LAYOUT_ERROR: "LAYOUT_ERROR",
	SHAPE_ERROR: "LAYOUT_SHAPE_ERROR",
	WIDTH_ERROR: "LAYOUT_WIDTH_ERROR",
	STATE_ERROR: "LAYOUT_STATE_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface LayoutErrorOptions {
	code?: string;
	cause?: unknown;
	context?: Record<string, unknown>;
}

/**
 * Base error class for all layout errors.
 */
export class LayoutError extends Error {
	override readonly name: string = "LayoutError";
	readonly code: string;
	readonly context?: Record<string, unknown>;

	constructor(message: string, options?: LayoutErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = options?.code ?? ErrorCode.LAYOUT_ERROR;
		this.context = options?.context;

		// istanbul ignore next -- Error.captureStackTrace always exists in Node.js
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

export interface ShapeErrorOptions extends LayoutErrorOptions {
	expected?: number;
	actual?: number;
}

/**
 * A row or option list does not match the layout's column count.
 */
export class ShapeError extends LayoutError {
	override readonly name = "ShapeError";
	readonly expected?: number;
	readonly actual?: number;

	constructor(message: string, options?: ShapeErrorOptions) {
		super(message, { ...options, code: options?.code ?? ErrorCode.SHAPE_ERROR });
		this.expected = options?.expected;
		this.actual = options?.actual;
	}
}

export interface WidthErrorOptions extends LayoutErrorOptions {
	width?: number;
}

/**
 * A resolved width or indent left no room to lay text out.
 */
export class WidthError extends LayoutError {
	override readonly name = "WidthError";
	readonly width?: number;

	constructor(message: string, options?: WidthErrorOptions) {
		super(message, { ...options, code: options?.code ?? ErrorCode.WIDTH_ERROR });
		this.width = options?.width;
	}
}

export interface StateErrorOptions extends LayoutErrorOptions {
	state?: string;
}

/**
 * An operation was called in a lifecycle state that does not allow it.
 */
export class StateError extends LayoutError {
	override readonly name = "StateError";
	readonly state?: string;

	constructor(message: string, options?: StateErrorOptions) {
		super(message, { ...options, code: options?.code ?? ErrorCode.STATE_ERROR });
		this.state = options?.state;
	}
}
