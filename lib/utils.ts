/**
 * Small helpers shared by the layout modules.
 */

/**
 * Safely converts any value to a string representation.
 * @param value - The value to convert
 * @returns String representation of the value
 */
export function toStringValue(value: unknown): string {
	if (typeof value === "string") {
		return value;
	}
	if (value === null) {
		return "null";
	}
	if (value === undefined) {
		return "undefined";
	}
	if (value instanceof Error) {
		return value.message;
	}
	if (typeof value === "object") {
		try {
			return JSON.stringify(value);
		} catch {
			return String(value);
		}
	}
	return String(value);
}

/**
 * Clamps `value` between optional bounds. The lower bound is checked first,
 * so it wins when the bounds cross.
 */
export function bound(min: number | undefined, value: number, max: number | undefined): number {
	if (min !== undefined && value < min) return min;
	if (max !== undefined && value > max) return max;
	return value;
}

export function sum(values: readonly number[]): number {
	return values.reduce((total, value) => total + value, 0);
}

/** A width expressed as a share of the space available to a table. */
export interface Fraction {
	readonly fraction: number;
}

/** An absolute character count or a {@link Fraction}. */
export type WidthSpec = number | Fraction;

export function fraction(value: number): Fraction {
	return { fraction: value };
}

/**
 * Resolves a width spec against the available space. Fractions truncate
 * toward zero.
 */
export function resolveWidth(spec: WidthSpec, available: number): number;
export function resolveWidth(spec: WidthSpec | undefined, available: number): number | undefined;
export function resolveWidth(spec: WidthSpec | undefined, available: number): number | undefined {
	if (spec === undefined) return undefined;
	if (typeof spec === "number") return spec;
	return Math.trunc(spec.fraction * available);
}

/**
 * Wraps `compute` so it runs on first access only; later calls return the
 * stored result. A throwing call stores nothing.
 */
export function once<T>(compute: () => T): () => T {
	let cached: { value: T } | undefined;
	return () => {
		if (!cached) {
			cached = { value: compute() };
		}
		return cached.value;
	};
}
