/**
 * Helpers for turning parameter names and value converters into the labels
 * shown in help text.
 */

/**
 * A function that converts a raw argument. It may carry a `cliTypeName` to
 * override the label derived from its name.
 */
export type ValueConverter = ((value: string) => unknown) & { readonly cliTypeName?: string };

export function identity<T>(value: T): T {
	return value;
}

/**
 * `_max_size_` becomes `max-size`; as a keyword, `--max-size` (or `-v` for a
 * single character).
 */
export function toCliName(name: string, keyword = false): string {
	const normalized = name.replace(/^_+|_+$/g, "").replace(/_/g, "-");
	if (!keyword) return normalized;
	return normalized.length > 1 ? `--${normalized}` : `-${normalized}`;
}

export function fromCliName(name: string): string {
	return name.replace(/^-+|-+$/g, "").replace(/-/g, "_");
}

export function typeLabel(converter: ValueConverter): string {
	if (typeof converter.cliTypeName === "string") {
		return converter.cliTypeName;
	}
	if (converter === identity || converter === String) {
		return "STR";
	}
	return converter.name.toUpperCase();
}
