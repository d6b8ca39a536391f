import { WidthError } from "./errors.js";

/** Splits text into lines no wider than `width`. */
export type WrapFn = (text: string, width: number) => string[];

/**
 * Greedy word wrap. Runs of whitespace are collapsed to a single space.
 * A word longer than `width` is kept whole on its own line.
 */
export function wrapText(text: string, width: number): string[] {
	if (width <= 0) {
		throw new WidthError(`Cannot wrap text at width ${width}`, { width });
	}

	const lines: string[] = [];
	let current = "";
	for (const word of text.split(/\s+/)) {
		if (!word) continue;
		if (!current) {
			current = word;
		} else if (current.length + 1 + word.length <= width) {
			current += ` ${word}`;
		} else {
			lines.push(current);
			current = word;
		}
	}
	if (current) {
		lines.push(current);
	}
	return lines;
}
