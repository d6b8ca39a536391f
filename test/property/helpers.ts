import * as fc from "fast-check";
import { fraction, type WidthSpec } from "../../lib/utils.js";
import type { ColumnLayoutOptions } from "../../lib/columns.js";

/** Lowercase words that fit any wrap width used by the properties. */
export const arbWord = fc.stringMatching(/^[a-z]{1,8}$/);

export const arbSeparator = fc.constantFrom(" ", "  ", "   ");

export const arbMaxWidth = fc.integer({ min: 20, max: 120 });

/** Cell text: words and dashes with the odd long token. */
export const arbCell = fc.oneof(
	fc.array(arbWord, { minLength: 0, maxLength: 12 }).map((words) => words.join(" ")),
	fc.stringMatching(/^--[a-z-]{1,40}$/),
);

export function arbRows(numColumns: number): fc.Arbitrary<string[][]> {
	return fc.array(fc.array(arbCell, { minLength: numColumns, maxLength: numColumns }), {
		minLength: 0,
		maxLength: 8,
	});
}

/**
 * Minimums stay at or below 2 columns (or 4% of the space), so with up to four
 * columns and three-space separators they fit in the narrowest width.
 */
export const arbMinWidth: fc.Arbitrary<WidthSpec> = fc.oneof(
	fc.integer({ min: 0, max: 2 }),
	fc.integer({ min: 0, max: 4 }).map((percent) => fraction(percent / 100)),
);

/** Maximums never resolve below any minimum from `arbMinWidth`. */
export const arbMaxWidthSpec: fc.Arbitrary<WidthSpec | undefined> = fc.oneof(
	fc.constant(undefined),
	fc.integer({ min: 6, max: 40 }),
	fc.integer({ min: 20, max: 100 }).map((percent) => fraction(percent / 100)),
);

function perColumn<T>(arb: fc.Arbitrary<T>, numColumns: number): fc.Arbitrary<T[] | undefined> {
	return fc.option(fc.array(arb, { minLength: numColumns, maxLength: numColumns }), {
		nil: undefined,
	});
}

export function arbColumnOptions(numColumns: number): fc.Arbitrary<ColumnLayoutOptions> {
	return fc.record({
		separator: arbSeparator,
		wrap: perColumn(fc.boolean(), numColumns),
		minWidths: perColumn(arbMinWidth, numColumns),
		maxWidths: perColumn(arbMaxWidthSpec, numColumns),
	});
}
