/**
 * Multi-column tables whose widths are computed from their content.
 *
 * Rows are collected while the layout is open. Closing it freezes one width per
 * column; rows are rendered into aligned, wrapped lines only when the owning
 * formatter is rendered.
 */

import { ShapeError, StateError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { WrapFn } from "./text-wrap.js";
import type { ColumnAlign, LineSource, RenderableLine } from "./types.js";
import { bound, fraction, once, resolveWidth, sum, type WidthSpec } from "./utils.js";

const log = createLogger("columns");

const DEFAULT_SEPARATOR = "   ";
const DEFAULT_MIN_WIDTH = 2;
const DEFAULT_FIRST_MAX_WIDTH = fraction(0.25);

export interface ColumnLayoutOptions {
	/** Text between adjacent columns (default: three spaces) */
	separator?: string;
	/** Per-column alignment (default: all left) */
	align?: ColumnAlign[];
	/** Per-column wrapping (default: first column keeps its cells on one line) */
	wrap?: boolean[];
	/** Per-column minimum width (default: 2) */
	minWidths?: WidthSpec[];
	/** Per-column maximum width (default: a quarter of the space for the first column) */
	maxWidths?: (WidthSpec | undefined)[];
}

/** What a layout needs from the formatter that owns it. */
export interface ColumnOwner {
	readonly maxWidth: number;
	readonly wrap: WrapFn;
	appendRaw(line: RenderableLine, extraIndent?: number): void;
}

function perColumn<T>(name: string, values: T[] | undefined, numColumns: number): T[] | undefined {
	if (values === undefined) return undefined;
	if (values.length !== numColumns) {
		throw new ShapeError(`Expected ${numColumns} ${name} entries but got ${values.length}`, {
			expected: numColumns,
			actual: values.length,
			context: { option: name },
		});
	}
	return [...values];
}

function alignText(text: string, width: number, align: ColumnAlign): string {
	switch (align) {
		case "right":
			return text.padStart(width);
		case "center": {
			const gap = width - text.length;
			if (gap <= 0) return text;
			const left = Math.floor(gap / 2);
			return " ".repeat(left) + text + " ".repeat(gap - left);
		}
		default:
			return text.padEnd(width);
	}
}

/**
 * One table row as stored in the formatter.
 */
export class ColumnRow implements LineSource {
	readonly renderLines: () => readonly string[];

	constructor(
		readonly layout: ColumnLayout,
		readonly cells: readonly string[],
	) {
		this.renderLines = once(() => layout.formatRow(cells));
	}
}

export class ColumnLayout {
	readonly numColumns: number;
	readonly separator: string;
	readonly align: readonly ColumnAlign[];
	readonly wrap: readonly boolean[];
	readonly minWidths: readonly WidthSpec[];
	readonly maxWidths: readonly (WidthSpec | undefined)[];

	private readonly rows: ColumnRow[] = [];
	private frozenWidths: readonly number[] | null = null;

	constructor(
		private readonly owner: ColumnOwner,
		numColumns = 2,
		options: ColumnLayoutOptions = {},
	) {
		if (!Number.isInteger(numColumns) || numColumns < 1) {
			throw new ShapeError(`Column count must be a positive integer, got ${numColumns}`, {
				actual: numColumns,
			});
		}
		this.numColumns = numColumns;
		this.separator = options.separator ?? DEFAULT_SEPARATOR;
		this.align =
			perColumn("align", options.align, numColumns) ??
			new Array<ColumnAlign>(numColumns).fill("left");
		this.wrap =
			perColumn("wrap", options.wrap, numColumns) ??
			Array.from({ length: numColumns }, (_, i) => i > 0);
		this.minWidths =
			perColumn("minWidths", options.minWidths, numColumns) ??
			new Array<WidthSpec>(numColumns).fill(DEFAULT_MIN_WIDTH);
		this.maxWidths =
			perColumn("maxWidths", options.maxWidths, numColumns) ??
			Array.from({ length: numColumns }, (_, i) => (i === 0 ? DEFAULT_FIRST_MAX_WIDTH : undefined));
	}

	get closed(): boolean {
		return this.frozenWidths !== null;
	}

	get rowCount(): number {
		return this.rows.length;
	}

	/** Column widths, available once the layout is closed. */
	get widths(): readonly number[] {
		if (this.frozenWidths === null) {
			throw new StateError("Column widths are not available until the layout is closed", {
				state: "open",
			});
		}
		return this.frozenWidths;
	}

	append(...cells: string[]): void {
		if (this.closed) {
			throw new StateError("Cannot append a row to a closed column layout", { state: "closed" });
		}
		if (cells.length !== this.numColumns) {
			throw new ShapeError(`Expected ${this.numColumns} cells but got ${cells.length}`, {
				expected: this.numColumns,
				actual: cells.length,
			});
		}
		const row = new ColumnRow(this, cells);
		this.rows.push(row);
		this.owner.appendRaw(row);
	}

	close(): void {
		if (this.closed) return;
		const widths = this.computeWidths();
		this.frozenWidths = Object.freeze(widths);
		log.debug("Computed column widths", { widths, rows: this.rows.length });
	}

	private computeWidths(): number[] {
		const { maxWidth } = this.owner;
		let used = this.separator.length * (this.numColumns - 1);
		const available = maxWidth - used;
		const minWidths = this.minWidths.map((spec) => resolveWidth(spec, available));
		const maxWidths = this.maxWidths.map((spec) => resolveWidth(spec, available));

		const widths: number[] = [];
		for (let i = 0; i < this.numColumns; i++) {
			const lengths = this.rows.map((row) => row.cells[i].length).sort((a, b) => a - b);
			// Leave every column to the right at least its minimum.
			const capacity = bound(undefined, maxWidth - used - sum(minWidths.slice(i + 1)), maxWidths[i]);
			if (!this.wrap[i]) {
				// Outliers are dropped so they spill onto their own line instead.
				while (lengths.length > 0 && lengths[lengths.length - 1] > capacity) {
					lengths.pop();
				}
			}
			const longest = lengths.length > 0 ? lengths[lengths.length - 1] : minWidths[i];
			const width = bound(minWidths[i], longest, capacity);
			used += width;
			widths.push(width);
		}
		return widths;
	}

	/**
	 * Renders one row into display lines. Cells are wrapped to their column and
	 * zipped line by line; a line wider than its column pushes the remaining
	 * columns down to the next line.
	 */
	formatRow(cells: readonly string[]): string[] {
		const widths = this.widths;
		const wrapped = cells.map((cell, i) => this.formatCell(i, cell, widths));
		const depth = Math.max(0, ...wrapped.map((cellLines) => cellLines.length));

		const lines: string[] = [];
		for (let position = 0; position < depth; position++) {
			const slice: (string | undefined)[] = wrapped.map((cellLines) =>
				position < cellLines.length ? cellLines[position] : undefined,
			);
			for (const parts of this.matchLines(slice, widths)) {
				lines.push(parts.join(this.separator).trimEnd());
			}
		}
		return lines;
	}

	private formatCell(index: number, cell: string, widths: readonly number[]): string[] {
		const width =
			this.wrap[index] || cell.length <= widths[index]
				? widths[index]
				: sum(widths.slice(index)) + this.separator.length * (this.numColumns - index - 1);
		return this.owner.wrap(cell, width).map((line) => alignText(line, width, this.align[index]));
	}

	private matchLines(cells: readonly (string | undefined)[], widths: readonly number[]): string[][] {
		const groups: string[][] = [];
		let current: string[] = [];
		for (let i = 0; i < cells.length; i++) {
			const cell = cells[i] ?? " ".repeat(widths[i]);
			current.push(cell);
			if (cell.length > widths[i]) {
				groups.push(current);
				if (i + 1 === this.numColumns) return groups;
				current = [" ".repeat(sum(widths.slice(0, i + 1)) + this.separator.length * i)];
			}
		}
		groups.push(current);
		return groups;
	}
}
