/**
 * Line buffer for help text.
 *
 * Text is wrapped as it is appended, at the width left after the current
 * indentation. Column rows are stored as they are appended and rendered only
 * when the formatter itself is rendered.
 */

import { ColumnLayout, type ColumnLayoutOptions } from "./columns.js";
import { WidthError } from "./errors.js";
import { IndentScope } from "./indent-scope.js";
import { createLogger } from "./logger.js";
import { getTerminalWidth } from "./terminal.js";
import { wrapText, type WrapFn } from "./text-wrap.js";
import type { FormatterLine, LineSource, RenderableLine } from "./types.js";

const log = createLogger("formatter");

export interface FormatterOptions {
	/** Total width available (default: the terminal width) */
	maxWidth?: number;
	/** Word-wrap function used for paragraphs and table cells */
	wrap?: WrapFn;
}

function isBlank(content: RenderableLine): boolean {
	return content === "";
}

function expand(content: RenderableLine): readonly string[] {
	return typeof content === "string" ? [content] : content.renderLines();
}

export class Formatter implements Iterable<FormatterLine>, LineSource {
	static readonly delimiter = "\n";

	readonly maxWidth: number;
	readonly wrap: WrapFn;

	private readonly lines: FormatterLine[] = [];
	private indent = 0;

	constructor(options: FormatterOptions = {}) {
		this.maxWidth = options.maxWidth ?? getTerminalWidth();
		this.wrap = options.wrap ?? wrapText;
	}

	get indentLevel(): number {
		return this.indent;
	}

	/** Width left for text at the current indent plus `extraIndent`. */
	getWidth(extraIndent = 0): number {
		return this.maxWidth - this.indent - extraIndent;
	}

	private shiftIndent(delta: number): void {
		const next = this.indent + delta;
		if (next < 0) {
			throw new WidthError(`Indent level cannot drop below zero (got ${next})`, { width: next });
		}
		this.indent = next;
	}

	appendText(line: string, extraIndent = 0): void {
		const width = this.getWidth(extraIndent);
		if (width <= 0) {
			throw new WidthError(
				`No room to wrap text: width ${this.maxWidth} minus indent ${this.indent + extraIndent}`,
				{ width, context: { maxWidth: this.maxWidth, indent: this.indent + extraIndent } },
			);
		}
		for (const wrapped of this.wrap(line, width)) {
			this.appendRaw(wrapped, extraIndent);
		}
	}

	appendRaw(line: RenderableLine, extraIndent = 0): void {
		this.lines.push({ indent: this.indent + extraIndent, content: line });
	}

	/** Adds a blank separator unless the buffer is empty or already ends with one. */
	paragraphBreak(): void {
		const last = this.lines[this.lines.length - 1];
		if (last && !isBlank(last.content)) {
			this.lines.push({ indent: 0, content: "" });
		}
	}

	/**
	 * Merges lines from another formatter, or plain strings at indent 0.
	 * Entries keep their own indent.
	 */
	extend(source: Iterable<FormatterLine | string>): void {
		for (const item of source) {
			const entry = typeof item === "string" ? { indent: 0, content: item } : item;
			if (isBlank(entry.content)) {
				this.paragraphBreak();
			} else {
				this.lines.push({ indent: entry.indent, content: entry.content });
			}
		}
	}

	/** Scope that indents by `amount`; a negative amount dedents. */
	openIndent(amount = 2): IndentScope {
		if (!Number.isInteger(amount)) {
			throw new WidthError(`Indent amount must be an integer, got ${amount}`, { width: amount });
		}
		return new IndentScope((delta) => this.shiftIndent(delta), amount);
	}

	withIndent<T>(fn: () => T, amount = 2): T {
		return this.openIndent(amount).run(fn);
	}

	openColumns(numColumns = 2, options: ColumnLayoutOptions = {}): ColumnLayout {
		return new ColumnLayout(this, numColumns, options);
	}

	/** Runs `fn` with a new column layout and closes the layout afterwards. */
	withColumns<T>(
		fn: (layout: ColumnLayout) => T,
		numColumns = 2,
		options: ColumnLayoutOptions = {},
	): T {
		const layout = this.openColumns(numColumns, options);
		try {
			return fn(layout);
		} finally {
			layout.close();
		}
	}

	renderLines(): string[] {
		const stop = log.time("render");
		const last = this.lines[this.lines.length - 1];
		const stored = last && isBlank(last.content) ? this.lines.slice(0, -1) : this.lines;

		const output: string[] = [];
		for (const { indent, content } of stored) {
			const prefix = " ".repeat(indent);
			for (const line of expand(content)) {
				output.push(prefix + line);
			}
		}
		stop();
		return output;
	}

	render(): string {
		return this.renderLines().join(Formatter.delimiter);
	}

	toString(): string {
		return this.render();
	}

	[Symbol.iterator](): Iterator<FormatterLine> {
		return this.lines.slice()[Symbol.iterator]();
	}
}
