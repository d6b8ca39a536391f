/** Content that expands to one or more display lines at render time. */
export interface LineSource {
	renderLines(): readonly string[];
}

/** A stored line: plain text, or a source rendered lazily. */
export type RenderableLine = string | LineSource;

export interface FormatterLine {
	/** Absolute indent in spaces. */
	indent: number;
	content: RenderableLine;
}

export type ColumnAlign = "left" | "right" | "center";
