export { Formatter, type FormatterOptions } from "./formatter.js";
export { ColumnLayout, ColumnRow, type ColumnLayoutOptions, type ColumnOwner } from "./columns.js";
export { IndentScope, type IndentScopeState, type IndentShift } from "./indent-scope.js";
export { wrapText, type WrapFn } from "./text-wrap.js";
export { getTerminalWidth, type TerminalLike } from "./terminal.js";
export { fromCliName, identity, toCliName, typeLabel, type ValueConverter } from "./naming.js";
export { bound, fraction, once, resolveWidth, type Fraction, type WidthSpec } from "./utils.js";
export {
	ErrorCode,
	LayoutError,
	ShapeError,
	StateError,
	WidthError,
	type ErrorCodeType,
	type LayoutErrorOptions,
} from "./errors.js";
export { createLogger, initLogger, type LogClient, type LogEntry, type LogLevel, type ScopedLogger } from "./logger.js";
export { DEFAULT_TERMINAL_WIDTH, PACKAGE_NAME } from "./constants.js";
export type { ColumnAlign, FormatterLine, LineSource, RenderableLine } from "./types.js";
