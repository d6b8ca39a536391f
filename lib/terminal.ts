import { DEFAULT_TERMINAL_WIDTH } from "./constants.js";

/** The parts of an output stream used to size help text. */
export interface TerminalLike {
	isTTY?: boolean;
	columns?: number;
}

function parseWidth(value: string | undefined): number | undefined {
	const trimmed = value?.trim();
	if (!trimmed || !/^\d+$/.test(trimmed)) return undefined;
	const parsed = Number.parseInt(trimmed, 10);
	return parsed > 0 ? parsed : undefined;
}

/**
 * Width available for help output.
 * Order: HELP_LAYOUT_WIDTH, the TTY's column count, COLUMNS, then 78.
 */
export function getTerminalWidth(
	stream: TerminalLike = process.stdout,
	env: NodeJS.ProcessEnv = process.env,
): number {
	const override = parseWidth(env.HELP_LAYOUT_WIDTH);
	if (override !== undefined) return override;
	if (stream.isTTY && stream.columns !== undefined && stream.columns > 0) {
		return stream.columns;
	}
	return parseWidth(env.COLUMNS) ?? DEFAULT_TERMINAL_WIDTH;
}
