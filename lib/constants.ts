export const PACKAGE_NAME = "help-layout";

/** Width used when the terminal size cannot be determined. */
export const DEFAULT_TERMINAL_WIDTH = 78;
