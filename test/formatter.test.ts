import { describe, it, expect, afterEach, vi } from "vitest";
import { Formatter } from "../lib/formatter.js";
import { StateError, WidthError } from "../lib/errors.js";

describe("Formatter", () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	describe("appendText", () => {
		it("packs whole words greedily up to the width", () => {
			const formatter = new Formatter({ maxWidth: 10 });
			formatter.appendText("a b c d e f g h");

			expect(formatter.render()).toBe("a b c d e\nf g h");
		});

		it("wraps at the width left after the active indent", () => {
			const formatter = new Formatter({ maxWidth: 10 });
			formatter.withIndent(() => {
				formatter.appendText("a b c d e f g h");
			});

			expect(formatter.render()).toBe("  a b c d\n  e f g h");
		});

		it("applies extra indent to wrapping and output", () => {
			const formatter = new Formatter({ maxWidth: 10 });
			formatter.appendText("hello world", 4);

			expect(formatter.render()).toBe("    hello\n    world");
		});

		it("throws WidthError when no width is left", () => {
			const formatter = new Formatter({ maxWidth: 4 });

			expect(() => formatter.appendText("x", 4)).toThrow(WidthError);
			formatter.withIndent(() => {
				expect(() => formatter.appendText("x")).toThrow(WidthError);
			}, 6);
			expect(formatter.render()).toBe("");
		});

		it("uses a supplied wrap function", () => {
			const wrap = vi.fn((text: string) => [text.toUpperCase()]);
			const formatter = new Formatter({ maxWidth: 12, wrap });
			formatter.appendText("abc", 2);

			expect(wrap).toHaveBeenCalledWith("abc", 10);
			expect(formatter.render()).toBe("  ABC");
		});
	});

	describe("appendRaw", () => {
		it("stores the line without wrapping", () => {
			const formatter = new Formatter({ maxWidth: 5 });
			formatter.appendRaw("this is long");

			expect(formatter.render()).toBe("this is long");
		});

		it("expands a nested formatter at render time", () => {
			const nested = new Formatter({ maxWidth: 20 });
			nested.appendText("alpha");
			nested.appendText("beta");
			const outer = new Formatter({ maxWidth: 20 });
			outer.appendRaw(nested, 2);

			expect(outer.render()).toBe("  alpha\n  beta");
		});
	});

	describe("paragraphBreak", () => {
		it("collapses repeated breaks into one blank line", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.appendText("one");
			formatter.paragraphBreak();
			formatter.paragraphBreak();
			formatter.paragraphBreak();
			formatter.appendText("two");

			expect([...formatter]).toHaveLength(3);
			expect(formatter.render()).toBe("one\n\ntwo");
		});

		it("does nothing on an empty buffer", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.paragraphBreak();

			expect([...formatter]).toEqual([]);
		});

		it("drops a trailing break from the output", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.appendText("one");
			formatter.paragraphBreak();

			expect(formatter.render()).toBe("one");
			expect(formatter.render()).toBe("one");
		});
	});

	describe("extend", () => {
		it("treats a leading blank string as a paragraph break", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.appendText("head");
			formatter.extend(["", "body", "tail"]);

			expect(formatter.render()).toBe("head\n\nbody\ntail");
		});

		it("keeps the indent a nested formatter resolved", () => {
			const nested = new Formatter({ maxWidth: 20 });
			nested.withIndent(() => {
				nested.appendText("inner");
			});
			const outer = new Formatter({ maxWidth: 20 });
			outer.appendText("outer");
			outer.withIndent(() => {
				outer.extend(nested);
			}, 4);

			expect(outer.render()).toBe("outer\n  inner");
		});

		it("never stores consecutive blank lines", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.extend(["a", "", "", "b"]);

			expect([...formatter].map((line) => line.content)).toEqual(["a", "", "b"]);
		});

		it("ignores an empty source", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.extend([]);

			expect(formatter.render()).toBe("");
		});
	});

	describe("indentation", () => {
		it("restores the level after the scope body throws", () => {
			const formatter = new Formatter({ maxWidth: 20 });

			expect(() =>
				formatter.withIndent(() => {
					throw new Error("boom");
				}),
			).toThrow("boom");
			expect(formatter.indentLevel).toBe(0);
		});

		it("composes nested scopes", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.withIndent(() => {
				formatter.withIndent(() => {
					expect(formatter.indentLevel).toBe(5);
					formatter.appendText("deep");
				}, 3);
				formatter.appendText("mid");
			});

			expect(formatter.indentLevel).toBe(0);
			expect(formatter.render()).toBe("     deep\n  mid");
		});

		it("dedents inside an outer scope", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.withIndent(() => {
				formatter.withIndent(() => {
					expect(formatter.indentLevel).toBe(2);
					formatter.appendText("back");
				}, -2);
				expect(formatter.indentLevel).toBe(4);
			}, 4);

			expect(formatter.indentLevel).toBe(0);
			expect(formatter.render()).toBe("  back");
		});

		it("rejects a dedent below zero and fractional amounts", () => {
			const formatter = new Formatter({ maxWidth: 20 });

			expect(() => formatter.withIndent(() => "unreached", -1)).toThrow(
				"Indent level cannot drop below zero (got -1)",
			);
			expect(formatter.indentLevel).toBe(0);
			expect(() => formatter.openIndent(1.5)).toThrow(WidthError);
		});

		it("reports the width left at the current indent", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.withIndent(() => {
				expect(formatter.getWidth()).toBe(16);
				expect(formatter.getWidth(3)).toBe(13);
			}, 4);
		});
	});

	describe("render", () => {
		it("is repeatable", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.appendText("Options:");
			formatter.withIndent(() => {
				formatter.withColumns((layout) => {
					layout.append("-v", "verbose");
				});
			});

			const first = formatter.render();
			expect(formatter.render()).toBe(first);
			expect(String(formatter)).toBe(first);
			expect(first).toBe("Options:\n  -v   verbose");
		});

		it("propagates StateError for rows of an open layout", () => {
			const formatter = new Formatter({ maxWidth: 20 });
			formatter.openColumns().append("a", "b");

			expect(() => formatter.render()).toThrow(StateError);
		});
	});

	it("defaults the width to the terminal width", () => {
		vi.stubEnv("HELP_LAYOUT_WIDTH", "55");

		expect(new Formatter().maxWidth).toBe(55);
	});
});
