import { StateError } from "./errors.js";

export type IndentScopeState = "unopened" | "active" | "closed";

/** Moves the owner's indent level by `delta`; may reject a shift. */
export type IndentShift = (delta: number) => void;

/**
 * Raises a formatter's indent level while active and lowers it by the same
 * amount on exit. Use {@link IndentScope.run} so the exit happens even when the
 * body throws.
 */
export class IndentScope {
	private current: IndentScopeState = "unopened";

	constructor(
		private readonly shift: IndentShift,
		readonly amount: number,
	) {}

	get state(): IndentScopeState {
		return this.current;
	}

	enter(): this {
		if (this.current !== "unopened") {
			throw new StateError(`Cannot enter an indent scope that is ${this.current}`, {
				state: this.current,
			});
		}
		this.shift(this.amount);
		this.current = "active";
		return this;
	}

	exit(): void {
		if (this.current !== "active") {
			throw new StateError(`Cannot exit an indent scope that is ${this.current}`, {
				state: this.current,
			});
		}
		this.current = "closed";
		this.shift(-this.amount);
	}

	run<T>(fn: () => T): T {
		this.enter();
		try {
			return fn();
		} finally {
			this.exit();
		}
	}
}
