/**
 * Discriminant carried by every error thrown by this library.
 * Switch on `error.kind` instead of matching messages.
 */
export type MachineErrorKind =
	| "HaltState"
	| "UnsetTape"
	| "InvalidSymbol"
	| "UnknownTransition"
	| "Validation"
	| "Completion"
	| "MalformedInput"
	| "InvalidObserver"
	| "UnrecognizedLine"
	| "DuplicateDirective"
	| "Line";

/**
 * Machine description invariants checked when a {@link Machine} is constructed.
 */
export type MachineInvariant =
	| "input-alphabet-subset"
	| "blank-in-tape-alphabet"
	| "initial-state-known"
	| "final-states-known"
	| "halt-state-known"
	| "transition-states-known"
	| "transition-symbols-known"
	| "transition-movement-legal";

/** Base class of all errors thrown by the machine, builder and parser. */
export abstract class MachineError extends Error {
	abstract readonly kind: MachineErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Narrows an unknown caught value to a {@link MachineError}.
 *
 * @example
 * ```typescript
 * try {
 *   machine.step();
 * } catch (e) {
 *   if (isMachineError(e) && e.kind === "UnknownTransition") { ... }
 * }
 * ```
 */
export function isMachineError(value: unknown): value is MachineError {
	return value instanceof MachineError;
}

/** `step()` was called while the machine sits in its halt state. */
export class HaltStateError extends MachineError {
	readonly kind = "HaltState";

	constructor(readonly state: unknown) {
		super(`Current state "${String(state)}" is the halt state`);
	}
}

/** `step()` was called before any tape was set. */
export class UnsetTapeError extends MachineError {
	readonly kind = "UnsetTape";

	constructor() {
		super("Tape must be set before performing a step");
	}
}

/** A tape was given a symbol outside the tape alphabet. */
export class InvalidSymbolError extends MachineError {
	readonly kind = "InvalidSymbol";

	constructor(readonly symbol: unknown, readonly position: number) {
		super(`Invalid tape symbol "${String(symbol)}" at position ${position}`);
	}
}

/** No transition is defined for the current (state, symbol) pair. */
export class UnknownTransitionError extends MachineError {
	readonly kind = "UnknownTransition";

	constructor(readonly state: unknown, readonly symbol: unknown) {
		// prettier-ignore
		super(`There is no transition for ("${String(state)}", "${String(symbol)}")`);
	}
}

/** A machine description broke one of the construction invariants. */
export class ValidationError extends MachineError {
	readonly kind = "Validation";

	constructor(
		readonly invariant: MachineInvariant,
		readonly values: readonly unknown[],
		message: string
	) {
		super(message);
	}
}

/** The builder was asked to create a machine before it had every mandatory part. */
export class CompletionError extends MachineError {
	readonly kind = "Completion";

	constructor(readonly missing: "initial state" | "blank symbol" | "halt state") {
		super(`It is necessary to specify the ${missing}`);
	}
}

/** A builder or engine argument has the wrong shape (bad movement, wide symbol, bad bound). */
export class MalformedInputError extends MachineError {
	readonly kind = "MalformedInput";

	constructor(readonly value: unknown, message: string) {
		super(message);
	}
}

/** An observer does not implement the observer contract. */
export class InvalidObserverError extends MachineError {
	readonly kind = "InvalidObserver";

	constructor(readonly method: string, message: string) {
		super(message);
	}
}

/** A specification line matched none of the grammar's statements. */
export class UnrecognizedLineError extends MachineError {
	readonly kind = "UnrecognizedLine";

	constructor(readonly line: number | null, readonly text: string) {
		super(withLine(line, `Unrecognized pattern: ${text}`));
	}
}

/** A once-only directive (INITIAL, BLANK, HALT) appeared a second time. */
export class DuplicateDirectiveError extends MachineError {
	readonly kind = "DuplicateDirective";

	constructor(
		readonly line: number | null,
		readonly directive: "INITIAL" | "BLANK" | "HALT"
	) {
		super(withLine(line, `${directive} can only be defined once`));
	}
}

/**
 * Any other failure raised while applying a specification line,
 * tagged with its 1-based line number. The original error is the `cause`.
 */
export class LineError extends MachineError {
	readonly kind = "Line";

	constructor(readonly line: number, cause: unknown) {
		// prettier-ignore
		super(withLine(line, cause instanceof Error ? cause.message : String(cause)), { cause });
	}
}

function withLine(line: number | null, message: string): string {
	return line === null ? message : `Line ${line}: ${message}`;
}
