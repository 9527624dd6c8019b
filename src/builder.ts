import { CompletionError, MalformedInputError } from "./errors.ts";
import {
	type Identifier,
	isMovement,
	type Logger,
	Machine,
	type MachineOptions,
	type Movement,
	type Transition,
	defaultLogger,
} from "./machine.ts";

/**
 * Collects a machine description piece by piece and creates a validated
 * {@link Machine} from it.
 *
 * States and symbols are registered implicitly as transitions, final, initial
 * and halt states are added. Symbols equal to the blank symbol known at the
 * time are kept out of the input alphabet. On `create()` the tape alphabet is
 * the input alphabet plus the blank symbol.
 *
 * All mutators return the builder, so calls can be chained.
 *
 * @template TState - Type of the state identifiers
 * @template TSymbol - Type of the tape symbols
 *
 * @example
 * ```typescript
 * const machine = new MachineBuilder()
 *   .setBlankSymbol("#")
 *   .setHaltState("H")
 *   .setInitialState("q0")
 *   .addTransition("q0", "1", "q0", "0", Movement.MoveRight)
 *   .addTransition("q0", "#", "H", "#", Movement.NoMove)
 *   .create();
 * ```
 */
export class MachineBuilder<
	TState extends Identifier = string,
	TSymbol extends Identifier = string
> {
	#states = new Set<TState>();
	#inputAlphabet = new Set<TSymbol>();
	#transitions = new Map<string, Transition<TState, TSymbol>>();
	#initial: TState | null = null;
	#finals = new Set<TState>();
	#halt: TState | null = null;
	#blank: TSymbol | null = null;

	#logger: Logger;

	#debug: boolean;

	/**
	 * @param options - Logging options, also handed to every created machine
	 */
	constructor(public readonly options: MachineOptions = {}) {
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[TM builder]", ...args);
		}
	}

	/**
	 * Clears all the previously collected data.
	 * @returns The builder instance for chaining
	 */
	clean(): this {
		this.#debugLog("clean() called");
		this.#states = new Set();
		this.#inputAlphabet = new Set();
		this.#transitions = new Map();
		this.#initial = null;
		this.#finals = new Set();
		this.#halt = null;
		this.#blank = null;
		return this;
	}

	/**
	 * Adds the transition `(state, symbol) -> (newState, newSymbol, movement)`,
	 * replacing any earlier one for the same `(state, symbol)` pair.
	 *
	 * @throws MalformedInputError if the movement is not a legal movement, or
	 *   a string symbol is longer than one character
	 */
	addTransition(
		state: TState,
		symbol: TSymbol,
		newState: TState,
		newSymbol: TSymbol,
		movement: Movement
	): this {
		if (!isMovement(movement)) {
			throw new MalformedInputError(
				movement,
				`Invalid movement "${String(movement)}"`
			);
		}
		for (const s of [symbol, newSymbol]) {
			if (typeof s === "string" && s.length > 1) {
				throw new MalformedInputError(s, `Symbol "${s}" is longer than one char`);
			}
		}

		this.#states.add(state);
		this.#states.add(newState);
		if (symbol !== this.#blank) this.#inputAlphabet.add(symbol);
		if (newSymbol !== this.#blank) this.#inputAlphabet.add(newSymbol);

		this.#transitions.set(transitionKey(state, symbol), {
			state,
			symbol,
			newState,
			newSymbol,
			movement,
		});
		this.#debugLog(
			`addTransition(): ("${state}", "${symbol}") -> ("${newState}", "${newSymbol}", ${movement})`
		);
		return this;
	}

	/** Adds a final state (idempotent). */
	addFinalState(state: TState): this {
		this.#states.add(state);
		this.#finals.add(state);
		return this;
	}

	/** Sets the initial state, replacing any previous one. Mandatory before `create()`. */
	setInitialState(state: TState): this {
		this.#states.add(state);
		this.#initial = state;
		return this;
	}

	/**
	 * Sets the blank symbol, replacing any previous one. Mandatory before `create()`.
	 * @throws MalformedInputError if the symbol is not exactly one char long
	 */
	setBlankSymbol(symbol: TSymbol): this {
		if (String(symbol).length !== 1) {
			throw new MalformedInputError(
				symbol,
				`Blank symbol must be one char long, got "${symbol}"`
			);
		}
		this.#blank = symbol;
		return this;
	}

	/**
	 * Sets the halt state, replacing any previous one. Mandatory before `create()`.
	 *
	 * A replaced halt state is dropped from the states unless a transition
	 * starts or ends in it.
	 */
	setHaltState(state: TState): this {
		const previous = this.#halt;
		if (previous !== null && !this.#isTransitionEndpoint(previous)) {
			this.#debugLog(`setHaltState(): dropping unused state "${previous}"`);
			this.#states.delete(previous);
		}
		this.#halt = state;
		this.#states.add(state);
		return this;
	}

	#isTransitionEndpoint(state: TState): boolean {
		for (const t of this.#transitions.values()) {
			if (t.state === state || t.newState === state) return true;
		}
		return false;
	}

	hasInitialState(): boolean {
		return this.#initial !== null;
	}

	hasHaltState(): boolean {
		return this.#halt !== null;
	}

	hasBlankSymbol(): boolean {
		return this.#blank !== null;
	}

	get initialState(): TState | null {
		return this.#initial;
	}

	get haltState(): TState | null {
		return this.#halt;
	}

	get blankSymbol(): TSymbol | null {
		return this.#blank;
	}

	/** States collected so far. */
	get states(): ReadonlySet<TState> {
		return this.#states;
	}

	/** Input alphabet collected so far (blank excluded at insertion time). */
	get inputAlphabet(): ReadonlySet<TSymbol> {
		return this.#inputAlphabet;
	}

	/**
	 * Creates a machine with the collected data.
	 * The tape alphabet is the input alphabet plus the blank symbol.
	 *
	 * @throws CompletionError if the initial state, blank symbol or halt state is unset
	 * @throws ValidationError if the machine description is invalid
	 */
	create(): Machine<TState, TSymbol> {
		const initial = this.#initial;
		const blank = this.#blank;
		const halt = this.#halt;
		if (initial === null) throw new CompletionError("initial state");
		if (blank === null) throw new CompletionError("blank symbol");
		if (halt === null) throw new CompletionError("halt state");

		this.#debugLog(
			`create() with ${this.#states.size} states and ${this.#transitions.size} transitions`
		);

		return new Machine<TState, TSymbol>({
			states: [...this.#states],
			inputAlphabet: [...this.#inputAlphabet],
			tapeAlphabet: [...this.#inputAlphabet, blank],
			transitions: [...this.#transitions.values()],
			initial,
			finals: [...this.#finals],
			halt,
			blank,
			debug: this.options.debug,
			logger: this.options.logger,
		});
	}
}

/** Map key for a (state, symbol) pair; JSON keeps 1 and "1" apart. */
function transitionKey(state: Identifier, symbol: Identifier): string {
	return JSON.stringify([state, symbol]);
}
