import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import {
	HaltStateError,
	InvalidObserverError,
	InvalidSymbolError,
	MalformedInputError,
	UnknownTransitionError,
	UnsetTapeError,
	ValidationError,
} from "./errors.ts";

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
export const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/**
 * Head movement applied after a symbol is written.
 */
export const Movement = {
	MoveLeft: "MoveLeft",
	MoveRight: "MoveRight",
	NoMove: "NoMove",
} as const;

export type Movement = (typeof Movement)[keyof typeof Movement];

const MOVEMENTS: ReadonlySet<unknown> = new Set<unknown>(Object.values(Movement));

/** Returns `true` if the value is one of the three legal movements. */
export function isMovement(value: unknown): value is Movement {
	return MOVEMENTS.has(value);
}

/**
 * Outcome codes returned by {@link Machine.run}.
 */
export const RunResult = {
	HaltReached: 0,
	StepLimitReached: 1,
	UnknownTransition: 2,
} as const;

export type RunResult = (typeof RunResult)[keyof typeof RunResult];

/**
 * States and symbols are opaque values compared by identity,
 * so they are restricted to primitives usable as Map/Set keys.
 */
export type Identifier = string | number;

/**
 * One entry of the transition function:
 * `(state, symbol) -> (newState, newSymbol, movement)`.
 */
export type Transition<TState extends Identifier, TSymbol extends Identifier> = {
	state: TState;
	symbol: TSymbol;
	newState: TState;
	newSymbol: TSymbol;
	movement: Movement;
};

/**
 * Execution observer. Every method is mandatory and must declare exactly
 * the listed parameters, which {@link Machine.attachObserver} checks at runtime.
 *
 * - `onStepStart(state, symbol)` - a transition was found; called before the
 *   tape is written, with the state and symbol the transition will produce
 * - `onStepEnd(state, symbol, movement)` - the step finished
 * - `onTapeChanged(headPosition)` - `setTape()` installed a new tape; receives
 *   the head position as it was passed
 * - `onHeadMoved(headPosition, previousHeadPosition)` - the head index changed
 */
export interface MachineObserver<
	TState extends Identifier,
	TSymbol extends Identifier
> {
	onStepStart(state: TState, symbol: TSymbol): void;
	onStepEnd(state: TState, symbol: TSymbol, movement: Movement): void;
	onTapeChanged(headPosition: number): void;
	onHeadMoved(headPosition: number, previousHeadPosition: number): void;
}

/** Runtime options shared by the machine, builder and parser. */
export type MachineOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Constructor configuration: the full formal description of a machine.
 *
 * @template TState - Type of the state identifiers
 * @template TSymbol - Type of the tape symbols
 */
export type MachineConfig<
	TState extends Identifier,
	TSymbol extends Identifier
> = MachineOptions & {
	states: Iterable<TState>;
	inputAlphabet: Iterable<TSymbol>;
	tapeAlphabet: Iterable<TSymbol>;
	transitions: Iterable<Transition<TState, TSymbol>>;
	initial: TState;
	finals: Iterable<TState>;
	halt: TState;
	blank: TSymbol;
};

type StepStartDetail<TState, TSymbol> = { state: TState; symbol: TSymbol };

type StepEndDetail<TState, TSymbol> = {
	state: TState;
	symbol: TSymbol;
	movement: Movement;
};

type HeadMovedDetail = { headPosition: number; previousHeadPosition: number };

type EventDetails<TState, TSymbol> = {
	stepStart: StepStartDetail<TState, TSymbol>;
	stepEnd: StepEndDetail<TState, TSymbol>;
	tapeChanged: number;
	headMoved: HeadMovedDetail;
};

/**
 * Factory function to create a Machine instance.
 * Equivalent to calling `new Machine(config)`.
 *
 * @example
 * ```typescript
 * const machine = createMachine({
 *   states: ["q0", "H"],
 *   inputAlphabet: ["1"],
 *   tapeAlphabet: ["1", "#"],
 *   transitions: [
 *     { state: "q0", symbol: "1", newState: "q0", newSymbol: "1", movement: Movement.MoveRight },
 *     { state: "q0", symbol: "#", newState: "H", newSymbol: "#", movement: Movement.NoMove },
 *   ],
 *   initial: "q0",
 *   finals: ["H"],
 *   halt: "H",
 *   blank: "#",
 * });
 * ```
 */
export function createMachine<
	TState extends Identifier,
	TSymbol extends Identifier
>(config: MachineConfig<TState, TSymbol>): Machine<TState, TSymbol> {
	return new Machine<TState, TSymbol>(config);
}

/**
 * A single-tape deterministic Turing machine.
 *
 * The description (states, alphabets, transition function, initial, final and
 * halt states, blank symbol) is validated once in the constructor and never
 * changes afterwards. The tape, head, current state and executed step counter
 * are the mutable runtime part.
 *
 * The tape is conceptually infinite: it is held in a growable buffer and every
 * position outside it reads as the blank symbol. Moving left from the first
 * cell inserts a blank in front (the head stays at index 0), moving right past
 * the last cell appends one.
 *
 * Execution is synchronous. Observers are notified in registration order and
 * must not call `step()` or `run()` on the same machine.
 *
 * @template TState - Type of the state identifiers
 * @template TSymbol - Type of the tape symbols
 *
 * @example
 * ```typescript
 * machine.setTape(["1", "1"]);
 * machine.run(); // RunResult.HaltReached
 * [...machine.tape]; // ["1", "1", "#"]
 * ```
 */
export class Machine<TState extends Identifier, TSymbol extends Identifier> {
	readonly #states: ReadonlySet<TState>;
	readonly #inputAlphabet: ReadonlySet<TSymbol>;
	readonly #tapeAlphabet: ReadonlySet<TSymbol>;
	readonly #finals: ReadonlySet<TState>;
	readonly #transitions = new Map<
		TState,
		Map<TSymbol, Transition<TState, TSymbol>>
	>();
	readonly #initial: TState;
	readonly #halt: TState;
	readonly #blank: TSymbol;

	#tape: TSymbol[] | null = null;
	#head = 0;
	#state: TState;
	#executedSteps = 0;

	/** Internal pub sub carrying observer notifications; observer errors reach the caller */
	#pubsub = createPubSub({
		onError: (error) => {
			throw error;
		},
	});

	/** Attached observers and their unsubscribers, in registration order */
	#observers = new Map<MachineObserver<TState, TSymbol>, Unsubscriber[]>();

	/** While set, observers are not notified (acceptance checks) */
	#muted = false;

	#logger: Logger;

	#debug: boolean;

	/**
	 * Creates a new Machine instance.
	 * @param config - The formal machine description plus optional logging options
	 * @throws ValidationError if the description breaks one of the invariants
	 */
	constructor(config: MachineConfig<TState, TSymbol>) {
		this.#debug = config.debug ?? false;
		this.#logger = config.logger ?? defaultLogger;

		this.#states = new Set(config.states);
		this.#inputAlphabet = new Set(config.inputAlphabet);
		this.#tapeAlphabet = new Set(config.tapeAlphabet);
		this.#finals = new Set(config.finals);
		this.#initial = config.initial;
		this.#halt = config.halt;
		this.#blank = config.blank;

		const transitions = Array.from(config.transitions, (t) => ({ ...t }));
		this.#validate(transitions);

		for (const t of transitions) {
			let bySymbol = this.#transitions.get(t.state);
			if (!bySymbol) {
				bySymbol = new Map();
				this.#transitions.set(t.state, bySymbol);
			}
			bySymbol.set(t.symbol, t);
		}

		this.#state = this.#initial;
		this.#debugLog(
			`Machine created with ${this.#states.size} states and initial state "${this.#initial}"`
		);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[TM]", ...args);
		}
	}

	/** Checks the description invariants, throwing on the first violation. */
	#validate(transitions: Transition<TState, TSymbol>[]): void {
		for (const symbol of this.#inputAlphabet) {
			if (!this.#tapeAlphabet.has(symbol)) {
				throw new ValidationError(
					"input-alphabet-subset",
					[symbol],
					`Input alphabet is not a subset of the tape alphabet ("${symbol}")`
				);
			}
		}

		if (!this.#tapeAlphabet.has(this.#blank)) {
			throw new ValidationError(
				"blank-in-tape-alphabet",
				[this.#blank],
				`Blank symbol "${this.#blank}" is not in the tape alphabet`
			);
		}

		if (!this.#states.has(this.#initial)) {
			throw new ValidationError(
				"initial-state-known",
				[this.#initial],
				`Initial state "${this.#initial}" is not a valid state`
			);
		}

		for (const state of this.#finals) {
			if (!this.#states.has(state)) {
				throw new ValidationError(
					"final-states-known",
					[state],
					`Final state "${state}" is not a valid state`
				);
			}
		}

		if (!this.#states.has(this.#halt)) {
			throw new ValidationError(
				"halt-state-known",
				[this.#halt],
				`Halt state "${this.#halt}" is not a valid state`
			);
		}

		for (const t of transitions) {
			const invalidStates = [t.state, t.newState].filter(
				(s) => !this.#states.has(s)
			);
			if (invalidStates.length) {
				throw new ValidationError(
					"transition-states-known",
					invalidStates,
					`Invalid state "${invalidStates[0]}" in transition ${formatTransition(t)}`
				);
			}

			const invalidSymbols = [t.symbol, t.newSymbol].filter(
				(s) => !this.#tapeAlphabet.has(s)
			);
			if (invalidSymbols.length) {
				throw new ValidationError(
					"transition-symbols-known",
					invalidSymbols,
					`Invalid symbol "${invalidSymbols[0]}" in transition ${formatTransition(t)}`
				);
			}

			if (!isMovement(t.movement)) {
				throw new ValidationError(
					"transition-movement-legal",
					[t.movement],
					`Invalid movement "${String(t.movement)}" in transition ${formatTransition(t)}`
				);
			}
		}
	}

	#publish<E extends keyof EventDetails<TState, TSymbol>>(
		event: E,
		detail: EventDetails<TState, TSymbol>[E]
	): void {
		if (!this.#muted) {
			this.#pubsub.publish(event, detail);
		}
	}

	/**
	 * Returns whether debug mode is enabled.
	 * @returns `true` if debug logging is active, `false` otherwise
	 */
	get debug(): boolean {
		return this.#debug;
	}

	/**
	 * Returns the logger instance used by this machine.
	 * @returns The Logger instance (default: console)
	 */
	get logger(): Logger {
		return this.#logger;
	}

	/** The current state */
	get state(): TState {
		return this.#state;
	}

	get initialState(): TState {
		return this.#initial;
	}

	get haltState(): TState {
		return this.#halt;
	}

	get blankSymbol(): TSymbol {
		return this.#blank;
	}

	get states(): ReadonlySet<TState> {
		return this.#states;
	}

	get finalStates(): ReadonlySet<TState> {
		return this.#finals;
	}

	get inputAlphabet(): ReadonlySet<TSymbol> {
		return this.#inputAlphabet;
	}

	get tapeAlphabet(): ReadonlySet<TSymbol> {
		return this.#tapeAlphabet;
	}

	/** All transition function entries, grouped by source state. */
	get transitions(): Transition<TState, TSymbol>[] {
		const out: Transition<TState, TSymbol>[] = [];
		for (const bySymbol of this.#transitions.values()) {
			for (const t of bySymbol.values()) out.push({ ...t });
		}
		return out;
	}

	/** Size of the live tape buffer (0 while the tape is unset). */
	get tapeSize(): number {
		return this.#tape?.length ?? 0;
	}

	get headPosition(): number {
		return this.#head;
	}

	/**
	 * The live tape buffer as a restartable iterable: every `for...of`
	 * (or spread) walks it again from index 0.
	 * @throws UnsetTapeError if no tape was set
	 */
	get tape(): Iterable<TSymbol> {
		const tape = this.#tape;
		if (!tape) {
			throw new UnsetTapeError();
		}
		return { [Symbol.iterator]: () => tape.values() };
	}

	/** Steps executed since construction or the last `resetExecutedSteps()`. */
	get executedSteps(): number {
		return this.#executedSteps;
	}

	get isHalted(): boolean {
		return this.#state === this.#halt;
	}

	get isAtFinalState(): boolean {
		return this.#finals.has(this.#state);
	}

	get isTapeSet(): boolean {
		return this.#tape !== null;
	}

	/**
	 * Returns the symbol at the given tape index. Indexes outside the live
	 * buffer, non-integer indexes and any index while the tape is unset read
	 * as blank.
	 */
	symbolAt(index: number): TSymbol {
		const tape = this.#tape;
		if (!tape || !Number.isInteger(index) || index < 0 || index >= tape.length) {
			return this.#blank;
		}
		return tape[index];
	}

	/**
	 * Returns the transition defined for the given pair, or `null`.
	 */
	transitionFor(state: TState, symbol: TSymbol): Transition<TState, TSymbol> | null {
		const t = this.#transitions.get(state)?.get(symbol);
		return t ? { ...t } : null;
	}

	/**
	 * Checks whether `step()` would succeed without executing it.
	 * This is a pure query operation that does not modify the machine.
	 */
	canStep(): boolean {
		if (this.isHalted || !this.#tape) return false;
		return this.transitionFor(this.#state, this.#tape[this.#head]) !== null;
	}

	/**
	 * Installs a new tape and head position.
	 *
	 * A negative head position pads the tape on the left with that many blanks
	 * and puts the head on index 0. A head position at or beyond the end pads
	 * the tape on the right with blanks up to and including the head cell
	 * (an empty tape becomes a single blank). The current state and the
	 * executed step counter are left as they are.
	 *
	 * @param tape - Symbols to place on the tape, left to right
	 * @param headPosition - Initial head index (default 0)
	 * @throws InvalidSymbolError if a symbol is not in the tape alphabet
	 * @throws MalformedInputError if the head position is not an integer
	 */
	setTape(tape: Iterable<TSymbol>, headPosition = 0): void {
		if (!Number.isInteger(headPosition)) {
			throw new MalformedInputError(
				headPosition,
				`Head position must be an integer, got ${headPosition}`
			);
		}

		const symbols = Array.from(tape);
		symbols.forEach((s, i) => {
			if (!this.#tapeAlphabet.has(s)) {
				throw new InvalidSymbolError(s, i);
			}
		});

		if (headPosition < 0) {
			this.#tape = [
				...new Array<TSymbol>(-headPosition).fill(this.#blank),
				...symbols,
			];
			this.#head = 0;
		} else {
			while (symbols.length <= headPosition) symbols.push(this.#blank);
			this.#tape = symbols;
			this.#head = headPosition;
		}

		this.#debugLog(
			`setTape() with ${this.#tape.length} cells, head at ${this.#head}`
		);
		this.#publish("tapeChanged", headPosition);
	}

	/** Forces the current state back to the initial state. The tape is untouched. */
	setAtInitialState(): void {
		this.#debugLog(`setAtInitialState() from "${this.#state}"`);
		this.#state = this.#initial;
	}

	/** Sets the executed step counter back to 0. */
	resetExecutedSteps(): void {
		this.#executedSteps = 0;
	}

	/**
	 * Performs one execution step.
	 *
	 * Notification order: `onStepStart` (before the tape is written),
	 * `onStepEnd`, then `onHeadMoved` only if the head index changed.
	 *
	 * @throws HaltStateError if the machine is in its halt state
	 * @throws UnsetTapeError if no tape was set
	 * @throws UnknownTransitionError if no transition exists for the current
	 *   state and symbol; the machine is left untouched
	 */
	step(): void {
		if (this.isHalted) {
			throw new HaltStateError(this.#state);
		}
		const tape = this.#tape;
		if (!tape) {
			throw new UnsetTapeError();
		}

		const symbol = tape[this.#head];
		const t = this.#transitions.get(this.#state)?.get(symbol);
		if (!t) {
			this.#debugLog(`step() failed: no transition for ("${this.#state}", "${symbol}")`);
			throw new UnknownTransitionError(this.#state, symbol);
		}

		this.#publish("stepStart", { state: t.newState, symbol: t.newSymbol });

		tape[this.#head] = t.newSymbol;
		this.#state = t.newState;

		const previousHead = this.#head;
		switch (t.movement) {
			case Movement.MoveLeft:
				if (this.#head === 0) {
					tape.unshift(this.#blank);
				} else {
					this.#head -= 1;
				}
				break;
			case Movement.MoveRight:
				this.#head += 1;
				if (this.#head === tape.length) {
					tape.push(this.#blank);
				}
				break;
			case Movement.NoMove:
				break;
		}

		this.#debugLog(
			`step(): ("${t.state}", "${t.symbol}") -> ("${t.newState}", "${t.newSymbol}", ${t.movement})`
		);

		this.#publish("stepEnd", {
			state: t.newState,
			symbol: t.newSymbol,
			movement: t.movement,
		});
		if (previousHead !== this.#head) {
			this.#publish("headMoved", {
				headPosition: this.#head,
				previousHeadPosition: previousHead,
			});
		}

		this.#executedSteps += 1;
	}

	/**
	 * Performs steps until the halt state, an undefined transition or the step limit.
	 *
	 * Without `maxSteps` this may never return for a machine that loops forever;
	 * the step bound is the only way to cap execution.
	 *
	 * @param maxSteps - Optional upper bound on the number of steps
	 * @returns `RunResult.HaltReached` (0), `RunResult.StepLimitReached` (1)
	 *   or `RunResult.UnknownTransition` (2)
	 * @throws UnsetTapeError if no tape was set
	 * @throws MalformedInputError if `maxSteps` is negative or not an integer
	 */
	run(maxSteps?: number): RunResult {
		if (
			maxSteps !== undefined &&
			(!Number.isInteger(maxSteps) || maxSteps < 0)
		) {
			throw new MalformedInputError(
				maxSteps,
				`Step limit must be a non-negative integer, got ${maxSteps}`
			);
		}
		this.#debugLog(`run(${maxSteps ?? ""}) called from state "${this.#state}"`);

		try {
			if (maxSteps === undefined) {
				while (!this.isHalted) this.step();
				return RunResult.HaltReached;
			}

			for (let i = 0; i < maxSteps; i++) this.step();
			return this.isHalted
				? RunResult.HaltReached
				: RunResult.StepLimitReached;
		} catch (e) {
			if (e instanceof HaltStateError) return RunResult.HaltReached;
			if (e instanceof UnknownTransitionError) {
				return RunResult.UnknownTransition;
			}
			throw e;
		}
	}

	/**
	 * Checks whether a word is accepted, without disturbing the machine.
	 *
	 * The word is installed as a fresh tape (head at 0) and run from the
	 * initial state. Afterwards the previous tape, head, current state and
	 * executed step counter are restored, whatever happened. Observers are
	 * not notified while the check runs.
	 *
	 * @param word - Input symbols
	 * @param maxSteps - Optional upper bound on the number of steps
	 * @returns `true` if execution stopped (halt or undefined transition) in a
	 *   final state, `false` if it stopped elsewhere, `null` if the step limit
	 *   was hit first
	 * @throws InvalidSymbolError if the word contains a symbol outside the tape alphabet
	 *
	 * @example
	 * ```typescript
	 * machine.isWordAccepted(["1", "0"]);        // true | false
	 * machine.isWordAccepted(["1", "0"], 1000); // true | false | null
	 * ```
	 */
	isWordAccepted(word: Iterable<TSymbol>, maxSteps?: number): boolean | null {
		this.#debugLog("isWordAccepted() called");
		const tape = this.#tape;
		const head = this.#head;
		const state = this.#state;
		const executedSteps = this.#executedSteps;
		const muted = this.#muted;

		this.#muted = true;
		try {
			this.setTape(word);
			this.#state = this.#initial;
			const result = this.run(maxSteps);
			return result === RunResult.StepLimitReached
				? null
				: this.isAtFinalState;
		} finally {
			this.#tape = tape;
			this.#head = head;
			this.#state = state;
			this.#executedSteps = executedSteps;
			this.#muted = muted;
		}
	}

	/**
	 * Attaches an observer. Attaching the same observer twice is a no-op.
	 *
	 * @throws InvalidObserverError if a callback is missing or declares the
	 *   wrong number of parameters
	 */
	attachObserver(observer: MachineObserver<TState, TSymbol>): void {
		const contract: Array<[keyof MachineObserver<TState, TSymbol>, unknown, number]> = [
			["onStepStart", observer.onStepStart, 2],
			["onStepEnd", observer.onStepEnd, 3],
			["onTapeChanged", observer.onTapeChanged, 1],
			["onHeadMoved", observer.onHeadMoved, 2],
		];
		for (const [method, fn, arity] of contract) {
			if (typeof fn !== "function") {
				throw new InvalidObserverError(
					method,
					`Observer must have an ${method} method`
				);
			}
			if (fn.length !== arity) {
				throw new InvalidObserverError(
					method,
					`Observer ${method} method must have ${arity} parameters`
				);
			}
		}

		if (this.#observers.has(observer)) return;

		this.#observers.set(observer, [
			this.#pubsub.subscribe(
				"stepStart",
				(d: StepStartDetail<TState, TSymbol>) =>
					observer.onStepStart(d.state, d.symbol)
			),
			this.#pubsub.subscribe(
				"stepEnd",
				(d: StepEndDetail<TState, TSymbol>) =>
					observer.onStepEnd(d.state, d.symbol, d.movement)
			),
			this.#pubsub.subscribe("tapeChanged", (headPosition: number) =>
				observer.onTapeChanged(headPosition)
			),
			this.#pubsub.subscribe("headMoved", (d: HeadMovedDetail) =>
				observer.onHeadMoved(d.headPosition, d.previousHeadPosition)
			),
		]);
		this.#debugLog(`attachObserver() (${this.#observers.size} attached)`);
	}

	/** Detaches an observer. Unknown observers are ignored. */
	detachObserver(observer: MachineObserver<TState, TSymbol>): void {
		const unsubs = this.#observers.get(observer);
		if (!unsubs) return;
		unsubs.forEach((unsub) => unsub());
		this.#observers.delete(observer);
		this.#debugLog(`detachObserver() (${this.#observers.size} attached)`);
	}

	/**
	 * Human readable description of the machine.
	 *
	 * @example
	 * ```typescript
	 * console.log(String(machine));
	 * // States: 1, 2, HALT
	 * // ...
	 * // Transition function:
	 * //     (1, 0) -> (2, 1, MoveRight)
	 * ```
	 */
	toString(): string {
		const list = (values: Iterable<unknown>) => [...values].join(", ");
		let out = `States: ${list(this.#states)}\n`;
		out += `Input alphabet: ${list(this.#inputAlphabet)}\n`;
		out += `Tape alphabet: ${list(this.#tapeAlphabet)}\n`;
		out += `Blank symbol: ${this.#blank}\n`;
		out += `Initial state: ${this.#initial}\n`;
		out += `Final states: ${list(this.#finals)}\n`;
		out += `Halt state: ${this.#halt}\n`;
		out += `\nTransition function:\n`;
		for (const t of this.transitions) {
			out += `    ${formatTransition(t)}\n`;
		}
		return out;
	}
}

function formatTransition<TState extends Identifier, TSymbol extends Identifier>(
	t: Transition<TState, TSymbol>
): string {
	return `(${t.state}, ${t.symbol}) -> (${t.newState}, ${t.newSymbol}, ${t.movement})`;
}
