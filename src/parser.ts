import { MachineBuilder } from "./builder.ts";
import {
	DuplicateDirectiveError,
	LineError,
	MalformedInputError,
	UnrecognizedLineError,
} from "./errors.ts";
import {
	type Identifier,
	type Logger,
	type Machine,
	type MachineOptions,
	Movement,
	defaultLogger,
} from "./machine.ts";

/** Movement tokens of the specification language. */
export const MOVEMENT_TOKENS: Readonly<Record<Movement, string>> = {
	MoveLeft: "<",
	MoveRight: ">",
	NoMove: "_",
};

const MOVEMENT_BY_TOKEN: ReadonlyMap<string, Movement> = new Map([
	[MOVEMENT_TOKENS.MoveLeft, Movement.MoveLeft],
	[MOVEMENT_TOKENS.MoveRight, Movement.MoveRight],
	[MOVEMENT_TOKENS.NoMove, Movement.NoMove],
]);

/**
 * Structured form of one specification line.
 */
export type LineToken =
	| { type: "empty" }
	| { type: "comment" }
	| {
			type: "transition";
			state: string;
			symbol: string;
			newState: string;
			newSymbol: string;
			movement: Movement;
	  }
	| { type: "final"; state: string }
	| { type: "initial"; state: string }
	| { type: "blank"; symbol: string }
	| { type: "halt"; state: string };

type LineClassifier = (line: string) => LineToken | null;

const TRANSITION_RE =
	/^\s*(\w+)\s*,\s*(.)\s*->\s*(\w+)\s*,\s*(.)\s*,\s*([<>_])\s*$/u;
const COMMENT_RE = /^\s*%/;
const FINAL_RE = /^\s*FINAL\s+(\w+)\s*$/;
const INITIAL_RE = /^\s*INITIAL\s+(\w+)\s*$/;
const BLANK_RE = /^\s*BLANK\s+(.)\s*$/u;
const HALT_RE = /^\s*HALT\s+(\w+)\s*$/;

/**
 * Line classifiers in recognition order; the first one returning a token wins.
 */
const LINE_CLASSIFIERS: readonly LineClassifier[] = [
	(line) => (line.trim() ? null : { type: "empty" }),
	(line) => {
		const m = line.match(TRANSITION_RE);
		if (!m) return null;
		const [, state, symbol, newState, newSymbol, token] = m;
		const movement = MOVEMENT_BY_TOKEN.get(token);
		if (!movement) return null;
		return { type: "transition", state, symbol, newState, newSymbol, movement };
	},
	(line) => (COMMENT_RE.test(line) ? { type: "comment" } : null),
	(line) => {
		const m = line.match(FINAL_RE);
		return m ? { type: "final", state: m[1] } : null;
	},
	(line) => {
		const m = line.match(INITIAL_RE);
		return m ? { type: "initial", state: m[1] } : null;
	},
	(line) => {
		const m = line.match(BLANK_RE);
		return m ? { type: "blank", symbol: m[1] } : null;
	},
	(line) => {
		const m = line.match(HALT_RE);
		return m ? { type: "halt", state: m[1] } : null;
	},
];

/**
 * Classifies a single specification line.
 *
 * @param line - One line of text, without the line break
 * @returns The recognized token, or `null` if the line matches no statement
 *
 * @example
 * ```typescript
 * classifyLine("q0, 1 -> q1, 0, >");
 * // { type: "transition", state: "q0", symbol: "1", newState: "q1", newSymbol: "0", movement: "MoveRight" }
 * ```
 */
export function classifyLine(line: string): LineToken | null {
	for (const classify of LINE_CLASSIFIERS) {
		const token = classify(line);
		if (token) return token;
	}
	return null;
}

/**
 * Translates the line-oriented specification language into builder calls.
 *
 * **Statements (one per line, no trailing comments):**
 * - empty line
 * - `% comment`
 * - `INITIAL <state>` - once
 * - `BLANK <symbol>` - once
 * - `FINAL <state>` - any number of times
 * - `HALT <state>` - once
 * - `<state>, <symbol> -> <newState>, <newSymbol>, <movement>` where movement
 *   is `<` (left), `>` (right) or `_` (no movement)
 *
 * States are word characters, symbols are exactly one character.
 *
 * @example
 * ```typescript
 * const parser = new MachineParser();
 * parser.parseString(`
 *   BLANK #
 *   INITIAL q0
 *   HALT H
 *   q0, # -> H, #, _
 * `);
 * const machine = parser.create();
 * ```
 */
export class MachineParser {
	#builder: MachineBuilder<string, string>;

	#logger: Logger;

	#debug: boolean;

	/**
	 * @param options - Logging options, also handed to the builder and created machines
	 */
	constructor(options: MachineOptions = {}) {
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;
		this.#builder = new MachineBuilder<string, string>(options);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[TM parser]", ...args);
		}
	}

	/** Clears all the previously parsed data. */
	clean(): this {
		this.#builder.clean();
		return this;
	}

	hasInitialState(): boolean {
		return this.#builder.hasInitialState();
	}

	hasBlankSymbol(): boolean {
		return this.#builder.hasBlankSymbol();
	}

	hasHaltState(): boolean {
		return this.#builder.hasHaltState();
	}

	/**
	 * Parses one line and applies it to the builder.
	 *
	 * @param line - The line text
	 * @param lineNumber - 1-based line number reported by parser errors (default: none)
	 * @throws UnrecognizedLineError if the line matches no statement
	 * @throws DuplicateDirectiveError if INITIAL, BLANK or HALT is repeated
	 * @throws MalformedInputError if the builder rejects the values
	 */
	parseLine(line: string, lineNumber: number | null = null): this {
		const token = classifyLine(line);
		if (!token) {
			this.#debugLog(`parseLine() failed at line ${lineNumber ?? "?"}`);
			throw new UnrecognizedLineError(lineNumber, line);
		}

		switch (token.type) {
			case "empty":
			case "comment":
				break;
			case "transition":
				this.#builder.addTransition(
					token.state,
					token.symbol,
					token.newState,
					token.newSymbol,
					token.movement
				);
				break;
			case "final":
				this.#builder.addFinalState(token.state);
				break;
			case "initial":
				if (this.#builder.hasInitialState()) {
					throw new DuplicateDirectiveError(lineNumber, "INITIAL");
				}
				this.#builder.setInitialState(token.state);
				break;
			case "blank":
				if (this.#builder.hasBlankSymbol()) {
					throw new DuplicateDirectiveError(lineNumber, "BLANK");
				}
				this.#builder.setBlankSymbol(token.symbol);
				break;
			case "halt":
				if (this.#builder.hasHaltState()) {
					throw new DuplicateDirectiveError(lineNumber, "HALT");
				}
				this.#builder.setHaltState(token.state);
				break;
		}
		return this;
	}

	/**
	 * Parses a whole specification text, line by line.
	 *
	 * Parser errors carry their 1-based line number; any other error raised
	 * while applying a line is wrapped in a {@link LineError} with the original
	 * error as `cause`.
	 */
	parseString(text: string): this {
		const lines = text.split(/\r?\n/);
		this.#debugLog(`parseString() with ${lines.length} lines`);

		for (let i = 0; i < lines.length; i++) {
			try {
				this.parseLine(lines[i], i + 1);
			} catch (e) {
				if (
					e instanceof UnrecognizedLineError ||
					e instanceof DuplicateDirectiveError
				) {
					throw e;
				}
				throw new LineError(i + 1, e);
			}
		}
		return this;
	}

	/**
	 * Creates a machine with everything parsed so far.
	 * Builder and machine errors surface unchanged.
	 *
	 * @throws CompletionError if INITIAL, BLANK or HALT is missing
	 * @throws ValidationError if the machine description is invalid
	 */
	create(): Machine<string, string> {
		return this.#builder.create();
	}
}

/**
 * Parses a specification text and creates the machine in one call.
 *
 * @example
 * ```typescript
 * const machine = fromSpecification(`
 *   BLANK #
 *   INITIAL q0
 *   HALT H
 *   FINAL H
 *   q0, 1 -> q0, 1, >
 *   q0, # -> H, #, _
 * `);
 * machine.isWordAccepted(["1", "1"]); // true
 * ```
 */
export function fromSpecification(
	text: string,
	options: MachineOptions = {}
): Machine<string, string> {
	return new MachineParser(options).parseString(text).create();
}

/**
 * Renders a machine in the specification language: BLANK, INITIAL, HALT and
 * FINAL lines followed by one line per transition. Parsing the result yields
 * a machine with the same behavior.
 *
 * @throws MalformedInputError if a state is not a word token or a symbol is
 *   not a single character
 *
 * @example
 * ```typescript
 * console.log(toSpecification(machine));
 * // BLANK #
 * // INITIAL q0
 * // HALT H
 * // FINAL H
 * // q0, 1 -> q0, 1, >
 * // q0, # -> H, #, _
 * ```
 */
export function toSpecification<
	TState extends Identifier,
	TSymbol extends Identifier
>(machine: Machine<TState, TSymbol>): string {
	const state = (s: TState) => {
		const out = String(s);
		if (!/^\w+$/.test(out)) {
			throw new MalformedInputError(s, `State "${out}" is not a word token`);
		}
		return out;
	};
	const symbol = (s: TSymbol) => {
		const out = String(s);
		if (out.length !== 1) {
			throw new MalformedInputError(s, `Symbol "${out}" is not a single char`);
		}
		return out;
	};

	let spec = `BLANK ${symbol(machine.blankSymbol)}\n`;
	spec += `INITIAL ${state(machine.initialState)}\n`;
	spec += `HALT ${state(machine.haltState)}\n`;
	for (const s of machine.finalStates) {
		spec += `FINAL ${state(s)}\n`;
	}
	for (const t of machine.transitions) {
		// prettier-ignore
		spec += `${state(t.state)}, ${symbol(t.symbol)} -> ${state(t.newState)}, ${symbol(t.newSymbol)}, ${MOVEMENT_TOKENS[t.movement]}\n`;
	}
	return spec;
}
