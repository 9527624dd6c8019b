#!/usr/bin/env -S npx tsx
/**
 * @module
 *
 * CLI script to load a machine from a specification file and run it on a word.
 *
 * @example Usage via npm script
 * ```sh
 * npm run run-machine -- --infile incrementer.tm --word 100001
 * npm run run-machine -- --infile incrementer.tm --word 1010 --accept --max-steps 1000
 * ```
 *
 * Options:
 * - `--infile <path>` - Path to the specification file (required)
 * - `--word <symbols>` - Input word, one character per symbol (default: empty)
 * - `--head <n>` - Initial head position (default: 0)
 * - `--max-steps <n>` - Upper bound on the number of steps
 * - `--accept` - Print the acceptance verdict instead of running
 * - `--trace` - Print every step
 * - `--debug` - Enable debug logging
 */

import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import {
	fromSpecification,
	isMachineError,
	type Machine,
	type MachineObserver,
	type Movement,
	RunResult,
} from "../src/mod.ts";

type Options = {
	infile: string;
	word: string;
	head: number;
	maxSteps?: number;
	accept?: boolean;
	trace?: boolean;
	debug?: boolean;
};

const OUTCOMES: Record<RunResult, string> = {
	[RunResult.HaltReached]: "halt state reached",
	[RunResult.StepLimitReached]: "step limit reached",
	[RunResult.UnknownTransition]: "no transition defined",
};

function parseInteger(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n)) {
		throw new InvalidArgumentError("Not an integer.");
	}
	return n;
}

class TraceObserver implements MachineObserver<string, string> {
	#step = 0;

	onStepStart(state: string, symbol: string): void {
		this.#step += 1;
		console.log(`#${this.#step} -> state "${state}", write "${symbol}"`);
	}

	onStepEnd(_state: string, _symbol: string, movement: Movement): void {
		console.log(`#${this.#step}    ${movement}`);
	}

	onTapeChanged(headPosition: number): void {
		console.log(`tape set, head at ${headPosition}`);
	}

	onHeadMoved(headPosition: number, previousHeadPosition: number): void {
		console.log(`#${this.#step}    head ${previousHeadPosition} -> ${headPosition}`);
	}
}

function renderTape(machine: Machine<string, string>): string {
	return [...machine.tape]
		.map((s, i) => (i === machine.headPosition ? `[${s}]` : s))
		.join("");
}

const program = new Command()
	.name("run-machine")
	.description("Run a Turing machine specification file on an input word")
	.requiredOption("--infile <path>", "path to the specification file")
	.option("--word <symbols>", "input word, one character per symbol", "")
	.option("--head <n>", "initial head position", parseInteger, 0)
	.option("--max-steps <n>", "upper bound on the number of steps", parseInteger)
	.option("--accept", "print the acceptance verdict instead of running")
	.option("--trace", "print every step")
	.option("--debug", "enable debug logging")
	.parse();

const args = program.opts<Options>();

let machine: Machine<string, string>;
try {
	const spec = await readFile(args.infile, "utf8");
	machine = fromSpecification(spec, { debug: args.debug });
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "ENOENT") {
		console.error(`Error: File not found: ${args.infile}`);
	} else {
		console.error(`Error: ${error instanceof Error ? error.message : error}`);
	}
	process.exit(1);
}

const word = Array.from(args.word);

try {
	if (args.accept) {
		const verdict = machine.isWordAccepted(word, args.maxSteps);
		console.log(
			verdict === null ? "indeterminate" : verdict ? "accepted" : "rejected"
		);
	} else {
		if (args.trace) machine.attachObserver(new TraceObserver());
		machine.setTape(word, args.head);
		const result = machine.run(args.maxSteps);
		console.log(`Outcome: ${OUTCOMES[result]}`);
		console.log(`State: ${machine.state}`);
		console.log(`Steps: ${machine.executedSteps}`);
		console.log(`Tape: ${renderTape(machine)}`);
	}
} catch (error) {
	if (!isMachineError(error)) throw error;
	console.error(`Error: ${error.message}`);
	process.exit(1);
}
