import { expect, test } from "vitest";
import { MachineBuilder } from "../src/builder.ts";
import {
	CompletionError,
	MalformedInputError,
	ValidationError,
} from "../src/errors.ts";
import { Movement, RunResult } from "../src/machine.ts";

test("builds and runs the binary incrementer", () => {
	const machine = new MachineBuilder<number | string, number | string>()
		.setBlankSymbol("#")
		.setHaltState("HALT")
		.addTransition(1, 0, 2, 1, Movement.MoveRight)
		.addTransition(1, 1, 2, 0, Movement.MoveRight)
		.addTransition(2, 0, 1, 0, Movement.NoMove)
		.addTransition(2, 1, 3, 1, Movement.MoveRight)
		.addTransition(3, 0, "HALT", 0, Movement.NoMove)
		.addTransition(3, 1, "HALT", 1, Movement.NoMove)
		.addTransition(3, "#", "HALT", "#", Movement.NoMove)
		.setInitialState(1)
		.addFinalState(2)
		.create();

	expect([...machine.states]).toEqual(["HALT", 1, 2, 3]);
	expect([...machine.inputAlphabet]).toEqual([0, 1]);
	expect([...machine.tapeAlphabet]).toEqual([0, 1, "#"]);
	expect([...machine.finalStates]).toEqual([2]);

	machine.setTape([1, 0, 0, 0, 0, 1]);
	expect(machine.run()).toBe(RunResult.HaltReached);
	expect([...machine.tape]).toEqual([0, 1, 1, 1, 1, 1, "#"]);
	expect(machine.executedSteps).toBe(11);
});

test("mutators return the builder", () => {
	const builder = new MachineBuilder();
	expect(builder.setInitialState("q")).toBe(builder);
	expect(builder.setBlankSymbol("#")).toBe(builder);
	expect(builder.setHaltState("H")).toBe(builder);
	expect(builder.addFinalState("H")).toBe(builder);
	expect(builder.addTransition("q", "a", "H", "a", Movement.NoMove)).toBe(
		builder
	);
	expect(builder.clean()).toBe(builder);
});

test("create requires the initial state, blank symbol and halt state", () => {
	const missingOf = (builder: MachineBuilder) => {
		try {
			builder.create();
			return null;
		} catch (e) {
			return e instanceof CompletionError ? e.missing : "unexpected";
		}
	};

	const builder = new MachineBuilder().addTransition(
		"q",
		"a",
		"H",
		"a",
		Movement.NoMove
	);
	expect(missingOf(builder)).toBe("initial state");
	builder.setInitialState("q");
	expect(missingOf(builder)).toBe("blank symbol");
	builder.setBlankSymbol("#");
	expect(missingOf(builder)).toBe("halt state");
	builder.setHaltState("H");
	expect(missingOf(builder)).toBe(null);

	expect(() => new MachineBuilder().create()).toThrow(
		"It is necessary to specify the initial state"
	);
});

test("presence queries follow the builder state", () => {
	const builder = new MachineBuilder();
	expect(builder.hasInitialState()).toBe(false);
	expect(builder.hasBlankSymbol()).toBe(false);
	expect(builder.hasHaltState()).toBe(false);

	builder.setInitialState("q").setBlankSymbol("#").setHaltState("H");
	expect(builder.hasInitialState()).toBe(true);
	expect(builder.hasBlankSymbol()).toBe(true);
	expect(builder.hasHaltState()).toBe(true);
	expect(builder.initialState).toBe("q");
	expect(builder.blankSymbol).toBe("#");
	expect(builder.haltState).toBe("H");

	builder.clean();
	expect(builder.hasInitialState()).toBe(false);
	expect(builder.hasBlankSymbol()).toBe(false);
	expect(builder.hasHaltState()).toBe(false);
	expect(builder.states.size).toBe(0);
	expect(builder.inputAlphabet.size).toBe(0);
	expect(() => builder.create()).toThrow(CompletionError);
});

test("later transition for the same pair replaces the earlier one", () => {
	const machine = new MachineBuilder()
		.setInitialState("q")
		.setBlankSymbol("#")
		.setHaltState("H")
		.addTransition("q", "a", "q", "a", Movement.MoveRight)
		.addTransition("q", "a", "H", "b", Movement.MoveLeft)
		.create();

	expect(machine.transitions.length).toBe(1);
	expect(machine.transitionFor("q", "a")).toEqual({
		state: "q",
		symbol: "a",
		newState: "H",
		newSymbol: "b",
		movement: Movement.MoveLeft,
	});
});

test("numeric and string identifiers stay apart", () => {
	const machine = new MachineBuilder<number | string, number | string>()
		.setInitialState(1)
		.setBlankSymbol("#")
		.setHaltState("1")
		.addTransition(1, 1, "1", "1", Movement.NoMove)
		.create();

	expect(machine.states.size).toBe(2);
	expect(machine.transitionFor(1, 1)?.newSymbol).toBe("1");
	expect(machine.transitionFor(1, "1")).toBe(null);
});

test("blank symbol is kept out of the input alphabet once it is known", () => {
	const before = new MachineBuilder()
		.addTransition("q", "#", "H", "#", Movement.NoMove)
		.setBlankSymbol("#");
	expect([...before.inputAlphabet]).toEqual(["#"]);

	const after = new MachineBuilder()
		.setBlankSymbol("#")
		.addTransition("q", "#", "H", "a", Movement.NoMove);
	expect([...after.inputAlphabet]).toEqual(["a"]);

	const machine = after.setInitialState("q").setHaltState("H").create();
	expect([...machine.tapeAlphabet]).toEqual(["a", "#"]);
});

test("replaced halt state is kept only as a transition endpoint", () => {
	const unused = new MachineBuilder().setHaltState("X").setHaltState("Y");
	expect([...unused.states]).toEqual(["Y"]);

	const byTransition = new MachineBuilder()
		.setHaltState("X")
		.addTransition("q", "a", "X", "a", Movement.NoMove)
		.setHaltState("Y");
	expect([...byTransition.states]).toEqual(["X", "q", "Y"]);
});

test("replaced halt state is dropped even when it is initial or final", () => {
	const invariantOf = (builder: MachineBuilder) => {
		try {
			builder.create();
			return null;
		} catch (e) {
			return e instanceof ValidationError ? e.invariant : "unexpected";
		}
	};

	const byInitial = new MachineBuilder()
		.setBlankSymbol("#")
		.setInitialState("X")
		.setHaltState("X")
		.setHaltState("Y");
	expect([...byInitial.states]).toEqual(["Y"]);
	expect(invariantOf(byInitial)).toBe("initial-state-known");

	const byFinal = new MachineBuilder()
		.setBlankSymbol("#")
		.setHaltState("X")
		.addFinalState("X")
		.setHaltState("Y")
		.setInitialState("Y");
	expect([...byFinal.states]).toEqual(["Y"]);
	expect(invariantOf(byFinal)).toBe("final-states-known");
});

test("malformed transitions and blank symbols are rejected", () => {
	const builder = new MachineBuilder();
	// as an untyped caller would pass it
	const sideways: Movement = JSON.parse('"Sideways"');

	expect(() => builder.addTransition("q", "a", "q", "a", sideways)).toThrow(
		'Invalid movement "Sideways"'
	);
	expect(() =>
		builder.addTransition("q", "ab", "q", "a", Movement.NoMove)
	).toThrow(MalformedInputError);
	expect(() =>
		builder.addTransition("q", "a", "q", "ab", Movement.NoMove)
	).toThrow('Symbol "ab" is longer than one char');
	// rejected calls leave nothing behind
	expect(builder.states.size).toBe(0);

	expect(() => builder.setBlankSymbol("")).toThrow(MalformedInputError);
	expect(() => builder.setBlankSymbol("##")).toThrow(MalformedInputError);
	expect(() => new MachineBuilder<string, number>().setBlankSymbol(10)).toThrow(
		'Blank symbol must be one char long, got "10"'
	);
	expect(builder.hasBlankSymbol()).toBe(false);
});

test("options are handed to the created machine", () => {
	const calls: unknown[][] = [];
	const record = (...args: unknown[]) => {
		calls.push(args);
		return String(args[0] ?? "");
	};
	const logger = { debug: record, log: record, warn: record, error: record };

	const machine = new MachineBuilder({ debug: true, logger })
		.setBlankSymbol("#")
		.setHaltState("H")
		.setInitialState("q")
		.addTransition("q", "#", "H", "#", Movement.NoMove)
		.create();

	expect(machine.debug).toBe(true);
	expect(machine.logger).toBe(logger);
	expect(calls).toEqual([
		["[TM builder]", 'addTransition(): ("q", "#") -> ("H", "#", NoMove)'],
		["[TM builder]", "create() with 2 states and 1 transitions"],
		["[TM]", 'Machine created with 2 states and initial state "q"'],
	]);
});
