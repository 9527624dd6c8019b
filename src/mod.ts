/**
 * @module
 *
 * A single-tape deterministic Turing machine simulator.
 *
 * This module provides a validated machine model with step-by-step and
 * run-to-completion execution, an incremental builder that collects and checks
 * the machine description, and a parser for a small line-oriented
 * specification language. Execution events reach presentation layers through
 * the observer interface.
 *
 * @example Building a machine
 * ```typescript
 * import { MachineBuilder, Movement, RunResult } from "turing-tape";
 *
 * const machine = new MachineBuilder()
 *   .setBlankSymbol("#")
 *   .setHaltState("H")
 *   .setInitialState("q0")
 *   .addTransition("q0", "0", "q0", "1", Movement.MoveRight)
 *   .addTransition("q0", "1", "q0", "0", Movement.MoveRight)
 *   .addTransition("q0", "#", "H", "#", Movement.NoMove)
 *   .create();
 *
 * machine.setTape(["0", "1"]);
 * machine.run() === RunResult.HaltReached; // true
 * [...machine.tape]; // ["1", "0", "#"]
 * ```
 *
 * @example Parsing a specification
 * ```typescript
 * import { fromSpecification } from "turing-tape";
 *
 * const machine = fromSpecification(`
 *   % accepts words of ones
 *   BLANK #
 *   INITIAL q0
 *   HALT H
 *   FINAL H
 *   q0, 1 -> q0, 1, >
 *   q0, # -> H, #, _
 * `);
 *
 * machine.isWordAccepted(["1", "1", "1"]); // true
 * ```
 */

export * from "./errors.ts";
export * from "./machine.ts";
export * from "./builder.ts";
export * from "./parser.ts";
