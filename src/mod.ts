/**
 * @module
 *
 * A lightweight, typed simulator of deterministic single-tape Turing machines.
 *
 * A machine is described by a plain model (states with ordered transitions),
 * either written by hand or parsed from JSON, YAML or TOML. It runs
 * synchronously on an input string until it accepts (no transition left in a
 * final state), rejects (no transition left in a non-final state) or reaches
 * an optional step limit.
 *
 * @example Basic usage
 * ```typescript
 * import { Machine } from "tape-machine";
 *
 * const tm = new Machine({
 *   states: [
 *     { name: "A", start: true, transitions: [
 *       { cons: "b", prod: "_", move: "L", next: "B" },
 *       { cons: "*", prod: "*", move: "S", next: "C" },
 *     ] },
 *     { name: "B" },
 *     { name: "C", final: true },
 *   ],
 * });
 *
 * tm.input("x").run(); // → { status: "HALTED_FINAL", steps: 1, accepted: true }
 * ```
 *
 * @example From source text
 * ```typescript
 * import { Machine } from "tape-machine";
 *
 * const tm = Machine.fromSource(await readFile("copy.toml", "utf8"), "toml");
 * tm.input("0101").run(1000);
 * ```
 *
 * @example Verbose run
 * ```typescript
 * import { formatStep, simulate } from "tape-machine";
 *
 * const { result, trace } = simulate(model, "0101", { verbose: true });
 * trace.forEach((r) => console.log(formatStep(r)));
 * ```
 */

export * from "./tape.ts";
export * from "./errors.ts";
export * from "./model.ts";
export * from "./machine.ts";
export * from "./parse.ts";
export * from "./simulate.ts";
export * from "./format.ts";
