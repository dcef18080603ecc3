import {
	Machine,
	type MachineConfig,
	type MachineIdentifier,
	type RunResult,
	type StepRecord,
} from "./machine.ts";
import type { MachineModel } from "./model.ts";

/** Options of a single `simulate()` call. */
export type SimulateOptions = MachineConfig & {
	/** Collect a record of every executed step (default: false) */
	verbose?: boolean;
	/** Halt with HALTED_STEP_LIMIT after this many steps */
	stepLimit?: number;
};

/** Everything a front end needs to report a finished run. */
export type Simulation = {
	result: RunResult;
	identifier: MachineIdentifier;
	/** Executed steps in order; empty unless `verbose` */
	trace: StepRecord[];
};

/**
 * Builds a fresh machine from the model, runs it on the input and returns the
 * outcome. Each call uses its own machine instance.
 *
 * @throws ValidationError if the model is invalid
 *
 * @example
 * ```typescript
 * const { result, trace } = simulate(model, "0101", { verbose: true, stepLimit: 1000 });
 * ```
 */
export function simulate(
	model: MachineModel,
	input: string,
	options: SimulateOptions = {}
): Simulation {
	const { verbose = false, stepLimit, ...config } = options;
	const machine = new Machine(model, config).input(input);

	const trace: StepRecord[] = [];
	const unsub = verbose ? machine.onStep((record) => trace.push(record)) : null;

	const result = machine.run(stepLimit);
	unsub?.();

	return { result, identifier: machine.identifier(), trace };
}
