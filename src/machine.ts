import { createPubSub } from "@marianmeres/pubsub";
import {
	cloneModel,
	findTransition,
	symbolsOf,
	validateModel,
	type MachineModel,
	type StateDef,
} from "./model.ts";
import { parse } from "./parse.ts";
import { Tape, type Move, type TapeSnapshot } from "./tape.ts";

/**
 * Logger interface compatible with console and @marianmeres/clog.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

const defaultLogger: Logger = {
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

/** Terminal statuses. None of them is an error. */
export type HaltStatus = "HALTED_FINAL" | "HALTED_STUCK" | "HALTED_STEP_LIMIT";

/**
 * Execution status of the machine itself (not to be confused with the
 * simulated machine's states).
 */
export type MachineStatus = "READY" | "RUNNING" | HaltStatus;

/** Constructor configuration */
export type MachineConfig = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/** Describes one executed step, in execution order. */
export type StepRecord = {
	/** 1-based step number */
	step: number;
	from: string;
	consumed: string;
	produced: string;
	move: Move;
	to: string;
};

/** Outcome of `run()`. */
export type RunResult = {
	status: HaltStatus;
	steps: number;
	/** true only for HALTED_FINAL */
	accepted: boolean;
};

/** Read-only snapshot of the machine configuration. */
export type MachineIdentifier = {
	readonly state: string;
	readonly status: MachineStatus;
	readonly steps: number;
	readonly tape: TapeSnapshot;
};

/** Whether the status is one of the terminal ones. */
export function isHaltStatus(status: MachineStatus): status is HaltStatus {
	return status.startsWith("HALTED_");
}

/**
 * Factory function to create a Machine instance.
 * Equivalent to calling `new Machine(model, config)`.
 */
export function createMachine(
	model: MachineModel,
	config: MachineConfig = {}
): Machine {
	return new Machine(model, config);
}

/**
 * A deterministic, single-tape Turing machine.
 *
 * The machine is synchronous. It owns a private copy of its model and tape;
 * everything handed out (`identifier()`, `model()`, step records) is a copy.
 *
 * **Halting:** the machine stops only when a lookup for the current state and
 * the symbol under the head finds no transition. Being in a final state at
 * that moment means `HALTED_FINAL` (accept), otherwise `HALTED_STUCK`
 * (reject). Entering a final state which still has applicable transitions
 * does not stop the machine. `run(limit)` may also stop with
 * `HALTED_STEP_LIMIT`. Once halted, `step()` does nothing until `input()` or
 * `reset()`.
 *
 * @example
 * ```typescript
 * const tm = new Machine({
 *   states: [
 *     { name: "A", start: true, transitions: [
 *       { cons: "0", prod: "1", move: "R", next: "A" },
 *       { cons: "_", prod: "_", move: "S", next: "B" },
 *     ] },
 *     { name: "B", final: true },
 *   ],
 * });
 * tm.input("000");
 * tm.run(); // → { status: "HALTED_FINAL", steps: 4, accepted: true }
 * tm.identifier().tape.cells.join(""); // → "111_"
 * ```
 */
export class Machine {
	#model: MachineModel;

	#states: Map<string, StateDef>;

	#start: string;

	#blank: string;

	#wildcard: string;

	/** Name of the current state */
	#state: string;

	#tape: Tape;

	#steps = 0;

	#status: MachineStatus = "READY";

	/** Internal pub sub */
	#pubsub = createPubSub();

	/** Number of active "change" subscribers */
	#watchers = 0;

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	/**
	 * Creates a new machine with an empty tape.
	 * @throws ValidationError if the model breaks any invariant
	 */
	constructor(model: MachineModel, config: MachineConfig = {}) {
		this.#start = validateModel(model);
		this.#model = cloneModel(model);
		this.#states = new Map(this.#model.states.map((s) => [s.name, s]));
		const symbols = symbolsOf(this.#model);
		this.#blank = symbols.blank;
		this.#wildcard = symbols.wildcard;
		this.#debug = config.debug ?? false;
		this.#logger = config.logger ?? defaultLogger;
		this.#state = this.#start;
		this.#tape = new Tape("", this.#blank);
		this.#debugLog(
			`Machine created with ${this.#states.size} states, start state "${this.#start}"`
		);
	}

	/**
	 * Creates a machine from model source text.
	 * @throws ParseError if the text cannot be parsed
	 * @throws ValidationError if the parsed model is invalid
	 */
	static fromSource(
		source: string,
		format = "inferred",
		config: MachineConfig = {}
	): Machine {
		return new Machine(parse(source, format), config);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[TM]", ...args);
		}
	}

	/** Returns whether debug mode is enabled. */
	get debug(): boolean {
		return this.#debug;
	}

	/** Returns the logger instance used by this machine. */
	get logger(): Logger {
		return this.#logger;
	}

	/** Name of the current state. */
	get state(): string {
		return this.#state;
	}

	get status(): MachineStatus {
		return this.#status;
	}

	/** Number of steps executed since the last `input()`. */
	get steps(): number {
		return this.#steps;
	}

	/** Whether the current state is a final one. */
	isFinal(): boolean {
		return !!this.#stateDef(this.#state).final;
	}

	isHalted(): boolean {
		return isHaltStatus(this.#status);
	}

	#stateDef(name: string): StateDef {
		const state = this.#states.get(name);
		if (!state) {
			throw new Error(`Unknown state "${name}"`);
		}
		return state;
	}

	#lookup() {
		const state = this.#stateDef(this.#state);
		const consumed = this.#tape.read();
		const transition = findTransition(state, consumed, this.#wildcard);
		return { state, consumed, transition };
	}

	// identifiers are built only while "change" has subscribers
	#notify() {
		if (this.#watchers > 0) {
			this.#pubsub.publish("change", this.identifier());
		}
	}

	#halt(status: HaltStatus) {
		this.#status = status;
		this.#debugLog(`halted with ${status} after ${this.#steps} steps`);
		this.#notify();
	}

	/**
	 * Loads the input onto a fresh tape, starting at position 0, and puts the
	 * machine back to the start state with a zero step counter.
	 *
	 * @returns The machine instance for chaining
	 */
	input(input: string): Machine {
		this.#debugLog(`input("${input}")`);
		this.#tape = new Tape(input, this.#blank);
		this.#state = this.#start;
		this.#steps = 0;
		this.#status = "READY";
		this.#notify();
		return this;
	}

	/**
	 * Clears the tape and returns to the start state.
	 *
	 * @returns The machine instance for chaining
	 */
	reset(): Machine {
		return this.input("");
	}

	/**
	 * Executes a single step.
	 *
	 * @returns The executed step, or `null` if no transition was taken (the
	 * machine has just halted, or was halted already)
	 */
	step(): StepRecord | null {
		if (this.isHalted()) {
			this.#debugLog(`step() ignored, machine is ${this.#status}`);
			return null;
		}

		const { state, consumed, transition } = this.#lookup();

		if (!transition) {
			this.#debugLog(`no transition from "${state.name}" on "${consumed}"`);
			this.#halt(state.final ? "HALTED_FINAL" : "HALTED_STUCK");
			return null;
		}

		// the produced symbol is written as is, even when it is the wildcard
		this.#tape.write(transition.prod);
		this.#tape.moveHead(transition.move);
		this.#state = transition.next;
		this.#steps += 1;
		this.#status = "RUNNING";

		const record: StepRecord = {
			step: this.#steps,
			from: state.name,
			consumed,
			produced: transition.prod,
			move: transition.move,
			to: transition.next,
		};
		// prettier-ignore
		this.#debugLog(`step ${record.step}: "${record.from}" ${consumed}/${record.produced},${record.move} -> "${record.to}"`);

		this.#pubsub.publish("step", record);
		this.#notify();

		return { ...record };
	}

	/**
	 * Steps until the machine halts.
	 *
	 * With `stepLimit`, halts with `HALTED_STEP_LIMIT` once the step counter
	 * (counted since the last `input()`) reaches it and another transition
	 * would apply, so `run(0)` executes nothing. A machine which has no
	 * applicable transition at that point halts with `HALTED_FINAL` or
	 * `HALTED_STUCK` as usual. Without a limit a non-halting machine runs
	 * forever.
	 *
	 * @throws RangeError if the limit is not a non-negative integer
	 */
	run(stepLimit?: number): RunResult {
		if (
			stepLimit !== undefined &&
			(!Number.isInteger(stepLimit) || stepLimit < 0)
		) {
			throw new RangeError(`Invalid step limit "${stepLimit}"`);
		}
		this.#debugLog(`run(${stepLimit ?? ""}) called in state "${this.#state}"`);

		while (true) {
			const status = this.#status;
			if (isHaltStatus(status)) {
				return {
					status,
					steps: this.#steps,
					accepted: status === "HALTED_FINAL",
				};
			}
			// at the limit, a machine which would halt anyway still halts normally
			if (
				stepLimit !== undefined &&
				this.#steps >= stepLimit &&
				this.#lookup().transition
			) {
				this.#halt("HALTED_STEP_LIMIT");
			} else {
				this.step();
			}
		}
	}

	/** Returns a frozen snapshot of the current configuration. */
	identifier(): MachineIdentifier {
		return Object.freeze({
			state: this.#state,
			status: this.#status,
			steps: this.#steps,
			tape: this.#tape.snapshot(),
		});
	}

	/** Returns a copy of the model the machine was built from. */
	model(): MachineModel {
		return cloneModel(this.#model);
	}

	/**
	 * Subscribes to configuration changes.
	 * The callback is invoked immediately with the current identifier and then
	 * after every step, halt and `input()`.
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (identifier: MachineIdentifier) => void): () => void {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		this.#watchers += 1;
		cb(this.identifier());

		let active = true;
		return () => {
			if (active) {
				active = false;
				this.#watchers -= 1;
			}
			unsub();
		};
	}

	/**
	 * Subscribes to executed steps, for verbose tracing.
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	onStep(cb: (record: StepRecord) => void): () => void {
		return this.#pubsub.subscribe("step", cb);
	}

	/**
	 * Generates a Mermaid stateDiagram-v2 notation of the machine graph.
	 *
	 * Transitions are labeled `consumed/produced,move`, final states get an
	 * edge to `[*]`.
	 *
	 * @example
	 * ```typescript
	 * console.log(tm.toMermaid());
	 * // stateDiagram-v2
	 * //     [*] --> A
	 * //     A --> A: 0/1,R
	 * //     A --> B: _/_,S
	 * //     B --> [*]
	 * ```
	 */
	toMermaid(): string {
		let mermaid = "stateDiagram-v2\n";
		mermaid += `    [*] --> ${this.#start}\n`;

		for (const state of this.#model.states) {
			for (const t of state.transitions ?? []) {
				mermaid += `    ${state.name} --> ${t.next}: ${t.cons}/${t.prod},${t.move}\n`;
			}
			if (state.final) {
				mermaid += `    ${state.name} --> [*]\n`;
			}
		}

		return mermaid;
	}
}
