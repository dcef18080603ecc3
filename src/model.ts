import { ValidationError } from "./errors.ts";
import { BLANK, type Move } from "./tape.ts";

/** Default transition-matching sentinel, matches any otherwise unmatched symbol. */
export const WILDCARD = "*";

/** All valid head moves. */
export const MOVES: readonly Move[] = ["L", "R", "S"];

/**
 * A single transition rule of a state.
 *
 * `cons` is the consumed symbol (or the wildcard), `prod` the symbol written
 * in its place, `move` the head move and `next` the name of the next state.
 */
export type TransitionDef = {
	next: string;
	cons: string;
	prod: string;
	move: Move;
};

/**
 * A state of the simulated machine. Transitions are matched in declaration
 * order, so their order is significant.
 */
export type StateDef = {
	name: string;
	start?: boolean;
	final?: boolean;
	transitions?: TransitionDef[];
};

/** Overrides of the blank and wildcard sentinels. */
export type SymbolConfig = {
	blank?: string;
	wildcard?: string;
};

/**
 * Machine description, as produced by `parse()` or written by hand.
 *
 * @example
 * ```typescript
 * const model: MachineModel = {
 *   states: [
 *     { name: "A", start: true, transitions: [{ cons: "*", prod: "1", move: "R", next: "A" }] },
 *   ],
 * };
 * ```
 */
export type MachineModel = {
	states: StateDef[];
	config?: SymbolConfig;
};

/** Whether the value is a string of exactly one character (code point). */
export function isSymbol(value: unknown): value is string {
	return typeof value === "string" && Array.from(value).length === 1;
}

/** Resolves the blank and wildcard sentinels of the model. */
export function symbolsOf(model: MachineModel): Required<SymbolConfig> {
	return {
		blank: model.config?.blank ?? BLANK,
		wildcard: model.config?.wildcard ?? WILDCARD,
	};
}

/**
 * Returns a deep copy of the model with the optional flags and transition
 * lists filled in.
 */
export function cloneModel(model: MachineModel): MachineModel {
	const out: MachineModel = {
		states: model.states.map((s) => ({
			name: s.name,
			start: !!s.start,
			final: !!s.final,
			transitions: (s.transitions ?? []).map((t) => ({ ...t })),
		})),
	};
	if (model.config) out.config = { ...model.config };
	return out;
}

/**
 * Checks the model invariants and returns the name of its start state.
 *
 * @throws ValidationError on the first broken invariant
 */
export function validateModel(model: MachineModel): string {
	const states = Array.isArray(model?.states) ? model.states : [];

	const { blank, wildcard } = symbolsOf(model);
	if (!isSymbol(blank) || !isSymbol(wildcard) || blank === wildcard) {
		// prettier-ignore
		throw new ValidationError("INVALID_CONFIG", `Blank "${blank}" and wildcard "${wildcard}" must be two distinct single characters`);
	}

	const names = new Set<string>();
	for (const state of states) {
		if (names.has(state.name)) {
			// prettier-ignore
			throw new ValidationError("DUPLICATE_STATE", `Duplicate state name "${state.name}"`);
		}
		names.add(state.name);
	}

	const starts = states.filter((s) => s.start).map((s) => s.name);
	if (starts.length !== 1) {
		// prettier-ignore
		throw new ValidationError("START_STATE", `Expected exactly one start state, found ${starts.length}${starts.length ? ` (${starts.join(", ")})` : ""}`);
	}

	for (const state of states) {
		for (const t of state.transitions ?? []) {
			if (!isSymbol(t.cons) || !isSymbol(t.prod)) {
				// prettier-ignore
				throw new ValidationError("INVALID_SYMBOL", `State "${state.name}": symbols must be single characters (got "${t.cons}" -> "${t.prod}")`);
			}
			if (!MOVES.includes(t.move)) {
				// prettier-ignore
				throw new ValidationError("INVALID_MOVE", `State "${state.name}": invalid move "${t.move}"`);
			}
			if (!names.has(t.next)) {
				// prettier-ignore
				throw new ValidationError("UNKNOWN_NEXT_STATE", `State "${state.name}" has a transition to unknown state "${t.next}"`);
			}
		}
	}

	return starts[0];
}

/**
 * Finds the transition of `state` to take when `consumed` is under the head.
 *
 * An exact match always wins over a wildcard. Among several candidates of the
 * same kind the first declared one is taken. Returns `null` when the state has
 * no applicable transition (the machine halts).
 */
export function findTransition(
	state: StateDef,
	consumed: string,
	wildcard: string = WILDCARD
): TransitionDef | null {
	const transitions = state.transitions ?? [];
	return (
		transitions.find((t) => t.cons === consumed) ??
		transitions.find((t) => t.cons === wildcard) ??
		null
	);
}
