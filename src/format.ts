import type {
	HaltStatus,
	MachineIdentifier,
	RunResult,
	StepRecord,
} from "./machine.ts";

const OUTCOME: Record<HaltStatus, string> = {
	HALTED_FINAL: "accepted",
	HALTED_STUCK: "rejected",
	HALTED_STEP_LIMIT: "step limit reached",
};

/**
 * Renders an identifier as text lines (state, steps, tape, logical head
 * position and the logical range of the printed cells, end exclusive).
 *
 * @example
 * ```typescript
 * formatIdentifier(tm.identifier());
 * // State: B
 * // Steps: 1
 * // Tape: __
 * // Head: -1
 * // Range (-1..1)
 * ```
 */
export function formatIdentifier(id: MachineIdentifier): string {
	const { cells, head, left } = id.tape;
	return [
		`State: ${id.state}`,
		`Steps: ${id.steps}`,
		`Tape: ${cells.join("")}`,
		`Head: ${left + head}`,
		`Range (${left}..${left + cells.length})`,
		"",
	].join("\n");
}

/** Renders one step as `#1 A: b/_,L -> B`. */
export function formatStep(record: StepRecord): string {
	const { step, from, consumed, produced, move, to } = record;
	return `#${step} ${from}: ${consumed}/${produced},${move} -> ${to}`;
}

/** Renders a run result, e.g. `accepted after 3 steps`. */
export function formatResult(result: RunResult): string {
	const unit = result.steps === 1 ? "step" : "steps";
	return `${OUTCOME[result.status]} after ${result.steps} ${unit}`;
}
