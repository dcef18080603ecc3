/** Default symbol of never written cells. */
export const BLANK = "_";

/** Head move: Left, Right or Stay. */
export type Move = "L" | "R" | "S";

/**
 * Read-only view of the materialized part of a tape.
 *
 * `cells[0]` sits at logical position `left`, and the head is at `cells[head]`
 * (so its logical position is `left + head`).
 */
export type TapeSnapshot = {
	readonly cells: readonly string[];
	readonly head: number;
	readonly left: number;
};

/** Minimum number of blank cells added when the tape grows to the left */
const LEFT_BLOCK = 16;

/**
 * A tape which is unbounded in both directions.
 *
 * Internally a zero-based buffer plus the buffer index of logical position 0.
 * The buffer grows to the left by blocks (at least doubling), and `#low`
 * marks the leftmost materialized cell, so block padding is never part of a
 * snapshot. The cell under the head is always materialized; moving past
 * either edge materializes one more blank cell on that side.
 *
 * @example
 * ```typescript
 * const tape = new Tape("01");
 * tape.moveHead("L");
 * tape.read(); // "_"
 * tape.head; // -1
 * tape.toString(); // "_01"
 * ```
 */
export class Tape {
	#cells: string[];

	/** Buffer index of logical position 0 */
	#origin = 0;

	/** Buffer index of the leftmost materialized cell */
	#low = 0;

	#head = 0;

	constructor(input = "", public readonly blank: string = BLANK) {
		this.#cells = Array.from(input);
		if (!this.#cells.length) this.#cells.push(blank);
	}

	/** Logical head position (may be negative). */
	get head(): number {
		return this.#head;
	}

	/** Returns the symbol under the head. */
	read(): string {
		return this.#cells[this.#origin + this.#head] ?? this.blank;
	}

	/** Writes the symbol under the head. */
	write(symbol: string): void {
		this.#cells[this.#origin + this.#head] = symbol;
	}

	/** Moves the head by one cell, or not at all for "S". */
	moveHead(move: Move): void {
		if (move === "L") {
			this.#head -= 1;
			if (this.#origin + this.#head < this.#low) {
				if (this.#low === 0) this.#growLeft();
				this.#low -= 1;
			}
		} else if (move === "R") {
			this.#head += 1;
			if (this.#origin + this.#head >= this.#cells.length) {
				this.#cells.push(this.blank);
			}
		}
	}

	#growLeft() {
		const size = Math.max(LEFT_BLOCK, this.#cells.length);
		this.#cells = new Array<string>(size).fill(this.blank).concat(this.#cells);
		this.#origin += size;
		this.#low += size;
	}

	/** Returns a frozen copy of the materialized window. */
	snapshot(): TapeSnapshot {
		return Object.freeze({
			cells: Object.freeze(this.#cells.slice(this.#low)),
			head: this.#origin + this.#head - this.#low,
			left: this.#low - this.#origin,
		});
	}

	toString(): string {
		return this.#cells.slice(this.#low).join("");
	}
}
