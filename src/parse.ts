import { parse as parseToml } from "smol-toml";
import { parse as parseYaml } from "yaml";
import { ParseError } from "./errors.ts";
import {
	MOVES,
	type MachineModel,
	type StateDef,
	type SymbolConfig,
	type TransitionDef,
} from "./model.ts";
import type { Move } from "./tape.ts";

/** Model source formats understood by `parse()`. */
export type ModelFormat = "json" | "yaml" | "yml" | "toml" | "inferred";

export const MODEL_FORMATS: readonly ModelFormat[] = [
	"json",
	"yaml",
	"yml",
	"toml",
	"inferred",
];

type Obj = Record<string, unknown>;

const isObj = (v: unknown): v is Obj =>
	typeof v === "object" && v !== null && !Array.isArray(v);

const isFormat = (v: string): v is ModelFormat =>
	MODEL_FORMATS.some((f) => f === v);

/** first defined value under any of the keys (aliases) */
const pick = (obj: Obj, ...keys: string[]): unknown => {
	for (const key of keys) {
		if (obj[key] !== undefined) return obj[key];
	}
	return undefined;
};

/**
 * Derives the model format from a file path extension, falling back to
 * `"inferred"`.
 *
 * @example
 * ```typescript
 * formatFromPath("machines/copy.toml"); // "toml"
 * formatFromPath("machine.txt"); // "inferred"
 * ```
 */
export function formatFromPath(path: string): ModelFormat {
	const match = path.match(/\.([^./\\]+)$/);
	const ext = match ? match[1].toLowerCase() : "";
	return isFormat(ext) && ext !== "inferred" ? ext : "inferred";
}

/**
 * Parses model source text (JSON, YAML or TOML) into a `MachineModel`.
 *
 * With `"inferred"` the formats are tried in the order JSON, TOML, YAML.
 *
 * Both the short and the long key spellings are accepted:
 * `states`/`state`, `transitions`/`trans`, `start`/`is_start`,
 * `final`/`is_final`, `cons`/`consume`, `prod`/`produce`, plus `next` and
 * `move` (`L`, `R` or `S`, any case). An optional `config` table may
 * redefine the `blank` (alias `empty`) and `wildcard` (alias `some`) symbols;
 * any other `config` key (such as a match-anything `any` pattern) is refused.
 *
 * Only the shape is checked here. Start state, unique names and transition
 * targets are validated by the `Machine` constructor.
 *
 * @throws ParseError
 *
 * @example
 * ```typescript
 * const model = parse(`
 * [[state]]
 * name = "q0"
 * start = true
 * `, "toml");
 * ```
 */
export function parse(source: string, format = "inferred"): MachineModel {
	return toModel(deserialize(source, format.toLowerCase()));
}

function deserialize(source: string, format: string): unknown {
	if (!isFormat(format)) {
		// prettier-ignore
		throw new ParseError("FORMAT", `Unsupported model format "${format}" (expected one of: ${MODEL_FORMATS.join(", ")})`);
	}

	switch (format) {
		case "json":
			return attempt("json", () => JSON.parse(source));
		case "yaml":
		case "yml":
			return attempt("yaml", () => parseYaml(source));
		case "toml":
			return attempt("toml", () => parseToml(source));
		case "inferred": {
			const reasons: string[] = [];
			for (const fmt of ["json", "toml", "yaml"]) {
				try {
					return deserialize(source, fmt);
				} catch (e) {
					reasons.push(e instanceof Error ? e.message : String(e));
				}
			}
			// prettier-ignore
			throw new ParseError("SYNTAX", `Unable to infer model format:\n${reasons.join("\n")}`);
		}
	}
}

function attempt(format: string, fn: () => unknown): unknown {
	try {
		return fn();
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e);
		// prettier-ignore
		throw new ParseError("SYNTAX", `${format} deserializer failed: ${reason}`, { cause: e });
	}
}

function toModel(raw: unknown): MachineModel {
	if (!isObj(raw)) {
		throw new ParseError("SHAPE", "Model must be an object");
	}

	const states = pick(raw, "states", "state") ?? [];
	if (!Array.isArray(states)) {
		throw new ParseError("SHAPE", `"states" must be a list`);
	}

	const model: MachineModel = { states: states.map(toState) };

	const config = pick(raw, "config");
	if (config !== undefined) {
		model.config = toConfig(config);
	}

	return model;
}

const CONFIG_KEYS = ["blank", "empty", "wildcard", "some"];

function toConfig(raw: unknown): SymbolConfig {
	if (!isObj(raw)) {
		throw new ParseError("SHAPE", `"config" must be an object`);
	}
	const unknown = Object.keys(raw).filter((k) => !CONFIG_KEYS.includes(k));
	if (unknown.length) {
		// prettier-ignore
		throw new ParseError("SHAPE", `Unsupported "config" keys: ${unknown.join(", ")} (expected: ${CONFIG_KEYS.join(", ")})`);
	}
	const config: SymbolConfig = {};
	const blank = pick(raw, "blank", "empty");
	const wildcard = pick(raw, "wildcard", "some");
	if (blank !== undefined) config.blank = toSymbol(blank, "config.blank");
	if (wildcard !== undefined) {
		config.wildcard = toSymbol(wildcard, "config.wildcard");
	}
	return config;
}

function toState(raw: unknown, index: number): StateDef {
	if (!isObj(raw)) {
		throw new ParseError("SHAPE", `State #${index + 1} must be an object`);
	}

	const name = raw.name;
	if (typeof name !== "string" || !name) {
		throw new ParseError("SHAPE", `State #${index + 1} has no name`);
	}

	const start = pick(raw, "start", "is_start") ?? false;
	const final = pick(raw, "final", "is_final") ?? false;
	if (typeof start !== "boolean" || typeof final !== "boolean") {
		// prettier-ignore
		throw new ParseError("SHAPE", `State "${name}": "start" and "final" must be booleans`);
	}

	const transitions = pick(raw, "transitions", "trans") ?? [];
	if (!Array.isArray(transitions)) {
		// prettier-ignore
		throw new ParseError("SHAPE", `State "${name}": "transitions" must be a list`);
	}

	return {
		name,
		start,
		final,
		transitions: transitions.map((t: unknown, i: number) =>
			toTransition(t, `State "${name}", transition #${i + 1}`)
		),
	};
}

function toTransition(raw: unknown, where: string): TransitionDef {
	if (!isObj(raw)) {
		throw new ParseError("SHAPE", `${where} must be an object`);
	}

	const next = raw.next;
	if (typeof next !== "string" || !next) {
		throw new ParseError("SHAPE", `${where}: "next" must be a state name`);
	}

	return {
		next,
		cons: toSymbol(pick(raw, "cons", "consume"), `${where}: "cons"`),
		prod: toSymbol(pick(raw, "prod", "produce"), `${where}: "prod"`),
		move: toMove(raw.move, where),
	};
}

function toSymbol(raw: unknown, where: string): string {
	// YAML reads an unquoted `0` as a number
	const value = typeof raw === "number" ? String(raw) : raw;
	if (typeof value !== "string" || Array.from(value).length !== 1) {
		throw new ParseError("SHAPE", `${where} must be a single character`);
	}
	return value;
}

function toMove(raw: unknown, where: string): Move {
	const letter = typeof raw === "string" ? raw.toUpperCase() : raw;
	const move = MOVES.find((m) => m === letter);
	if (!move) {
		// prettier-ignore
		throw new ParseError("SHAPE", `${where}: "move" must be one of L, R, S (got "${String(raw)}")`);
	}
	return move;
}
