import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { test } from "node:test";
import { Machine } from "../src/machine.ts";
import { formatFromPath, parse } from "../src/parse.ts";

const fixture = (name: string) =>
	readFileSync(new URL(`../machines/${name}`, import.meta.url), "utf8");

test("json", () => {
	assert.deepEqual(parse(fixture("erase-b.json"), "json"), {
		states: [
			{
				name: "A",
				start: true,
				final: false,
				transitions: [
					{ next: "B", cons: "b", prod: "_", move: "L" },
					{ next: "C", cons: "*", prod: "*", move: "S" },
				],
			},
			{ name: "B", start: false, final: false, transitions: [] },
			{ name: "C", start: false, final: true, transitions: [] },
		],
	});
});

test("toml with array of tables", () => {
	const model = parse(fixture("binary-increment.toml"), "toml");

	assert.deepEqual(
		model.states.map((s) => [s.name, s.start, s.final, s.transitions?.length]),
		[
			["right", true, false, 3],
			["carry", false, false, 3],
			["done", false, true, 0],
		]
	);
	assert.deepEqual(model.states[1].transitions?.[0], {
		next: "carry",
		cons: "1",
		prod: "0",
		move: "L",
	});

	assert.deepEqual(new Machine(model).input("0111").run(), {
		status: "HALTED_FINAL",
		steps: 9,
		accepted: true,
	});
});

test("yaml with long key names", () => {
	const source = `
states:
  - name: A
    is_start: true
    transitions:
      - { consume: 0, produce: 1, move: r, next: A }
  - name: B
    is_final: true
`;
	assert.deepEqual(parse(source, "yaml"), {
		states: [
			{
				name: "A",
				start: true,
				final: false,
				transitions: [{ next: "A", cons: "0", prod: "1", move: "R" }],
			},
			{ name: "B", start: false, final: true, transitions: [] },
		],
	});
});

test("inferred format", () => {
	const tm = Machine.fromSource(fixture("all-ones.yaml"));
	assert.deepEqual(tm.input("001100").run(), {
		status: "HALTED_FINAL",
		steps: 7,
		accepted: true,
	});
	assert.equal(tm.identifier().tape.cells.join(""), "111111_");

	assert.equal(parse(fixture("binary-increment.toml")).states.length, 3);
	assert.equal(parse(fixture("erase-b.json"), "inferred").states.length, 3);
});

test("config and its aliases", () => {
	const model = parse(
		'{"config":{"empty":"#","some":"?"},"states":[{"name":"A","start":true}]}',
		"json"
	);
	assert.deepEqual(model.config, { blank: "#", wildcard: "?" });

	const model2 = parse(
		'{"config":{"blank":"."},"states":[{"name":"A","start":true}]}',
		"json"
	);
	assert.deepEqual(model2.config, { blank: "." });

	assert.throws(
		() =>
			parse(
				'{"config":{"any":"."},"states":[{"name":"A","start":true}]}',
				"json"
			),
		{
			name: "ParseError",
			kind: "SHAPE",
			message:
				'Unsupported "config" keys: any (expected: blank, empty, wildcard, some)',
		}
	);
});

test("referential integrity is left to the machine", () => {
	const model = parse(
		'{"states":[{"name":"A","start":true,"transitions":[{"cons":"a","prod":"a","move":"R","next":"Z"}]}]}',
		"json"
	);
	assert.equal(model.states[0].transitions?.[0].next, "Z");
	assert.throws(() => new Machine(model), {
		name: "ValidationError",
		kind: "UNKNOWN_NEXT_STATE",
	});
});

test("errors", () => {
	const check = (source: string, format: string, kind: string) =>
		assert.throws(() => parse(source, format), { name: "ParseError", kind });

	check("{}", "xml", "FORMAT");
	check("{", "json", "SYNTAX");
	check("{", "inferred", "SYNTAX");
	check("[]", "json", "SHAPE");
	check('{"states":{}}', "json", "SHAPE");
	check('{"states":[{"start":true}]}', "json", "SHAPE");
	check('{"states":[{"name":"A","start":"yes"}]}', "json", "SHAPE");
	check('{"states":[{"name":"A","transitions":{}}]}', "json", "SHAPE");
	// prettier-ignore
	check('{"states":[{"name":"A","transitions":[{"cons":"ab","prod":"a","move":"R","next":"A"}]}]}', "json", "SHAPE");
	// prettier-ignore
	check('{"states":[{"name":"A","transitions":[{"cons":"a","prod":"a","move":"X","next":"A"}]}]}', "json", "SHAPE");
	// prettier-ignore
	check('{"states":[{"name":"A","transitions":[{"cons":"a","prod":"a","move":"R"}]}]}', "json", "SHAPE");
});

test("format is case-insensitive", () => {
	assert.equal(parse('{"states":[]}', "JSON").states.length, 0);
});

test("formatFromPath", () => {
	assert.equal(formatFromPath("machines/copy.toml"), "toml");
	assert.equal(formatFromPath("a/b.YML"), "yml");
	assert.equal(formatFromPath("m.yaml"), "yaml");
	assert.equal(formatFromPath("m.json"), "json");
	assert.equal(formatFromPath("m.txt"), "inferred");
	assert.equal(formatFromPath("dir.d/machine"), "inferred");
	assert.equal(formatFromPath("x.inferred"), "inferred");
});
