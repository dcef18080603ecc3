import assert from "node:assert/strict";
import { test } from "node:test";
import type { MachineModel } from "../src/model.ts";
import { simulate } from "../src/simulate.ts";

const eraseB = (): MachineModel => ({
	states: [
		{
			name: "A",
			start: true,
			transitions: [
				{ cons: "b", prod: "_", move: "L", next: "B" },
				{ cons: "*", prod: "*", move: "S", next: "C" },
			],
		},
		{ name: "B" },
		{ name: "C", final: true },
	],
});

test("verbose run collects the trace", () => {
	const { result, identifier, trace } = simulate(eraseB(), "b", {
		verbose: true,
	});

	assert.deepEqual(result, {
		status: "HALTED_STUCK",
		steps: 1,
		accepted: false,
	});
	assert.equal(identifier.state, "B");
	assert.deepEqual(trace, [
		{ step: 1, from: "A", consumed: "b", produced: "_", move: "L", to: "B" },
	]);
});

test("quiet run has no trace", () => {
	const { result, trace } = simulate(eraseB(), "x");
	assert.equal(result.accepted, true);
	assert.deepEqual(trace, []);
});

test("step limit", () => {
	const loop: MachineModel = {
		states: [
			{
				name: "L",
				start: true,
				transitions: [{ cons: "*", prod: "1", move: "L", next: "L" }],
			},
		],
	};
	const { result, identifier, trace } = simulate(loop, "", {
		stepLimit: 3,
		verbose: true,
	});

	assert.deepEqual(result, {
		status: "HALTED_STEP_LIMIT",
		steps: 3,
		accepted: false,
	});
	assert.deepEqual(identifier.tape, {
		cells: ["_", "1", "1", "1"],
		head: 0,
		left: -3,
	});
	assert.deepEqual(
		trace.map((r) => r.step),
		[1, 2, 3]
	);
});

test("independent runs do not share state", () => {
	const model = eraseB();
	const a = simulate(model, "b");
	const b = simulate(model, "x");
	assert.equal(a.result.status, "HALTED_STUCK");
	assert.equal(b.result.status, "HALTED_FINAL");
	assert.equal(a.identifier.state, "B");
});

test("invalid model throws", () => {
	assert.throws(() => simulate({ states: [] }, "x"), {
		name: "ValidationError",
		kind: "START_STATE",
	});
});
