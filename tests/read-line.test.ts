import assert from "node:assert/strict";
import { PassThrough, Readable } from "node:stream";
import { test } from "node:test";
import { readLine } from "../scripts/read-line.ts";

test("reads the first line only", async () => {
	assert.equal(await readLine(Readable.from(["1011\n", "ignored\n"])), "1011");
	assert.equal(await readLine(Readable.from(["no newline"])), "no newline");
	assert.equal(await readLine(Readable.from([])), "");
});

test("does not wait for the end of the stream", async () => {
	const stream = new PassThrough();
	const line = readLine(stream);
	stream.write("abc\n");
	// the stream stays open
	assert.equal(await line, "abc");
	stream.destroy();
});
