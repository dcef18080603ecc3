import { createInterface } from "node:readline";

/**
 * Reads a single line from the stream, without waiting for the stream to end.
 * Resolves with `""` when the stream ends before a line was read.
 */
export function readLine(
	input: NodeJS.ReadableStream = process.stdin
): Promise<string> {
	const rl = createInterface({ input });
	return new Promise((resolve) => {
		rl.once("line", (line) => {
			resolve(line);
			rl.close();
		});
		rl.once("close", () => resolve(""));
	});
}
