#!/usr/bin/env -S node --import tsx
/**
 * @module
 *
 * CLI script to run a Turing machine model file on an input string.
 *
 * @example Usage via npm script
 * ```sh
 * npm run trm -- --file machines/binary-increment.toml --input 1011
 * echo 1011 | npm run trm -- -f machines/binary-increment.toml -v
 * ```
 *
 * Options:
 * - `--file, -f <path>` - Path to the model file (required)
 * - `--ext, -e <fmt>` - Model format: json, yaml, toml (default: from the file extension)
 * - `--input, -i <str>` - Input string (default: first line of stdin)
 * - `--limit, -l <n>` - Step limit
 * - `--verbose, -v` - Print every step
 * - `--debug` - Print debug logs
 * - `--help, -h` - Show help message
 *
 * Exit codes: 0 accepted, 1 error, 2 rejected, 3 step limit reached.
 */

import { readFile } from "node:fs/promises";
import { createClog } from "@marianmeres/clog";
import minimist from "minimist";
import {
	formatFromPath,
	formatIdentifier,
	formatResult,
	formatStep,
	parse,
	ParseError,
	simulate,
	ValidationError,
	type HaltStatus,
	type Logger,
} from "../src/mod.ts";
import { readLine } from "./read-line.ts";

const EXIT_CODES: Record<HaltStatus, number> = {
	HALTED_FINAL: 0,
	HALTED_STUCK: 2,
	HALTED_STEP_LIMIT: 3,
};

const args = minimist(process.argv.slice(2), {
	string: ["file", "ext", "input", "limit"],
	boolean: ["help", "verbose", "debug"],
	alias: { f: "file", e: "ext", i: "input", l: "limit", v: "verbose", h: "help" },
});

const str = (v: unknown): string | undefined =>
	typeof v === "string" && v !== "" ? v : undefined;

if (args.help) {
	console.log(`
trm - Run a single-tape Turing machine

Usage:
  npm run trm -- --file <path> [options]

Options:
  --file, -f <path>   Path to the model file (required)
  --ext, -e <fmt>     Model format: json, yaml, toml (default: from extension)
  --input, -i <str>   Input string (default: first line of stdin)
  --limit, -l <n>     Halt after this many steps
  --verbose, -v       Print every executed step
  --debug             Print debug logs
  --help, -h          Show this help message

Exit codes:
  0 accepted, 1 error, 2 rejected, 3 step limit reached
`);
	process.exit(0);
}

const file = str(args.file);
if (!file) {
	console.error("Error: --file is required");
	console.error("Run with --help for usage information");
	process.exit(1);
}

const clog = createClog("trm");
const logger: Logger = {
	debug: (...a: unknown[]) => {
		clog.debug(...a);
		return String(a[0] ?? "");
	},
	log: (...a: unknown[]) => {
		clog.log(...a);
		return String(a[0] ?? "");
	},
	warn: (...a: unknown[]) => {
		clog.warn(...a);
		return String(a[0] ?? "");
	},
	error: (...a: unknown[]) => {
		clog.error(...a);
		return String(a[0] ?? "");
	},
};

try {
	const limit = str(args.limit);
	const stepLimit = limit === undefined ? undefined : Number(limit);
	const source = await readFile(file, "utf8");
	const model = parse(source, str(args.ext) ?? formatFromPath(file));
	const input: string =
		typeof args.input === "string" ? args.input : await readLine();

	const { result, identifier, trace } = simulate(model, input, {
		verbose: !!args.verbose,
		debug: !!args.debug,
		logger,
		stepLimit,
	});

	trace.forEach((record) => console.log(formatStep(record)));
	console.log(formatIdentifier(identifier));
	console.log(formatResult(result));
	process.exit(EXIT_CODES[result.status]);
} catch (error) {
	if (error instanceof ParseError || error instanceof ValidationError) {
		console.error(`Error: ${error.name} (${error.kind}): ${error.message}`);
		process.exit(1);
	}
	if (error instanceof Error && "code" in error && error.code === "ENOENT") {
		console.error(`Error: File not found: ${file}`);
		process.exit(1);
	}
	console.error(`Error: ${error instanceof Error ? error.message : error}`);
	process.exit(1);
}
