/**
 * Reasons a model is refused at machine construction.
 */
export type ValidationErrorKind =
	| "START_STATE"
	| "DUPLICATE_STATE"
	| "UNKNOWN_NEXT_STATE"
	| "INVALID_SYMBOL"
	| "INVALID_MOVE"
	| "INVALID_CONFIG";

/**
 * Reasons a model source text could not be turned into a model.
 */
export type ParseErrorKind = "FORMAT" | "SYNTAX" | "SHAPE";

/**
 * Thrown when a model breaks one of the machine invariants (exactly one start
 * state, unique state names, resolvable transition targets, well-formed
 * symbols and moves). No machine instance exists when this is thrown.
 */
export class ValidationError extends Error {
	override name = "ValidationError";

	constructor(public readonly kind: ValidationErrorKind, message: string) {
		super(message);
	}
}

/**
 * Thrown by `parse()` when the source text is in an unsupported format,
 * is not valid JSON/YAML/TOML, or does not have the shape of a model.
 */
export class ParseError extends Error {
	override name = "ParseError";

	constructor(
		public readonly kind: ParseErrorKind,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
	}
}
