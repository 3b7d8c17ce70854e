import { Data } from "effect";
import { preview } from "../utils/preview.js";

// ============================================================================
// Effect TaggedError Codec Error Types
// ============================================================================

/**
 * No encode or decode path exists for the kind found at `path`.
 */
export class UnsupportedTypeError extends Data.TaggedError(
	"UnsupportedTypeError",
)<{
	readonly path: ReadonlyArray<string>;
	readonly kind: string;
	readonly message: string;
}> {}

/**
 * A cell could not be parsed into (or validated as) the field's scalar type.
 */
export class ConversionError extends Data.TaggedError("ConversionError")<{
	readonly path: ReadonlyArray<string>;
	readonly value: string;
	readonly expected: string;
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * A custom getCells/setCells/toText/fromText hook threw.
 */
export class HookError extends Data.TaggedError("HookError")<{
	readonly path: ReadonlyArray<string>;
	readonly hook: "getCells" | "setCells" | "toText" | "fromText";
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * The row or path tree had a cell where a subtree was expected, or the
 * reverse. Also raised for header/row width mismatches.
 */
export class UnexpectedShapeError extends Data.TaggedError(
	"UnexpectedShapeError",
)<{
	readonly path: ReadonlyArray<string>;
	readonly expected: string;
	readonly received: string;
	readonly message: string;
}> {}

/**
 * The tabular reader or writer failed.
 */
export class RowIOError extends Data.TaggedError("RowIOError")<{
	readonly operation: "read" | "write" | "flush";
	readonly message: string;
	readonly cause?: unknown;
}> {}

/**
 * The reader has no more rows. Terminal, not a malfunction.
 */
export class EndOfInputError extends Data.TaggedError("EndOfInputError")<{
	readonly message: string;
}> {}

// ============================================================================
// Unions
// ============================================================================

export type MarshalError =
	| UnsupportedTypeError
	| ConversionError
	| HookError
	| UnexpectedShapeError;

export type EncodeError = MarshalError | RowIOError;

export type DecodeError = MarshalError | RowIOError | EndOfInputError;

// ============================================================================
// Breadcrumbs
// ============================================================================

/**
 * Prefix a child failure with the field, element or key it happened under.
 * The message reads outermost first, e.g.
 * "field `person` `[object]`: field `age` `abc`: cannot parse ...".
 */
export const withContext =
	(segment: string, label: string, value: unknown) =>
	(error: MarshalError): MarshalError => {
		const path = [segment, ...error.path];
		const message = `${label} \`${preview(value)}\`: ${error.message}`;
		switch (error._tag) {
			case "UnsupportedTypeError":
				return new UnsupportedTypeError({ path, kind: error.kind, message });
			case "ConversionError":
				return new ConversionError({
					path,
					value: error.value,
					expected: error.expected,
					message,
					cause: error.cause,
				});
			case "HookError":
				return new HookError({
					path,
					hook: error.hook,
					message,
					cause: error.cause,
				});
			case "UnexpectedShapeError":
				return new UnexpectedShapeError({
					path,
					expected: error.expected,
					received: error.received,
					message,
				});
		}
	};
