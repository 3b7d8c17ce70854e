// ============================================================================
// Codec Errors (re-exported from codec-errors.ts)
// ============================================================================

export type { DecodeError, EncodeError, MarshalError } from "./codec-errors.js";
export {
	ConversionError,
	EndOfInputError,
	HookError,
	RowIOError,
	UnexpectedShapeError,
	UnsupportedTypeError,
	withContext,
} from "./codec-errors.js";
