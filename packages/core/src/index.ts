/**
 * Main entry point for @rowcodec/core.
 *
 * Encodes Effect Schema structs as flat rows of text cells and decodes them
 * back through a dotted header. Results are Either (pure core) or Effect
 * (sessions); failures are tagged errors.
 */

// ============================================================================
// Sessions
// ============================================================================

export { Decoder, unmarshalRow } from "./session/decoder.js";
export { Encoder, marshalRow } from "./session/encoder.js";
export type { CodecOptions } from "./session/options.js";
export {
	DEFAULT_EMPTY_VALUE,
	DEFAULT_NIL_VALUE,
	defaultCodecOptions,
	resolveCodecOptions,
} from "./session/options.js";
export { StickyGuard } from "./session/sticky-guard.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export type { DecodeError, EncodeError, MarshalError } from "./errors/index.js";
export {
	ConversionError,
	EndOfInputError,
	HookError,
	RowIOError,
	UnexpectedShapeError,
	UnsupportedTypeError,
	withContext,
} from "./errors/index.js";

// ============================================================================
// Schema Annotations
// ============================================================================

export type { AnyCellHooks, CellHooks, CellTag } from "./schema/annotations.js";
export {
	CellEmbeddedId,
	CellHooksId,
	CellTagId,
	cellClass,
	cellHooks,
	cellTag,
	embedded,
	field,
	getCellHooks,
	getCellTag,
	isEmbedded,
	parseCellTag,
} from "./schema/annotations.js";
export {
	Float32,
	Float32SchemaId,
	Float64,
	Int8,
	Int16,
	Int32,
	Int64,
	Uint8,
	Uint16,
	Uint32,
} from "./schema/numeric.js";
export { DateTime } from "./schema/time.js";

// ============================================================================
// Type Introspection
// ============================================================================

export type {
	AssociativeType,
	BigIntType,
	BooleanType,
	CellType,
	FloatType,
	IntegerType,
	LiteralType,
	LiteralValue,
	OpaqueType,
	OptionalType,
	RecordType,
	SequenceType,
	StringType,
	UnsupportedType,
} from "./schema/cell-type.js";
export {
	cellTypeOf,
	fieldsOf,
	isZero,
	resolveCellType,
	widthOf,
	zeroOf,
} from "./schema/cell-type.js";
export type { FieldDescriptor } from "./schema/field-resolver.js";
export { resolveFields } from "./schema/field-resolver.js";
export { headerOf } from "./schema/header.js";
export { shapeOf } from "./schema/shape.js";

// ============================================================================
// Hooks
// ============================================================================

export type {
	CellGetter,
	CellSetter,
	DecodeHook,
	DetectedHooks,
	EncodeHook,
	TextMarshaler,
	TextUnmarshaler,
} from "./hooks/hook-registry.js";
export {
	detectDecodeHook,
	detectEncodeHook,
	detectHooks,
	isCellGetter,
	isCellSetter,
	isTextMarshaler,
	isTextUnmarshaler,
} from "./hooks/hook-registry.js";

// ============================================================================
// Cell Codec
// ============================================================================

export type { Sentinels } from "./codec/marshal.js";
export { marshal, marshalRecord } from "./codec/marshal.js";
export type { ScalarType } from "./codec/scalars.js";
export {
	formatFloat,
	formatFloat32,
	formatScalar,
	isScalar,
	parseScalar,
} from "./codec/scalars.js";
export { assign, unmarshal, unmarshalRecord, unmarshalTree } from "./codec/unmarshal.js";
export type { PathNode, PathObject } from "./path-tree/path-tree.js";
export { PathTree } from "./path-tree/path-tree.js";

// ============================================================================
// Tabular Reader / Writer
// ============================================================================

export { makeRowReader, TabularParseError } from "./tabular/reader.js";
export type { RowReader, RowWriter, TabularOptions } from "./tabular/row-io.js";
export { defaultTabularOptions, resolveTabularOptions } from "./tabular/row-io.js";
export { makeRowWriter, makeStringRowWriter, quoteCell } from "./tabular/writer.js";
