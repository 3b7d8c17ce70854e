/**
 * Fixed-width numeric schemas. Decoding validates parsed cells against
 * these refinements, so an out-of-range cell is a ConversionError.
 */

import { Schema } from "effect";

export const Int8 = Schema.Int.pipe(Schema.between(-128, 127));
export const Int16 = Schema.Int.pipe(Schema.between(-32_768, 32_767));
export const Int32 = Schema.Int.pipe(
	Schema.between(-2_147_483_648, 2_147_483_647),
);
export const Uint8 = Schema.Int.pipe(Schema.between(0, 255));
export const Uint16 = Schema.Int.pipe(Schema.between(0, 65_535));
export const Uint32 = Schema.Int.pipe(Schema.between(0, 4_294_967_295));

/** 64-bit integers do not fit a JS number, so they decode to bigint. */
export const Int64 = Schema.BigIntFromSelf.pipe(
	Schema.betweenBigInt(-(2n ** 63n), 2n ** 63n - 1n),
);

export const Float32SchemaId: unique symbol = Symbol.for("@rowcodec/core/Float32");

/**
 * Single-precision floats. Cells are rounded to the nearest 32-bit value as
 * they are parsed, and written as the shortest decimal that rounds back.
 */
export const Float32 = Schema.Number.pipe(
	Schema.filter((n) => Number.isNaN(n) || Math.fround(n) === n, {
		schemaId: Float32SchemaId,
		message: () => "expected a value representable as a 32-bit float",
	}),
);

export const Float64 = Schema.Number;
