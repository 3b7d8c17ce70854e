/**
 * Shared helpers for codec tests: run a schema through an in-memory encoder
 * or decoder and return plain values.
 */

import { Effect, type Schema } from "effect";
import { Decoder } from "../src/session/decoder.js";
import { Encoder } from "../src/session/encoder.js";
import type { CodecOptions } from "../src/session/options.js";
import { makeRowReader } from "../src/tabular/reader.js";
import { makeStringRowWriter } from "../src/tabular/writer.js";

/**
 * Encode `values` one row each, without a header.
 */
export const encodeRows = <A, I>(
	schema: Schema.Schema<A, I, never>,
	values: ReadonlyArray<A>,
	options?: CodecOptions,
): string => {
	const writer = makeStringRowWriter();
	const encoder = new Encoder(schema, writer, options);
	for (const value of values) {
		Effect.runSync(encoder.encode(value));
	}
	return writer.output();
};

/**
 * Decode every row of `input`, whose first row is the header.
 */
export const decodeRows = <A, I>(
	schema: Schema.Schema<A, I, never>,
	input: string,
	options?: CodecOptions,
): ReadonlyArray<A> =>
	Effect.runSync(new Decoder(schema, makeRowReader(input), options).decodeAll());

/**
 * Decode the first record of `input`.
 */
export const decodeFirst = <A, I>(
	schema: Schema.Schema<A, I, never>,
	input: string,
	options?: CodecOptions,
): A => Effect.runSync(new Decoder(schema, makeRowReader(input), options).decode());
