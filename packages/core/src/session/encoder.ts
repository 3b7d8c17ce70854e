import { Effect, Either, type Schema } from "effect";
import { marshalRecord, type Sentinels } from "../codec/marshal.js";
import {
	type EncodeError,
	type MarshalError,
	RowIOError,
	UnsupportedTypeError,
} from "../errors/codec-errors.js";
import { type CellType, resolveCellType } from "../schema/cell-type.js";
import { headerOf } from "../schema/header.js";
import type { RowWriter } from "../tabular/row-io.js";
import { type CodecOptions, resolveCodecOptions } from "./options.js";
import { StickyGuard } from "./sticky-guard.js";

const ioError = (operation: RowIOError["operation"], error: unknown) =>
	new RowIOError({
		operation,
		message: `failed to ${operation} row: ${error instanceof Error ? error.message : String(error)}`,
		cause: error,
	});

/**
 * Encode records of one schema as rows.
 */
export const marshalRow = <A, I, R>(
	schema: Schema.Schema<A, I, R>,
	value: A,
	sentinels: Sentinels,
): Either.Either<ReadonlyArray<string>, MarshalError> => {
	const type: CellType = resolveCellType(schema.ast);
	if (type._tag !== "Record") {
		return Either.left(
			new UnsupportedTypeError({
				path: [],
				kind: type._tag,
				message: `only a struct can be encoded as a row, got ${type._tag.toLowerCase()}`,
			}),
		);
	}
	return marshalRecord(type, value, sentinels);
};

/**
 * Writes records of one schema as rows. `emptyValue` and `nilValue` may be
 * changed at any time; the first failure poisons the encoder.
 *
 * @example
 * ```ts
 * const writer = makeStringRowWriter()
 * const encoder = new Encoder(Person, writer)
 * Effect.runSync(encoder.encode({ name: "ada", age: 36 }))
 * writer.output() // "ada,36\n"
 * ```
 */
export class Encoder<A, I = A> {
	emptyValue: string;
	nilValue: string;
	private readonly guard = new StickyGuard<EncodeError>();
	private rows = 0;

	constructor(
		readonly schema: Schema.Schema<A, I, never>,
		private readonly writer: RowWriter,
		options?: CodecOptions,
	) {
		const resolved = resolveCodecOptions(options);
		this.emptyValue = resolved.emptyValue;
		this.nilValue = resolved.nilValue;
	}

	get error() {
		return this.guard.error;
	}

	/**
	 * The cells `value` encodes to, without writing anything.
	 */
	marshal(value: A): Either.Either<ReadonlyArray<string>, MarshalError> {
		return marshalRow(this.schema, value, {
			emptyValue: this.emptyValue,
			nilValue: this.nilValue,
		});
	}

	/**
	 * Write the header row matching this schema's cell layout.
	 */
	writeHeader(): Effect.Effect<void, EncodeError> {
		return this.guard.run(this.write(headerOf(this.schema)));
	}

	/**
	 * Encode `value`, write it as one row and flush the writer.
	 */
	encode(value: A): Effect.Effect<void, EncodeError> {
		return this.guard.run(
			Effect.gen(this, function* () {
				const cells = yield* this.marshal(value);
				yield* this.write(cells);
				this.rows++;
				yield* Effect.logDebug("encoded row").pipe(
					Effect.annotateLogs({ row: this.rows, cells: cells.length }),
				);
			}),
		);
	}

	private write(cells: ReadonlyArray<string>): Effect.Effect<void, RowIOError> {
		return Effect.try({
			try: () => this.writer.writeRow(cells),
			catch: (error) => ioError("write", error),
		}).pipe(
			Effect.zipRight(
				Effect.try({
					try: () => this.writer.flush(),
					catch: (error) => ioError("flush", error),
				}),
			),
		);
	}
}
