import { Effect, Either, type Option, Schema } from "effect";
import type { Sentinels } from "../codec/marshal.js";
import { unmarshal } from "../codec/unmarshal.js";
import {
	ConversionError,
	type DecodeError,
	EndOfInputError,
	type MarshalError,
	RowIOError,
} from "../errors/codec-errors.js";
import { PathTree } from "../path-tree/path-tree.js";
import { resolveCellType } from "../schema/cell-type.js";
import { shapeOf } from "../schema/shape.js";
import type { RowReader } from "../tabular/row-io.js";
import { type CodecOptions, resolveCodecOptions } from "./options.js";
import { StickyGuard } from "./sticky-guard.js";

const readFailure = (error: unknown) =>
	new RowIOError({
		operation: "read",
		message: `failed to read row: ${error instanceof Error ? error.message : String(error)}`,
		cause: error,
	});

const endOfInput = () => new EndOfInputError({ message: "no more rows" });

const duplicatesOf = (header: ReadonlyArray<string>): ReadonlyArray<string> =>
	header.filter((column, i) => header.indexOf(column) !== i);

/**
 * Read one row, reporting the end of input as EndOfInputError.
 */
const readRow = (
	reader: RowReader,
): Either.Either<ReadonlyArray<string>, RowIOError | EndOfInputError> =>
	Either.try({ try: () => reader.readRow(), catch: readFailure }).pipe(
		Either.flatMap((row) => (row === null ? Either.left(endOfInput()) : Either.right(row))),
	);

/**
 * Decode one row addressed by `header` into a value of `schema`.
 *
 * The assembled record is checked for structure only: refinements were
 * applied to each parsed cell, and zero values stand for sentinels, skipped
 * fields and columns the header leaves out.
 */
export const unmarshalRow = <A, I>(
	schema: Schema.Schema<A, I, never>,
	header: ReadonlyArray<string>,
	row: ReadonlyArray<string>,
	sentinels: Sentinels,
): Either.Either<A, MarshalError> =>
	PathTree.fromRow(header, row).pipe(
		Either.flatMap((tree) => unmarshal(resolveCellType(schema.ast), tree, sentinels)),
		Either.flatMap((record) =>
			Schema.validateEither(Schema.make<A>(shapeOf(schema.ast)))(record).pipe(
				Either.mapLeft(
					(error) =>
						new ConversionError({
							path: [],
							value: "",
							expected: "a value matching the schema",
							message: `decoded row does not match the schema: ${error.message}`,
							cause: error,
						}),
				),
			),
		),
	);

/**
 * Reads records of one schema from rows. The first row is taken as the
 * header when the decoder is created; a failure there poisons the decoder
 * straight away.
 *
 * @example
 * ```ts
 * const decoder = new Decoder(Person, makeRowReader("name,age\nada,36\n"))
 * Effect.runSync(decoder.decode()) // { name: "ada", age: 36 }
 * ```
 */
export class Decoder<A, I = A> {
	emptyValue: string;
	nilValue: string;
	readonly header: ReadonlyArray<string>;
	private readonly guard: StickyGuard<DecodeError>;
	private rows = 0;

	constructor(
		readonly schema: Schema.Schema<A, I, never>,
		private readonly reader: RowReader,
		options?: CodecOptions,
	) {
		const resolved = resolveCodecOptions(options);
		this.emptyValue = resolved.emptyValue;
		this.nilValue = resolved.nilValue;

		const header = readRow(reader);
		this.header = Either.getOrElse(header, () => []);
		this.guard = new StickyGuard<DecodeError>(Either.isLeft(header) ? header.left : undefined);
	}

	get error(): Option.Option<DecodeError> {
		return this.guard.error;
	}

	/**
	 * Decode the next row. Fails with EndOfInputError once the input is
	 * exhausted.
	 */
	decode(): Effect.Effect<A, DecodeError> {
		return this.guard.run(
			Effect.gen(this, function* () {
				const row = yield* readRow(this.reader);
				this.rows++;
				const duplicates = this.rows === 1 ? duplicatesOf(this.header) : [];
				if (duplicates.length > 0) {
					yield* Effect.logWarning("duplicate header columns, the last one wins").pipe(
						Effect.annotateLogs({ columns: duplicates.join(",") }),
					);
				}
				const value = yield* unmarshalRow(this.schema, this.header, row, {
					emptyValue: this.emptyValue,
					nilValue: this.nilValue,
				});
				yield* Effect.logDebug("decoded row").pipe(Effect.annotateLogs({ row: this.rows }));
				return value;
			}),
		);
	}

	/**
	 * Decode every remaining row. Reaching the end of input ends the list; it
	 * still poisons the decoder, like any terminal condition.
	 */
	decodeAll(): Effect.Effect<ReadonlyArray<A>, Exclude<DecodeError, EndOfInputError>> {
		return Effect.gen(this, function* () {
			const values: A[] = [];
			for (;;) {
				const next = yield* Effect.either(this.decode());
				if (Either.isRight(next)) {
					values.push(next.right);
					continue;
				}
				if (next.left._tag === "EndOfInputError") {
					return values;
				}
				return yield* Effect.fail(next.left);
			}
		});
	}
}
