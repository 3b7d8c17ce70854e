/**
 * Encoding: a typed value becomes a flat, ordered list of cells.
 *
 * Sequences and maps collapse into a single comma-joined cell so that every
 * row of a schema has the same width no matter how many elements they hold.
 * The commas are not escaped; quoting the whole cell is the tabular writer's
 * job, and an element containing a comma will not split back the same way.
 */

import { Either, Option } from "effect";
import {
	type MarshalError,
	UnexpectedShapeError,
	UnsupportedTypeError,
	withContext,
} from "../errors/codec-errors.js";
import { detectEncodeHook } from "../hooks/hook-registry.js";
import { type CellType, isZero, type RecordType, widthOf } from "../schema/cell-type.js";
import { formatScalar, isScalar } from "./scalars.js";

export interface Sentinels {
	/** Cell written for a zero value whose field asks for `omitEmpty`. */
	readonly emptyValue: string;
	/** Cell written for an absent (null / undefined) value. */
	readonly nilValue: string;
}

type Cells = ReadonlyArray<string>;

const isObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null;

const unsupported = (name: string) =>
	new UnsupportedTypeError({
		path: [],
		kind: name,
		message: `cannot encode ${name} as cells`,
	});

const wrongShape = (expected: "array" | "object", value: unknown) => {
	const received = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
	return new UnexpectedShapeError({
		path: [],
		expected,
		received,
		message: `expected an ${expected}, got ${received}`,
	});
};

/**
 * Encode each item and join everything into one cell, failing on the first
 * item that does not encode.
 */
const joinAll = <T>(
	items: ReadonlyArray<T>,
	encodeItem: (item: T, index: number) => Either.Either<string, MarshalError>,
): Either.Either<Cells, MarshalError> => {
	const parts: string[] = [];
	for (let i = 0; i < items.length; i++) {
		const part = encodeItem(items[i], i);
		if (Either.isLeft(part)) {
			return Either.left(part.left);
		}
		parts.push(part.right);
	}
	return Either.right([parts.join(",")]);
};

/**
 * Encode `value` as cells according to `type`. `omitEmpty` only applies at
 * this level; it is never passed down into elements or nested fields.
 */
export function marshal(
	type: CellType,
	value: unknown,
	omitEmpty: boolean,
	sentinels: Sentinels,
): Either.Either<Cells, MarshalError> {
	const hook = detectEncodeHook(type, value);
	if (Option.isSome(hook)) {
		return hook.value();
	}

	if (type._tag === "Optional") {
		if (value === null || value === undefined) {
			return Either.right(Array.from({ length: widthOf(type.inner) }, () => sentinels.nilValue));
		}
		return marshal(type.inner, value, omitEmpty, sentinels);
	}

	if (omitEmpty && isZero(type, value)) {
		return Either.right([sentinels.emptyValue]);
	}

	if (isScalar(type)) {
		return formatScalar(type, value).pipe(Either.map((cell) => [cell]));
	}

	switch (type._tag) {
		case "Sequence": {
			if (!Array.isArray(value)) {
				return Either.left(wrongShape("array", value));
			}
			const elements: ReadonlyArray<unknown> = value;
			return joinAll(elements, (element, index) =>
				marshal(type.element, element, false, sentinels).pipe(
					Either.map((cells) => cells.join(",")),
					Either.mapLeft(withContext(`[${index}]`, `element [${index}]`, element)),
				),
			);
		}

		case "Associative": {
			if (!isObject(value)) {
				return Either.left(wrongShape("object", value));
			}
			// Entry order follows the object's own key order and carries no meaning.
			return joinAll(Object.entries(value), ([key, entry]) =>
				marshal(type.value, entry, false, sentinels).pipe(
					Either.map((cells) => `${key}:${cells.join(",")}`),
					Either.mapLeft(withContext(key, `map value [${key}]`, entry)),
				),
			);
		}

		case "Record":
			return marshalRecord(type, value, sentinels);

		case "Opaque":
		case "Unsupported":
			return Either.left(unsupported(type.name));
	}
}

/**
 * Concatenate the cells of every non-skipped field in declaration order.
 */
export function marshalRecord(
	type: RecordType,
	value: unknown,
	sentinels: Sentinels,
): Either.Either<Cells, MarshalError> {
	if (!isObject(value)) {
		return Either.left(wrongShape("object", value));
	}

	const cells: string[] = [];
	for (const field of type.fields) {
		if (field.skip) {
			continue;
		}
		const fieldValue = value[field.declaredName];
		const encoded = marshal(field.type, fieldValue, field.omitEmpty, sentinels).pipe(
			Either.mapLeft(withContext(field.declaredName, `field \`${field.declaredName}\``, fieldValue)),
		);
		if (Either.isLeft(encoded)) {
			return Either.left(encoded.left);
		}
		cells.push(...encoded.right);
	}
	return Either.right(cells);
}
