/**
 * Decoding: a PathTree built from one row becomes a typed value.
 *
 * Struct fields are routed by header path; leaves are parsed by kind. A
 * column that does not appear in the header leaves its field at the zero
 * value.
 */

import { Either, Option } from "effect";
import {
	type MarshalError,
	UnexpectedShapeError,
	UnsupportedTypeError,
	withContext,
} from "../errors/codec-errors.js";
import { type DecodeHook, detectDecodeHook } from "../hooks/hook-registry.js";
import type { PathTree } from "../path-tree/path-tree.js";
import { type CellType, type RecordType, zeroOf } from "../schema/cell-type.js";
import type { Sentinels } from "./marshal.js";
import { isScalar, parseScalar } from "./scalars.js";

const expectedSubtree = (received: string) =>
	new UnexpectedShapeError({
		path: [],
		expected: "subtree",
		received: "cell",
		message: `expected nested columns for a struct, got the single cell "${received}"`,
	});

const expectedCell = (type: CellType) =>
	new UnexpectedShapeError({
		path: [],
		expected: "cell",
		received: "subtree",
		message: `expected a single cell for ${type._tag.toLowerCase()}, got nested columns`,
	});

const unsupported = (name: string) =>
	new UnsupportedTypeError({
		path: [],
		kind: name,
		message: `cannot decode ${name} from cells`,
	});

/**
 * Decode one cell into `type`.
 *
 * The nil sentinel leaves the zero value (absent, for optional types). Any
 * other cell makes an optional type present, even the empty sentinel, which
 * then leaves the present value at its zero.
 */
export function assign(
	type: CellType,
	cell: string,
	sentinels: Sentinels,
): Either.Either<unknown, MarshalError> {
	if (cell === sentinels.nilValue) {
		return Either.right(zeroOf(type));
	}

	if (type._tag === "Optional") {
		return assign(type.inner, cell, sentinels);
	}

	if (cell === sentinels.emptyValue) {
		return Either.right(zeroOf(type));
	}

	const hook = detectDecodeHook(type, zeroOf(type));
	if (Option.isSome(hook)) {
		return hook.value([cell]);
	}

	if (isScalar(type)) {
		return parseScalar(type, cell);
	}

	switch (type._tag) {
		case "Sequence": {
			const parts = cell.split(",");
			const elements: unknown[] = new Array(parts.length);
			for (let i = 0; i < parts.length; i++) {
				const element = assign(type.element, parts[i], sentinels).pipe(
					Either.mapLeft(withContext(`[${i}]`, `element [${i}]`, parts[i])),
				);
				if (Either.isLeft(element)) {
					return Either.left(element.left);
				}
				elements[i] = element.right;
			}
			// only handed out once every element parsed
			return Either.right(elements);
		}
		case "Record":
			return Either.left(expectedSubtree(cell));
		case "Associative":
			return Either.left(unsupported("map"));
		case "Opaque":
		case "Unsupported":
			return Either.left(unsupported(type.name));
	}
}

const allNil = (tree: PathTree, nilValue: string): boolean => {
	let sawLeaf = false;
	for (const leaf of tree.leaves()) {
		if (leaf !== nilValue) {
			return false;
		}
		sawLeaf = true;
	}
	return sawLeaf;
};

/**
 * Decode a subtree into a struct (or an optional struct). An optional struct
 * whose every cell is the nil sentinel stays absent, which is how the
 * encoder writes it.
 */
export function unmarshalTree(
	type: CellType,
	tree: PathTree,
	sentinels: Sentinels,
	spliced = false,
): Either.Either<unknown, MarshalError> {
	if (type._tag === "Optional") {
		if (!spliced && allNil(tree, sentinels.nilValue)) {
			return Either.right(type.nil);
		}
		return unmarshalTree(type.inner, tree, sentinels, spliced);
	}
	// a hook wider than one cell is addressed as name.0, name.1, ...
	const hook: Option.Option<DecodeHook> = spliced
		? Option.none()
		: detectDecodeHook(type, zeroOf(type));
	if (Option.isSome(hook)) {
		return hook.value([...tree.leaves()]);
	}
	if (type._tag === "Record") {
		return unmarshalRecord(type, tree, sentinels);
	}
	return Either.left(
		spliced ? unsupported(`embedded ${type._tag.toLowerCase()}`) : expectedCell(type),
	);
}

/**
 * Populate every field of a struct from `tree`. Embedded fields read from
 * the same node as their parent.
 */
export function unmarshalRecord(
	type: RecordType,
	tree: PathTree,
	sentinels: Sentinels,
): Either.Either<Record<string, unknown>, MarshalError> {
	const record: Record<string, unknown> = {};

	for (const field of type.fields) {
		let decoded: Either.Either<unknown, MarshalError>;
		let source: unknown;

		if (field.skip) {
			decoded = Either.right(zeroOf(field.type));
		} else if (field.embedded) {
			source = "[embedded]";
			decoded = unmarshalTree(field.type, tree, sentinels, true);
		} else {
			const node = tree.get(field.effectiveName);
			if (node === undefined) {
				decoded = Either.right(zeroOf(field.type));
			} else if (typeof node === "string") {
				source = node;
				decoded = assign(field.type, node, sentinels);
			} else {
				source = node.toObject();
				decoded = unmarshalTree(field.type, node, sentinels);
			}
		}

		if (Either.isLeft(decoded)) {
			return Either.left(
				withContext(field.declaredName, `field \`${field.declaredName}\``, source)(decoded.left),
			);
		}
		if (!(field.optional && decoded.right === undefined)) {
			record[field.declaredName] = decoded.right;
		}
	}

	return Either.right(record);
}

/**
 * Decode a whole row. Only structs are supported at the top level.
 */
export function unmarshal(
	type: CellType,
	tree: PathTree,
	sentinels: Sentinels,
): Either.Either<Record<string, unknown>, MarshalError> {
	if (type._tag !== "Record") {
		return Either.left(
			new UnsupportedTypeError({
				path: [],
				kind: type._tag,
				message: `only a struct can be decoded from a row, got ${type._tag.toLowerCase()}`,
			}),
		);
	}
	return unmarshalRecord(type, tree, sentinels);
}
