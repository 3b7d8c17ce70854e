/**
 * Annotations that steer how a schema is laid out as cells.
 *
 * Field tags use the form `name[,omitEmpty]`:
 *
 * ```ts
 * const Person = Schema.Struct({
 *   name: Schema.propertySignature(Schema.String).annotations(cellTag("handle")),
 *   nickname: Schema.optional(Schema.String).annotations(cellTag(",omitEmpty")),
 *   secret: field(Schema.String, "-"),
 *   base: embedded(Audit),
 * })
 * ```
 */

import { Schema, SchemaAST } from "effect";

// ============================================================================
// Annotation identifiers
// ============================================================================

export const CellTagId: unique symbol = Symbol.for("@rowcodec/core/CellTag");
export const CellEmbeddedId: unique symbol = Symbol.for(
	"@rowcodec/core/CellEmbedded",
);
export const CellHooksId: unique symbol = Symbol.for("@rowcodec/core/CellHooks");

// ============================================================================
// Field tags
// ============================================================================

export interface CellTag {
	readonly name: string;
	readonly omitEmpty: boolean;
}

/**
 * Parse a `name[,omitEmpty]` tag. An empty name means "use the default".
 */
export const parseCellTag = (tag: string): CellTag => {
	const [name = "", ...options] = tag.split(",");
	return { name, omitEmpty: options.includes("omitEmpty") };
};

export const cellTag = (tag: string): { readonly [CellTagId]: string } => ({
	[CellTagId]: tag,
});

/**
 * Shorthand for a required property signature carrying a cell tag.
 */
export const field = <S extends Schema.Schema.Any>(schema: S, tag: string) =>
	Schema.propertySignature(schema).annotations(cellTag(tag));

/**
 * Splice the nested struct's fields into the parent's cells and header
 * namespace instead of nesting them under the field's own name.
 */
export const embedded = <S extends Schema.Schema.Any>(schema: S) =>
	Schema.propertySignature(schema).annotations({ [CellEmbeddedId]: true });

// ============================================================================
// Type-level hooks
// ============================================================================

/**
 * Hooks attached to a schema rather than to its runtime values. Each
 * function may throw; the codec tags the failure as a HookError.
 */
export interface CellHooks<A> {
	readonly getCells?: (value: A) => ReadonlyArray<string>;
	readonly setCells?: (cells: ReadonlyArray<string>) => A;
	readonly toText?: (value: A) => string;
	readonly fromText?: (text: string) => A;
	/** Value used when the column is absent; also probed for value-level hooks. */
	readonly zero?: () => A;
	/** Cells produced by getCells, used to size nil expansions. Defaults to 1. */
	readonly width?: number;
}

/**
 * Runtime view of a CellHooks annotation, with the value type erased.
 */
export interface AnyCellHooks {
	readonly getCells?: (value: unknown) => ReadonlyArray<string>;
	readonly setCells?: (cells: ReadonlyArray<string>) => unknown;
	readonly toText?: (value: unknown) => string;
	readonly fromText?: (text: string) => unknown;
	readonly zero?: () => unknown;
	readonly width?: number;
}

export const cellHooks = <A>(
	hooks: CellHooks<A>,
): { readonly [CellHooksId]: CellHooks<A> } => ({ [CellHooksId]: hooks });

/**
 * A schema for instances of `ctor`. The codec builds a fresh instance when
 * decoding and lets its own `setCells` / `fromText` methods populate it.
 */
export const cellClass = <A extends object>(
	ctor: new () => A,
	identifier: string = ctor.name,
) =>
	Schema.instanceOf(ctor).annotations({
		identifier,
		...cellHooks<A>({ zero: () => new ctor() }),
	});

// ============================================================================
// Readers
// ============================================================================

const isFunction = (u: unknown): u is (...args: ReadonlyArray<never>) => unknown =>
	typeof u === "function";

const isHooks = (u: unknown): u is AnyCellHooks =>
	typeof u === "object" &&
	u !== null &&
	Object.values(u).every(
		(entry) => entry === undefined || isFunction(entry) || typeof entry === "number",
	);

export const getCellTag = (annotated: SchemaAST.Annotated): string | undefined => {
	const tag = annotated.annotations[CellTagId];
	return typeof tag === "string" ? tag : undefined;
};

export const isEmbedded = (annotated: SchemaAST.Annotated): boolean =>
	annotated.annotations[CellEmbeddedId] === true;

export const getCellHooks = (
	annotated: SchemaAST.Annotated,
): AnyCellHooks | undefined => {
	const hooks = annotated.annotations[CellHooksId];
	return isHooks(hooks) ? hooks : undefined;
};
