/**
 * Closed enumeration of the kinds the codec knows how to lay out as cells,
 * resolved once per schema AST node.
 */

import { Schema, SchemaAST } from "effect";
import { type AnyCellHooks, getCellHooks } from "./annotations.js";
import { type FieldDescriptor, resolveFields } from "./field-resolver.js";
import { Float32SchemaId } from "./numeric.js";

// ============================================================================
// Kinds
// ============================================================================

interface Base {
	/** The node validated against after a cell is parsed into this kind. */
	readonly ast: SchemaAST.AST;
	readonly hooks: AnyCellHooks | undefined;
}

export type LiteralValue = string | number | boolean | bigint;

export interface BooleanType extends Base {
	readonly _tag: "Boolean";
}
export interface IntegerType extends Base {
	readonly _tag: "Integer";
}
export interface FloatType extends Base {
	readonly _tag: "Float";
	readonly precision: 32 | 64;
}
export interface BigIntType extends Base {
	readonly _tag: "BigInt";
}
export interface StringType extends Base {
	readonly _tag: "String";
}
export interface LiteralType extends Base {
	readonly _tag: "Literal";
	readonly literals: ReadonlyArray<LiteralValue>;
}
export interface OptionalType extends Base {
	readonly _tag: "Optional";
	readonly inner: CellType;
	/** What an absent value decodes to. */
	readonly nil: null | undefined;
}
export interface SequenceType extends Base {
	readonly _tag: "Sequence";
	readonly element: CellType;
}
export interface AssociativeType extends Base {
	readonly _tag: "Associative";
	readonly value: CellType;
}
export interface RecordType extends Base {
	readonly _tag: "Record";
	readonly fields: ReadonlyArray<FieldDescriptor>;
}
export interface OpaqueType extends Base {
	readonly _tag: "Opaque";
	readonly name: string;
}
export interface UnsupportedType extends Base {
	readonly _tag: "Unsupported";
	readonly name: string;
}

export type CellType =
	| BooleanType
	| IntegerType
	| FloatType
	| BigIntType
	| StringType
	| LiteralType
	| OptionalType
	| SequenceType
	| AssociativeType
	| RecordType
	| OpaqueType
	| UnsupportedType;

// ============================================================================
// Resolution
// ============================================================================

const cache = new WeakMap<SchemaAST.AST, CellType>();

const isIntRefinement = (ast: SchemaAST.Refinement): boolean =>
	ast.annotations[SchemaAST.SchemaIdAnnotationId] === Schema.IntSchemaId;

const isFloat32Refinement = (ast: SchemaAST.Refinement): boolean =>
	ast.annotations[SchemaAST.SchemaIdAnnotationId] === Float32SchemaId;

const isNullLiteral = (ast: SchemaAST.AST): boolean =>
	SchemaAST.isLiteral(ast) && ast.literal === null;

const literalsOf = (ast: SchemaAST.AST): ReadonlyArray<LiteralValue> | undefined => {
	if (SchemaAST.isLiteral(ast)) {
		return ast.literal === null ? undefined : [ast.literal];
	}
	if (SchemaAST.isEnums(ast)) {
		return ast.enums.map(([, value]) => value);
	}
	return undefined;
};

const resolveUnion = (ast: SchemaAST.Union, hooks: AnyCellHooks | undefined): CellType => {
	const hasUndefined = ast.types.some(SchemaAST.isUndefinedKeyword);
	const hasNull = ast.types.some(isNullLiteral);
	const members = ast.types.filter(
		(member) => !SchemaAST.isUndefinedKeyword(member) && !isNullLiteral(member),
	);

	let inner: CellType;
	if (members.length === 1) {
		inner = resolveCellType(members[0]);
	} else {
		const literals: LiteralValue[] = [];
		for (const member of members) {
			const values = literalsOf(member);
			if (values === undefined) {
				return { _tag: "Unsupported", name: "Union", ast, hooks };
			}
			literals.push(...values);
		}
		if (literals.length === 0) {
			return { _tag: "Unsupported", name: "Union", ast, hooks };
		}
		inner = { _tag: "Literal", literals, ast: SchemaAST.Union.make(members), hooks: undefined };
	}

	if (!hasUndefined && !hasNull) {
		return hooks ? { ...inner, hooks } : inner;
	}
	return {
		_tag: "Optional",
		inner,
		nil: hasNull ? null : undefined,
		ast,
		hooks,
	};
};

const resolveUncached = (ast: SchemaAST.AST): CellType => {
	const hooks = getCellHooks(ast);
	switch (ast._tag) {
		case "BooleanKeyword":
			return { _tag: "Boolean", ast, hooks };
		case "NumberKeyword":
			return { _tag: "Float", precision: 64, ast, hooks };
		case "BigIntKeyword":
			return { _tag: "BigInt", ast, hooks };
		case "StringKeyword":
			return { _tag: "String", ast, hooks };
		case "Literal":
		case "Enums": {
			const literals = literalsOf(ast);
			return literals
				? { _tag: "Literal", literals, ast, hooks }
				: { _tag: "Unsupported", name: "Null", ast, hooks };
		}
		case "Refinement": {
			const from = resolveCellType(ast.from);
			const kind = from._tag === "Float" && isIntRefinement(ast) ? "Integer" : from._tag;
			if (kind === "Integer") {
				return { _tag: "Integer", ast, hooks: hooks ?? from.hooks };
			}
			if (from._tag === "Float" && isFloat32Refinement(ast)) {
				return { _tag: "Float", precision: 32, ast, hooks: hooks ?? from.hooks };
			}
			return { ...from, ast, hooks: hooks ?? from.hooks };
		}
		case "Transformation": {
			const to = resolveCellType(ast.to);
			return { ...to, ast, hooks: hooks ?? to.hooks };
		}
		case "Union":
			return resolveUnion(ast, hooks);
		case "TupleType":
			if (ast.elements.length === 0 && ast.rest.length === 1) {
				return {
					_tag: "Sequence",
					element: resolveCellType(ast.rest[0].type),
					ast,
					hooks,
				};
			}
			return { _tag: "Unsupported", name: "Tuple", ast, hooks };
		case "TypeLiteral":
			if (ast.propertySignatures.length === 0 && ast.indexSignatures.length === 1) {
				return {
					_tag: "Associative",
					value: resolveCellType(ast.indexSignatures[0].type),
					ast,
					hooks,
				};
			}
			return {
				_tag: "Record",
				fields: resolveFields(ast, resolveFieldType),
				ast,
				hooks,
			};
		case "Declaration":
			return {
				_tag: "Opaque",
				name: String(ast.annotations[SchemaAST.IdentifierAnnotationId] ?? "Declaration"),
				ast,
				hooks,
			};
		default:
			return { _tag: "Unsupported", name: ast._tag, ast, hooks };
	}
};

/**
 * Resolve the cell kind of a schema AST node.
 */
export function resolveCellType(ast: SchemaAST.AST): CellType {
	const cached = cache.get(ast);
	if (cached) {
		return cached;
	}
	const resolved = resolveUncached(ast);
	cache.set(ast, resolved);
	return resolved;
}

/**
 * A property declared with `Schema.optional` may be missing even when its
 * type has no `undefined` member (exact optional properties).
 */
const resolveFieldType = (ps: SchemaAST.PropertySignature): CellType => {
	const type = resolveCellType(ps.type);
	if (!ps.isOptional || type._tag === "Optional") {
		return type;
	}
	return { _tag: "Optional", inner: type, nil: undefined, ast: ps.type, hooks: undefined };
};

export const cellTypeOf = <A, I, R>(schema: Schema.Schema<A, I, R>): CellType =>
	resolveCellType(schema.ast);

/**
 * The ordered field descriptors of a struct schema, or an empty list for any
 * other kind.
 */
export const fieldsOf = <A, I, R>(
	schema: Schema.Schema<A, I, R>,
): ReadonlyArray<FieldDescriptor> => {
	const type = cellTypeOf(schema);
	return type._tag === "Record" ? type.fields : [];
};

// ============================================================================
// Type-level properties
// ============================================================================

const hasEncodeHooks = (type: CellType): boolean =>
	type.hooks?.getCells !== undefined || type.hooks?.toText !== undefined;

const widthCache = new WeakMap<CellType, number>();

/**
 * Number of cells a populated value of this type encodes to. Absent
 * optional values expand to the same number of nil cells.
 */
export function widthOf(type: CellType): number {
	const cached = widthCache.get(type);
	if (cached !== undefined) {
		return cached;
	}
	let width: number;
	if (hasEncodeHooks(type)) {
		width = type.hooks?.width ?? 1;
	} else if (type._tag === "Record") {
		width = type.fields.reduce(
			(sum, field) => (field.skip ? sum : sum + widthOf(field.type)),
			0,
		);
	} else if (type._tag === "Optional") {
		width = widthOf(type.inner);
	} else {
		width = 1;
	}
	widthCache.set(type, width);
	return width;
}

/**
 * The value a field takes when no cell addresses it.
 */
export function zeroOf(type: CellType): unknown {
	if (type.hooks?.zero) {
		return type.hooks.zero();
	}
	switch (type._tag) {
		case "Boolean":
			return false;
		case "Integer":
		case "Float":
			return 0;
		case "BigInt":
			return 0n;
		case "String":
			return "";
		case "Literal":
			return type.literals[0];
		case "Optional":
			return type.nil;
		case "Sequence":
			return [];
		case "Associative":
			return {};
		case "Record": {
			const record: Record<string, unknown> = {};
			for (const field of type.fields) {
				const zero = zeroOf(field.type);
				if (!(field.optional && zero === undefined)) {
					record[field.declaredName] = zero;
				}
			}
			return record;
		}
		case "Opaque":
		case "Unsupported":
			return undefined;
	}
}

const isObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null;

/**
 * Whether `value` is the zero value of its type, which is what `omitEmpty`
 * replaces with the empty sentinel.
 */
export function isZero(type: CellType, value: unknown): boolean {
	switch (type._tag) {
		case "Boolean":
		case "Integer":
		case "Float":
		case "BigInt":
		case "String":
		case "Literal":
			return value === false || value === 0 || value === 0n || value === "";
		case "Optional":
			return value === null || value === undefined;
		case "Sequence":
			return Array.isArray(value) && value.length === 0;
		case "Associative":
			return isObject(value) && Object.keys(value).length === 0;
		case "Record":
			return (
				isObject(value) &&
				type.fields.every((field) => isZero(field.type, value[field.declaredName]))
			);
		case "Opaque":
		case "Unsupported":
			return false;
	}
}
