import type { SchemaAST } from "effect";
import {
	getCellTag,
	isEmbedded,
	parseCellTag,
} from "./annotations.js";
import type { CellType } from "./cell-type.js";

/**
 * How one declared struct field takes part in a row.
 */
export interface FieldDescriptor {
	/** The property key as declared on the struct. */
	readonly declaredName: string;
	/** Header segment used to look the field up when decoding. */
	readonly effectiveName: string;
	readonly omitEmpty: boolean;
	readonly skip: boolean;
	readonly embedded: boolean;
	/** Declared with `Schema.optional`, so the key may be missing. */
	readonly optional: boolean;
	readonly type: CellType;
}

const cache = new WeakMap<SchemaAST.TypeLiteral, ReadonlyArray<FieldDescriptor>>();

/**
 * Keys starting with "_" are private to the value and never become cells
 * unless the field is embedded.
 */
const isPrivateKey = (key: string): boolean => key.startsWith("_");

/**
 * Resolve the field descriptors of a struct, in declaration order.
 * Pure, and computed once per struct AST.
 */
export function resolveFields(
	ast: SchemaAST.TypeLiteral,
	resolveType: (ps: SchemaAST.PropertySignature) => CellType,
): ReadonlyArray<FieldDescriptor> {
	const cached = cache.get(ast);
	if (cached) {
		return cached;
	}

	const fields: FieldDescriptor[] = [];
	for (const ps of ast.propertySignatures) {
		// symbol keys have no header representation
		if (typeof ps.name !== "string") {
			continue;
		}

		const { name, omitEmpty } = parseCellTag(
			getCellTag(ps) ?? getCellTag(ps.type) ?? "",
		);
		const embedded = isEmbedded(ps) || isEmbedded(ps.type);
		const skip = name === "-" || (isPrivateKey(ps.name) && !embedded);

		fields.push({
			declaredName: ps.name,
			effectiveName: name === "" || name === "-" ? ps.name.toLowerCase() : name,
			omitEmpty,
			skip,
			embedded,
			optional: ps.isOptional,
			type: resolveType(ps),
		});
	}

	cache.set(ast, fields);
	return fields;
}
