import type { Schema } from "effect";
import { type CellType, resolveCellType, widthOf } from "./cell-type.js";

const hasEncodeHooks = (type: CellType): boolean =>
	type.hooks?.getCells !== undefined || type.hooks?.toText !== undefined;

/**
 * Unwrap optionals down to a struct that is laid out field by field, if
 * there is one.
 */
const structuralRecord = (type: CellType) => {
	let current = type;
	while (current._tag === "Optional" && !hasEncodeHooks(current)) {
		current = current.inner;
	}
	return current._tag === "Record" && !hasEncodeHooks(current) ? current : undefined;
};

const columnsOf = (type: CellType, prefix: string): ReadonlyArray<string> => {
	const record = structuralRecord(type);
	if (record === undefined) {
		return [];
	}
	const columns: string[] = [];
	for (const field of record.fields) {
		if (field.skip) {
			continue;
		}
		if (field.embedded) {
			columns.push(...columnsOf(field.type, prefix));
			continue;
		}
		const name = `${prefix}${field.effectiveName}`;
		if (structuralRecord(field.type) !== undefined) {
			columns.push(...columnsOf(field.type, `${name}.`));
			continue;
		}
		const width = widthOf(field.type);
		if (width === 1) {
			columns.push(name);
		} else {
			for (let i = 0; i < width; i++) {
				columns.push(`${name}.${i}`);
			}
		}
	}
	return columns;
};

/**
 * The dotted header that labels the cells the encoder writes for `schema`,
 * using the names the decoder looks fields up by.
 *
 * @example
 * headerOf(Schema.Struct({ id: Schema.Number, person: Schema.Struct({ name: Schema.String }) }))
 * // ["id", "person.name"]
 */
export function headerOf<A, I, R>(schema: Schema.Schema<A, I, R>): ReadonlyArray<string> {
	return columnsOf(resolveCellType(schema.ast), "");
}
