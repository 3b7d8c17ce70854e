/**
 * The structural part of a schema's type side, which decoded records are
 * checked against. Leaves are checked against their refinements as they are
 * parsed; zeros restored for sentinels, skipped fields and missing columns
 * are kept as they are.
 */

import { SchemaAST } from "effect";

const shapes = new WeakMap<SchemaAST.AST, SchemaAST.AST>();

const relax = (ast: SchemaAST.AST): SchemaAST.AST => {
	switch (ast._tag) {
		case "Refinement":
			return relax(ast.from);
		case "Transformation":
			return relax(ast.to);
		// an opaque type has no zero to restore
		case "Declaration":
			return SchemaAST.unknownKeyword;
		case "Suspend":
			return new SchemaAST.Suspend(() => relax(ast.f()), ast.annotations);
		case "Union":
			return SchemaAST.Union.make(ast.types.map(relax), ast.annotations);
		case "TupleType":
			return new SchemaAST.TupleType(
				ast.elements.map(
					(element) =>
						new SchemaAST.OptionalType(relax(element.type), element.isOptional, element.annotations),
				),
				ast.rest.map((rest) => new SchemaAST.Type(relax(rest.type), rest.annotations)),
				ast.isReadonly,
				ast.annotations,
			);
		case "TypeLiteral":
			return new SchemaAST.TypeLiteral(
				ast.propertySignatures.map(
					(property) =>
						new SchemaAST.PropertySignature(
							property.name,
							relax(property.type),
							property.isOptional,
							property.isReadonly,
							property.annotations,
						),
				),
				ast.indexSignatures.map(
					(index) => new SchemaAST.IndexSignature(index.parameter, relax(index.type), index.isReadonly),
				),
				ast.annotations,
			);
		default:
			return ast;
	}
};

export function shapeOf(ast: SchemaAST.AST): SchemaAST.AST {
	let shape = shapes.get(ast);
	if (shape === undefined) {
		shape = relax(ast);
		shapes.set(ast, shape);
	}
	return shape;
}
