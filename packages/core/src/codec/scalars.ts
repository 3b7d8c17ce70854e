import { Either, type ParseResult, Schema, type SchemaAST } from "effect";
import { ConversionError } from "../errors/codec-errors.js";
import type { CellType, LiteralValue } from "../schema/cell-type.js";

export type ScalarType = Extract<
	CellType,
	{ readonly _tag: "Boolean" | "Integer" | "Float" | "BigInt" | "String" | "Literal" }
>;

export const isScalar = (type: CellType): type is ScalarType =>
	type._tag === "Boolean" ||
	type._tag === "Integer" ||
	type._tag === "Float" ||
	type._tag === "BigInt" ||
	type._tag === "String" ||
	type._tag === "Literal";

// ============================================================================
// Formatting
// ============================================================================

/**
 * Shortest decimal that reads back to the same number. Negative zero keeps
 * its sign.
 */
export const formatFloat = (n: number): string =>
	Object.is(n, -0) ? "-0" : String(n);

/**
 * Shortest decimal that rounds to the same 32-bit float.
 */
export const formatFloat32 = (n: number): string => {
	const target = Math.fround(n);
	if (!Number.isFinite(target) || target === 0) {
		return formatFloat(target);
	}
	for (let digits = 1; digits < 9; digits++) {
		const candidate = Number(target.toPrecision(digits));
		if (Math.fround(candidate) === target) {
			return String(candidate);
		}
	}
	return String(Number(target.toPrecision(9)));
};

const formatLiteral = (literal: LiteralValue): string => String(literal);

/**
 * Render a scalar as one cell. Values of the wrong runtime type fail with a
 * ConversionError rather than being coerced.
 */
export function formatScalar(
	type: ScalarType,
	value: unknown,
): Either.Either<string, ConversionError> {
	switch (type._tag) {
		case "Boolean":
			if (typeof value === "boolean") return Either.right(value ? "true" : "false");
			break;
		case "Integer":
			if (typeof value === "number" && Number.isSafeInteger(value)) {
				return Either.right(String(value));
			}
			break;
		case "Float":
			if (typeof value === "number") {
				return Either.right(type.precision === 32 ? formatFloat32(value) : formatFloat(value));
			}
			break;
		case "BigInt":
			if (typeof value === "bigint") return Either.right(value.toString(10));
			break;
		case "String":
			if (typeof value === "string") return Either.right(value);
			break;
		case "Literal": {
			const match = type.literals.find((literal) => literal === value);
			if (match !== undefined) return Either.right(formatLiteral(match));
			break;
		}
	}
	return Either.left(
		new ConversionError({
			path: [],
			value: String(value),
			expected: expectedOf(type),
			message: `cannot format ${typeof value} as ${expectedOf(type)}`,
		}),
	);
}

// ============================================================================
// Parsing
// ============================================================================

const DECIMAL_INTEGER = /^[+-]?\d+$/;
const PREFIXED_INTEGER = /^([+-]?)0([xob])([0-9a-f]+)$/i;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INFINITY = /^([+-]?)(inf|infinity)$/i;

const expectedOf = (type: ScalarType): string => {
	switch (type._tag) {
		case "Boolean":
			return "boolean";
		case "Integer":
			return "integer";
		case "Float":
			return "number";
		case "BigInt":
			return "bigint";
		case "String":
			return "string";
		case "Literal":
			return `one of ${type.literals.map(formatLiteral).join(" | ")}`;
	}
};

const conversionError = (type: ScalarType, value: string, cause?: unknown) =>
	new ConversionError({
		path: [],
		value,
		expected: expectedOf(type),
		message: `cannot parse "${value}" as ${expectedOf(type)}`,
		cause,
	});

/**
 * Integers accept decimal and 0x / 0o / 0b prefixed forms.
 */
const parseBigInt = (value: string): bigint | undefined => {
	if (DECIMAL_INTEGER.test(value)) {
		return BigInt(value);
	}
	const prefixed = PREFIXED_INTEGER.exec(value);
	if (prefixed === null) {
		return undefined;
	}
	const [, sign, base, digits] = prefixed;
	const valid =
		base.toLowerCase() === "x"
			? /^[0-9a-f]+$/i.test(digits)
			: base.toLowerCase() === "o"
				? /^[0-7]+$/.test(digits)
				: /^[01]+$/.test(digits);
	if (!valid) {
		return undefined;
	}
	const magnitude = BigInt(`0${base}${digits}`);
	return sign === "-" ? -magnitude : magnitude;
};

const parseBoolean = (value: string): boolean | undefined => {
	switch (value) {
		case "1":
		case "t":
		case "T":
		case "true":
		case "TRUE":
		case "True":
			return true;
		case "0":
		case "f":
		case "F":
		case "false":
		case "FALSE":
		case "False":
			return false;
		default:
			return undefined;
	}
};

const parseNumber = (value: string): number | undefined => {
	if (FLOAT.test(value)) {
		return Number(value);
	}
	if (value.toLowerCase() === "nan") {
		return Number.NaN;
	}
	const infinity = INFINITY.exec(value);
	if (infinity !== null) {
		return infinity[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
	}
	return undefined;
};

const parseRaw = (type: ScalarType, value: string): unknown => {
	switch (type._tag) {
		case "Boolean":
			return parseBoolean(value);
		case "Integer": {
			const parsed = parseBigInt(value);
			if (parsed === undefined) return undefined;
			const n = Number(parsed);
			return Number.isSafeInteger(n) ? n : undefined;
		}
		case "Float": {
			const parsed = parseNumber(value);
			return parsed !== undefined && type.precision === 32 ? Math.fround(parsed) : parsed;
		}
		case "BigInt":
			return parseBigInt(value);
		case "String":
			return value;
		case "Literal":
			return type.literals.find((literal) => formatLiteral(literal) === value);
	}
};

const validators = new WeakMap<
	SchemaAST.AST,
	(u: unknown) => Either.Either<unknown, ParseResult.ParseError>
>();

const validatorFor = (ast: SchemaAST.AST) => {
	let validate = validators.get(ast);
	if (validate === undefined) {
		validate = Schema.validateEither(Schema.make<unknown>(ast));
		validators.set(ast, validate);
	}
	return validate;
};

/**
 * Parse a cell into a scalar and check it against the field's schema, so
 * refinements such as `Int8` bounds apply.
 */
export function parseScalar(
	type: ScalarType,
	value: string,
): Either.Either<unknown, ConversionError> {
	const parsed = parseRaw(type, value);
	if (parsed === undefined) {
		return Either.left(conversionError(type, value));
	}
	return validatorFor(type.ast)(parsed).pipe(
		Either.mapLeft((error) =>
			new ConversionError({
				path: [],
				value,
				expected: expectedOf(type),
				message: `"${value}" is not a valid ${expectedOf(type)}: ${error.message}`,
				cause: error,
			}),
		),
	);
}
