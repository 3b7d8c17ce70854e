import { Either, Schema } from "effect";
import { describe, expect, it } from "vitest";
import {
	formatFloat,
	formatFloat32,
	formatScalar,
	isScalar,
	parseScalar,
	type ScalarType,
} from "../src/codec/scalars.js";
import { cellTypeOf } from "../src/schema/cell-type.js";
import { Float32, Int8, Int64 } from "../src/schema/numeric.js";

const scalar = <A, I, R>(schema: Schema.Schema<A, I, R>): ScalarType => {
	const type = cellTypeOf(schema);
	if (!isScalar(type)) {
		throw new Error(`${type._tag} is not a scalar`);
	}
	return type;
};

const parsed = (type: ScalarType, cell: string): unknown =>
	Either.getOrThrow(parseScalar(type, cell));

const fails = (type: ScalarType, cell: string): boolean =>
	Either.isLeft(parseScalar(type, cell));

describe("formatFloat", () => {
	it("writes the shortest round-tripping form", () => {
		expect(formatFloat(60.429)).toBe("60.429");
		expect(formatFloat(0.1)).toBe("0.1");
		expect(formatFloat(1e21)).toBe("1e+21");
		expect(formatFloat(Number.POSITIVE_INFINITY)).toBe("Infinity");
	});

	it("keeps the sign of negative zero", () => {
		expect(formatFloat(-0)).toBe("-0");
		expect(formatFloat(0)).toBe("0");
	});
});

describe("formatFloat32", () => {
	it("writes the shortest decimal that rounds to the same 32-bit value", () => {
		expect(formatFloat32(Math.fround(60.429))).toBe("60.429");
		expect(formatFloat32(Math.fround(0.1))).toBe("0.1");
		expect(formatFloat32(16_777_216)).toBe("16777216");
		expect(formatFloat32(-0)).toBe("-0");
		expect(formatFloat32(Number.NaN)).toBe("NaN");
	});
});

describe("formatScalar", () => {
	it("formats each kind", () => {
		expect(Either.getOrThrow(formatScalar(scalar(Schema.Boolean), true))).toBe("true");
		expect(Either.getOrThrow(formatScalar(scalar(Schema.Int), -42))).toBe("-42");
		expect(Either.getOrThrow(formatScalar(scalar(Int64), 2n ** 62n))).toBe(
			"4611686018427387904",
		);
		expect(Either.getOrThrow(formatScalar(scalar(Schema.Literal("a", "b")), "b"))).toBe("b");
	});

	it("refuses values of the wrong runtime type", () => {
		const result = formatScalar(scalar(Schema.Boolean), "true");
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.message).toBe("cannot format string as boolean");
		}
		expect(Either.isLeft(formatScalar(scalar(Schema.Int), 1.5))).toBe(true);
		expect(Either.isLeft(formatScalar(scalar(Schema.Literal("a")), "z"))).toBe(true);
	});

	it("refuses integers outside the safe range, which would not parse back", () => {
		const int = scalar(Schema.Int);
		expect(Either.getOrThrow(formatScalar(int, Number.MAX_SAFE_INTEGER))).toBe(
			"9007199254740991",
		);
		expect(Either.isLeft(formatScalar(int, 2 ** 60))).toBe(true);
		expect(Either.isLeft(formatScalar(int, 1e21))).toBe(true);
	});

	it("formats 32-bit floats in their shortest form", () => {
		expect(Either.getOrThrow(formatScalar(scalar(Float32), Math.fround(60.429)))).toBe("60.429");
	});
});

describe("parseScalar", () => {
	it("parses booleans in their accepted spellings", () => {
		const bool = scalar(Schema.Boolean);
		expect(parsed(bool, "true")).toBe(true);
		expect(parsed(bool, "T")).toBe(true);
		expect(parsed(bool, "1")).toBe(true);
		expect(parsed(bool, "FALSE")).toBe(false);
		expect(parsed(bool, "f")).toBe(false);
		expect(fails(bool, "yes")).toBe(true);
	});

	it("parses integers in decimal and prefixed forms", () => {
		const int = scalar(Schema.Int);
		expect(parsed(int, "23")).toBe(23);
		expect(parsed(int, "+7")).toBe(7);
		expect(parsed(int, "007")).toBe(7);
		expect(parsed(int, "0x1f")).toBe(31);
		expect(parsed(int, "-0b101")).toBe(-5);
		expect(parsed(int, "0o17")).toBe(15);
		expect(fails(int, "1.5")).toBe(true);
		expect(fails(int, "0x")).toBe(true);
		expect(fails(int, "0o9")).toBe(true);
		expect(fails(int, "9007199254740993")).toBe(true);
	});

	it("applies refinements after parsing", () => {
		const int8 = scalar(Int8);
		expect(parsed(int8, "-128")).toBe(-128);
		const result = parseScalar(int8, "300");
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ConversionError");
			expect(result.left.value).toBe("300");
			expect(result.left.expected).toBe("integer");
		}
	});

	it("parses floats including special values", () => {
		const float = scalar(Schema.Number);
		expect(parsed(float, "60.429")).toBe(60.429);
		expect(parsed(float, ".5")).toBe(0.5);
		expect(parsed(float, "1e3")).toBe(1000);
		expect(parsed(float, "-0")).toBe(-0);
		expect(parsed(float, "NaN")).toBeNaN();
		expect(parsed(float, "-Inf")).toBe(Number.NEGATIVE_INFINITY);
		expect(parsed(float, "infinity")).toBe(Number.POSITIVE_INFINITY);
		expect(fails(float, "abc")).toBe(true);
		expect(fails(float, "1.2.3")).toBe(true);
	});

	it("rounds 32-bit floats to the nearest representable value", () => {
		const float32 = scalar(Float32);
		expect(parsed(float32, "60.429")).toBe(Math.fround(60.429));
		expect(parsed(float32, "0.1")).toBe(Math.fround(0.1));
		expect(parsed(float32, "-0")).toBe(-0);
		expect(parsed(float32, "NaN")).toBeNaN();
		expect(fails(float32, "abc")).toBe(true);
	});

	it("parses bigints beyond the safe integer range", () => {
		const big = scalar(Int64);
		expect(parsed(big, "-9223372036854775808")).toBe(-(2n ** 63n));
		expect(fails(big, "9223372036854775808")).toBe(true);
	});

	it("matches literals by their string form", () => {
		const literal = scalar(Schema.Literal(1, 2));
		expect(parsed(literal, "2")).toBe(2);
		expect(fails(literal, "3")).toBe(true);
	});

	it("reports the cell and the expected kind", () => {
		const result = parseScalar(scalar(Schema.Int), "abc");
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.message).toBe('cannot parse "abc" as integer');
			expect(result.left.path).toEqual([]);
		}
	});
});
