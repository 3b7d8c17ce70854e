import { describe, expect, it } from "vitest";
import { makeRowReader, TabularParseError } from "../src/tabular/reader.js";
import type { RowReader, TabularOptions } from "../src/tabular/row-io.js";
import { makeRowWriter, makeStringRowWriter, quoteCell } from "../src/tabular/writer.js";

const readAll = (reader: RowReader): ReadonlyArray<ReadonlyArray<string>> => {
	const rows: ReadonlyArray<string>[] = [];
	for (let row = reader.readRow(); row !== null; row = reader.readRow()) {
		rows.push(row);
	}
	return rows;
};

const parse = (input: string, options?: TabularOptions) => readAll(makeRowReader(input, options));

describe("makeRowReader", () => {
	it("splits rows and cells", () => {
		expect(parse("a,b\nc,d\n")).toEqual([
			["a", "b"],
			["c", "d"],
		]);
	});

	it("reads a final row without a line break", () => {
		expect(parse("a,b\nc,d")).toEqual([
			["a", "b"],
			["c", "d"],
		]);
	});

	it("unquotes quoted cells", () => {
		expect(parse('"c,d","e""f"\n')).toEqual([["c,d", 'e"f']]);
	});

	it("keeps line breaks inside quotes", () => {
		expect(parse('a,"x\ny"\n')).toEqual([["a", "x\ny"]]);
	});

	it("accepts CRLF line endings", () => {
		expect(parse("a,b\r\nc,d\r\n")).toEqual([
			["a", "b"],
			["c", "d"],
		]);
	});

	it("skips blank lines", () => {
		expect(parse("a\n\nb\n")).toEqual([["a"], ["b"]]);
	});

	it("keeps empty cells", () => {
		expect(parse("a,,\n")).toEqual([["a", "", ""]]);
		expect(parse('""\n')).toEqual([[""]]);
	});

	it("uses a custom delimiter", () => {
		expect(parse("a;b,c\n", { delimiter: ";" })).toEqual([["a", "b,c"]]);
	});

	it("rejects a bare quote unless quotes are lazy", () => {
		expect(() => parse('a"b\n')).toThrow(TabularParseError);
		expect(() => parse('a"b\n')).toThrow('parse error on line 1, column 2: bare " in non-quoted-field');
		expect(parse('a"b\n', { lazyQuotes: true })).toEqual([['a"b']]);
	});

	it("rejects an unterminated quoted cell", () => {
		expect(() => parse('"abc')).toThrow(TabularParseError);
		expect(parse('"abc', { lazyQuotes: true })).toEqual([["abc"]]);
	});

	it("holds every row to the first row's width", () => {
		const reader = makeRowReader("a,b\nc\n");
		expect(reader.readRow()).toEqual(["a", "b"]);
		expect(() => reader.readRow()).toThrow("wrong number of fields: expected 2, got 1");
	});

	it("allows ragged rows when the width check is off", () => {
		expect(parse("a,b\nc\n", { fieldsPerRecord: -1 })).toEqual([["a", "b"], ["c"]]);
	});

	it("rejects an invalid delimiter", () => {
		expect(() => makeRowReader("", { delimiter: ",," })).toThrow('invalid delimiter ",,"');
		expect(() => makeRowReader("", { delimiter: '"' })).toThrow();
	});
});

describe("quoteCell", () => {
	it("leaves plain cells alone", () => {
		expect(quoteCell("abc")).toBe("abc");
		expect(quoteCell("")).toBe("");
	});

	it("quotes cells that would not read back", () => {
		expect(quoteCell("a,b")).toBe('"a,b"');
		expect(quoteCell('say "hi"')).toBe('"say ""hi"""');
		expect(quoteCell("two\nlines")).toBe('"two\nlines"');
		expect(quoteCell(" lead")).toBe('" lead"');
	});

	it("quotes for the delimiter in use", () => {
		expect(quoteCell("a,b", ";")).toBe("a,b");
		expect(quoteCell("a;b", ";")).toBe('"a;b"');
	});
});

describe("makeRowWriter", () => {
	it("hands rows to the sink only on flush", () => {
		const chunks: string[] = [];
		const writer = makeRowWriter((chunk) => chunks.push(chunk));

		writer.writeRow(["a", "b"]);
		writer.writeRow(["c,d", "e"]);
		expect(chunks).toEqual([]);

		writer.flush();
		expect(chunks).toEqual(['a,b\n"c,d",e\n']);

		writer.flush();
		expect(chunks).toHaveLength(1);
	});

	it("writes a lone empty cell as an empty quoted field", () => {
		const writer = makeStringRowWriter();
		writer.writeRow([""]);
		writer.flush();
		expect(writer.output()).toBe('""\n');
		expect(parse(writer.output())).toEqual([[""]]);
	});

	it("honours the delimiter and line terminator", () => {
		const writer = makeStringRowWriter({ delimiter: "\t", lineTerminator: "\r\n" });
		writer.writeRow(["a", "b c"]);
		writer.flush();
		expect(writer.output()).toBe("a\tb c\r\n");
	});

	it("resets accumulated output", () => {
		const writer = makeStringRowWriter();
		writer.writeRow(["a"]);
		writer.flush();
		writer.reset();
		expect(writer.output()).toBe("");
	});
});
