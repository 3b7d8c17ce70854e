/**
 * In-memory delimited-text reader (RFC 4180 quoting).
 *
 * Quoted fields may contain the delimiter, doubled quotes and line breaks;
 * their content is kept byte for byte. Outside quotes, "\r\n" and "\n" both
 * end a row. Blank lines are skipped.
 */

import {
	type RowReader,
	resolveTabularOptions,
	type TabularOptions,
} from "./row-io.js";

export class TabularParseError extends Error {
	constructor(
		readonly line: number,
		readonly column: number,
		reason: string,
	) {
		super(`parse error on line ${line}, column ${column}: ${reason}`);
		this.name = "TabularParseError";
	}
}

export function makeRowReader(input: string, options?: TabularOptions): RowReader {
	const { delimiter, lazyQuotes, fieldsPerRecord } = resolveTabularOptions(options);
	let pos = 0;
	let line = 1;
	let expectedFields = fieldsPerRecord;

	const atRowEnd = (i: number): boolean =>
		i >= input.length || input[i] === "\n" || (input[i] === "\r" && input[i + 1] === "\n");

	const skipRowEnd = (): void => {
		if (input[pos] === "\r") pos++;
		if (input[pos] === "\n") {
			pos++;
			line++;
		}
	};

	const readQuoted = (): string => {
		const startLine = line;
		let value = "";
		pos++; // opening quote
		for (;;) {
			if (pos >= input.length) {
				if (lazyQuotes) return value;
				throw new TabularParseError(startLine, 1, 'extraneous or missing " in quoted-field');
			}
			const ch = input[pos];
			if (ch === '"') {
				if (input[pos + 1] === '"') {
					value += '"';
					pos += 2;
					continue;
				}
				pos++;
				if (pos >= input.length || input[pos] === delimiter || atRowEnd(pos)) {
					return value;
				}
				if (!lazyQuotes) {
					throw new TabularParseError(line, pos, 'extraneous or missing " in quoted-field');
				}
				value += '"';
				continue;
			}
			if (ch === "\n") line++;
			value += ch;
			pos++;
		}
	};

	const readBare = (): string => {
		const start = pos;
		while (pos < input.length && input[pos] !== delimiter && !atRowEnd(pos)) {
			if (input[pos] === '"' && !lazyQuotes) {
				throw new TabularParseError(line, pos - start + 1, 'bare " in non-quoted-field');
			}
			pos++;
		}
		return input.slice(start, pos);
	};

	const readRow = (): ReadonlyArray<string> | null => {
		while (pos < input.length && atRowEnd(pos)) {
			skipRowEnd();
		}
		if (pos >= input.length) {
			return null;
		}

		const rowLine = line;
		const cells: string[] = [];
		for (;;) {
			cells.push(input[pos] === '"' ? readQuoted() : readBare());
			if (input[pos] === delimiter) {
				pos++;
				continue;
			}
			skipRowEnd();
			break;
		}

		if (expectedFields === 0) {
			expectedFields = cells.length;
		} else if (expectedFields > 0 && cells.length !== expectedFields) {
			throw new TabularParseError(
				rowLine,
				1,
				`wrong number of fields: expected ${expectedFields}, got ${cells.length}`,
			);
		}
		return cells;
	};

	return { readRow };
}
