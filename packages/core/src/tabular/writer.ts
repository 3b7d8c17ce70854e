/**
 * Delimited-text writer. Rows are buffered until `flush` hands them to the
 * sink as one chunk.
 */

import {
	type RowWriter,
	resolveTabularOptions,
	type TabularOptions,
} from "./row-io.js";

/**
 * A cell is quoted when it contains the delimiter, a quote, a line break, or
 * starts with a space or tab. Quotes inside are doubled.
 */
export function quoteCell(cell: string, delimiter = ","): string {
	if (cell === "") {
		return cell;
	}
	const needsQuotes =
		cell.includes(delimiter) ||
		cell.includes('"') ||
		cell.includes("\n") ||
		cell.includes("\r") ||
		cell[0] === " " ||
		cell[0] === "\t";
	return needsQuotes ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function makeRowWriter(
	sink: (chunk: string) => void,
	options?: TabularOptions,
): RowWriter {
	const { delimiter, lineTerminator } = resolveTabularOptions(options);
	let buffer: string[] = [];

	return {
		writeRow: (row) => {
			// a lone empty cell would otherwise read back as a blank line
			if (row.length === 1 && row[0] === "") {
				buffer.push(`""${lineTerminator}`);
				return;
			}
			buffer.push(row.map((cell) => quoteCell(cell, delimiter)).join(delimiter) + lineTerminator);
		},
		flush: () => {
			if (buffer.length === 0) {
				return;
			}
			const chunk = buffer.join("");
			buffer = [];
			sink(chunk);
		},
	};
}

/**
 * A writer that accumulates flushed output in memory.
 */
export function makeStringRowWriter(options?: TabularOptions): RowWriter & {
	readonly output: () => string;
	readonly reset: () => void;
} {
	let text = "";
	const writer = makeRowWriter((chunk) => {
		text += chunk;
	}, options);
	return {
		...writer,
		output: () => text,
		reset: () => {
			text = "";
		},
	};
}
