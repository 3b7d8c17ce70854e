/**
 * The line-level collaborators the codec reads from and writes to. Framing,
 * quoting and escaping all live behind these interfaces.
 *
 * Implementations are synchronous and throw on failure; the encoder and
 * decoder tag what they throw as RowIOError.
 */

export interface RowReader {
	/** The next row's cells, or `null` at end of input. */
	readonly readRow: () => ReadonlyArray<string> | null;
}

export interface RowWriter {
	readonly writeRow: (row: ReadonlyArray<string>) => void;
	/** Push buffered rows to the underlying sink. */
	readonly flush: () => void;
}

export interface TabularOptions {
	/** Field separator, a single character. Defaults to ",". */
	readonly delimiter?: string;
	/** Written after each row. Defaults to "\n". */
	readonly lineTerminator?: "\n" | "\r\n";
	/** Accept a quote inside an unquoted field, or a stray quote in a quoted one. */
	readonly lazyQuotes?: boolean;
	/**
	 * Expected cells per row. 0 takes the first row's count; a negative value
	 * disables the check.
	 */
	readonly fieldsPerRecord?: number;
}

export const defaultTabularOptions: Required<TabularOptions> = {
	delimiter: ",",
	lineTerminator: "\n",
	lazyQuotes: false,
	fieldsPerRecord: 0,
};

export const resolveTabularOptions = (
	options?: TabularOptions,
): Required<TabularOptions> => {
	const resolved = { ...defaultTabularOptions, ...options };
	if (
		resolved.delimiter.length !== 1 ||
		resolved.delimiter === '"' ||
		resolved.delimiter === "\r" ||
		resolved.delimiter === "\n"
	) {
		throw new Error(`invalid delimiter ${JSON.stringify(resolved.delimiter)}`);
	}
	return resolved;
};
