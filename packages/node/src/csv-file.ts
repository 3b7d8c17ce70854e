/**
 * Read and write whole delimited files of one schema.
 * Writes go through a temp file and a rename, retried with exponential
 * backoff.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { basename, dirname, join } from "node:path";
import {
	type CodecOptions,
	type DecodeError,
	Decoder,
	type EncodeError,
	Encoder,
	type EndOfInputError,
	makeRowReader,
	makeStringRowWriter,
	RowIOError,
	type TabularOptions,
} from "@rowcodec/core";
import { Data, Effect, Schedule, type Schema } from "effect";

// ============================================================================
// Errors
// ============================================================================

export class FileError extends Data.TaggedError("FileError")<{
	readonly path: string;
	readonly operation: "read" | "write";
	readonly message: string;
	readonly cause?: unknown;
}> {}

// ============================================================================
// Configuration
// ============================================================================

export interface CsvFileOptions extends CodecOptions, TabularOptions {
	/** Write a header row first. Defaults to true. */
	readonly header?: boolean;
	readonly createMissingDirectories?: boolean;
	readonly fileMode?: number;
	readonly dirMode?: number;
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
}

interface FileConfig {
	readonly header: boolean;
	readonly createMissingDirectories: boolean;
	readonly fileMode: number;
	readonly dirMode: number;
	readonly maxRetries: number;
	readonly baseDelay: number;
}

const defaultFileConfig: FileConfig = {
	header: true,
	createMissingDirectories: true,
	fileMode: 0o644,
	dirMode: 0o755,
	maxRetries: 3,
	baseDelay: 100,
};

const resolveFileConfig = (options: CsvFileOptions): FileConfig => ({
	header: options.header ?? defaultFileConfig.header,
	createMissingDirectories:
		options.createMissingDirectories ?? defaultFileConfig.createMissingDirectories,
	fileMode: options.fileMode ?? defaultFileConfig.fileMode,
	dirMode: options.dirMode ?? defaultFileConfig.dirMode,
	maxRetries: options.maxRetries ?? defaultFileConfig.maxRetries,
	baseDelay: options.baseDelay ?? defaultFileConfig.baseDelay,
});

// ============================================================================
// Helpers
// ============================================================================

const toFileError = (
	path: string,
	operation: FileError["operation"],
	error: unknown,
): FileError =>
	new FileError({
		path,
		operation,
		message: error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

const retryPolicy = (config: FileConfig) =>
	Schedule.intersect(Schedule.exponential(config.baseDelay), Schedule.recurs(config.maxRetries));

const isMissing = (error: FileError): boolean =>
	error.cause instanceof Error && Reflect.get(error.cause, "code") === "ENOENT";

const fsCall = <T>(
	path: string,
	operation: FileError["operation"],
	run: () => Promise<T>,
): Effect.Effect<T, FileError> =>
	Effect.tryPromise({ try: run, catch: (error) => toFileError(path, operation, error) });

const readText = (path: string, config: FileConfig): Effect.Effect<string, FileError> =>
	fsCall(path, "read", () => fs.readFile(path, "utf-8")).pipe(
		// a missing file will not appear by retrying
		Effect.retry({ schedule: retryPolicy(config), while: (error) => !isMissing(error) }),
	);

/**
 * Replace `path` with `text` through a hidden sibling temp file, removed
 * again if the rename does not happen.
 */
const replaceFile = (
	path: string,
	text: string,
	config: FileConfig,
): Effect.Effect<void, FileError> => {
	const directory = dirname(path);
	const tempPath = join(directory, `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`);
	const removeTemp = fsCall(tempPath, "write", () => fs.rm(tempPath, { force: true })).pipe(
		Effect.ignore,
	);

	return Effect.gen(function* () {
		if (config.createMissingDirectories) {
			yield* fsCall(directory, "write", () =>
				fs.mkdir(directory, { recursive: true, mode: config.dirMode }),
			);
		}
		yield* fsCall(tempPath, "write", () =>
			fs.writeFile(tempPath, text, { mode: config.fileMode }),
		).pipe(
			Effect.zipRight(fsCall(path, "write", () => fs.rename(tempPath, path))),
			Effect.onError(() => removeTemp),
		);
	}).pipe(Effect.retry(retryPolicy(config)));
};

const invalidOptions = (operation: RowIOError["operation"], error: unknown) =>
	new RowIOError({
		operation,
		message: error instanceof Error ? error.message : String(error),
		cause: error,
	});

// ============================================================================
// Operations
// ============================================================================

/**
 * Decode every record of a file whose first row is the header. An empty
 * file yields no records.
 */
export const readCsvFile = <A, I>(
	path: string,
	schema: Schema.Schema<A, I, never>,
	options: CsvFileOptions = {},
): Effect.Effect<ReadonlyArray<A>, FileError | Exclude<DecodeError, EndOfInputError>> => {
	const config = resolveFileConfig(options);
	return Effect.gen(function* () {
		const text = yield* readText(path, config);
		const reader = yield* Effect.try({
			try: () => makeRowReader(text, options),
			catch: (error) => invalidOptions("read", error),
		});
		const records = yield* new Decoder(schema, reader, options).decodeAll();
		yield* Effect.logDebug("read csv file").pipe(
			Effect.annotateLogs({ path, records: records.length }),
		);
		return records;
	});
};

/**
 * Encode `records` and replace the file at `path` with the result in one
 * atomic step. Nothing is written if any record fails to encode.
 */
export const writeCsvFile = <A, I>(
	path: string,
	schema: Schema.Schema<A, I, never>,
	records: Iterable<A>,
	options: CsvFileOptions = {},
): Effect.Effect<void, FileError | EncodeError> => {
	const config = resolveFileConfig(options);
	return Effect.gen(function* () {
		const writer = yield* Effect.try({
			try: () => makeStringRowWriter(options),
			catch: (error) => invalidOptions("write", error),
		});
		const encoder = new Encoder(schema, writer, options);
		if (config.header) {
			yield* encoder.writeHeader();
		}
		let count = 0;
		for (const record of records) {
			yield* encoder.encode(record);
			count++;
		}
		yield* replaceFile(path, writer.output(), config);
		yield* Effect.logDebug("wrote csv file").pipe(Effect.annotateLogs({ path, records: count }));
	});
};
