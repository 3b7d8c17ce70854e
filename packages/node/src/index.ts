/**
 * @rowcodec/node - Node.js file helpers for rowcodec
 *
 * Re-exports everything from @rowcodec/core plus whole-file read and write.
 */

// Re-export everything from core
export * from "@rowcodec/core";
export type { CsvFileOptions } from "./csv-file.js";
export { FileError, readCsvFile, writeCsvFile } from "./csv-file.js";
