import { Schema } from "effect";
import { cellHooks } from "./annotations.js";

/**
 * A `Date` carried as one ISO-8601 cell through text hooks.
 */
export const DateTime = Schema.DateFromSelf.annotations({
	identifier: "DateTime",
	...cellHooks<Date>({
		toText: (date) => date.toISOString(),
		fromText: (text) => {
			const date = new Date(text);
			if (Number.isNaN(date.getTime())) {
				throw new Error(`invalid date "${text}"`);
			}
			return date;
		},
		zero: () => new Date(0),
	}),
});
