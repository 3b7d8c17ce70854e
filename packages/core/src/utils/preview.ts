/**
 * Render a value for an error message. Long renderings are truncated.
 */
export function preview(value: unknown, maxLength = 60): string {
	const text = render(value);
	return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

function render(value: unknown): string {
	if (value === null || value === undefined) {
		return String(value);
	}
	if (typeof value === "bigint") {
		return `${value}n`;
	}
	if (typeof value !== "object") {
		return String(value);
	}
	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
	}
	try {
		return JSON.stringify(value, (_key, v: unknown) =>
			typeof v === "bigint" ? `${v}n` : v,
		);
	} catch (error) {
		// circular structures
		return error instanceof Error ? `[${error.name}]` : "[object]";
	}
}
