// ============================================================================
// Session configuration
// ============================================================================

export interface CodecOptions {
	/** Cell standing for a zero value. Defaults to the empty string. */
	readonly emptyValue?: string;
	/** Cell standing for an absent value. Defaults to "NULL". */
	readonly nilValue?: string;
}

export const DEFAULT_EMPTY_VALUE = "";
export const DEFAULT_NIL_VALUE = "NULL";

export const defaultCodecOptions: Required<CodecOptions> = {
	emptyValue: DEFAULT_EMPTY_VALUE,
	nilValue: DEFAULT_NIL_VALUE,
};

export const resolveCodecOptions = (
	options?: CodecOptions,
): Required<CodecOptions> => ({ ...defaultCodecOptions, ...options });
