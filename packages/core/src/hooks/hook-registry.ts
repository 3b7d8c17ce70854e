/**
 * Capability detection for types that override structural encoding.
 *
 * Detection runs in two phases per capability: the runtime value's own
 * methods first, then hooks annotated on its schema. Cell capabilities are
 * checked before text capabilities, so a type exposing both uses cells.
 */

import { Either, Option } from "effect";
import { HookError } from "../errors/codec-errors.js";
import type { CellType } from "../schema/cell-type.js";

// ============================================================================
// Value-level capabilities
// ============================================================================

export interface CellGetter {
	getCells(): ReadonlyArray<string>;
}

export interface CellSetter {
	setCells(cells: ReadonlyArray<string>): void;
}

export interface TextMarshaler {
	toText(): string;
}

export interface TextUnmarshaler {
	fromText(text: string): void;
}

const hasMethod = <K extends string>(
	value: unknown,
	name: K,
): value is { readonly [P in K]: (...args: ReadonlyArray<never>) => unknown } =>
	typeof value === "object" &&
	value !== null &&
	typeof Reflect.get(value, name) === "function";

const isStringArray = (u: unknown): u is ReadonlyArray<string> =>
	Array.isArray(u) && u.every((cell) => typeof cell === "string");

export const isCellGetter = (value: unknown): value is CellGetter =>
	hasMethod(value, "getCells");

export const isCellSetter = (value: unknown): value is CellSetter =>
	hasMethod(value, "setCells");

export const isTextMarshaler = (value: unknown): value is TextMarshaler =>
	hasMethod(value, "toText");

export const isTextUnmarshaler = (value: unknown): value is TextUnmarshaler =>
	hasMethod(value, "fromText");

// ============================================================================
// Detected hooks
// ============================================================================

export type EncodeHook = () => Either.Either<ReadonlyArray<string>, HookError>;

export type DecodeHook = (
	cells: ReadonlyArray<string>,
) => Either.Either<unknown, HookError>;

export interface DetectedHooks {
	readonly encode: Option.Option<EncodeHook>;
	readonly decode: Option.Option<DecodeHook>;
}

const hookFailure = (hook: HookError["hook"], error: unknown): HookError =>
	new HookError({
		path: [],
		hook,
		message: `${hook} failed: ${error instanceof Error ? error.message : String(error)}`,
		cause: error,
	});

const runHook = <A>(
	hook: HookError["hook"],
	run: () => A,
): Either.Either<A, HookError> =>
	Either.try({ try: run, catch: (error) => hookFailure(hook, error) });

const expectCells = (
	cells: unknown,
): Either.Either<ReadonlyArray<string>, HookError> =>
	isStringArray(cells)
		? Either.right(cells)
		: Either.left(hookFailure("getCells", new Error("expected an array of strings")));

/**
 * Find the encode hook for `value` of `type`, if any.
 */
export function detectEncodeHook(type: CellType, value: unknown): Option.Option<EncodeHook> {
	const hooks = type.hooks;

	if (isCellGetter(value)) {
		return Option.some(() =>
			runHook("getCells", () => value.getCells()).pipe(Either.flatMap(expectCells)),
		);
	}
	const getCells = hooks?.getCells;
	if (getCells) {
		return Option.some(() =>
			runHook("getCells", () => getCells(value)).pipe(Either.flatMap(expectCells)),
		);
	}
	if (isTextMarshaler(value)) {
		return Option.some(() => runHook("toText", () => [String(value.toText())]));
	}
	const toText = hooks?.toText;
	if (toText) {
		return Option.some(() => runHook("toText", () => [toText(value)]));
	}
	return Option.none();
}

/**
 * Find the decode hook for `type`. `instance` is the fresh zero value the
 * cells will be decoded into; its own methods are consulted first.
 */
export function detectDecodeHook(type: CellType, instance: unknown): Option.Option<DecodeHook> {
	const hooks = type.hooks;

	if (isCellSetter(instance)) {
		return Option.some((cells) =>
			runHook("setCells", () => {
				instance.setCells(cells);
				return instance;
			}),
		);
	}
	const setCells = hooks?.setCells;
	if (setCells) {
		return Option.some((cells) => runHook("setCells", () => setCells(cells)));
	}
	if (isTextUnmarshaler(instance)) {
		return Option.some((cells) =>
			runHook("fromText", () => {
				instance.fromText(cells.join(","));
				return instance;
			}),
		);
	}
	const fromText = hooks?.fromText;
	if (fromText) {
		return Option.some((cells) => runHook("fromText", () => fromText(cells.join(","))));
	}
	return Option.none();
}

/**
 * Both directions at once, for callers that inspect a type's overrides.
 */
export const detectHooks = (type: CellType, value: unknown): DetectedHooks => ({
	encode: detectEncodeHook(type, value),
	decode: detectDecodeHook(type, value),
});
