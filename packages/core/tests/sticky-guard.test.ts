import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import { ConversionError } from "../src/errors/codec-errors.js";
import { StickyGuard } from "../src/session/sticky-guard.js";

const failure = new ConversionError({ path: [], value: "x", expected: "integer", message: "bad" });

describe("StickyGuard", () => {
	it("passes successes through", () => {
		const guard = new StickyGuard<ConversionError>();
		expect(Effect.runSync(guard.run(Effect.succeed(1)))).toBe(1);
		expect(guard.poisoned).toBe(false);
		expect(Option.isNone(guard.error)).toBe(true);
	});

	it("remembers the first failure and replays it without running", () => {
		const guard = new StickyGuard<ConversionError>();
		let runs = 0;
		const counted = Effect.sync(() => {
			runs++;
			return runs;
		});

		const first = Effect.runSync(Effect.flip(guard.run(Effect.fail(failure))));
		const second = Effect.runSync(Effect.flip(guard.run(counted)));

		expect(first).toBe(failure);
		expect(second).toBe(failure);
		expect(runs).toBe(0);
		expect(guard.poisoned).toBe(true);
	});

	it("can start poisoned", () => {
		const guard = new StickyGuard<ConversionError>(failure);
		expect(Option.getOrThrow(guard.error)).toBe(failure);
		expect(Effect.runSync(Effect.flip(guard.run(Effect.succeed(1))))).toBe(failure);
	});

	it("checks the stored failure when the effect runs, not when it is built", () => {
		const guard = new StickyGuard<ConversionError>();
		const later = guard.run(Effect.succeed("ok"));
		Effect.runSync(Effect.either(guard.run(Effect.fail(failure))));
		expect(Effect.runSync(Effect.flip(later))).toBe(failure);
	});
});
