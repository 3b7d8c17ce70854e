import { Effect, Option } from "effect";

/**
 * Remembers the first failure of a session. Once poisoned, every later call
 * fails with that same error and does no work; recovery means starting a new
 * session.
 */
export class StickyGuard<E> {
	private failure: Option.Option<E> = Option.none();

	constructor(initial?: E) {
		if (initial !== undefined) {
			this.failure = Option.some(initial);
		}
	}

	get error(): Option.Option<E> {
		return this.failure;
	}

	get poisoned(): boolean {
		return Option.isSome(this.failure);
	}

	run<A, E2 extends E, R>(
		effect: Effect.Effect<A, E2, R>,
	): Effect.Effect<A, E | E2, R> {
		return Effect.suspend((): Effect.Effect<A, E | E2, R> => {
			if (Option.isSome(this.failure)) {
				return Effect.fail(this.failure.value);
			}
			return effect.pipe(
				Effect.tapError((error) =>
					Effect.sync(() => {
						this.failure = Option.some(error);
					}).pipe(Effect.zipRight(Effect.logDebug("codec session poisoned", error))),
				),
			);
		});
	}
}
