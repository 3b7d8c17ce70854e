/**
 * Trie of header path segments, rebuilt for every decoded row.
 *
 * Header `person.name,person.age,id` with row `henry,23,7` becomes
 * `{ person: { name: "henry", age: "23" }, id: "7" }`.
 */

import { Either } from "effect";
import { UnexpectedShapeError } from "../errors/codec-errors.js";

export type PathNode = PathTree | string;

export interface PathObject {
	readonly [segment: string]: PathObject | string;
}

export class PathTree {
	private readonly children = new Map<string, PathNode>();

	/**
	 * Build the tree for one row. `header` and `row` are parallel.
	 */
	static fromRow(
		header: ReadonlyArray<string>,
		row: ReadonlyArray<string>,
	): Either.Either<PathTree, UnexpectedShapeError> {
		if (header.length !== row.length) {
			return Either.left(
				new UnexpectedShapeError({
					path: [],
					expected: `${header.length} cells`,
					received: `${row.length} cells`,
					message: `row has ${row.length} cells but the header has ${header.length} columns`,
				}),
			);
		}
		const tree = new PathTree();
		for (let i = 0; i < header.length; i++) {
			const inserted = tree.set(header[i], row[i]);
			if (Either.isLeft(inserted)) {
				return Either.left(inserted.left);
			}
		}
		return Either.right(tree);
	}

	get size(): number {
		return this.children.size;
	}

	get(segment: string): PathNode | undefined {
		return this.children.get(segment);
	}

	/**
	 * Insert `value` at a dotted `path`, creating intermediate nodes.
	 * A repeated leaf path overwrites; a path that would put a subtree where a
	 * cell already sits (or the reverse) fails.
	 */
	set(path: string, value: string): Either.Either<void, UnexpectedShapeError> {
		return this.insert(path.split("."), 0, value, path);
	}

	private insert(
		segments: ReadonlyArray<string>,
		index: number,
		value: string,
		path: string,
	): Either.Either<void, UnexpectedShapeError> {
		const head = segments[index];
		const existing = this.children.get(head);

		if (index === segments.length - 1) {
			if (existing instanceof PathTree) {
				return Either.left(conflict(path, segments.slice(0, index + 1), "cell", "subtree"));
			}
			this.children.set(head, value);
			return Either.right(undefined);
		}

		if (typeof existing === "string") {
			return Either.left(conflict(path, segments.slice(0, index + 1), "subtree", "cell"));
		}
		const child = existing ?? new PathTree();
		this.children.set(head, child);
		return child.insert(segments, index + 1, value, path);
	}

	/**
	 * Every cell value under this node, depth first.
	 */
	*leaves(): IterableIterator<string> {
		for (const node of this.children.values()) {
			if (typeof node === "string") {
				yield node;
			} else {
				yield* node.leaves();
			}
		}
	}

	toObject(): PathObject {
		const out: Record<string, PathObject | string> = {};
		for (const [segment, node] of this.children) {
			out[segment] = typeof node === "string" ? node : node.toObject();
		}
		return out;
	}
}

const conflict = (
	path: string,
	at: ReadonlyArray<string>,
	expected: string,
	received: string,
): UnexpectedShapeError =>
	new UnexpectedShapeError({
		path: at,
		expected,
		received,
		message: `header path "${path}" needs a ${expected} at "${at.join(".")}" but a ${received} is already there`,
	});
