import { Either } from "effect";
import { describe, expect, it } from "vitest";
import { PathTree } from "../src/path-tree/path-tree.js";

describe("PathTree", () => {
	it("populates nested paths", () => {
		const tree = new PathTree();
		const result = tree.set("my.nested.struct", "henry");

		expect(Either.isRight(result)).toBe(true);
		expect(tree.toObject()).toEqual({ my: { nested: { struct: "henry" } } });
	});

	it("builds a tree from a header and row", () => {
		const tree = Either.getOrThrow(
			PathTree.fromRow(["person.name", "person.age", "id"], ["henry", "23", "7"]),
		);

		expect(tree.toObject()).toEqual({ person: { name: "henry", age: "23" }, id: "7" });
		expect(tree.size).toBe(2);
		expect(tree.get("id")).toBe("7");
	});

	it("lets the last duplicate leaf win", () => {
		const tree = Either.getOrThrow(PathTree.fromRow(["a", "a"], ["first", "second"]));
		expect(tree.get("a")).toBe("second");
	});

	it("yields leaves in header order", () => {
		const tree = Either.getOrThrow(
			PathTree.fromRow(["p.x", "q", "p.y"], ["1", "2", "3"]),
		);
		expect([...tree.leaves()]).toEqual(["1", "3", "2"]);
	});

	it("rejects a subtree under an existing cell", () => {
		const result = PathTree.fromRow(["person", "person.name"], ["a", "b"]);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("UnexpectedShapeError");
			expect(result.left.path).toEqual(["person"]);
			expect(result.left.expected).toBe("subtree");
			expect(result.left.received).toBe("cell");
		}
	});

	it("rejects a cell over an existing subtree", () => {
		const result = PathTree.fromRow(["person.name", "person"], ["a", "b"]);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.expected).toBe("cell");
			expect(result.left.received).toBe("subtree");
		}
	});

	it("rejects a row whose width differs from the header", () => {
		const result = PathTree.fromRow(["a", "b"], ["1"]);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.message).toBe("row has 1 cells but the header has 2 columns");
		}
	});
});
