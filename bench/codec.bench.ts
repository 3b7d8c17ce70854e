/**
 * Codec throughput benchmarks.
 *
 * Measures ops/sec for encoding and decoding a mid-sized record with nested,
 * optional and sequence fields, plus the tabular reader on its own.
 */

import { fileURLToPath } from "node:url";
import {
	Decoder,
	Encoder,
	headerOf,
	Int32,
	makeRowReader,
	makeStringRowWriter,
} from "@rowcodec/core";
import { Effect, Schema } from "effect";
import { Bench } from "tinybench";

// ============================================================================
// Fixtures
// ============================================================================

const ROWS = 1_000;

const Order = Schema.Struct({
	id: Int32,
	customer: Schema.Struct({ name: Schema.String, email: Schema.String }),
	shipping: Schema.NullOr(Schema.Struct({ city: Schema.String, zip: Schema.String })),
	items: Schema.Array(Schema.String),
	total: Schema.Number,
	paid: Schema.Boolean,
});

type Order = typeof Order.Type;

const orders: ReadonlyArray<Order> = Array.from({ length: ROWS }, (_, i) => ({
	id: i,
	customer: { name: `customer ${i}`, email: `c${i}@example.com` },
	shipping: i % 3 === 0 ? null : { city: "Springfield", zip: `${10_000 + i}` },
	items: ["widget", "gadget", `part-${i}`],
	total: i * 1.25,
	paid: i % 2 === 0,
}));

const encodeAll = (): string => {
	const writer = makeStringRowWriter();
	const encoder = new Encoder(Order, writer);
	Effect.runSync(encoder.writeHeader());
	for (const order of orders) {
		Effect.runSync(encoder.encode(order));
	}
	return writer.output();
};

const encoded = encodeAll();

// ============================================================================
// Suite
// ============================================================================

export const suiteName = "codec";

export function createSuite(): Bench {
	const bench = new Bench({ time: 500 });

	bench.add(`encode ${ROWS} rows`, () => {
		encodeAll();
	});

	bench.add(`decode ${ROWS} rows`, () => {
		Effect.runSync(new Decoder(Order, makeRowReader(encoded)).decodeAll());
	});

	bench.add(`read ${ROWS} rows (tabular only)`, () => {
		const reader = makeRowReader(encoded);
		while (reader.readRow() !== null) {
			// drain
		}
	});

	bench.add("headerOf", () => {
		headerOf(Order);
	});

	return bench;
}

export async function run(): Promise<void> {
	const bench = createSuite();
	await bench.run();
	console.log(`\n${suiteName}`);
	console.table(bench.table());
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
	await run();
}
