import { Bench } from "tinybench";
import {
	createRecordStream,
	type Framing,
	MemoryChannel,
	type RecordStream,
} from "../src/stream";
import { WarcParser } from "../src/warc";
import type { BenchmarkArchive } from "./fixtures/generate";

const parser = new WarcParser();

async function readAll(stream: RecordStream, withContent: boolean) {
	let count = 0;
	for await (const outcome of stream.readRecords()) {
		if (outcome.kind !== "record") break;
		if (withContent) await outcome.record.content();
		count++;
	}
	await stream.close();
	return count;
}

const open = (bytes: Uint8Array, framing: Framing) =>
	createRecordStream(new MemoryChannel(bytes), { framing, parser });

export async function runReadBenchmarks(archives: BenchmarkArchive[]) {
	console.log("\nReading benchmarks...");

	for (const archive of archives) {
		const bench = new Bench({
			time: 5000,
			iterations: 20,
			warmupTime: 1000,
			warmupIterations: 5,
		});

		bench
			.add(`plain: Read ${archive.name}`, async () => {
				await readAll(open(archive.plain, "plain"), true);
			})
			.add(`plain: Skip ${archive.name}`, async () => {
				await readAll(open(archive.plain, "plain"), false);
			})
			.add(`gzip-record: Read ${archive.name}`, async () => {
				await readAll(open(archive.gzipRecord, "gzip-record"), true);
			})
			.add(`gzip-file: Read ${archive.name}`, async () => {
				await readAll(open(archive.gzipFile, "gzip-file"), true);
			});

		await bench.run();
		console.log(`\n--- ${archive.name} ---`);
		console.table(bench.table());
	}
}
