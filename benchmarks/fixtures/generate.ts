import { gzipSync } from "node:zlib";
import { concatBytes } from "../../src/stream/utils";
import { WarcRecord } from "../../src/warc";

const SMALL_RECORD_COUNT = 2500;
const SMALL_RECORD_SIZE = 1024; // 1 KB
const LARGE_RECORD_COUNT = 5;
const LARGE_RECORD_SIZE = 20 * 1024 * 1024; // 20 MB

export interface BenchmarkArchive {
	readonly name: string;
	readonly plain: Uint8Array;
	readonly gzipRecord: Uint8Array;
	readonly gzipFile: Uint8Array;
}

async function buildArchive(
	name: string,
	count: number,
	size: number,
): Promise<BenchmarkArchive> {
	const body = new Uint8Array(size).fill(0x61);
	const plain: Uint8Array[] = [];
	const gzipRecord: Uint8Array[] = [];

	for (let i = 0; i < count; i++) {
		const record = WarcRecord.create({
			type: "resource",
			url: `http://example.com/file-${i}.txt`,
			contentType: "text/plain",
			content: body,
		});
		const bytes = await record.serialize();
		plain.push(bytes);
		gzipRecord.push(gzipSync(bytes));
	}

	const joined = concatBytes(plain);
	return {
		name,
		plain: joined,
		gzipRecord: concatBytes(gzipRecord),
		gzipFile: gzipSync(joined),
	};
}

export async function generateFixtures(): Promise<BenchmarkArchive[]> {
	console.log("Generating fixtures...");

	return [
		await buildArchive(
			`Many Small Records (${SMALL_RECORD_COUNT} x 1KB)`,
			SMALL_RECORD_COUNT,
			SMALL_RECORD_SIZE,
		),
		await buildArchive(
			`Few Large Records (${LARGE_RECORD_COUNT} x 20MB)`,
			LARGE_RECORD_COUNT,
			LARGE_RECORD_SIZE,
		),
	];
}
