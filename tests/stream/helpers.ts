import type { ArchiveRecord, ReadOutcome } from "../../src/stream";
import { decode } from "../fixtures";

type Outcomes = AsyncGenerator<ReadOutcome, void, undefined>;

/** Advances `outcomes` and returns the record it yields. */
export async function nextRecord(outcomes: Outcomes): Promise<ArchiveRecord> {
	const result = await outcomes.next();
	if (result.done || result.value.kind !== "record") {
		throw new Error("Expected a record outcome.");
	}
	return result.value.record;
}

export async function collect(outcomes: Outcomes): Promise<ReadOutcome[]> {
	const all: ReadOutcome[] = [];
	for await (const outcome of outcomes) all.push(outcome);
	return all;
}

/** Type, URL and decoded content of every record, read as they stream by. */
export async function summarize(
	outcomes: Outcomes,
): Promise<[string | undefined, string | undefined, string][]> {
	const rows: [string | undefined, string | undefined, string][] = [];
	for await (const outcome of outcomes) {
		if (outcome.kind !== "record") continue;
		const [, content] = await outcome.record.content();
		rows.push([outcome.record.type, outcome.record.url, decode(content)]);
	}
	return rows;
}
