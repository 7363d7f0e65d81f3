import { CHUNK_SIZE, DELIMITER_LENGTH } from "./constants";
import {
	RecordDecodeError,
	RecordStreamError,
	TruncatedArchiveError,
} from "./errors";
import type { GzipMemberChannel } from "./gzip";
import type {
	ArchiveRecord,
	BoundedReader,
	ByteChannel,
	ContentReader,
	Framing,
	ReadOutcome,
	ReadRecordsOptions,
	RecordParser,
} from "./types";

/**
 * How much of the current record is left. `remaining` counts content bytes
 * plus the trailing delimiter; `epoch` identifies the record it belongs to.
 */
export type ContentBounds =
	| { readonly kind: "unbounded" }
	| { readonly kind: "bounded"; readonly remaining: number; readonly epoch: number };

const UNBOUNDED: ContentBounds = { kind: "unbounded" };

/**
 * A stream of archive records over an uncompressed channel.
 *
 * Reads are bounded by the record the parser last started: `read` and
 * `readline` never return the record's trailing delimiter nor anything past
 * it, and reading the next record first drains whatever is left of the
 * current one.
 *
 * @example
 * ```typescript
 * const stream = await openRecordStream(new MemoryChannel(bytes));
 * for await (const record of stream) {
 *   const [contentType, content] = await record.content();
 *   console.log(record.type, contentType, content.length);
 * }
 * await stream.close();
 * ```
 */
export class RecordStream<C extends ByteChannel = ByteChannel>
	implements BoundedReader
{
	protected readonly channel: C;
	protected readonly parser: RecordParser;
	private bounds: ContentBounds = UNBOUNDED;
	private epoch = 0;
	private closed = false;

	constructor(channel: C, parser: RecordParser) {
		this.channel = channel;
		this.parser = parser;
	}

	get framing(): Framing {
		return "plain";
	}

	/** Bytes left in the current record, delimiter included; `undefined` between records. */
	get remaining(): number | undefined {
		return this.bounds.kind === "bounded" ? this.bounds.remaining : undefined;
	}

	/**
	 * Repositions the channel. `offset` must be the start of a record; any
	 * record in progress is abandoned.
	 */
	async seek(offset: number): Promise<void> {
		this.bounds = UNBOUNDED;
		await this.channel.seek(offset);
	}

	/**
	 * Reads content of the current record, never its trailing delimiter.
	 * Between records the request is passed to the channel as-is.
	 */
	async read(count?: number): Promise<Uint8Array> {
		return this.take(await this.channel.read(this.clamp(count)));
	}

	/** Line-oriented counterpart of {@link RecordStream.read}. */
	async readline(maxLength?: number): Promise<Uint8Array> {
		return this.take(await this.channel.readline(this.clamp(maxLength)));
	}

	/**
	 * Starts a record spanning `remaining` bytes (content plus delimiter) from
	 * the current position. Called by the record parser.
	 */
	bound(remaining: number): ContentReader {
		if (!Number.isSafeInteger(remaining) || remaining < 0) {
			throw new RangeError(`Invalid record length ${remaining}.`);
		}

		const epoch = ++this.epoch;
		this.bounds = { kind: "bounded", remaining, epoch };

		const isCurrent = () =>
			this.bounds.kind === "bounded" && this.bounds.epoch === epoch;
		const assertCurrent = () => {
			if (!isCurrent()) {
				throw new RecordStreamError(
					"The stream has moved past this record; its content is no longer readable.",
				);
			}
		};
		const contentLeft = () =>
			isCurrent() ? Math.max((this.remaining ?? 0) - DELIMITER_LENGTH, 0) : 0;

		return {
			read: async (count) => {
				assertCurrent();
				return this.read(count);
			},
			readline: async (maxLength) => {
				assertCurrent();
				return this.readline(maxLength);
			},
			get remaining() {
				return contentLeft();
			},
		};
	}

	/**
	 * Yields one outcome per record read, stopping after the first outcome
	 * that carries no record (a clean end or a parse failure).
	 */
	async *readRecords(
		options: ReadRecordsOptions = {},
	): AsyncGenerator<ReadOutcome, void, undefined> {
		const limit = options.limit ?? Number.POSITIVE_INFINITY;
		const offsets = options.offsets ?? true;

		for (let count = 0; count < limit; count++) {
			const outcome = await this.readRecord(offsets);
			yield outcome;
			if (outcome.kind !== "record") break;
		}
	}

	/**
	 * Yields every record until the end of the archive. A record that fails
	 * to parse throws a {@link RecordDecodeError}.
	 */
	async *records(): AsyncGenerator<ArchiveRecord, void, undefined> {
		while (true) {
			const outcome = await this.readRecord(false);

			switch (outcome.kind) {
				case "record":
					yield outcome.record;
					break;
				case "failure":
					throw new RecordDecodeError(outcome.errors, outcome.offset);
				case "end":
					return;
			}
		}
	}

	[Symbol.asyncIterator](): AsyncGenerator<ArchiveRecord, void, undefined> {
		return this.records();
	}

	/** Serializes `record` to the channel. */
	async write(record: ArchiveRecord): Promise<void> {
		await this.channel.write(await record.serialize());
	}

	/** Releases the channel. Later calls do nothing. */
	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		this.bounds = UNBOUNDED;
		await this.channel.close();
	}

	/**
	 * Reads past the rest of the current record so the channel lands on the
	 * next record's first byte.
	 */
	async skipToEndOfRecord(): Promise<void> {
		if (this.bounds.kind === "unbounded") {
			throw new RecordStreamError(
				"No record is in progress; cannot skip to its end.",
			);
		}

		while (this.bounds.kind === "bounded" && this.bounds.remaining > 0) {
			const size = Math.min(CHUNK_SIZE, this.bounds.remaining);
			const data = await this.channel.read(size);
			this.take(data);

			if (data.length < size) {
				throw new TruncatedArchiveError(
					`Expected ${size} bytes but only read ${data.length}.`,
					{ expected: size, actual: data.length },
				);
			}
		}

		this.bounds = UNBOUNDED;
	}

	/** Reads one record. Framing variants override this. */
	protected async readRecord(offsets: boolean): Promise<ReadOutcome> {
		await this.finishRecord();

		const offset = offsets ? this.channel.tell() : undefined;
		return this.parser.parse(this, offset);
	}

	/** Drains the previous record, if one is in progress. */
	protected async finishRecord(): Promise<void> {
		if (this.bounds.kind === "bounded") {
			await this.skipToEndOfRecord();
		}
	}

	private clamp(count: number | undefined): number | undefined {
		if (this.bounds.kind === "unbounded") {
			return count;
		}

		const available = Math.max(this.bounds.remaining - DELIMITER_LENGTH, 0);
		return count === undefined ? available : Math.min(count, available);
	}

	private take(data: Uint8Array): Uint8Array {
		if (this.bounds.kind === "bounded") {
			this.bounds = {
				...this.bounds,
				remaining: this.bounds.remaining - data.length,
			};
		}
		return data;
	}
}

/**
 * A stream of records that were each compressed as their own gzip member.
 * Every record is reported at the raw offset of its member, so a fresh
 * stream seeked to that offset reads the same record.
 */
export class GzipRecordStream extends RecordStream<GzipMemberChannel> {
	override get framing(): Framing {
		return "gzip-record";
	}

	protected override async readRecord(): Promise<ReadOutcome> {
		await this.finishRecord();

		const offset = await this.channel.memberOffset();
		const outcome = await this.parser.parse(this, undefined);
		return { ...outcome, offset };
	}
}

/**
 * A stream of records inside a single gzip stream. There are no record
 * boundaries in the compressed bytes, so records carry no offset.
 */
export class GzipFileStream extends RecordStream<GzipMemberChannel> {
	override get framing(): Framing {
		return "gzip-file";
	}

	/**
	 * Restarts decompression and skips `offset` decompressed bytes. An offset
	 * is an opaque position in the decompressed stream.
	 */
	override async seek(offset: number): Promise<void> {
		await super.seek(0);

		let left = offset;
		while (left > 0) {
			const data = await this.channel.read(Math.min(CHUNK_SIZE, left));
			if (data.length === 0) {
				throw new TruncatedArchiveError(
					`Cannot seek to ${offset}; the archive ends after ${offset - left} bytes.`,
					{ expected: offset, actual: offset - left },
				);
			}
			left -= data.length;
		}
	}

	protected override async readRecord(): Promise<ReadOutcome> {
		await this.finishRecord();

		const outcome = await this.parser.parse(this, undefined);
		return { ...outcome, offset: undefined };
	}
}
