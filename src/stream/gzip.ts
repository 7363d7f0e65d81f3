import { once } from "node:events";
import { createInflateRaw, gzipSync, type InflateRaw } from "node:zlib";
import { BufferedChannel } from "./channel";
import {
	CHUNK_SIZE,
	GZIP_FLAG,
	GZIP_HEADER_SIZE,
	GZIP_MAGIC,
	GZIP_METHOD_DEFLATE,
	GZIP_TRAILER_SIZE,
} from "./constants";
import { Crc32 } from "./crc32";
import { GzipFormatError, TruncatedArchiveError } from "./errors";
import type { ByteChannel } from "./types";

const EMPTY = new Uint8Array(0);

interface Member {
	/** Raw offset of the member's first header byte. */
	readonly offset: number;
	readonly inflater: InflateRaw;
	/** Inflated chunks not yet handed to the reader. */
	readonly output: Uint8Array[];
	readonly crc: Crc32;
	size: number;
	finished: boolean;
	error: Error | null;
}

/**
 * Reads the decompressed bytes of a concatenation of gzip members.
 *
 * Members are decoded one at a time and reads cross member boundaries as if
 * the members were one stream. {@link GzipMemberChannel.memberOffset} reports
 * where in the raw channel the member that the next read comes from begins.
 */
export class GzipMemberChannel extends BufferedChannel {
	private readonly source: ByteChannel;
	// Raw bytes read from the source but not yet consumed by the decoder.
	private input: Uint8Array = EMPTY;
	private member: Member | null = null;
	private produced = 0;
	private closed = false;

	constructor(source: ByteChannel) {
		super();
		this.source = source;
	}

	/** Raw position of the next compressed byte the decoder will consume. */
	get rawPosition(): number {
		return this.source.tell() - this.input.length;
	}

	/**
	 * Raw offset of the member the next read comes from, opening the next
	 * member when the current one has been read to its end. `undefined` once
	 * the raw channel has no further members.
	 */
	async memberOffset(): Promise<number | undefined> {
		if (this.buffered > 0 && this.member !== null) {
			return this.member.offset;
		}

		while (true) {
			const member = this.member ?? (await this.openMember());
			if (member === null) {
				return undefined;
			}

			if (member.output.length > 0) {
				return member.offset;
			}

			if (member.finished) {
				if ((await this.openMember()) === null) {
					return undefined;
				}
				continue;
			}

			await this.inflateMore(member);
		}
	}

	protected async pull(): Promise<Uint8Array | null> {
		while (true) {
			const member = this.member ?? (await this.openMember());
			if (member === null) {
				return null;
			}

			const chunk = member.output.shift();
			if (chunk !== undefined) {
				this.produced += chunk.length;
				return chunk;
			}

			if (member.finished) {
				if ((await this.openMember()) === null) {
					return null;
				}
				continue;
			}

			await this.inflateMore(member);
		}
	}

	/** Moves the raw channel to `offset`, which must be the start of a member. */
	async seek(offset: number): Promise<void> {
		this.reset();
		await this.source.seek(offset);
	}

	/** Decompressed bytes read since the channel was opened or last seeked. */
	tell(): number {
		return this.produced - this.buffered;
	}

	/**
	 * Writes `data` as one new gzip member at the current raw position, the
	 * end of the last member read. Anything already stored there is
	 * overwritten.
	 */
	async write(data: Uint8Array): Promise<void> {
		const position = this.rawPosition;
		this.reset();
		await this.source.seek(position);
		await this.source.write(gzipSync(data));
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;

		this.reset();
		await this.source.close();
	}

	private reset(): void {
		this.member?.inflater.close();
		this.member = null;
		this.input = EMPTY;
		this.produced = 0;
		this.clearBuffer();
	}

	private async openMember(): Promise<Member | null> {
		// Skip NUL padding between members.
		while (true) {
			if (!(await this.fillInput(1))) {
				return null;
			}

			let padding = 0;
			while (padding < this.input.length && this.input[padding] === 0) {
				padding++;
			}
			if (padding === 0) break;
			this.input = this.input.subarray(padding);
		}

		// The member starts here; nothing of it has been consumed yet.
		const offset = this.rawPosition;
		const headerSize = await this.readHeader(offset);
		this.input = this.input.subarray(headerSize);

		this.member?.inflater.close();

		const inflater = createInflateRaw();
		const member: Member = {
			offset,
			inflater,
			output: [],
			crc: new Crc32(),
			size: 0,
			finished: false,
			error: null,
		};

		inflater.on("data", (chunk: Uint8Array) => {
			member.output.push(chunk);
			member.crc.update(chunk);
			member.size += chunk.length;
		});
		inflater.on("error", (error: Error) => {
			member.error = error;
		});

		this.member = member;
		return member;
	}

	/** Validates the member header at the front of the input and returns its size. */
	private async readHeader(offset: number): Promise<number> {
		if (!(await this.fillInput(GZIP_HEADER_SIZE))) {
			throw new TruncatedArchiveError(
				`Gzip member at offset ${offset} ends inside its header.`,
				{ expected: GZIP_HEADER_SIZE, actual: this.input.length },
			);
		}

		if (this.input[0] !== GZIP_MAGIC[0] || this.input[1] !== GZIP_MAGIC[1]) {
			throw new GzipFormatError(
				`No gzip member starts at offset ${offset}.`,
				offset,
			);
		}

		if (this.input[2] !== GZIP_METHOD_DEFLATE) {
			throw new GzipFormatError(
				`Unsupported gzip compression method ${this.input[2]} at offset ${offset}.`,
				offset,
			);
		}

		const flags = this.input[3];
		let cursor = GZIP_HEADER_SIZE;

		if (flags & GZIP_FLAG.extra) {
			await this.requireHeader(cursor + 2, offset);
			const extraLength = this.input[cursor] | (this.input[cursor + 1] << 8);
			cursor += 2 + extraLength;
			await this.requireHeader(cursor, offset);
		}

		if (flags & GZIP_FLAG.name) {
			cursor = await this.skipZeroTerminated(cursor, offset);
		}

		if (flags & GZIP_FLAG.comment) {
			cursor = await this.skipZeroTerminated(cursor, offset);
		}

		if (flags & GZIP_FLAG.headerCrc) {
			cursor += 2;
			await this.requireHeader(cursor, offset);
		}

		return cursor;
	}

	private async requireHeader(size: number, offset: number): Promise<void> {
		if (!(await this.fillInput(size))) {
			throw new TruncatedArchiveError(
				`Gzip member at offset ${offset} ends inside its header.`,
				{ expected: size, actual: this.input.length },
			);
		}
	}

	private async skipZeroTerminated(
		cursor: number,
		offset: number,
	): Promise<number> {
		let from = cursor;

		while (true) {
			const end = this.input.indexOf(0, from);
			if (end !== -1) {
				return end + 1;
			}

			from = this.input.length;
			await this.requireHeader(this.input.length + 1, offset);
		}
	}

	/** Feeds the next raw bytes of the member to its inflater. */
	private async inflateMore(member: Member): Promise<void> {
		if (this.input.length === 0) {
			this.input = await this.source.read(CHUNK_SIZE);

			if (this.input.length === 0) {
				throw new TruncatedArchiveError(
					`Gzip member at offset ${member.offset} ends before its end-of-stream marker.`,
				);
			}
		}

		const chunk = this.input;
		const used = await this.inflate(member, chunk);
		this.input = chunk.subarray(used);

		// The inflater stops taking input only at the end of the deflate stream.
		if (used < chunk.length) {
			await this.finishMember(member);
		}
	}

	private inflate(member: Member, chunk: Uint8Array): Promise<number> {
		const { inflater } = member;
		const before = inflater.bytesWritten;

		return new Promise<number>((resolve, reject) => {
			const onError = (error: Error) => {
				reject(
					new GzipFormatError(
						`Invalid deflate data in gzip member at offset ${member.offset}.`,
						member.offset,
						{ cause: error },
					),
				);
			};

			inflater.once("error", onError);
			inflater.write(chunk, (error) => {
				inflater.off("error", onError);
				if (error) {
					onError(error);
				} else {
					resolve(inflater.bytesWritten - before);
				}
			});
		});
	}

	private async finishMember(member: Member): Promise<void> {
		// Every inflated chunk has been delivered once the readable side ends.
		if (!member.inflater.readableEnded) {
			await once(member.inflater, "end");
		}
		member.inflater.close();

		if (member.error !== null) {
			throw new GzipFormatError(
				`Invalid deflate data in gzip member at offset ${member.offset}.`,
				member.offset,
				{ cause: member.error },
			);
		}

		if (!(await this.fillInput(GZIP_TRAILER_SIZE))) {
			throw new TruncatedArchiveError(
				`Gzip member at offset ${member.offset} is missing its trailer.`,
				{ expected: GZIP_TRAILER_SIZE, actual: this.input.length },
			);
		}

		const trailer = new DataView(
			this.input.buffer,
			this.input.byteOffset,
			GZIP_TRAILER_SIZE,
		);
		const crc = trailer.getUint32(0, true);
		const size = trailer.getUint32(4, true);
		this.input = this.input.subarray(GZIP_TRAILER_SIZE);
		member.finished = true;

		if (crc !== member.crc.digest()) {
			throw new GzipFormatError(
				`CRC check failed for gzip member at offset ${member.offset}.`,
				member.offset,
			);
		}

		if (size !== member.size % 2 ** 32) {
			throw new GzipFormatError(
				`Length check failed for gzip member at offset ${member.offset}.`,
				member.offset,
			);
		}
	}

	/** Reads from the source until `size` raw bytes are pending. */
	private async fillInput(size: number): Promise<boolean> {
		while (this.input.length < size) {
			const chunk = await this.source.read(CHUNK_SIZE);
			if (chunk.length === 0) {
				return false;
			}

			const combined = new Uint8Array(this.input.length + chunk.length);
			combined.set(this.input);
			combined.set(chunk, this.input.length);
			this.input = combined;
		}

		return true;
	}
}
