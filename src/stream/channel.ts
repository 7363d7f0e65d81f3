import { LF } from "./constants";
import type { ByteChannel } from "./types";

const EMPTY = new Uint8Array(0);

/**
 * Base for channels that produce their bytes in chunks. Subclasses implement
 * {@link BufferedChannel.pull}; this class keeps the chunk queue and serves
 * exact-size reads, line reads and peeks from it.
 */
export abstract class BufferedChannel implements ByteChannel {
	// Chunk queue
	private chunks: Uint8Array[] = [];
	private offset = 0; // Read offset within the first chunk only
	private length = 0;

	/** Next chunk of the source, or `null` at end of input. */
	protected abstract pull(): Promise<Uint8Array | null>;

	abstract seek(offset: number): Promise<void>;
	abstract tell(): number;
	abstract write(data: Uint8Array): Promise<void>;
	abstract close(): Promise<void>;

	/** Bytes pulled from the source but not yet returned to a reader. */
	protected get buffered(): number {
		return this.length;
	}

	/** Drops everything buffered, as after a seek. */
	protected clearBuffer(): void {
		this.chunks = [];
		this.offset = 0;
		this.length = 0;
	}

	async read(count?: number): Promise<Uint8Array> {
		if (count === undefined) {
			while (await this.fill()) {}
			return this.consume(this.length);
		}

		while (this.length < count && (await this.fill())) {}
		return this.consume(Math.min(count, this.length));
	}

	async readline(limit = Number.POSITIVE_INFINITY): Promise<Uint8Array> {
		let scanned = 0;

		while (true) {
			const index = this.indexOf(LF, scanned);
			if (index !== -1 && index < limit) {
				return this.consume(index + 1);
			}

			if (this.length >= limit) {
				return this.consume(limit);
			}

			scanned = this.length;
			if (!(await this.fill())) {
				return this.consume(this.length);
			}
		}
	}

	async peek(count: number): Promise<Uint8Array> {
		while (this.length < count && (await this.fill())) {}

		const size = Math.min(count, this.length);
		const data = this.consume(size);
		this.unshift(data);
		return data.slice();
	}

	private async fill(): Promise<boolean> {
		const chunk = await this.pull();
		if (chunk === null) {
			return false;
		}

		if (chunk.length > 0) {
			this.chunks.push(chunk);
			this.length += chunk.length;
		}
		return true;
	}

	/**
	 * Reads and consumes a specific number of bytes from the chunk queue.
	 * Callers make sure that many bytes are buffered.
	 */
	private consume(size: number): Uint8Array {
		if (size === 0) {
			return EMPTY;
		}

		this.length -= size;

		const firstChunk = this.chunks[0];

		// Fast path: The entire data block is within the first chunk.
		if (firstChunk.length - this.offset >= size) {
			const data = firstChunk.subarray(this.offset, this.offset + size);
			this.offset += size;

			// If we've consumed the entire chunk, remove it and reset offset.
			if (this.offset === firstChunk.length) {
				this.chunks.shift();
				this.offset = 0;
			}

			return data;
		}

		// Slow path: The data spans multiple chunks, so we need to stitch them together to reach the needed size.
		const data = new Uint8Array(size);
		let bytesCopied = 0;

		while (bytesCopied < size) {
			const chunk = this.chunks[0];
			const bytesToCopy = Math.min(
				size - bytesCopied,
				chunk.length - this.offset,
			);

			data.set(
				chunk.subarray(this.offset, this.offset + bytesToCopy),
				bytesCopied,
			);
			bytesCopied += bytesToCopy;
			this.offset += bytesToCopy;

			if (this.offset === chunk.length) {
				this.chunks.shift();
				this.offset = 0;
			}
		}

		return data;
	}

	/** Puts data back at the front of the chunk queue. */
	private unshift(data: Uint8Array): void {
		if (data.length === 0) {
			return;
		}

		if (this.offset > 0) {
			// If we were in the middle of a chunk, put the remainder back as a full chunk.
			this.chunks[0] = this.chunks[0].subarray(this.offset);
			this.offset = 0;
		}
		this.chunks.unshift(data);
		this.length += data.length;
	}

	/** Position of `byte` among the buffered bytes, searching from `from`. */
	private indexOf(byte: number, from: number): number {
		let base = 0;

		for (let i = 0; i < this.chunks.length; i++) {
			const start = i === 0 ? this.offset : 0;
			const chunk = this.chunks[i];
			const size = chunk.length - start;

			if (from < base + size) {
				const index = chunk.indexOf(byte, start + Math.max(0, from - base));
				if (index !== -1) {
					return base + index - start;
				}
			}

			base += size;
		}

		return -1;
	}
}
