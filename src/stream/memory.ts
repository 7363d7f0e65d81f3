import { BufferedChannel } from "./channel";
import { CHUNK_SIZE } from "./constants";

/**
 * A channel over bytes held in memory. Writes overwrite or extend the data at
 * the current position.
 */
export class MemoryChannel extends BufferedChannel {
	private data: Uint8Array;
	private position = 0;
	private readonly chunkSize: number;
	private closed = false;

	constructor(data: Uint8Array = new Uint8Array(0), chunkSize = CHUNK_SIZE) {
		super();
		this.data = data;
		this.chunkSize = chunkSize;
	}

	/** Everything written to or held by the channel. */
	get bytes(): Uint8Array {
		return this.data;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	protected async pull(): Promise<Uint8Array | null> {
		if (this.position >= this.data.length) {
			return null;
		}

		const end = Math.min(this.position + this.chunkSize, this.data.length);
		const chunk = this.data.subarray(this.position, end);
		this.position = end;
		return chunk;
	}

	async seek(offset: number): Promise<void> {
		if (!Number.isInteger(offset) || offset < 0) {
			throw new RangeError(`Invalid seek offset ${offset}.`);
		}
		this.clearBuffer();
		this.position = offset;
	}

	tell(): number {
		return this.position - this.buffered;
	}

	async write(data: Uint8Array): Promise<void> {
		const start = this.tell();
		this.clearBuffer();

		const end = start + data.length;
		if (end > this.data.length) {
			const grown = new Uint8Array(end);
			grown.set(this.data);
			this.data = grown;
		}

		this.data.set(data, start);
		this.position = end;
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}
