import * as fs from "node:fs/promises";
import { BufferedChannel } from "../stream/channel";
import { FILE_READ_SIZE } from "../stream/constants";

/** A {@link ByteChannel} over a local file. */
export class FileChannel extends BufferedChannel {
	readonly path: string;
	private readonly handle: fs.FileHandle;
	// File position of the next byte to pull.
	private position = 0;
	private closed = false;

	constructor(handle: fs.FileHandle, path: string) {
		super();
		this.handle = handle;
		this.path = path;
	}

	/** Opens `path` with the given `fs.open` flags (read-only by default). */
	static async open(path: string, flags = "r"): Promise<FileChannel> {
		return new FileChannel(await fs.open(path, flags), path);
	}

	protected async pull(): Promise<Uint8Array | null> {
		const buffer = new Uint8Array(FILE_READ_SIZE);
		const { bytesRead } = await this.handle.read(
			buffer,
			0,
			buffer.length,
			this.position,
		);

		if (bytesRead === 0) {
			return null;
		}

		this.position += bytesRead;
		return buffer.subarray(0, bytesRead);
	}

	async seek(offset: number): Promise<void> {
		if (!Number.isSafeInteger(offset) || offset < 0) {
			throw new RangeError(`Invalid offset ${offset}.`);
		}

		this.position = offset;
		this.clearBuffer();
	}

	tell(): number {
		return this.position - this.buffered;
	}

	async write(data: Uint8Array): Promise<void> {
		const start = this.tell();
		let written = 0;

		while (written < data.length) {
			const { bytesWritten } = await this.handle.write(
				data,
				written,
				data.length - written,
				start + written,
			);
			written += bytesWritten;
		}

		this.position = start + written;
		this.clearBuffer();
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;

		this.clearBuffer();
		await this.handle.close();
	}
}
