import { gzipSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import {
	GzipFormatError,
	GzipMemberChannel,
	MemoryChannel,
	TruncatedArchiveError,
} from "../../src/stream";
import { concatBytes } from "../../src/stream/utils";
import { decode, text } from "../fixtures";

const first = gzipSync(text("hello "));
const second = gzipSync(text("world"));

describe("gzip member channel", () => {
	it("reads concatenated members as one stream", async () => {
		const channel = new GzipMemberChannel(
			new MemoryChannel(concatBytes([first, second])),
		);

		expect(decode(await channel.read())).toBe("hello world");
		expect(channel.tell()).toBe(11);
	});

	it("reports the raw offset of the member being read", async () => {
		const channel = new GzipMemberChannel(
			new MemoryChannel(concatBytes([first, second])),
		);

		expect(await channel.memberOffset()).toBe(0);
		expect(decode(await channel.read(6))).toBe("hello ");
		expect(await channel.memberOffset()).toBe(first.length);
		expect(decode(await channel.read())).toBe("world");
		expect(await channel.memberOffset()).toBeUndefined();
	});

	it("skips NUL padding between members", async () => {
		const channel = new GzipMemberChannel(
			new MemoryChannel(concatBytes([first, new Uint8Array(3), second])),
		);

		await channel.read(6);
		expect(await channel.memberOffset()).toBe(first.length + 3);
		expect(decode(await channel.read())).toBe("world");
	});

	it("reads from a member offset after seeking", async () => {
		const channel = new GzipMemberChannel(
			new MemoryChannel(concatBytes([first, second])),
		);

		await channel.seek(first.length);
		expect(decode(await channel.read())).toBe("world");
	});

	it("appends every write as a new member", async () => {
		const raw = new MemoryChannel();
		const channel = new GzipMemberChannel(raw);

		await channel.write(text("abc"));
		await channel.write(text("def"));

		expect(raw.bytes).toEqual(
			concatBytes([gzipSync(text("abc")), gzipSync(text("def"))]),
		);

		await channel.seek(0);
		expect(decode(await channel.read())).toBe("abcdef");
	});

	it("writes a new member at the current raw position", async () => {
		const raw = new MemoryChannel(concatBytes([first, second]));
		const channel = new GzipMemberChannel(raw);

		await channel.seek(first.length);
		await channel.write(text("abc"));

		const written = gzipSync(text("abc"));
		expect(raw.bytes.subarray(0, first.length)).toEqual(Uint8Array.from(first));
		expect(
			raw.bytes.subarray(first.length, first.length + written.length),
		).toEqual(Uint8Array.from(written));
		expect(raw.tell()).toBe(first.length + written.length);
	});

	it("rejects a member whose CRC does not match", async () => {
		const corrupt = Uint8Array.from(first);
		corrupt[corrupt.length - 8] ^= 0xff;
		const channel = new GzipMemberChannel(new MemoryChannel(corrupt));

		await expect(channel.read()).rejects.toThrow(
			"CRC check failed for gzip member at offset 0.",
		);
	});

	it("rejects a member that is cut short", async () => {
		const channel = new GzipMemberChannel(
			new MemoryChannel(first.subarray(0, first.length - 4)),
		);

		await expect(channel.read()).rejects.toThrow(TruncatedArchiveError);
	});

	it("rejects bytes that are not gzip", async () => {
		const channel = new GzipMemberChannel(
			new MemoryChannel(text("definitely not gzip")),
		);

		await expect(channel.read()).rejects.toThrow(GzipFormatError);
		await expect(channel.memberOffset()).rejects.toThrow(
			"No gzip member starts at offset 0.",
		);
	});

	it("closes the raw channel once", async () => {
		const raw = new MemoryChannel(first);
		const channel = new GzipMemberChannel(raw);

		await channel.close();
		await channel.close();
		expect(raw.isClosed).toBe(true);
	});
});
