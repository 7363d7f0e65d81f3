import { constants, gunzipSync } from "node:zlib";
import { WarcParser } from "../warc/parser";
import { GZIP_MAGIC, GZIP_SUFFIX } from "./constants";
import { UnsupportedFormatError } from "./errors";
import { GzipMemberChannel } from "./gzip";
import {
	GzipFileStream,
	GzipRecordStream,
	RecordStream,
} from "./record-stream";
import type { ByteChannel, Framing, RecordParser } from "./types";
import { decodeLatin1, startsWith } from "./utils";

/** Bytes inspected to recognise the framing and the record grammar. */
const SNIFF_SIZE = 4096;

/** Record grammars that can be recognised from an archive's first bytes. */
export const RECORD_GRAMMARS: readonly RecordParser[] = [new WarcParser()];

/** How an archive is laid out and which grammar its records follow. */
export interface ArchiveFormat {
	readonly framing: Framing;
	readonly parser: RecordParser;
}

export interface DetectFormatOptions {
	/** Name of the archive, used to recognise the `.gz` suffix. */
	filename?: string;
	/** Framing to use instead of detecting it. Defaults to `"auto"`. */
	framing?: Framing | "auto";
	/** Record grammar to use instead of inferring it. */
	parser?: RecordParser;
}

/**
 * Works out the format of the archive at the channel's current position
 * without consuming any of it.
 *
 * @param channel - Channel positioned at the first record of the archive.
 * @param options - Optional filename hint and overrides using {@link DetectFormatOptions}.
 * @returns The {@link ArchiveFormat} to open the archive with.
 * @throws {UnsupportedFormatError} When no record grammar matches.
 */
export async function detectArchiveFormat(
	channel: ByteChannel,
	options: DetectFormatOptions = {},
): Promise<ArchiveFormat> {
	const prefix = await channel.peek(SNIFF_SIZE);

	const framing =
		options.framing === undefined || options.framing === "auto"
			? detectFraming(prefix, options.filename)
			: options.framing;

	const parser =
		options.parser ??
		detectGrammar(framing === "plain" ? prefix : inflatePrefix(prefix));

	return { framing, parser };
}

/**
 * Per-record gzip when the name ends in `.gz` or the bytes start with the
 * gzip magic number, plain otherwise.
 */
export function detectFraming(prefix: Uint8Array, filename?: string): Framing {
	if (filename?.endsWith(GZIP_SUFFIX) || startsWith(prefix, GZIP_MAGIC)) {
		return "gzip-record";
	}
	return "plain";
}

/** The first grammar whose records start like `prefix`. */
export function detectGrammar(prefix: Uint8Array): RecordParser {
	const parser = RECORD_GRAMMARS.find((grammar) => grammar.matches(prefix));

	if (parser === undefined) {
		const start = JSON.stringify(decodeLatin1(prefix.subarray(0, 16)));
		throw new UnsupportedFormatError(
			`Cannot infer the record grammar of an archive starting with ${start}.`,
		);
	}

	return parser;
}

/**
 * Builds the stream for a format detected or chosen beforehand.
 *
 * @param channel - Raw channel of the archive. The stream takes ownership of it.
 * @param format - Framing and record grammar of the archive.
 * @returns A {@link RecordStream} matching `format.framing`.
 */
export function createRecordStream(
	channel: ByteChannel,
	format: ArchiveFormat,
): RecordStream {
	switch (format.framing) {
		case "plain":
			return new RecordStream(channel, format.parser);
		case "gzip-record":
			return new GzipRecordStream(
				new GzipMemberChannel(channel),
				format.parser,
			);
		case "gzip-file":
			return new GzipFileStream(new GzipMemberChannel(channel), format.parser);
	}
}

/**
 * Detects the format of the archive behind `channel` and opens a record
 * stream over it. The stream owns the channel from then on.
 *
 * @param channel - Raw channel of the archive.
 * @param options - Optional configuration for detection using {@link DetectFormatOptions}.
 * @returns A {@link RecordStream} positioned at the first record.
 *
 * @example
 * ```typescript
 * import { MemoryChannel, openRecordStream } from 'warc-record-stream';
 *
 * const stream = await openRecordStream(new MemoryChannel(bytes), { framing: "gzip-file" });
 * for await (const outcome of stream.readRecords({ limit: 10 })) {
 *   if (outcome.kind === "record") console.log(outcome.record.url);
 * }
 * await stream.close();
 * ```
 */
export async function openRecordStream(
	channel: ByteChannel,
	options: DetectFormatOptions = {},
): Promise<RecordStream> {
	return createRecordStream(
		channel,
		await detectArchiveFormat(channel, options),
	);
}

// Decompresses as much of a gzip prefix as is there.
function inflatePrefix(prefix: Uint8Array): Uint8Array {
	try {
		return gunzipSync(prefix, { finishFlush: constants.Z_SYNC_FLUSH });
	} catch (error) {
		throw new UnsupportedFormatError(
			"The archive is not a valid gzip stream.",
			{ cause: error },
		);
	}
}
