import {
	createRecordStream,
	type DetectFormatOptions,
	detectArchiveFormat,
} from "../stream/open";
import type { RecordStream } from "../stream/record-stream";
import type { ChannelOpener } from "../stream/types";
import { UnsupportedLocationError } from "./errors";
import { FileChannel } from "./file";

const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

export interface OpenArchiveOptions
	extends Omit<DetectFormatOptions, "filename"> {
	/**
	 * Opens the channel for a location. Defaults to {@link openFileChannel},
	 * which only handles local paths.
	 */
	openChannel?: ChannelOpener;
}

/** Opens local files read-only and rejects `scheme://` locations. */
export const openFileChannel: ChannelOpener = async (location) => {
	if (SCHEME_PATTERN.test(location)) {
		throw new UnsupportedLocationError(location);
	}
	return FileChannel.open(location);
};

/**
 * Opens the archive at `location` as a record stream, detecting its framing
 * from the name and first bytes unless `options.framing` says otherwise.
 *
 * @param location - Local path, or any location `options.openChannel` understands.
 * @param options - Optional opener and format overrides using {@link OpenArchiveOptions}.
 * @returns A {@link RecordStream} over the archive; close it when done.
 *
 * @example
 * ```typescript
 * import { openArchive } from 'warc-record-stream/fs';
 *
 * const stream = await openArchive('crawl.warc.gz');
 * for await (const outcome of stream.readRecords()) {
 *   if (outcome.kind === "record") console.log(outcome.offset, outcome.record.url);
 * }
 * await stream.close();
 * ```
 */
export async function openArchive(
	location: string,
	options: OpenArchiveOptions = {},
): Promise<RecordStream> {
	const open = options.openChannel ?? openFileChannel;
	const channel = await open(location);

	try {
		const format = await detectArchiveFormat(channel, {
			filename: location,
			framing: options.framing,
			parser: options.parser,
		});
		return createRecordStream(channel, format);
	} catch (error) {
		await channel.close();
		throw error;
	}
}
