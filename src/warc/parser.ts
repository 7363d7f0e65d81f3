import { DELIMITER_LENGTH, LF } from "../stream/constants";
import type {
	BoundedReader,
	ReadOutcome,
	RecordParser,
} from "../stream/types";
import {
	decoder,
	encoder,
	startsWith,
	stripLineEnding,
} from "../stream/utils";
import { MAX_LINE_LENGTH, WARC_HEADER, WARC_MAGIC } from "./constants";
import { WarcRecord } from "./record";

const VERSION_PATTERN = /^WARC\/\d+\.\d+$/;
const LENGTH_PATTERN = /^\d+$/;
const MAGIC = encoder.encode(WARC_MAGIC);

/**
 * Parses WARC records: a `WARC/x.y` version line, header lines up to a blank
 * line, then `Content-Length` bytes of content and a `\r\n\r\n` delimiter.
 *
 * Content is not read here. The parser bounds the stream to the record and
 * hands the resulting content reader to the record.
 */
export class WarcParser implements RecordParser {
	readonly name = "warc";

	matches(prefix: Uint8Array): boolean {
		return startsWith(prefix, MAGIC);
	}

	async parse(
		reader: BoundedReader,
		offset: number | undefined,
	): Promise<ReadOutcome> {
		let line = await reader.readline(MAX_LINE_LENGTH);

		// Blank lines between records are tolerated.
		while (line.length > 0 && stripLineEnding(decoder.decode(line)) === "") {
			line = await reader.readline(MAX_LINE_LENGTH);
		}

		if (line.length === 0) {
			return { kind: "end", offset };
		}

		const version = stripLineEnding(decoder.decode(line));
		if (!VERSION_PATTERN.test(version)) {
			return {
				kind: "failure",
				offset,
				errors: [`Invalid version line "${truncate(version)}".`],
			};
		}

		const headers: [string, string][] = [];
		const errors: string[] = [];

		while (true) {
			line = await reader.readline(MAX_LINE_LENGTH);

			if (line.length === 0) {
				return {
					kind: "failure",
					offset,
					errors: ["Unexpected end of input in the header block."],
				};
			}

			if (line[line.length - 1] !== LF && line.length === MAX_LINE_LENGTH) {
				return {
					kind: "failure",
					offset,
					errors: [`Header line exceeds ${MAX_LINE_LENGTH} bytes.`],
				};
			}

			const text = stripLineEnding(decoder.decode(line));
			if (text === "") break;

			// Continuation of the previous header's value.
			if (text.startsWith(" ") || text.startsWith("\t")) {
				const previous = headers.at(-1);
				if (previous) {
					previous[1] = `${previous[1]} ${text.trim()}`;
				} else {
					errors.push(`Continuation line without a header: "${truncate(text)}".`);
				}
				continue;
			}

			const colon = text.indexOf(":");
			if (colon === -1) {
				errors.push(`Invalid header line "${truncate(text)}".`);
				continue;
			}

			headers.push([text.slice(0, colon).trim(), text.slice(colon + 1).trim()]);
		}

		const wanted = WARC_HEADER.contentLength.toLowerCase();
		const declared = headers.find(([name]) => name.toLowerCase() === wanted);

		if (declared === undefined) {
			return {
				kind: "failure",
				offset,
				errors: [...errors, "Missing Content-Length header."],
			};
		}

		const length = Number(declared[1]);
		if (!LENGTH_PATTERN.test(declared[1]) || !Number.isSafeInteger(length)) {
			return {
				kind: "failure",
				offset,
				errors: [...errors, `Invalid Content-Length "${truncate(declared[1])}".`],
			};
		}

		const content = reader.bound(length + DELIMITER_LENGTH);
		const record = new WarcRecord(version, headers, content, errors);

		return { kind: "record", offset, record };
	}
}

function truncate(text: string, length = 80): string {
	return text.length > length ? `${text.slice(0, length)}...` : text;
}
