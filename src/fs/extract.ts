import { RequestMessage, ResponseMessage } from "../http/message";
import type { ArchiveRecord, ReadOutcome } from "../stream/types";
import { WARC_TYPE } from "../warc/constants";
import { type OpenArchiveOptions, openArchive } from "./open";

const EMPTY = new Uint8Array(0);
const HTTP_CONTENT_TYPE = "application/http";

export type PayloadWarningKind =
	| "trailing-data"
	| "truncated-response"
	| "invalid-record"
	| "no-record";

/** A problem that did not stop the payload from being extracted. */
export interface PayloadWarning {
	readonly kind: PayloadWarningKind;
	readonly message: string;
	readonly location: string;
	readonly offset: number;
}

export interface ExtractPayloadOptions extends OpenArchiveOptions {
	/** Receives non-fatal problems. Defaults to printing them with `console.warn`. */
	onWarning?: (warning: PayloadWarning) => void;
}

const defaultWarning = (warning: PayloadWarning): void => {
	console.warn(warning.message);
};

/**
 * Returns the payload of the record at `offset` in the archive at `location`.
 *
 * For an HTTP response record that is the decoded response body; for any
 * other record, its raw content. A record that cannot be read yields empty
 * bytes and a warning.
 *
 * @param location - Archive path, or any location `options.openChannel` understands.
 * @param offset - Offset of the record, as reported by the archive's record stream.
 * @param options - Optional configuration using {@link ExtractPayloadOptions}.
 * @returns The payload bytes.
 *
 * @example
 * ```typescript
 * import { extractPayload } from 'warc-record-stream/fs';
 *
 * const body = await extractPayload('crawl.warc.gz', 1234, {
 *   onWarning: (warning) => console.error(warning.kind, warning.message),
 * });
 * process.stdout.write(body);
 * ```
 */
export async function extractPayload(
	location: string,
	offset: number,
	options: ExtractPayloadOptions = {},
): Promise<Uint8Array> {
	const onWarning = options.onWarning ?? defaultWarning;
	const warn = (kind: PayloadWarningKind, message: string) =>
		onWarning({ kind, message, location, offset });

	const stream = await openArchive(location, options);

	try {
		await stream.seek(offset);

		const next = await stream.readRecords({ limit: 1 }).next();
		const outcome: ReadOutcome = next.done
			? { kind: "end", offset }
			: next.value;

		switch (outcome.kind) {
			case "record":
				return await recordPayload(outcome.record, warn);
			case "failure":
				warn(
					"invalid-record",
					`Invalid record at ${location}:${offset}: ${outcome.errors.join(", ")}`,
				);
				return EMPTY;
			case "end":
				warn("no-record", `No record at ${location}:${offset}.`);
				return EMPTY;
		}
	} finally {
		await stream.close();
	}
}

async function recordPayload(
	record: ArchiveRecord,
	warn: (kind: PayloadWarningKind, message: string) => void,
): Promise<Uint8Array> {
	const [contentType, content] = await record.content();

	const isHttpResponse =
		record.type === WARC_TYPE.response &&
		contentType?.toLowerCase().startsWith(HTTP_CONTENT_TYPE) === true;
	if (!isHttpResponse) {
		return content;
	}

	const message = new ResponseMessage(new RequestMessage());
	const rest = message.feed(content);
	message.close();

	if (rest.length > 0) {
		warn(
			"trailing-data",
			`Trailing data after the HTTP response for ${record.url ?? "record"}: ${rest.length} bytes ignored.`,
		);
	}

	if (!message.complete) {
		warn(
			"truncated-response",
			`Truncated HTTP response for ${record.url ?? "record"}.`,
		);
	}

	return message.body;
}
