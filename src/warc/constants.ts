/** Version written into new records. */
export const WARC_VERSION = "WARC/1.0";

/** Every record begins with this. */
export const WARC_MAGIC = "WARC/";

/** Standard WARC record types. */
export const WARC_TYPE = {
	warcinfo: "warcinfo",
	response: "response",
	resource: "resource",
	request: "request",
	metadata: "metadata",
	revisit: "revisit",
	conversion: "conversion",
	continuation: "continuation",
} as const;

export type WarcType = (typeof WARC_TYPE)[keyof typeof WARC_TYPE];

/** Header names the record model reads. */
export const WARC_HEADER = {
	type: "WARC-Type",
	recordId: "WARC-Record-ID",
	date: "WARC-Date",
	targetUri: "WARC-Target-URI",
	contentType: "Content-Type",
	contentLength: "Content-Length",
} as const;

/** Closes the header block and, doubled, every record. */
export const CRLF = "\r\n";

/** Longest version or header line the parser accepts. */
export const MAX_LINE_LENGTH = 64 * 1024;
