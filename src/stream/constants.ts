/** Size of the chunks used to drain a record and to feed the gzip decoder. */
export const CHUNK_SIZE = 8192;

/** Size of the reads a file channel issues against its handle. */
export const FILE_READ_SIZE = 64 * 1024;

/**
 * Number of bytes that close every record (`\r\n\r\n`). They are counted in a
 * record's remaining length but never returned by a content read.
 */
export const DELIMITER_LENGTH = 4;

/** The two leading bytes of every gzip member. */
export const GZIP_MAGIC = [0x1f, 0x8b] as const;

/** Filename suffix that selects per-record gzip framing. */
export const GZIP_SUFFIX = ".gz";

/** Fixed-size part of a gzip member header. */
export const GZIP_HEADER_SIZE = 10;

/** CRC-32 and ISIZE, both little-endian. */
export const GZIP_TRAILER_SIZE = 8;

/** Compression method 8 is deflate, the only one gzip defines. */
export const GZIP_METHOD_DEFLATE = 8;

/** Flag bits of a gzip member header. */
export const GZIP_FLAG = {
	text: 0x01,
	headerCrc: 0x02,
	extra: 0x04,
	name: 0x08,
	comment: 0x10,
} as const;

export const LF = 0x0a;
