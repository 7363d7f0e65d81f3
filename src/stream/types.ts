/**
 * A seekable byte source (and, where supported, sink) that a record stream
 * owns for its whole lifetime.
 */
export interface ByteChannel {
	/** Reads up to `count` bytes, or everything left when `count` is omitted. Fewer bytes are returned only at end of input. */
	read(count?: number): Promise<Uint8Array>;
	/** Reads up to and including the next line feed, stopping early after `limit` bytes or at end of input. */
	readline(limit?: number): Promise<Uint8Array>;
	/** Returns up to `count` upcoming bytes without consuming them. */
	peek(count: number): Promise<Uint8Array>;
	/** Moves to an absolute position in the channel's own domain. */
	seek(offset: number): Promise<void>;
	/** Current position in the channel's own domain. */
	tell(): number;
	/** Writes `data` at the current position. */
	write(data: Uint8Array): Promise<void>;
	/** Releases the underlying resource. Safe to call more than once. */
	close(): Promise<void>;
}

/** Opens a channel for an archive location, such as a local path or a remote object reference. */
export type ChannelOpener = (location: string) => Promise<ByteChannel>;

/**
 * Physical layout of an archive.
 *
 * - `plain`: uncompressed records, concatenated.
 * - `gzip-record`: every record compressed as its own gzip member.
 * - `gzip-file`: the whole archive compressed as a single gzip stream.
 */
export type Framing = "plain" | "gzip-record" | "gzip-file";

/** `content()` result of a record: its content type and its raw content bytes. */
export type RecordContent = readonly [
	contentType: string | undefined,
	bytes: Uint8Array,
];

/** A record produced by a {@link RecordParser}. */
export interface ArchiveRecord {
	/** Record type tag, such as `response` or `request`. */
	readonly type: string | undefined;
	/** URI the record is about, if it names one. */
	readonly url: string | undefined;
	/** Media type of the record content. */
	readonly contentType: string | undefined;
	/** Declared length of the record content in bytes. */
	readonly contentLength: number;
	/** Non-fatal problems found while parsing the record. */
	readonly errors: readonly string[];
	/** Reads (once) and returns the content of the record. */
	content(): Promise<RecordContent>;
	/** Returns the record in its wire format, delimiter included. */
	serialize(): Promise<Uint8Array>;
}

/**
 * The content of the record a parser just started. It reads nothing once the
 * stream has moved on to another record.
 */
export interface ContentReader {
	read(count?: number): Promise<Uint8Array>;
	readline(maxLength?: number): Promise<Uint8Array>;
	/** Bytes of content left to read. */
	readonly remaining: number;
}

/** The view of a record stream that a parser works with. */
export interface BoundedReader {
	read(count?: number): Promise<Uint8Array>;
	readline(maxLength?: number): Promise<Uint8Array>;
	/**
	 * Starts a record whose content and delimiter span `remaining` bytes from
	 * the current position, and returns the reader for its content.
	 */
	bound(remaining: number): ContentReader;
}

/** Result of reading one record from a stream. */
export type ReadOutcome =
	| {
			kind: "record";
			offset: number | undefined;
			record: ArchiveRecord;
	  }
	| {
			kind: "failure";
			offset: number | undefined;
			errors: readonly string[];
	  }
	| {
			kind: "end";
			offset: number | undefined;
	  };

/** Record grammar that turns bytes at a record boundary into a record. */
export interface RecordParser {
	/** Name of the grammar, used in diagnostics. */
	readonly name: string;
	/** Whether `prefix`, the first bytes of an archive, starts a record of this grammar. */
	matches(prefix: Uint8Array): boolean;
	/**
	 * Parses the record at the reader's position. On success the parser must
	 * have called {@link BoundedReader.bound} before returning.
	 */
	parse(reader: BoundedReader, offset: number | undefined): Promise<ReadOutcome>;
}

export interface ReadRecordsOptions {
	/** Stop after this many outcomes. Defaults to no limit. */
	limit?: number;
	/** Whether to track record offsets where the framing allows it. Defaults to `true`. */
	offsets?: boolean;
}
