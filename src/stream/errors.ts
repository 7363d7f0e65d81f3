/**
 * Raised when a record stream is used out of order, for example when draining
 * a record that was never started or reading the content of a record the
 * stream has already moved past.
 */
export class RecordStreamError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "RecordStreamError";
	}
}

/**
 * Raised when the archive ends before a record or a gzip member does. The
 * archive is corrupt or was cut short; reading is not retried.
 */
export class TruncatedArchiveError extends Error {
	/** Bytes that were expected, when the shortfall is known. */
	readonly expected: number | undefined;
	/** Bytes that were actually available, when the shortfall is known. */
	readonly actual: number | undefined;

	constructor(
		message: string,
		options?: ErrorOptions & { expected?: number; actual?: number },
	) {
		super(message, options);
		this.name = "TruncatedArchiveError";
		this.expected = options?.expected;
		this.actual = options?.actual;
	}
}

/** Raised for bytes that do not form a valid gzip member. */
export class GzipFormatError extends Error {
	/** Raw offset of the member the error was found in, if known. */
	readonly offset: number | undefined;

	constructor(message: string, offset?: number, options?: ErrorOptions) {
		super(message, options);
		this.name = "GzipFormatError";
		this.offset = offset;
	}
}

/**
 * Raised at open time when neither the framing nor the record grammar of an
 * archive can be identified.
 */
export class UnsupportedFormatError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "UnsupportedFormatError";
	}
}

/** Raised while iterating records when the parser reports a corrupt record. */
export class RecordDecodeError extends Error {
	/** Messages reported by the record parser. */
	readonly errors: readonly string[];
	/** Offset of the record that failed to parse, when it was tracked. */
	readonly offset: number | undefined;

	constructor(errors: readonly string[], offset?: number) {
		super(`Errors while decoding record: ${errors.join(", ")}`);
		this.name = "RecordDecodeError";
		this.errors = errors;
		this.offset = offset;
	}
}
