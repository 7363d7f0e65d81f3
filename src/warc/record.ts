import { randomUUID } from "node:crypto";
import type {
	ArchiveRecord,
	ContentReader,
	RecordContent,
} from "../stream/types";
import { concatBytes, encoder } from "../stream/utils";
import { CRLF, WARC_HEADER, WARC_VERSION } from "./constants";

/** A header line as it appeared in the record, name casing preserved. */
export type WarcHeader = readonly [name: string, value: string];

/** Fields accepted by {@link WarcRecord.create}. */
export interface NewWarcRecord {
	type: string;
	content: Uint8Array | string;
	url?: string;
	contentType?: string;
	/** Defaults to a fresh `urn:uuid` identifier. */
	id?: string;
	/** Defaults to the current time. */
	date?: Date;
	/** Additional headers, written after the standard ones. */
	headers?: readonly WarcHeader[];
}

type ContentSource =
	| { kind: "buffered"; bytes: Uint8Array }
	| { kind: "stream"; reader: ContentReader };

/**
 * A WARC record: the version line, an ordered header block and the content
 * block. Records read from a stream load their content on first use.
 */
export class WarcRecord implements ArchiveRecord {
	readonly version: string;
	readonly headers: readonly WarcHeader[];
	readonly errors: readonly string[];
	private source: ContentSource;

	constructor(
		version: string,
		headers: readonly WarcHeader[],
		content: Uint8Array | ContentReader,
		errors: readonly string[] = [],
	) {
		this.version = version;
		this.headers = headers;
		this.errors = errors;
		this.source =
			content instanceof Uint8Array
				? { kind: "buffered", bytes: content }
				: { kind: "stream", reader: content };
	}

	/** Builds a new record in memory, ready to be written to a stream. */
	static create(fields: NewWarcRecord): WarcRecord {
		const content =
			typeof fields.content === "string"
				? encoder.encode(fields.content)
				: fields.content;

		const headers: WarcHeader[] = [
			[WARC_HEADER.type, fields.type],
			[WARC_HEADER.recordId, fields.id ?? `<urn:uuid:${randomUUID()}>`],
			[WARC_HEADER.date, formatWarcDate(fields.date ?? new Date())],
		];
		if (fields.url !== undefined) {
			headers.push([WARC_HEADER.targetUri, fields.url]);
		}
		if (fields.contentType !== undefined) {
			headers.push([WARC_HEADER.contentType, fields.contentType]);
		}
		headers.push(...(fields.headers ?? []));
		headers.push([WARC_HEADER.contentLength, String(content.length)]);

		return new WarcRecord(WARC_VERSION, headers, content);
	}

	/** First value of the header `name`, compared case-insensitively. */
	getHeader(name: string): string | undefined {
		const wanted = name.toLowerCase();
		return this.headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
	}

	get type(): string | undefined {
		return this.getHeader(WARC_HEADER.type);
	}

	get id(): string | undefined {
		return this.getHeader(WARC_HEADER.recordId);
	}

	get date(): string | undefined {
		return this.getHeader(WARC_HEADER.date);
	}

	get url(): string | undefined {
		return this.getHeader(WARC_HEADER.targetUri);
	}

	get contentType(): string | undefined {
		return this.getHeader(WARC_HEADER.contentType);
	}

	get contentLength(): number {
		return Number.parseInt(
			this.getHeader(WARC_HEADER.contentLength) ?? "0",
			10,
		);
	}

	async content(): Promise<RecordContent> {
		if (this.source.kind === "buffered") {
			return [this.contentType, this.source.bytes];
		}

		const { reader } = this.source;
		const bytes = await reader.read(reader.remaining);
		this.source = { kind: "buffered", bytes };
		return [this.contentType, bytes];
	}

	async serialize(): Promise<Uint8Array> {
		const [, content] = await this.content();

		let head = `${this.version}${CRLF}`;
		for (const [name, value] of this.headers) {
			head += `${name}: ${value}${CRLF}`;
		}
		head += CRLF;

		return concatBytes([
			encoder.encode(head),
			content,
			encoder.encode(CRLF + CRLF),
		]);
	}
}

/** Formats a date the way WARC-Date expects: UTC, second precision. */
export function formatWarcDate(date: Date): string {
	return `${date.toISOString().slice(0, 19)}Z`;
}
