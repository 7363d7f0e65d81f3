import { LF } from "../stream/constants";
import { concatBytes, decodeLatin1, stripLineEnding } from "../stream/utils";

const EMPTY = new Uint8Array(0);
const CHUNK_SIZE_PATTERN = /^[0-9a-fA-F]+$/;
const LENGTH_PATTERN = /^\d+$/;

/** Progress of a message through its parts. */
export type HttpMessageState = "start" | "headers" | "body" | "complete";

/** How the end of a message body is found. */
export type BodyFraming =
	| { readonly kind: "none" }
	| { readonly kind: "length"; readonly length: number }
	| { readonly kind: "chunked" }
	| { readonly kind: "close" };

type ChunkPhase = "size" | "data" | "data-end" | "trailer";

/**
 * Incremental decoder for one HTTP/1.x message. Bytes are pushed in with
 * {@link HttpMessage.feed}; the decoded body is available from
 * {@link HttpMessage.body} at any point.
 */
export abstract class HttpMessage {
	state: HttpMessageState = "start";
	startLine: string | undefined;
	headers: [string, string][] = [];
	trailers: [string, string][] = [];
	/** Problems that did not stop decoding. */
	readonly errors: string[] = [];

	private pending: Uint8Array = EMPTY;
	private chunks: Uint8Array[] = [];
	private framing: BodyFraming = { kind: "none" };
	private left = 0;
	private phase: ChunkPhase = "size";

	/** Parses the request or status line. */
	protected abstract parseStartLine(line: string): void;

	/** Decides how the body ends once the headers are known. */
	protected abstract bodyFraming(): BodyFraming;

	/** Called when the header block ends; returning `true` starts a new message head. */
	protected isInterim(): boolean {
		return false;
	}

	get complete(): boolean {
		return this.state === "complete";
	}

	/** Body bytes decoded so far, with chunk framing removed. */
	get body(): Uint8Array {
		return concatBytes(this.chunks);
	}

	/** First value of the header `name`, compared case-insensitively. */
	getHeader(name: string): string | undefined {
		const wanted = name.toLowerCase();
		return this.headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
	}

	/**
	 * Decodes `data`. Returns the bytes that follow the end of the message,
	 * which is empty until the message is complete.
	 */
	feed(data: Uint8Array): Uint8Array {
		if (this.state === "complete") {
			return data;
		}

		this.pending =
			this.pending.length === 0 ? data : concatBytes([this.pending, data]);

		while (!this.complete && this.step()) {}

		if (!this.complete) {
			return EMPTY;
		}

		const rest = this.pending;
		this.pending = EMPTY;
		return rest;
	}

	/**
	 * Marks the end of input. A body delimited by the end of the connection is
	 * complete at this point; any other unfinished message stays incomplete.
	 */
	close(): void {
		if (this.state === "body" && this.framing.kind === "close") {
			this.state = "complete";
		}
	}

	// Advances by one token. Returns false when more input is needed.
	private step(): boolean {
		switch (this.state) {
			case "start":
				return this.stepStart();
			case "headers":
				return this.stepHeaders();
			case "body":
				return this.stepBody();
			case "complete":
				return false;
		}
	}

	private stepStart(): boolean {
		const line = this.takeLine();
		if (line === undefined) return false;

		// Blank lines before the start line are ignored.
		if (line === "") return true;

		this.startLine = line;
		this.parseStartLine(line);
		this.state = "headers";
		return true;
	}

	private stepHeaders(): boolean {
		const line = this.takeLine();
		if (line === undefined) return false;

		if (line !== "") {
			this.addHeader(this.headers, line);
			return true;
		}

		if (this.isInterim()) {
			this.startLine = undefined;
			this.headers = [];
			this.state = "start";
			return true;
		}

		this.framing = this.bodyFraming();
		switch (this.framing.kind) {
			case "none":
				this.state = "complete";
				break;
			case "length":
				this.left = this.framing.length;
				this.state = this.left === 0 ? "complete" : "body";
				break;
			case "chunked":
				this.phase = "size";
				this.state = "body";
				break;
			case "close":
				this.state = "body";
				break;
		}
		return true;
	}

	private stepBody(): boolean {
		switch (this.framing.kind) {
			case "length": {
				if (this.pending.length === 0) return false;
				this.left -= this.takeBody(this.left).length;
				if (this.left === 0) this.state = "complete";
				return true;
			}
			case "close": {
				if (this.pending.length === 0) return false;
				this.takeBody(this.pending.length);
				return true;
			}
			case "chunked":
				return this.stepChunk();
			case "none":
				this.state = "complete";
				return true;
		}
	}

	private stepChunk(): boolean {
		switch (this.phase) {
			case "size": {
				const line = this.takeLine();
				if (line === undefined) return false;

				const size = line.split(";", 1)[0].trim();
				if (!CHUNK_SIZE_PATTERN.test(size)) {
					this.errors.push(`Invalid chunk size "${size}".`);
					this.state = "complete";
					return true;
				}

				this.left = Number.parseInt(size, 16);
				this.phase = this.left === 0 ? "trailer" : "data";
				return true;
			}
			case "data": {
				if (this.pending.length === 0) return false;
				this.left -= this.takeBody(this.left).length;
				if (this.left === 0) this.phase = "data-end";
				return true;
			}
			case "data-end": {
				const line = this.takeLine();
				if (line === undefined) return false;
				if (line !== "") {
					this.errors.push("Missing line break after chunk data.");
				}
				this.phase = "size";
				return true;
			}
			case "trailer": {
				const line = this.takeLine();
				if (line === undefined) return false;
				if (line === "") {
					this.state = "complete";
				} else {
					this.addHeader(this.trailers, line);
				}
				return true;
			}
		}
	}

	private addHeader(target: [string, string][], line: string): void {
		// Folded continuation of the previous value.
		if (line.startsWith(" ") || line.startsWith("\t")) {
			const previous = target.at(-1);
			if (previous) {
				previous[1] = `${previous[1]} ${line.trim()}`;
			} else {
				this.errors.push(`Continuation line without a header: "${line}".`);
			}
			return;
		}

		const colon = line.indexOf(":");
		if (colon === -1) {
			this.errors.push(`Invalid header line "${line}".`);
			return;
		}

		target.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
	}

	/** Removes the next full line from the input, without its line ending. */
	private takeLine(): string | undefined {
		const end = this.pending.indexOf(LF);
		if (end === -1) return undefined;

		const line = this.pending.subarray(0, end + 1);
		this.pending = this.pending.subarray(end + 1);
		return stripLineEnding(decodeLatin1(line));
	}

	private takeBody(limit: number): Uint8Array {
		const size = Math.min(limit, this.pending.length);
		const data = this.pending.subarray(0, size);
		this.pending = this.pending.subarray(size);
		if (data.length > 0) this.chunks.push(data);
		return data;
	}

	/** Framing declared by `Transfer-Encoding` or `Content-Length`, if any. */
	protected declaredFraming(): BodyFraming | undefined {
		const encoding = this.getHeader("Transfer-Encoding");
		const codings = encoding?.toLowerCase().split(",") ?? [];
		if (codings.some((coding) => coding.trim() === "chunked")) {
			return { kind: "chunked" };
		}

		const length = this.getHeader("Content-Length");
		if (length === undefined) {
			return undefined;
		}

		if (!LENGTH_PATTERN.test(length)) {
			this.errors.push(`Invalid Content-Length "${length}".`);
			return undefined;
		}

		return { kind: "length", length: Number(length) };
	}
}

/** Decodes an HTTP request. A request without a declared length has no body. */
export class RequestMessage extends HttpMessage {
	method: string | undefined;
	target: string | undefined;
	version: string | undefined;

	protected parseStartLine(line: string): void {
		const parts = line.split(" ");
		if (parts.length !== 3) {
			this.errors.push(`Invalid request line "${line}".`);
		}
		[this.method, this.target, this.version] = parts;
	}

	protected bodyFraming(): BodyFraming {
		return this.declaredFraming() ?? { kind: "none" };
	}
}

/**
 * Decodes an HTTP response. The request it answers decides whether a body
 * can follow (none does for `HEAD`).
 *
 * @example
 * ```typescript
 * const message = new ResponseMessage(new RequestMessage());
 * const rest = message.feed(bytes);
 * message.close();
 * if (message.complete) console.log(message.status, message.body.length);
 * ```
 */
export class ResponseMessage extends HttpMessage {
	readonly request: RequestMessage;
	version: string | undefined;
	status: number | undefined;
	reason: string | undefined;

	constructor(request: RequestMessage) {
		super();
		this.request = request;
	}

	protected parseStartLine(line: string): void {
		const match = /^(HTTP\/\d+(?:\.\d+)?)\s+(\d{3})(?:\s+(.*))?$/.exec(line);
		if (match === null) {
			this.errors.push(`Invalid status line "${line}".`);
			this.version = undefined;
			this.status = undefined;
			this.reason = undefined;
			return;
		}

		this.version = match[1];
		this.status = Number(match[2]);
		this.reason = match[3] ?? "";
	}

	// 100 Continue and friends precede the real response. 101 ends HTTP.
	protected override isInterim(): boolean {
		return (
			this.status !== undefined &&
			this.status >= 100 &&
			this.status < 200 &&
			this.status !== 101
		);
	}

	protected bodyFraming(): BodyFraming {
		const status = this.status;
		if (
			this.request.method?.toUpperCase() === "HEAD" ||
			(status !== undefined &&
				(status < 200 || status === 204 || status === 304))
		) {
			return { kind: "none" };
		}

		return this.declaredFraming() ?? { kind: "close" };
	}
}
