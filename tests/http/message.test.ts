import { describe, expect, it } from "vitest";
import { RequestMessage, ResponseMessage } from "../../src/http";
import { decode, text } from "../fixtures";

const response = () => new ResponseMessage(new RequestMessage());

const CHUNKED =
	"HTTP/1.1 200 OK\r\n" +
	"Transfer-Encoding: chunked\r\n" +
	"\r\n" +
	"5\r\nhello\r\n" +
	"6;ext=1\r\n world\r\n" +
	"0\r\n" +
	"X-Trailer: yes\r\n" +
	"\r\n";

describe("http response decoding", () => {
	it("reads a body delimited by Content-Length", () => {
		const message = response();
		const rest = message.feed(
			text(
				"HTTP/1.1 200 OK\r\nContent-Type: text/html\r\nContent-Length: 5\r\n\r\nhello",
			),
		);

		expect(rest.length).toBe(0);
		expect(message.complete).toBe(true);
		expect(message.status).toBe(200);
		expect(message.reason).toBe("OK");
		expect(message.getHeader("content-type")).toBe("text/html");
		expect(decode(message.body)).toBe("hello");
	});

	it("returns the bytes that follow a complete message", () => {
		const message = response();
		const rest = message.feed(
			text("HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nokextra"),
		);

		expect(decode(message.body)).toBe("ok");
		expect(decode(rest)).toBe("extra");
		expect(decode(message.feed(text("more")))).toBe("more");
	});

	it("decodes chunked bodies with trailers", () => {
		const message = response();
		message.feed(text(CHUNKED));

		expect(message.complete).toBe(true);
		expect(decode(message.body)).toBe("hello world");
		expect(message.trailers).toEqual([["X-Trailer", "yes"]]);
		expect(message.errors).toEqual([]);
	});

	it("accepts input one byte at a time", () => {
		const message = response();
		const bytes = text(CHUNKED);
		let leftover = 0;

		for (const byte of bytes) {
			leftover += message.feed(Uint8Array.of(byte)).length;
		}

		expect(leftover).toBe(0);
		expect(message.complete).toBe(true);
		expect(decode(message.body)).toBe("hello world");
	});

	it("reads until close when no length is declared", () => {
		const message = response();
		message.feed(text("HTTP/1.0 200 OK\r\n\r\nstreamed body"));

		expect(message.complete).toBe(false);
		message.close();
		expect(message.complete).toBe(true);
		expect(decode(message.body)).toBe("streamed body");
	});

	it("stays incomplete when the body is cut short", () => {
		const message = response();
		const rest = message.feed(
			text("HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\nabc"),
		);
		message.close();

		expect(rest.length).toBe(0);
		expect(message.complete).toBe(false);
		expect(decode(message.body)).toBe("abc");
	});

	it("expects no body for 204 responses", () => {
		const message = response();
		message.feed(text("HTTP/1.1 204 No Content\r\nContent-Length: 10\r\n\r\n"));

		expect(message.complete).toBe(true);
		expect(message.body.length).toBe(0);
	});

	it("expects no body in answer to a HEAD request", () => {
		const request = new RequestMessage();
		request.feed(text("HEAD / HTTP/1.1\r\nHost: example.com\r\n\r\n"));
		const message = new ResponseMessage(request);
		message.feed(text("HTTP/1.1 200 OK\r\nContent-Length: 100\r\n\r\n"));

		expect(request.method).toBe("HEAD");
		expect(message.complete).toBe(true);
		expect(message.body.length).toBe(0);
	});

	it("skips interim responses", () => {
		const message = response();
		message.feed(
			text(
				"HTTP/1.1 100 Continue\r\n\r\nHTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok",
			),
		);

		expect(message.status).toBe(200);
		expect(message.complete).toBe(true);
		expect(decode(message.body)).toBe("ok");
	});

	it("tolerates bare line feeds and folded headers", () => {
		const message = response();
		message.feed(
			text("HTTP/1.1 200 OK\nX-Long: first\n second\nContent-Length: 2\n\nok"),
		);

		expect(message.getHeader("X-Long")).toBe("first second");
		expect(decode(message.body)).toBe("ok");
	});

	it("records malformed lines without stopping", () => {
		const message = response();
		message.feed(text("garbage\r\nno colon here\r\n\r\n"));
		message.close();

		expect(message.errors).toEqual([
			'Invalid status line "garbage".',
			'Invalid header line "no colon here".',
		]);
		expect(message.status).toBeUndefined();
		expect(message.complete).toBe(true);
	});

	it("stops at an invalid chunk size", () => {
		const message = response();
		const rest = message.feed(
			text("HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\nzz\r\nleft"),
		);

		expect(message.errors).toEqual(['Invalid chunk size "zz".']);
		expect(message.complete).toBe(true);
		expect(decode(rest)).toBe("left");
	});
});

describe("http request decoding", () => {
	it("reads the request line and a declared body", () => {
		const request = new RequestMessage();
		const rest = request.feed(
			text("POST /submit HTTP/1.1\r\nContent-Length: 3\r\n\r\nabcGET"),
		);

		expect(request.method).toBe("POST");
		expect(request.target).toBe("/submit");
		expect(request.version).toBe("HTTP/1.1");
		expect(decode(request.body)).toBe("abc");
		expect(decode(rest)).toBe("GET");
	});

	it("has no body without a declared length", () => {
		const request = new RequestMessage();
		const rest = request.feed(text("GET / HTTP/1.1\r\n\r\ntrailing"));

		expect(request.complete).toBe(true);
		expect(request.body.length).toBe(0);
		expect(decode(rest)).toBe("trailing");
	});
});
