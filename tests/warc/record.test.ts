import { describe, expect, it } from "vitest";
import { formatWarcDate, WarcRecord } from "../../src/warc";
import { decode } from "../fixtures";

describe("warc record", () => {
	const record = WarcRecord.create({
		type: "resource",
		url: "http://example.com/",
		contentType: "text/plain",
		content: "hi",
		id: "<urn:uuid:test>",
		date: new Date("2024-03-01T12:00:00.123Z"),
		headers: [["WARC-Payload-Digest", "sha1:TEST"]],
	});

	it("serializes headers in order followed by the content and delimiter", async () => {
		expect(decode(await record.serialize())).toBe(
			"WARC/1.0\r\n" +
				"WARC-Type: resource\r\n" +
				"WARC-Record-ID: <urn:uuid:test>\r\n" +
				"WARC-Date: 2024-03-01T12:00:00Z\r\n" +
				"WARC-Target-URI: http://example.com/\r\n" +
				"Content-Type: text/plain\r\n" +
				"WARC-Payload-Digest: sha1:TEST\r\n" +
				"Content-Length: 2\r\n" +
				"\r\n" +
				"hi\r\n\r\n",
		);
	});

	it("looks headers up without regard to case", () => {
		expect(record.getHeader("content-length")).toBe("2");
		expect(record.getHeader("warc-payload-digest")).toBe("sha1:TEST");
		expect(record.getHeader("X-Missing")).toBeUndefined();
		expect(record.contentLength).toBe(2);
		expect(record.type).toBe("resource");
		expect(record.date).toBe("2024-03-01T12:00:00Z");
	});

	it("generates a urn:uuid identifier by default", () => {
		const fresh = WarcRecord.create({ type: "metadata", content: "" });

		expect(fresh.id).toMatch(/^<urn:uuid:[0-9a-f-]{36}>$/);
		expect(fresh.url).toBeUndefined();
		expect(fresh.contentType).toBeUndefined();
	});

	it("returns in-memory content with its type", async () => {
		const [contentType, content] = await record.content();

		expect(contentType).toBe("text/plain");
		expect(decode(content)).toBe("hi");
	});

	it("formats dates to the second in UTC", () => {
		expect(formatWarcDate(new Date(Date.UTC(2023, 0, 2, 3, 4, 5, 678)))).toBe(
			"2023-01-02T03:04:05Z",
		);
	});
});
