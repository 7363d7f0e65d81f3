import { describe, expect, it } from "vitest";
import { HELP, parseCliArgs } from "../../src/cli/args";

describe("cli arguments", () => {
	it("shows help", () => {
		expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
		expect(parseCliArgs(["crawl.warc:1", "-h"])).toEqual({ kind: "help" });
		expect(HELP.split("\n")[0]).toBe(
			"warc-payload: print the payload of one archive record",
		);
	});

	it("reads the record locator with automatic framing", () => {
		expect(parseCliArgs(["crawl.warc:10"])).toEqual({
			kind: "extract",
			location: "crawl.warc",
			offset: 10,
			framing: "auto",
		});
	});

	it("accepts an explicit framing", () => {
		expect(parseCliArgs(["--framing", "gzip-file", "crawl.warc.gz:0"])).toEqual({
			kind: "extract",
			location: "crawl.warc.gz",
			offset: 0,
			framing: "gzip-file",
		});
		expect(parseCliArgs(["--framing=plain", "crawl.warc:3"])).toMatchObject({
			framing: "plain",
		});
	});

	it("reports usage errors", () => {
		expect(parseCliArgs(["--framing", "zip", "crawl.warc:1"])).toEqual({
			kind: "usage-error",
			message: "Invalid framing: zip",
		});
		expect(parseCliArgs(["--framing"])).toEqual({
			kind: "usage-error",
			message: "Invalid framing: (missing)",
		});
		expect(parseCliArgs(["--verbose", "crawl.warc:1"])).toEqual({
			kind: "usage-error",
			message: "Unknown option: --verbose",
		});
		expect(parseCliArgs([])).toEqual({
			kind: "usage-error",
			message: "Expected exactly one <archive>:<offset> argument.",
		});
		expect(parseCliArgs(["crawl.warc"])).toEqual({
			kind: "usage-error",
			message: 'Expected <archive>:<offset>, got "crawl.warc".',
		});
	});
});
