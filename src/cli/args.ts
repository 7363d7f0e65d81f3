import { LocatorError } from "../fs/errors";
import { parseLocator } from "../fs/locator";
import type { Framing } from "../stream/types";

export const HELP = `
warc-payload: print the payload of one archive record

Usage:
  warc-payload [options] <archive>:<offset>

Options:
  --framing <mode>   auto, plain, gzip-record or gzip-file (default: auto)
  --help             Show this help message
`.trim();

const FRAMINGS = ["auto", "plain", "gzip-record", "gzip-file"] as const;

export type CliCommand =
	| { readonly kind: "help" }
	| { readonly kind: "usage-error"; readonly message: string }
	| {
			readonly kind: "extract";
			readonly location: string;
			readonly offset: number;
			readonly framing: Framing | "auto";
	  };

/** Interprets the arguments that follow the program name. */
export function parseCliArgs(args: readonly string[]): CliCommand {
	let framing: Framing | "auto" = "auto";
	const positional: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			return { kind: "help" };
		}

		if (arg === "--framing" || arg.startsWith("--framing=")) {
			const value = arg === "--framing" ? args[++i] : arg.slice(10);
			const mode = FRAMINGS.find((candidate) => candidate === value);
			if (mode === undefined) {
				return {
					kind: "usage-error",
					message: `Invalid framing: ${value ?? "(missing)"}`,
				};
			}
			framing = mode;
			continue;
		}

		if (arg.startsWith("--")) {
			return { kind: "usage-error", message: `Unknown option: ${arg}` };
		}

		positional.push(arg);
	}

	if (positional.length !== 1) {
		return {
			kind: "usage-error",
			message: "Expected exactly one <archive>:<offset> argument.",
		};
	}

	try {
		const { location, offset } = parseLocator(positional[0]);
		return { kind: "extract", location, offset, framing };
	} catch (error) {
		if (error instanceof LocatorError) {
			return { kind: "usage-error", message: error.message };
		}
		throw error;
	}
}
