#!/usr/bin/env node

import { HELP, parseCliArgs } from "./cli/args";
import { extractPayload } from "./fs/extract";

async function main() {
	const command = parseCliArgs(process.argv.slice(2));

	switch (command.kind) {
		case "help":
			console.log(HELP);
			return;
		case "usage-error":
			console.error(`${command.message}\n`);
			console.log(HELP);
			process.exit(1);
			return;
		case "extract": {
			const payload = await extractPayload(command.location, command.offset, {
				framing: command.framing,
			});
			process.stdout.write(payload);
			return;
		}
	}
}

main().catch((err) => {
	console.error(err);
	process.exit(1);
});
