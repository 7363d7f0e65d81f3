import { defineConfig } from "tsdown";

export default defineConfig([
	{
		entry: {
			"stream/index": "./src/stream/index.ts",
			"fs/index": "./src/fs/index.ts",
			cli: "./src/cli.ts",
		},
		platform: "node",
		target: "node20",
		dts: true,
		plugins: [
			{
				name: "strip-tsdoc",
				generateBundle(_options, bundle) {
					for (const [fileName, chunk] of Object.entries(bundle)) {
						if (chunk.type === "chunk" && fileName.endsWith(".js")) {
							chunk.code = chunk.code.replace(
								/\n?\s*\/\*\*[\s\S]*?\*\/\s*\n?/g,
								"\n",
							);
						}
					}
				},
			},
		],
	},
]);
