import { generateFixtures } from "./fixtures/generate";
import { runReadBenchmarks } from "./read.bench";

async function main() {
	console.log("Starting benchmark run...");

	const archives = await generateFixtures();
	await runReadBenchmarks(archives);

	console.log("Benchmark run complete.");
}

main().catch((err) => {
	console.error("Benchmark failed:", err);
	process.exit(1);
});
