import path from "node:path";
import { promises as fs } from "node:fs";
import { getDependencies } from "../src/infrastructure/container";
import { loadConfig } from "../src/infrastructure/config";
import { RedisQueue } from "../src/infrastructure/queue/redisQueue";
import { processHighlightJob } from "../src/application/highlightService";
import { describeIssues, highlightJobPayloadSchema } from "../src/interfaces/schemas";

// Usage examples:
//  - npx tsx scripts/runJob.ts --input=./analysis.json
//  - npx tsx scripts/runJob.ts --input=./analysis.json --enqueue (requires REDIS_URL)
// The input file holds { signal, transcript, options? } as produced by the analysis step.

function parseArgs() {
  const opts: Record<string, string | boolean> = {};
  for (const arg of process.argv.slice(2)) {
    const m = arg.match(/^--([^=]+)(=(.*))?$/);
    if (m) {
      opts[m[1]] = m[3] ?? true;
    }
  }
  return opts;
}

async function main() {
  const args = parseArgs();
  if (typeof args.input !== "string") {
    console.error("Provide --input=<analysis.json> [--enqueue]");
    process.exit(1);
  }

  const inputPath = path.isAbsolute(args.input) ? args.input : path.join(process.cwd(), args.input);
  const payload: unknown = JSON.parse(await fs.readFile(inputPath, "utf-8"));
  const config = loadConfig();

  if (args.enqueue) {
    const parsed = highlightJobPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      console.error(`Invalid input: ${describeIssues(parsed.error)}`);
      process.exit(1);
    }
    const queue = new RedisQueue(config.redisUrl);
    const jobId = await queue.enqueue(parsed.data);
    await queue.close();
    console.log(`Enqueued highlight job ${jobId}.`);
    return;
  }

  const deps = await getDependencies(config);
  const result = await processHighlightJob(payload, config.engine, deps);
  console.log(`Run ${result.runId}: ${result.scenes.length} scenes, ${result.highlights.length} highlights.`);
  for (const [index, highlight] of result.highlights.entries()) {
    const preview = highlight.text.length > 100 ? `${highlight.text.slice(0, 100)}...` : highlight.text;
    console.log(
      `${index + 1}. ${highlight.startTime.toFixed(1)}s - ${highlight.endTime.toFixed(1)}s ` +
        `(${highlight.duration.toFixed(1)}s) score=${highlight.score.toFixed(2)} ${preview}`
    );
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
