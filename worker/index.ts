import { Worker } from "bullmq";
import IORedis from "ioredis";
import { getQueueName, SELECT_HIGHLIGHTS_JOB } from "../src/infrastructure/queue/redisQueue";
import { getDependencies } from "../src/infrastructure/container";
import { loadConfig } from "../src/infrastructure/config";
import { processHighlightJob } from "../src/application/highlightService";
import type { HighlightRunResult } from "../src/domain/types";

async function startWorker() {
  const config = loadConfig();
  const deps = await getDependencies(config);
  const connection = new IORedis(config.redisUrl, { maxRetriesPerRequest: null });

  const worker = new Worker<unknown, HighlightRunResult>(
    getQueueName(),
    async (job) => {
      if (job.name !== SELECT_HIGHLIGHTS_JOB) {
        throw new Error(`Unknown job type: ${job.name}`);
      }
      return processHighlightJob(job.data, config.engine, deps);
    },
    { connection, concurrency: config.workerConcurrency }
  );

  worker.on("failed", (job, err) => {
    console.error("Job failed", job?.id, err);
  });

  worker.on("error", (err) => {
    console.error("Worker error", err);
  });

  setupMemoryGuard(worker, config.workerMaxRssMb);

  const shutdown = async () => {
    try {
      await worker.close();
      await connection.quit();
      process.exit(0);
    } catch (err) {
      console.error("Shutdown failed", err);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  console.log(`Highlight worker running (pid=${process.pid}, concurrency=${config.workerConcurrency}).`);
}

function setupMemoryGuard(worker: Worker<unknown, HighlightRunResult>, limitMb: number) {
  if (limitMb <= 0) {
    return;
  }
  const resumeThreshold = limitMb * 0.85;
  let paused = false;

  const interval = setInterval(() => {
    const rssMb = process.memoryUsage().rss / 1024 / 1024;
    if (!paused && rssMb >= limitMb) {
      paused = true;
      worker
        .pause()
        .then(() => console.warn(`Paused new jobs (RSS ${rssMb.toFixed(1)}MB >= ${limitMb}MB).`))
        .catch((err) => console.error("Failed to pause worker", err));
    } else if (paused && rssMb <= resumeThreshold) {
      paused = false;
      worker.resume();
      console.info(`Resumed new jobs (RSS ${rssMb.toFixed(1)}MB <= ${resumeThreshold.toFixed(1)}MB).`);
    }
  }, 5000);

  interval.unref();
}

startWorker().catch((err) => {
  console.error(err);
  process.exit(1);
});
