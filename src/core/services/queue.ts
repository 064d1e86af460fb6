/**
 * BullMQ queue configuration for crawl and detection jobs
 */

import { Queue, Worker, type Job } from "bullmq";
import { Redis } from "ioredis";
import type { RedisConfig, SchedulerConfig } from "../config/index";
import { dailyCronPattern } from "../config/index";
import { Logger } from "../utils/logger";
import type { CatalogJobData, CatalogJobResult } from "./jobs";

export const QUEUE_NAMES = {
  CATALOG: "catalog-jobs",
} as const;

export const DETECTION_SCHEDULER_ID = "daily-change-detection";

export type CatalogQueue = Queue<CatalogJobData, CatalogJobResult>;
export type CatalogWorker = Worker<CatalogJobData, CatalogJobResult>;

export function createRedisConnection(config: RedisConfig): Redis {
  return new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    maxRetriesPerRequest: null, // Required for BullMQ
  });
}

export function createCatalogQueue(connection: Redis): CatalogQueue {
  return new Queue<CatalogJobData, CatalogJobResult>(QUEUE_NAMES.CATALOG, {
    connection,
  });
}

export function setupWorkerEventHandlers(worker: CatalogWorker): void {
  worker.on("completed", (job) => {
    Logger.info(`Job ${job.id} completed successfully`, {
      kind: job.data.kind,
    });
  });

  worker.on("failed", (job, err) => {
    Logger.error(`Job ${job?.id ?? "unknown"} failed`, err);
  });

  worker.on("error", (err) => {
    Logger.error("Worker error", err);
  });
}

/**
 * Worker processing one job at a time; crawls and detections never overlap
 */
export function createCatalogWorker(
  connection: Redis,
  processor: (job: Job<CatalogJobData, CatalogJobResult>) => Promise<CatalogJobResult>,
  setupEvents = true,
): CatalogWorker {
  const worker = new Worker<CatalogJobData, CatalogJobResult>(
    QUEUE_NAMES.CATALOG,
    async (job) => {
      Logger.info(`Processing catalog job: ${job.id}`, { data: job.data });
      return processor(job);
    },
    {
      connection,
      concurrency: 1,
    },
  );

  if (setupEvents) {
    setupWorkerEventHandlers(worker);
  }

  return worker;
}

/**
 * Creates or updates the daily change-detection job
 */
export async function scheduleRecurringDetection(
  queue: CatalogQueue,
  scheduler: SchedulerConfig,
): Promise<void> {
  const pattern = dailyCronPattern(scheduler.runTime);

  await queue.upsertJobScheduler(
    DETECTION_SCHEDULER_ID,
    {
      pattern,
      tz: scheduler.timezone,
    },
    {
      name: DETECTION_SCHEDULER_ID,
      data: { kind: "detect" },
      opts: {
        removeOnComplete: {
          age: 24 * 3600,
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600,
        },
      },
    },
  );

  Logger.info(
    `Scheduled change detection daily at ${scheduler.runTime} ${scheduler.timezone}`,
    { pattern },
  );
}

export async function removeRecurringDetection(queue: CatalogQueue): Promise<void> {
  await queue.removeJobScheduler(DETECTION_SCHEDULER_ID);
  Logger.info(`Removed scheduled job: ${DETECTION_SCHEDULER_ID}`);
}

/**
 * Queues a single job; failed crawls retry with exponential backoff and
 * resume from their checkpoint
 */
export async function scheduleOneTimeJob(
  queue: CatalogQueue,
  data: CatalogJobData,
  options: { delay?: number } = {},
): Promise<Job<CatalogJobData, CatalogJobResult>> {
  const job = await queue.add(`${data.kind}-onetime`, data, {
    delay: options.delay,
    attempts: 3,
    backoff: {
      type: "exponential",
      delay: 60000,
    },
  });

  Logger.info(`Scheduled one-time ${data.kind} job: ${job.id}`, { data });
  return job;
}

export async function getScheduledJobs(queue: CatalogQueue) {
  return queue.getJobSchedulers();
}
