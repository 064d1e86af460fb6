/**
 * Scheduler Entry Point
 * Upserts the recurring detection job, optionally queues a one-time job,
 * then exits
 */

import "dotenv/config";
import { loadAppConfig, nextRunAt } from "./core/config/index";
import {
  createCatalogQueue,
  createRedisConnection,
  getScheduledJobs,
  removeRecurringDetection,
  scheduleOneTimeJob,
  scheduleRecurringDetection,
} from "./core/services/queue";
import { Logger } from "./core/utils/logger";

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  if (argv.includes("--help") || argv.includes("-h")) {
    process.stdout.write(`
Scheduler - Configure recurring catalogue jobs

Usage:
  npm run scheduler                        # Upsert the daily detection job
  npm run scheduler -- --time 03:30        # Override SCHEDULER_RUN_TIME
  npm run scheduler -- --crawl-now         # Also queue a resuming crawl
  npm run scheduler -- --detect-now        # Also queue a detection run
  npm run scheduler -- --remove            # Remove the daily detection job

Environment Variables:
  SCHEDULER_ENABLED      Upsert the daily job (default: true)
  SCHEDULER_RUN_TIME     Daily run time, HH:MM (default: 02:00)
  SCHEDULER_TIMEZONE     Time zone of the run time (default: UTC)
  REDIS_HOST             Redis host (default: localhost)
  REDIS_PORT             Redis port (default: 6379)
  REDIS_PASSWORD         Redis password (optional)
`);
    return 0;
  }

  const config = loadAppConfig();
  const timeIndex = argv.indexOf("--time");
  const scheduler = {
    ...config.scheduler,
    runTime: timeIndex >= 0 ? argv[timeIndex + 1] ?? "" : config.scheduler.runTime,
  };

  const connection = createRedisConnection(config.redis);
  const queue = createCatalogQueue(connection);

  try {
    if (argv.includes("--remove")) {
      await removeRecurringDetection(queue);
    } else if (scheduler.enabled) {
      await scheduleRecurringDetection(queue, scheduler);
      if (scheduler.timezone === "UTC") {
        Logger.info(
          `Next detection run: ${nextRunAt(new Date(), scheduler.runTime).toISOString()}`,
        );
      }
    } else {
      Logger.warn("Scheduler is disabled in settings");
    }

    if (argv.includes("--crawl-now")) {
      await scheduleOneTimeJob(queue, { kind: "crawl", resume: true });
    }
    if (argv.includes("--detect-now")) {
      await scheduleOneTimeJob(queue, { kind: "detect" });
    }

    const scheduled = await getScheduledJobs(queue);
    Logger.info(`Total scheduled jobs: ${scheduled.length}`);
    for (const s of scheduled) {
      Logger.info(`  - ${s.key}: ${s.pattern ?? s.every ?? "?"}`);
    }
  } finally {
    await queue.close();
    await connection.quit();
  }

  Logger.info("Scheduler completed");
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    Logger.error("Scheduler failed", e);
    process.exit(1);
  });
