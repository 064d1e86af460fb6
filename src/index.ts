/**
 * Main Entry Point
 * Starts the BullMQ worker and upserts the recurring detection job.
 * This is the primary way to run the application in queue mode.
 */

import "dotenv/config";
import http from "node:http";
import { loadAppConfig } from "./core/config/index";
import { CatalogService } from "./core/services/catalog-service";
import { processCatalogJob } from "./core/services/jobs";
import {
  createCatalogQueue,
  createCatalogWorker,
  createRedisConnection,
  scheduleRecurringDetection,
} from "./core/services/queue";
import { Logger } from "./core/utils/logger";

const config = loadAppConfig();

async function main() {
  Logger.info("Starting catalog watcher");

  const connection = createRedisConnection(config.redis);
  const queue = createCatalogQueue(connection);
  const service = CatalogService.open(config);

  if (config.scheduler.enabled) {
    await scheduleRecurringDetection(queue, config.scheduler);
  } else {
    Logger.warn("Scheduler is disabled; only queued jobs will run");
  }

  const worker = createCatalogWorker(connection, (job) =>
    processCatalogJob(
      service,
      { id: job.id, data: job.data },
      { reportsDir: config.reportsDir, reportLimit: config.reportLimit },
    ),
  );

  // Graceful shutdown
  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    Logger.info("Graceful shutdown initiated");
    setTimeout(() => {
      Logger.warn("Forced exit after 5s");
      process.exit(1);
    }, 5000).unref();
    await worker.close();
    await queue.close();
    await service.close();
    await connection.quit();
    server.close(() => {
      Logger.info("Health server closed");
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((e) => {
      Logger.error("Shutdown failed", e);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  Logger.info("Application is ready and listening for jobs");
}

// Health check server
const server = http.createServer((req, res) => {
  if (req.url === "/healthz") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("ok");
  } else {
    res.writeHead(404);
    res.end();
  }
});

server.listen(config.healthPort, () => {
  Logger.info("Health check endpoint listening on /healthz", {
    port: config.healthPort,
  });
});

main().catch((e) => {
  Logger.error("Startup failed", e);
  process.exit(1);
});
