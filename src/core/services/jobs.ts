/**
 * Job processing, independent of the queue transport
 */

import { writeChangeReports } from "../changes/index";
import type { ChangeDetectionStats, CrawlSummary } from "../types";
import { Logger } from "../utils/logger";
import type { CatalogService } from "./catalog-service";

export type CatalogJobData =
  | { kind: "crawl"; resume?: boolean; recordNew?: boolean }
  | { kind: "detect" };

export interface CatalogJob {
  id?: string;
  data: CatalogJobData;
}

export type CatalogJobResult =
  | { kind: "crawl"; summary: CrawlSummary }
  | { kind: "detect"; stats: ChangeDetectionStats; reports: string[] };

export interface JobOptions {
  reportsDir: string;
  reportLimit: number;
  now?: () => Date;
}

/**
 * Runs one job against the service. Detection runs that found changes
 * leave a JSON and a CSV report in `reportsDir`.
 * @throws Error when a crawl ends interrupted, so the queue can retry it
 */
export async function processCatalogJob(
  service: CatalogService,
  job: CatalogJob,
  options: JobOptions,
): Promise<CatalogJobResult> {
  Logger.info(`Processing job ${job.id ?? "(inline)"}`, { kind: job.data.kind });

  if (job.data.kind === "crawl") {
    const summary = await service.runCrawl({
      resume: job.data.resume ?? true,
      recordNew: job.data.recordNew ?? false,
    });
    if (summary.status === "interrupted") {
      throw new Error(`Crawl interrupted: ${summary.error ?? "unknown error"}`);
    }
    return { kind: "crawl", summary };
  }

  const stats = await service.runChangeDetectionCycle();
  let reports: string[] = [];
  if (stats.totalChanges > 0) {
    const changes = await service.recentChanges(options.reportLimit);
    reports = writeChangeReports(
      changes,
      options.reportsDir,
      (options.now ?? (() => new Date()))(),
    );
    for (const file of reports) Logger.info(`Report saved: ${file}`);
  } else {
    Logger.info("No changes detected");
  }
  return { kind: "detect", stats, reports };
}
