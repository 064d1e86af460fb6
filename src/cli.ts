import "dotenv/config";
import fs from "node:fs";
import { writeChangeReports } from "./core/changes/index";
import { loadAppConfig } from "./core/config/index";
import { CatalogService } from "./core/services/catalog-service";
import type { ReportFormat } from "./core/types";
import { formatDuration } from "./core/utils/date";
import { Logger } from "./core/utils/logger";

const USAGE = `Usage:
  npm run cli -- crawl [--fresh] [--record-new]
  npm run cli -- detect [--report]
  npm run cli -- report [--format json|csv] [--limit N] [--out FILE]
  npm run cli -- state

CLI Mode - Bypass queue and run directly

Commands:
  crawl      Crawl the catalogue, resuming from the stored checkpoint
  detect     Re-check every stored entity and log what changed
  report     Print the most recent changes
  state      Print the stored crawl checkpoint

Options:
  --fresh       Discard the checkpoint and start from the first category
  --record-new  Log a new_book change for every entity stored by the crawl
  --report      After detection, save JSON and CSV reports when something changed
  --format      Report format (default: json)
  --limit       Number of changes in the report (default: REPORT_LIMIT)
  --out         Write the report to a file instead of stdout

Note: For queue-based processing, use: npm start`;

function isReportFormat(value: string): value is ReportFormat {
  return value === "json" || value === "csv";
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  const command = argv[0];
  if (!command || hasFlag("--help") || hasFlag("-h")) {
    process.stdout.write(`${USAGE}\n`);
    return command ? 0 : 1;
  }

  const config = loadAppConfig();
  const service = CatalogService.open(config);

  try {
    switch (command) {
      case "crawl": {
        const controller = new AbortController();
        const stop = () => {
          Logger.warn("Interrupt received, stopping after the current page");
          controller.abort();
        };
        process.once("SIGINT", stop);
        process.once("SIGTERM", stop);

        const summary = await service.runCrawl({
          resume: !hasFlag("--fresh"),
          recordNew: hasFlag("--record-new"),
          signal: controller.signal,
        });
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);

        Logger.info(
          `Crawl ${summary.status}: ${summary.stored} stored, ${summary.duplicates} duplicates, ${summary.failed} failed in ${formatDuration(summary.durationMs / 1000)}`,
          { ...summary },
        );
        return summary.status === "completed" ? 0 : 1;
      }

      case "detect": {
        const stats = await service.runChangeDetectionCycle();
        Logger.info(
          `Detection done: ${stats.totalChanges} change(s) across ${stats.changed} of ${stats.checked} entities`,
          { ...stats },
        );
        if (hasFlag("--report") && stats.totalChanges > 0) {
          const changes = await service.recentChanges(config.reportLimit);
          for (const file of writeChangeReports(changes, config.reportsDir)) {
            Logger.info(`Report saved: ${file}`);
          }
        }
        return 0;
      }

      case "report": {
        const format = getArg("--format") ?? "json";
        if (!isReportFormat(format)) {
          Logger.error(`Unknown report format: ${format} (expected json or csv)`);
          return 1;
        }
        const limitArg = getArg("--limit");
        const limit = limitArg === undefined ? config.reportLimit : Number(limitArg);
        if (!Number.isInteger(limit) || limit < 1) {
          Logger.error(`Invalid --limit: ${limitArg}`);
          return 1;
        }
        const report = await service.changeReport(format, limit);
        const out = getArg("--out");
        if (out) {
          fs.writeFileSync(out, report, "utf8");
          Logger.info(`Report saved: ${out}`);
        } else {
          process.stdout.write(`${report}\n`);
        }
        return 0;
      }

      case "state": {
        const state = await service.crawlState();
        const entities = await service.entityCount();
        process.stdout.write(
          `${JSON.stringify({ state, stored_entities: entities }, null, 2)}\n`,
        );
        return 0;
      }

      default:
        Logger.error(`Unknown command: ${command}`);
        process.stdout.write(`${USAGE}\n`);
        return 1;
    }
  } finally {
    await service.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    Logger.error("Command failed", e);
    process.exit(1);
  });
