/**
 * Centralized application configuration
 */

import {
  CRAWL_CONSTANTS,
  DEFAULT_TARGET_URL,
  HTTP_CONSTANTS,
  REPORT_CONSTANTS,
} from "../constants/index";
import type { RetryPolicy } from "../utils/retry";
import { envBool, envFloat, envInt, envStr, type Env } from "./env";

export interface CrawlerConfig {
  targetUrl: string;
  concurrency: number;
  timeoutMs: number;
  userAgent: string;
  retry: RetryPolicy;
  stateType: string;
}

export interface SchedulerConfig {
  enabled: boolean;
  /** Daily run time, "HH:MM" */
  runTime: string;
  timezone: string;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
}

export interface AppConfig {
  dbPath: string;
  crawler: CrawlerConfig;
  scheduler: SchedulerConfig;
  redis: RedisConfig;
  reportsDir: string;
  reportLimit: number;
  healthPort: number;
}

/**
 * Builds the configuration from environment variables
 * @param env - Variable source (default: process.env)
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    dbPath: envStr("DB_PATH", "state/catalog.sqlite", env),
    crawler: {
      targetUrl: envStr("TARGET_URL", DEFAULT_TARGET_URL, env),
      concurrency: Math.max(
        1,
        envInt("CRAWLER_CONCURRENCY", CRAWL_CONSTANTS.DEFAULT_CONCURRENCY, env),
      ),
      timeoutMs: envInt(
        "CRAWLER_TIMEOUT_MS",
        CRAWL_CONSTANTS.DEFAULT_TIMEOUT_MS,
        env,
      ),
      userAgent: envStr("CRAWLER_USER_AGENT", HTTP_CONSTANTS.USER_AGENT, env),
      retry: {
        maxAttempts: Math.max(
          1,
          envInt(
            "CRAWLER_MAX_RETRIES",
            CRAWL_CONSTANTS.DEFAULT_MAX_ATTEMPTS,
            env,
          ),
        ),
        initialDelayMs: envInt(
          "CRAWLER_RETRY_DELAY_MS",
          CRAWL_CONSTANTS.DEFAULT_RETRY_DELAY_MS,
          env,
        ),
        backoffFactor: envFloat(
          "CRAWLER_BACKOFF_FACTOR",
          CRAWL_CONSTANTS.DEFAULT_BACKOFF_FACTOR,
          env,
        ),
      },
      stateType: envStr(
        "CRAWL_STATE_TYPE",
        CRAWL_CONSTANTS.DEFAULT_STATE_TYPE,
        env,
      ),
    },
    scheduler: {
      enabled: envBool("SCHEDULER_ENABLED", true, env),
      runTime: envStr("SCHEDULER_RUN_TIME", "02:00", env),
      timezone: envStr("SCHEDULER_TIMEZONE", "UTC", env),
    },
    redis: {
      host: envStr("REDIS_HOST", "localhost", env),
      port: envInt("REDIS_PORT", 6379, env),
      password: env.REDIS_PASSWORD || undefined,
    },
    reportsDir: envStr("REPORTS_DIR", "reports", env),
    reportLimit: envInt("REPORT_LIMIT", REPORT_CONSTANTS.DEFAULT_LIMIT, env),
    healthPort: envInt("HEALTH_PORT", 8080, env),
  };
}
