import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const pretty =
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true },
      }
    : undefined,
});

export interface LogMeta {
  url?: string;
  category?: string;
  page?: number;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error instanceof Error ? error.message : error == null ? undefined : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static entityStored(url: string, title: string, price: number): void {
    this.debug(`Entity stored: ${title}`, { url, title, price });
  }
  static pageProgress(
    category: string,
    page: number,
    urls: number,
    totalStored: number,
  ): void {
    this.info(`Page done: ${category} #${page}`, {
      category,
      page,
      urls,
      totalStored,
    });
  }
  static changeDetected(
    url: string,
    changeType: string,
    oldValue: unknown,
    newValue: unknown,
  ): void {
    this.info(`Change detected: ${changeType}`, {
      url,
      changeType,
      oldValue,
      newValue,
    });
  }
  static fetchGaveUp(url: string, attempts: number, error: Error): void {
    this.warn(`Fetch failed after ${attempts} attempt(s): ${url}`, {
      url,
      attempts,
      error: error.message,
    });
  }
}
