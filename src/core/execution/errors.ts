/**
 * Errors that end a crawl run
 */

export class FatalCrawlError extends Error {
  constructor(
    message: string,
    public url: string,
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "FatalCrawlError";
  }
}

export class CrawlInterruptedError extends Error {
  constructor(message = "Crawl interrupted") {
    super(message);
    this.name = "CrawlInterruptedError";
  }
}
