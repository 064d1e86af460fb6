/**
 * HTTP client shared by every worker of a run
 */

import { HTTP_CONSTANTS } from "../constants/index";
import { Logger } from "../utils/logger";
import {
  DEFAULT_RETRY_POLICY,
  RetryError,
  toError,
  withRetry,
  type RetryPolicy,
} from "../utils/retry";

export class FetchError extends Error {
  constructor(
    message: string,
    public url: string,
    public status: number | null = null,
    public attempts = 1,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export type FetchOutcome =
  | { ok: true; url: string; body: string; attempts: number }
  | { ok: false; url: string; error: FetchError; attempts: number };

export type FetchImpl = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

export interface HttpClientOptions {
  userAgent?: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  /** Transport (default: global fetch) */
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
}

export class HttpClient {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchImpl;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions = {}) {
    this.userAgent = options.userAgent ?? HTTP_CONSTANTS.USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep;
  }

  /**
   * Single GET without retries
   * @throws FetchError on transport failure, timeout or non-2xx status
   */
  async fetchOnce(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        redirect: "follow",
        headers: {
          "user-agent": this.userAgent,
          accept: HTTP_CONSTANTS.ACCEPT_HEADER,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new FetchError(toError(error).message, url);
    }
    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(`HTTP ${response.status} for ${url}`, url, response.status);
    }
    return response.text();
  }

  /**
   * GET with the client's retry policy. Never throws: exhausted attempts
   * come back as `{ ok: false }`.
   */
  async fetch(url: string): Promise<FetchOutcome> {
    let attempts = 0;
    try {
      const body = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.fetchOnce(url);
        },
        this.retry,
        {
          sleep: this.sleep,
          onRetry: (error, attempt, delayMs) =>
            Logger.debug(`Retrying ${url} in ${delayMs}ms`, {
              url,
              attempt,
              error: error.message,
            }),
        },
      );
      return { ok: true, url, body, attempts };
    } catch (error) {
      const cause = error instanceof RetryError ? error.originalError : toError(error);
      const failure =
        cause instanceof FetchError
          ? cause
          : new FetchError(cause.message, url);
      failure.attempts = attempts;
      Logger.fetchGaveUp(url, attempts, failure);
      return { ok: false, url, error: failure, attempts };
    }
  }
}
