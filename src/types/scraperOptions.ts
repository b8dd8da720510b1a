import type { Credentials, TopicRange } from "../core/crawlers/phpbb/types";
import type { LogLevel } from "../core/logger";

export interface ScraperOptions {
  baseUrl: string;
  credentials: Credentials;
  /** fetched before the range */
  priorityId?: number;
  range: TopicRange;
  delayMs: number;
  outputDir: string;
  separateFiles: boolean;
  userAgent: string;
  maxPages: number;
  progressEvery: number;
  maxRetries: number;
  retryBaseMs: number;
  timeoutMs: number;
  maxConsecutiveFailures: number;
  /** UTC offset of dates shown only as text, e.g. "+01:00" */
  displayUtcOffset: string;
  logLevel: LogLevel;
}
