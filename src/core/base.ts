import { ContentParser } from "./crawlers/phpbb/ContentParser";
import { parseUtcOffset } from "./crawlers/phpbb/dates";
import { ExistenceClassifier } from "./crawlers/phpbb/ExistenceClassifier";
import { planIds, ScrapeOrchestrator } from "./crawlers/phpbb/ScrapeOrchestrator";
import { SessionManager } from "./crawlers/phpbb/SessionManager";
import { TopicFetcher } from "./crawlers/phpbb/TopicFetcher";
import type { RunSummary } from "./crawlers/phpbb/types";
import { AxiosTransport } from "./http/AxiosTransport";
import { HttpClient } from "./http/HttpClient";
import { RateLimiter } from "./http/RateLimiter";
import type { Transport } from "./http/types";
import { createConsoleLogger } from "./logger";
import type { Logger } from "./logger";
import { FileReportWriter } from "./report/FileReportWriter";
import type { ReportWriter } from "../types/storage";
import type { ScraperOptions } from "../types/scraperOptions";

export interface RunnerDeps {
  transport?: Transport;
  writer?: ReportWriter;
  logger?: Logger;
}

export class ScraperRunner {
  private readonly options: ScraperOptions;
  private readonly logger: Logger;
  private readonly transport: Transport;
  private readonly writer: ReportWriter;

  constructor(options: ScraperOptions, deps: RunnerDeps = {}) {
    this.options = options;
    this.logger = deps.logger ?? createConsoleLogger("scraper", options.logLevel);
    this.transport = deps.transport ?? new AxiosTransport(options.timeoutMs);
    this.writer = deps.writer ?? new FileReportWriter(options.outputDir, this.logger);
  }

  /**
   * Logs in (falling back to anonymous access), then scrapes the configured
   * range and writes the reports.
   */
  public async run(): Promise<RunSummary> {
    try {
      return await this.scrape();
    } catch (error) {
      this.logger.error("Scraping aborted:", error);
      throw error;
    }
  }

  private async scrape(): Promise<RunSummary> {
    const { range, priorityId } = this.options;
    // range errors surface before login
    planIds(range, priorityId);

    this.logger.info("=== Forum topic scraper ===", {
      baseUrl: this.options.baseUrl,
      range,
      priorityId,
      delayMs: this.options.delayMs,
    });

    const limiter = new RateLimiter(this.options.delayMs);
    const http = new HttpClient(
      this.transport,
      limiter,
      {
        userAgent: this.options.userAgent,
        maxRetries: this.options.maxRetries,
        retryBaseMs: this.options.retryBaseMs,
      },
      this.logger
    );

    const session = await new SessionManager(this.options.baseUrl, http, this.logger).login(
      this.options.credentials
    );

    const fetcher = new TopicFetcher(
      http,
      { baseUrl: this.options.baseUrl, maxPages: this.options.maxPages },
      new ExistenceClassifier(),
      new ContentParser({ displayOffsetMinutes: parseUtcOffset(this.options.displayUtcOffset) }),
      this.logger
    );

    const orchestrator = new ScrapeOrchestrator(
      fetcher,
      session,
      this.writer,
      {
        separateFiles: this.options.separateFiles,
        progressEvery: this.options.progressEvery,
        maxConsecutiveTransportFailures: this.options.maxConsecutiveFailures,
      },
      this.logger
    );

    return orchestrator.run(range, priorityId);
  }
}

/**
 * Factory for a one-shot run.
 */
export async function run(options: ScraperOptions, deps?: RunnerDeps): Promise<RunSummary> {
  const runner = new ScraperRunner(options, deps);
  return runner.run();
}
