import { ConfigurationFailure, describeError, TransportFailure, TransportLost } from "../../errors";
import type { Logger } from "../../logger";
import { renderSummary, renderTopic, renderTopics } from "../../report/ReportSerializer";
import type { ReportWriter } from "../../../types/storage";
import { toIsoWithOffset } from "./dates";
import type { TopicFetcher } from "./TopicFetcher";
import type {
  RunSummary,
  ScrapeOutcome,
  SessionContext,
  StatusCounts,
  Topic,
  TopicRange,
} from "./types";

export interface OrchestratorOptions {
  /** one file per topic, otherwise a single combined document */
  separateFiles?: boolean;
  /** log progress every N ids */
  progressEvery?: number;
  /** consecutive transport failures that count as losing the transport */
  maxConsecutiveTransportFailures?: number;
}

export function validateRange(range: TopicRange): void {
  const { start, end, step } = range;
  if (![start, end, step].every(Number.isInteger)) {
    throw new ConfigurationFailure(`Topic range must be integers, got ${start}..${end} step ${step}`);
  }
  if (start < 0) throw new ConfigurationFailure(`Topic range start must not be negative (${start})`);
  if (start > end) throw new ConfigurationFailure(`Topic range start ${start} is after end ${end}`);
  if (step < 1) throw new ConfigurationFailure(`Topic range step must be at least 1 (${step})`);
}

/** Priority id first, then the range in ascending order without repeating it. */
export function planIds(range: TopicRange, priorityId?: number): number[] {
  validateRange(range);
  if (priorityId !== undefined && (!Number.isInteger(priorityId) || priorityId < 0)) {
    throw new ConfigurationFailure(`Invalid priority topic id ${priorityId}`);
  }
  const ids: number[] = priorityId !== undefined ? [priorityId] : [];
  for (let id = range.start; id <= range.end; id += range.step) {
    if (id !== priorityId) ids.push(id);
  }
  return ids;
}

function emptyCounts(): StatusCounts {
  return { HAS_CONTENT: 0, EMPTY: 0, NOT_FOUND: 0, FETCH_ERROR: 0, total: 0 };
}

/**
 * Walks the planned ids one at a time. A failing topic becomes a failure
 * record and the run moves on, as does a topic document the writer rejects.
 * Only configuration errors, a lost transport and a failed summary write end
 * the run early.
 */
export class ScrapeOrchestrator {
  private readonly separateFiles: boolean;
  private readonly progressEvery: number;
  private readonly maxConsecutiveTransportFailures: number;

  constructor(
    private readonly fetcher: TopicFetcher,
    private readonly session: SessionContext,
    private readonly writer: ReportWriter,
    options: OrchestratorOptions = {},
    private readonly logger?: Logger
  ) {
    this.separateFiles = options.separateFiles ?? true;
    this.progressEvery = options.progressEvery ?? 10;
    this.maxConsecutiveTransportFailures = options.maxConsecutiveTransportFailures ?? 20;
  }

  async run(range: TopicRange, priorityId?: number): Promise<RunSummary> {
    const ids = planIds(range, priorityId);
    const startedAt = new Date();
    const outcomes: ScrapeOutcome[] = [];
    const kept: Topic[] = [];
    const writeFailures: RunSummary["writeFailures"] = [];
    let consecutiveTransportFailures = 0;

    this.logger?.info(
      `Starting scrape of ${ids.length} topics (${this.session.authenticated ? "logged in" : "anonymous"})`
    );

    for (const [index, id] of ids.entries()) {
      const outcome = await this.scrapeOne(id);
      outcomes.push(outcome);

      if (outcome.kind === "topic") {
        consecutiveTransportFailures = 0;
        const { topic } = outcome;
        this.logger?.info(`[${index + 1}/${ids.length}] topic ${id}: ${topic.status} (${topic.posts.length} posts)`);
        if (topic.status === "HAS_CONTENT" || topic.status === "EMPTY") {
          if (this.separateFiles) {
            await this.store(id, writeFailures, () => this.writer.writeTopic(topic, renderTopic(topic)));
          } else {
            kept.push(topic);
          }
        }
      } else {
        this.logger?.warn(`[${index + 1}/${ids.length}] topic ${id}: failed - ${outcome.reason}`);
        if (outcome.transport) consecutiveTransportFailures += 1;
        else consecutiveTransportFailures = 0;
      }

      if ((index + 1) % this.progressEvery === 0) {
        this.logProgress(index + 1, ids.length, startedAt, outcomes);
      }

      if (consecutiveTransportFailures >= this.maxConsecutiveTransportFailures) {
        const summary = await this.finish(startedAt, outcomes, kept, writeFailures);
        throw new TransportLost(
          `${consecutiveTransportFailures} consecutive transport failures, giving up after topic ${id}`,
          summary
        );
      }
    }

    const summary = await this.finish(startedAt, outcomes, kept, writeFailures);
    this.logger?.info(
      `Scraping completed in ${(summary.elapsedMs / 60000).toFixed(1)} min: ` +
        `${summary.counts.HAS_CONTENT} with content, ${summary.counts.EMPTY} empty, ` +
        `${summary.counts.NOT_FOUND} not found, ${summary.counts.FETCH_ERROR} errors`
    );
    return summary;
  }

  private async scrapeOne(id: number): Promise<ScrapeOutcome & { transport?: boolean }> {
    try {
      return { kind: "topic", topic: await this.fetcher.fetch(id, this.session) };
    } catch (error) {
      return {
        kind: "failure",
        id,
        reason: describeError(error),
        transport: error instanceof TransportFailure,
      };
    }
  }

  /** Runs one document write; a rejection is logged and recorded against `id`. */
  private async store(
    id: number | null,
    writeFailures: RunSummary["writeFailures"],
    write: () => Promise<string>
  ): Promise<void> {
    try {
      await write();
    } catch (error) {
      const reason = describeError(error);
      this.logger?.error(`Could not write ${id === null ? "combined document" : `topic ${id}`}: ${reason}`);
      writeFailures.push({ id, reason });
    }
  }

  private async finish(
    startedAt: Date,
    outcomes: ScrapeOutcome[],
    kept: Topic[],
    writeFailures: RunSummary["writeFailures"]
  ): Promise<RunSummary> {
    const finishedAt = new Date();

    if (!this.separateFiles && kept.length > 0) {
      await this.store(null, writeFailures, () =>
        this.writer.writeCombined(renderTopics(kept, toIsoWithOffset(finishedAt)), finishedAt)
      );
    }
    const summary = summarize(outcomes, startedAt, finishedAt, this.session.authenticated, writeFailures);
    await this.writer.writeSummary(summary, renderSummary(summary));
    return summary;
  }

  private logProgress(done: number, total: number, startedAt: Date, outcomes: ScrapeOutcome[]): void {
    const elapsed = Date.now() - startedAt.getTime();
    const remaining = (total - done) * (elapsed / done);
    const counts = countOutcomes(outcomes);
    this.logger?.info(
      `Progress: ${done}/${total} (${((done / total) * 100).toFixed(1)}%), ` +
        `time ${(elapsed / 60000).toFixed(1)}min, remaining ~${(remaining / 60000).toFixed(1)}min, ` +
        `content=${counts.HAS_CONTENT} empty=${counts.EMPTY} notFound=${counts.NOT_FOUND} errors=${counts.FETCH_ERROR}`
    );
  }
}

export function countOutcomes(outcomes: readonly ScrapeOutcome[]): StatusCounts {
  const counts = emptyCounts();
  for (const o of outcomes) {
    counts[o.kind === "topic" ? o.topic.status : "FETCH_ERROR"] += 1;
    counts.total += 1;
  }
  return counts;
}

export function summarize(
  outcomes: readonly ScrapeOutcome[],
  startedAt: Date,
  finishedAt: Date,
  authenticated: boolean,
  writeFailures: RunSummary["writeFailures"] = []
): RunSummary {
  const topics: RunSummary["topics"] = [];
  const failures: RunSummary["failures"] = [];
  for (const o of outcomes) {
    if (o.kind === "failure") failures.push({ id: o.id, reason: o.reason });
    else if (o.topic.status === "HAS_CONTENT") {
      topics.push({ id: o.topic.id, title: o.topic.title, posts: o.topic.posts.length });
    }
  }
  return {
    startedAt: toIsoWithOffset(startedAt),
    finishedAt: toIsoWithOffset(finishedAt),
    elapsedMs: finishedAt.getTime() - startedAt.getTime(),
    authenticated,
    counts: countOutcomes(outcomes),
    topics,
    failures,
    writeFailures: [...writeFailures],
  };
}
