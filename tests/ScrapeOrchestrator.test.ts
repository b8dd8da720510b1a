import { describe, expect, it, vi } from "vitest";
import { ScrapeOrchestrator, planIds, validateRange } from "../src/core/crawlers/phpbb/ScrapeOrchestrator";
import type { OrchestratorOptions } from "../src/core/crawlers/phpbb/ScrapeOrchestrator";
import { anonymousSession } from "../src/core/crawlers/phpbb/SessionManager";
import { TopicFetcher } from "../src/core/crawlers/phpbb/TopicFetcher";
import { ConfigurationFailure, TransportLost } from "../src/core/errors";
import { readTopics } from "../src/core/report/ReportSerializer";
import { FakeForum, FORUM, makePosts } from "./helpers/fakeForum";
import { MemoryWriter } from "./helpers/memoryWriter";
import { makeHttp, quietLogger } from "./helpers/setup";

function setup(forum: FakeForum, options: OrchestratorOptions = {}) {
  const logger = quietLogger();
  const writer = new MemoryWriter();
  const fetcher = new TopicFetcher(makeHttp(forum), { baseUrl: FORUM });
  const orchestrator = new ScrapeOrchestrator(fetcher, anonymousSession(), writer, options, logger);
  return { logger, writer, orchestrator };
}

function scenarioForum(): FakeForum {
  return new FakeForum()
    .addTopic(47593, { title: "Priority topic", pages: [makePosts(47593, 2)] })
    .addTopic(47591, { title: "Nobody replied", pages: [] })
    .addTopic(47592, { title: "Short one", pages: [makePosts(47592, 1)] });
}

describe("planIds", () => {
  it("puts the priority id first and walks the range by step", () => {
    expect(planIds({ start: 1, end: 10, step: 3 }, 5)).toEqual([5, 1, 4, 7, 10]);
  });

  it("does not repeat a priority id that lies in the range", () => {
    expect(planIds({ start: 1, end: 3, step: 1 }, 2)).toEqual([2, 1, 3]);
    expect(planIds({ start: 1, end: 3, step: 1 })).toEqual([1, 2, 3]);
  });

  it("rejects an invalid priority id", () => {
    expect(() => planIds({ start: 1, end: 3, step: 1 }, -4)).toThrow(ConfigurationFailure);
  });
});

describe("validateRange", () => {
  it.each([
    [{ start: 5, end: 1, step: 1 }, "Topic range start 5 is after end 1"],
    [{ start: -1, end: 1, step: 1 }, "Topic range start must not be negative (-1)"],
    [{ start: 1, end: 4, step: 0 }, "Topic range step must be at least 1 (0)"],
    [{ start: 1.5, end: 4, step: 1 }, "Topic range must be integers, got 1.5..4 step 1"],
  ])("rejects %o", (range, message) => {
    expect(() => validateRange(range)).toThrow(new ConfigurationFailure(message));
  });

  it("accepts a single-id range", () => {
    expect(() => validateRange({ start: 7, end: 7, step: 1 })).not.toThrow();
  });
});

describe("ScrapeOrchestrator", () => {
  it("processes the priority id first and counts every status", async () => {
    const forum = scenarioForum();
    const { orchestrator, writer } = setup(forum);

    const summary = await orchestrator.run({ start: 47590, end: 47592, step: 1 }, 47593);

    expect(forum.topicRequests).toEqual([47593, 47590, 47591, 47592]);
    expect(summary.counts).toEqual({ HAS_CONTENT: 2, EMPTY: 1, NOT_FOUND: 1, FETCH_ERROR: 0, total: 4 });
    expect(summary.topics).toEqual([
      { id: 47593, title: "Priority topic", posts: 2 },
      { id: 47592, title: "Short one", posts: 1 },
    ]);
    expect(summary.failures).toEqual([]);
    expect(summary.writeFailures).toEqual([]);
    expect(summary.authenticated).toBe(false);
    expect(writer.topics.map((t) => [t.topic.id, t.topic.status])).toEqual([
      [47593, "HAS_CONTENT"],
      [47591, "EMPTY"],
      [47592, "HAS_CONTENT"],
    ]);
    expect(writer.summaries).toHaveLength(1);
    expect(writer.summaries[0].summary).toBe(summary);
    expect(writer.combined).toEqual([]);
  });

  it("fails on an invalid range before fetching anything", async () => {
    const forum = scenarioForum();
    const { orchestrator, writer } = setup(forum);

    await expect(orchestrator.run({ start: 47592, end: 47590, step: 1 })).rejects.toBeInstanceOf(
      ConfigurationFailure
    );
    expect(forum.requests).toEqual([]);
    expect(writer.summaries).toEqual([]);
  });

  it("records a failing topic and moves on", async () => {
    const forum = scenarioForum();
    forum.unreachable.add(47591);
    const { orchestrator } = setup(forum);

    const summary = await orchestrator.run({ start: 47591, end: 47592, step: 1 });

    expect(forum.topicRequests).toEqual([47591, 47592]);
    expect(summary.counts).toEqual({ HAS_CONTENT: 1, EMPTY: 0, NOT_FOUND: 0, FETCH_ERROR: 1, total: 2 });
    expect(summary.failures).toEqual([{ id: 47591, reason: "TransportFailure: ETIMEDOUT" }]);
  });

  it("gives up once the transport keeps failing and still writes the summary", async () => {
    const forum = scenarioForum();
    forum.unreachable.add(1);
    forum.unreachable.add(2);
    const { orchestrator, writer } = setup(forum, { maxConsecutiveTransportFailures: 2 });

    const error = await orchestrator.run({ start: 1, end: 5, step: 1 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportLost);
    expect(forum.topicRequests).toEqual([1, 2]);
    expect(writer.summaries).toHaveLength(1);
    if (error instanceof TransportLost) {
      expect(error.message).toBe("2 consecutive transport failures, giving up after topic 2");
      expect(error.summary.counts.FETCH_ERROR).toBe(2);
      expect(error.summary).toBe(writer.summaries[0].summary);
    }
  });

  it("resets the failure streak after a reachable topic", async () => {
    const forum = scenarioForum();
    forum.unreachable.add(1);
    forum.unreachable.add(3);
    const { orchestrator } = setup(forum, { maxConsecutiveTransportFailures: 2 });

    const summary = await orchestrator.run({ start: 1, end: 3, step: 1 });

    expect(summary.counts).toEqual({ HAS_CONTENT: 0, EMPTY: 0, NOT_FOUND: 1, FETCH_ERROR: 2, total: 3 });
  });

  it("writes one combined document when per-topic files are off", async () => {
    const forum = scenarioForum();
    const { orchestrator, writer } = setup(forum, { separateFiles: false });

    await orchestrator.run({ start: 47590, end: 47592, step: 1 }, 47593);

    expect(writer.topics).toEqual([]);
    expect(writer.combined).toHaveLength(1);
    expect(readTopics(writer.combined[0].document).map((t) => t.id)).toEqual([47593, 47591, 47592]);
  });

  it("records a topic the writer rejects and keeps going", async () => {
    const forum = scenarioForum();
    const { orchestrator, writer, logger } = setup(forum);
    vi.spyOn(writer, "writeTopic").mockRejectedValueOnce(new Error("EACCES"));

    const summary = await orchestrator.run({ start: 47590, end: 47592, step: 1 }, 47593);

    expect(forum.topicRequests).toEqual([47593, 47590, 47591, 47592]);
    expect(summary.counts.HAS_CONTENT).toBe(2);
    expect(summary.writeFailures).toEqual([{ id: 47593, reason: "Error: EACCES" }]);
    expect(writer.topics.map((t) => t.topic.id)).toEqual([47591, 47592]);
    expect(writer.summaries).toHaveLength(1);
    expect(writer.summaries[0].document).toContain(
      '  <write_failures count="1">\n    <write_failure id="47593">Error: EACCES</write_failure>\n  </write_failures>'
    );
    expect(logger.error).toHaveBeenCalledWith("Could not write topic 47593: Error: EACCES");
  });

  it("still writes the summary when the combined document fails", async () => {
    const forum = scenarioForum();
    const { orchestrator, writer } = setup(forum, { separateFiles: false });
    vi.spyOn(writer, "writeCombined").mockRejectedValueOnce(new Error("ENOSPC"));

    const summary = await orchestrator.run({ start: 47591, end: 47592, step: 1 });

    expect(writer.combined).toEqual([]);
    expect(summary.writeFailures).toEqual([{ id: null, reason: "Error: ENOSPC" }]);
    expect(writer.summaries[0].summary).toBe(summary);
  });

  it("fails the run when the summary cannot be written", async () => {
    const { orchestrator, writer } = setup(scenarioForum());
    vi.spyOn(writer, "writeSummary").mockRejectedValueOnce(new Error("EROFS"));

    await expect(orchestrator.run({ start: 47591, end: 47591, step: 1 })).rejects.toThrow("EROFS");
  });

  it("logs progress at the configured cadence", async () => {
    const { orchestrator, logger } = setup(new FakeForum(), { progressEvery: 2 });

    await orchestrator.run({ start: 1, end: 4, step: 1 });

    expect(logger.info).toHaveBeenCalledWith(expect.stringMatching(/^Progress: 2\/4 \(50\.0%\)/));
    expect(logger.info).toHaveBeenCalledWith(expect.stringMatching(/^Progress: 4\/4 \(100\.0%\)/));
  });

  it("produces a summary even when nothing was found", async () => {
    const { orchestrator, writer } = setup(new FakeForum());

    const summary = await orchestrator.run({ start: 10, end: 11, step: 1 });

    expect(summary.counts).toEqual({ HAS_CONTENT: 0, EMPTY: 0, NOT_FOUND: 2, FETCH_ERROR: 0, total: 2 });
    expect(writer.topics).toEqual([]);
    expect(writer.summaries).toHaveLength(1);
  });
});
