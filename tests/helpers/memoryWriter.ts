import type { RunSummary, Topic } from "../../src/core/crawlers/phpbb/types";
import type { ReportWriter } from "../../src/types/storage";

/** Keeps rendered documents in memory. */
export class MemoryWriter implements ReportWriter {
  readonly topics: Array<{ topic: Topic; document: string }> = [];
  readonly combined: Array<{ document: string; generatedAt: Date }> = [];
  readonly summaries: Array<{ summary: RunSummary; document: string }> = [];

  async writeTopic(topic: Topic, document: string): Promise<string> {
    this.topics.push({ topic, document });
    return `memory://topic/${topic.id}`;
  }

  async writeCombined(document: string, generatedAt: Date): Promise<string> {
    this.combined.push({ document, generatedAt });
    return "memory://topics";
  }

  async writeSummary(summary: RunSummary, document: string): Promise<string> {
    this.summaries.push({ summary, document });
    return "memory://summary";
  }
}
