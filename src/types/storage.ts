import type { RunSummary, Topic } from "../core/crawlers/phpbb/types";

/**
 * Where rendered reports go. Returns an identifier of the stored document
 * (a file path for FileReportWriter).
 */
export interface ReportWriter {
  writeTopic(topic: Topic, document: string): Promise<string>;
  writeCombined(document: string, generatedAt: Date): Promise<string>;
  writeSummary(summary: RunSummary, document: string): Promise<string>;
}
