import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { Topic, RunSummary } from "../crawlers/phpbb/types";
import type { Logger } from "../logger";
import type { ReportWriter } from "../../types/storage";

const MAX_TITLE_SLUG = 60;

/** "Volby 2025: kandidátka" -> "volby_2025_kandidatka" */
export function sanitizeTitle(title: string): string {
  return title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase()
    .slice(0, MAX_TITLE_SLUG)
    .replace(/_+$/, "");
}

export function topicFileName(topic: Pick<Topic, "id" | "title">): string {
  const slug = sanitizeTitle(topic.title);
  return slug ? `topic_${topic.id}_${slug}.xml` : `topic_${topic.id}.xml`;
}

/** local time as YYYYMMDD_HHMMSS */
export function runStamp(date: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${p(date.getMonth() + 1)}${p(date.getDate())}_` +
    `${p(date.getHours())}${p(date.getMinutes())}${p(date.getSeconds())}`
  );
}

export class FileReportWriter implements ReportWriter {
  private ready?: Promise<string | undefined>;

  constructor(
    private readonly outputDir: string,
    private readonly logger?: Logger
  ) {}

  async writeTopic(topic: Topic, document: string): Promise<string> {
    const file = await this.write(topicFileName(topic), document);
    this.logger?.info(
      `Topic ${topic.id} saved to ${file} (${(Buffer.byteLength(document) / 1024).toFixed(1)} KB)`
    );
    return file;
  }

  async writeCombined(document: string, generatedAt: Date): Promise<string> {
    const file = await this.write(`topics_${runStamp(generatedAt)}.xml`, document);
    this.logger?.info(`Topics saved to ${file}`);
    return file;
  }

  async writeSummary(summary: RunSummary, document: string): Promise<string> {
    const file = await this.write(
      `scraping_summary_${runStamp(new Date(summary.finishedAt))}.xml`,
      document
    );
    this.logger?.info(`Summary file saved to ${file}`);
    return file;
  }

  private async write(name: string, document: string): Promise<string> {
    if (!this.ready) this.ready = mkdir(this.outputDir, { recursive: true });
    await this.ready;
    const file = path.join(this.outputDir, name);
    await writeFile(file, document, "utf-8");
    return file;
  }
}
