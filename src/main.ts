#!/usr/bin/env node
import dotenv from "dotenv";
import { loadConfig } from "./config";
import type { CliOverrides } from "./config";
import { run } from "./core/base";
import { ConfigurationFailure, TransportLost } from "./core/errors";

function printHelp(): void {
  const msg = `Usage: forum-topic-scraper [options]\n\nOptions:\n  -s, --start        first topic id (TOPIC_START)\n  -e, --end          last topic id (TOPIC_END)\n      --step         id step (TOPIC_STEP, default 1)\n  -p, --priority     topic URL or id fetched first (PRIORITY_URL)\n  -o, --output       output directory (OUTPUT_DIR, default data)\n  -d, --delay        delay between requests in ms (REQUEST_DELAY_MS, default 2000)\n      --single-file  write all topics into one document\n  -h, --help         show this help\n\nCredentials come from FORUM_USERNAME / FORUM_PASSWORD (.env is loaded).`;
  console.log(msg);
}

export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === "-h" || a === "--help") {
      out.help = true;
      continue;
    }
    if (a.startsWith("-")) {
      const key = a.replace(/^--?/, "");
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        out[key] = next;
        i += 1;
      } else {
        out[key] = true;
      }
    }
  }
  return out;
}

export function toOverrides(args: Record<string, string | boolean>): Partial<CliOverrides> {
  const pick = (...keys: string[]): string | undefined => {
    for (const k of keys) {
      const v = args[k];
      if (typeof v === "string") return v;
    }
    return undefined;
  };
  return {
    start: pick("start", "s"),
    end: pick("end", "e"),
    step: pick("step"),
    priority: pick("priority", "p"),
    output: pick("output", "o"),
    delay: pick("delay", "d"),
    singleFile: args["single-file"] === true ? true : undefined,
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    process.exit(0);
  }

  dotenv.config();

  try {
    const options = loadConfig(process.env, toOverrides(args));
    const summary = await run(options);
    console.log(
      `Done: ${summary.counts.HAS_CONTENT}/${summary.counts.total} topics with content, ` +
        `files in ${options.outputDir}`
    );
  } catch (error) {
    if (error instanceof ConfigurationFailure) {
      console.error(`${error.message}\n`);
      printHelp();
    } else if (error instanceof TransportLost) {
      console.error(`${error.message}; partial summary written`);
    } else {
      console.error("Scraping failed with an unexpected error:", error);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
