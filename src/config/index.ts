import { z } from "zod";
import { ConfigurationFailure } from "../core/errors";
import type { ScraperOptions } from "../types/scraperOptions";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const int = (defaultValue: number) =>
  z.coerce.number().int().default(defaultValue);

const bool = (defaultValue: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(defaultValue)
    .transform((val) => val === "true" || val === "1" || val === "yes");

const configSchema = z
  .object({
    baseUrl: z.string().url().default("https://forum.pirati.cz"),
    username: z.string().default(""),
    password: z.string().default(""),
    priorityUrl: z.string().optional(),
    range: z.object({
      start: z.coerce.number().int().nonnegative(),
      end: z.coerce.number().int().nonnegative(),
      step: int(1).pipe(z.number().int().positive()),
    }),
    delayMs: int(2000).pipe(z.number().nonnegative()),
    outputDir: z.string().min(1).default("data"),
    separateFiles: bool("true"),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    maxPages: int(100).pipe(z.number().positive()),
    progressEvery: int(10).pipe(z.number().positive()),
    maxRetries: int(3).pipe(z.number().nonnegative()),
    retryBaseMs: int(1000).pipe(z.number().nonnegative()),
    timeoutMs: int(15000).pipe(z.number().positive()),
    maxConsecutiveFailures: int(20).pipe(z.number().positive()),
    displayUtcOffset: z
      .string()
      .regex(/^[+-]\d{2}:?\d{2}$/, "expected an offset like +01:00")
      .default("+01:00"),
    logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  })
  .refine((c) => c.range.start <= c.range.end, {
    message: "range start must not be after range end",
    path: ["range"],
  });

/** Reads `t` from a viewtopic.php URL; a bare number is taken as the id. */
export function topicIdFromUrl(url: string): number {
  if (/^\d+$/.test(url.trim())) return Number(url.trim());
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationFailure(`Priority URL is not a URL: ${url}`);
  }
  const t = parsed.searchParams.get("t");
  if (t === null) throw new ConfigurationFailure(`Priority URL has no topic id (t parameter): ${url}`);
  if (!/^\d+$/.test(t)) throw new ConfigurationFailure(`Priority URL has a non-numeric topic id: ${url}`);
  return Number(t);
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<CliOverrides> = {}
): ScraperOptions {
  const fromEnv = (name: string) => blankToUndefined(env[name]);

  const raw = {
    baseUrl: fromEnv("FORUM_BASE_URL"),
    username: fromEnv("FORUM_USERNAME"),
    password: fromEnv("FORUM_PASSWORD"),
    priorityUrl: overrides.priority ?? fromEnv("PRIORITY_URL"),
    range: {
      start: overrides.start ?? fromEnv("TOPIC_START"),
      end: overrides.end ?? fromEnv("TOPIC_END"),
      step: overrides.step ?? fromEnv("TOPIC_STEP"),
    },
    delayMs: overrides.delay ?? fromEnv("REQUEST_DELAY_MS"),
    outputDir: overrides.output ?? fromEnv("OUTPUT_DIR"),
    separateFiles: overrides.singleFile === true ? "false" : fromEnv("SEPARATE_FILES"),
    userAgent: fromEnv("USER_AGENT"),
    maxPages: fromEnv("MAX_PAGES"),
    progressEvery: fromEnv("PROGRESS_EVERY"),
    maxRetries: fromEnv("MAX_RETRIES"),
    retryBaseMs: fromEnv("RETRY_BASE_MS"),
    timeoutMs: fromEnv("REQUEST_TIMEOUT_MS"),
    maxConsecutiveFailures: fromEnv("MAX_CONSECUTIVE_FAILURES"),
    displayUtcOffset: fromEnv("DISPLAY_UTC_OFFSET"),
    logLevel: fromEnv("LOG_LEVEL"),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigurationFailure(`Invalid configuration:\n${issues}`);
  }

  const c = parsed.data;
  return {
    baseUrl: c.baseUrl.replace(/\/+$/, ""),
    credentials: { username: c.username, password: c.password },
    priorityId: c.priorityUrl ? topicIdFromUrl(c.priorityUrl) : undefined,
    range: c.range,
    delayMs: c.delayMs,
    outputDir: c.outputDir,
    separateFiles: c.separateFiles,
    userAgent: c.userAgent,
    maxPages: c.maxPages,
    progressEvery: c.progressEvery,
    maxRetries: c.maxRetries,
    retryBaseMs: c.retryBaseMs,
    timeoutMs: c.timeoutMs,
    maxConsecutiveFailures: c.maxConsecutiveFailures,
    displayUtcOffset: c.displayUtcOffset,
    logLevel: c.logLevel,
  };
}

export interface CliOverrides {
  start: string;
  end: string;
  step: string;
  priority: string;
  output: string;
  delay: string;
  singleFile: boolean;
}
