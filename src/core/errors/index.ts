import type { RunSummary } from "../crawlers/phpbb/types";

export class AuthFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthFailure";
  }
}

export class TransportFailure extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number) {
    super(message);
    this.name = "TransportFailure";
    this.url = url;
    this.status = status;
  }
}

/** HTTP 429 */
export class RateLimited extends TransportFailure {
  constructor(url: string) {
    super("Rate limit exceeded", url, 429);
    this.name = "RateLimited";
  }
}

export class TooManyRedirects extends TransportFailure {
  constructor(url: string, hops: number) {
    super(`Stopped after ${hops} redirects`, url);
    this.name = "TooManyRedirects";
  }
}

export class ParseFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseFailure";
  }
}

export class ConfigurationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationFailure";
  }
}

/**
 * Raised when the transport keeps failing for consecutive topics. Carries the
 * summary of everything processed before the run gave up.
 */
export class TransportLost extends Error {
  readonly summary: RunSummary;

  constructor(message: string, summary: RunSummary) {
    super(message);
    this.name = "TransportLost";
    this.summary = summary;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
