import type { CookieJar } from "tough-cookie";

export type ExistenceStatus = "NOT_FOUND" | "EMPTY" | "HAS_CONTENT" | "FETCH_ERROR";

export const EXISTENCE_STATUSES: readonly ExistenceStatus[] = [
  "HAS_CONTENT",
  "EMPTY",
  "NOT_FOUND",
  "FETCH_ERROR",
];

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Cookies and login state for the whole run. Only the HTTP client writes into
 * the jar; everything else treats the context as read-only.
 */
export interface SessionContext {
  readonly authenticated: boolean;
  readonly username: string | null;
  readonly jar: CookieJar;
}

/** Fields of the profile column next to a post; `null` where the forum hides one. */
export interface AuthorProfile {
  rank: string | null;
  postCount: number | null;
  /** registration date as displayed */
  joined: string | null;
  profession: string | null;
  location: string | null;
  thanksGiven: number | null;
  thanksReceived: number | null;
}

export interface PostThanks {
  count: number;
  users: string[];
}

export interface Post {
  id: string;
  author: string;
  authorId: string | null;
  /** ISO-8601 with offset, `null` when the page shows no usable date */
  postedAt: string | null;
  content: string;
  /** post heading without the "Re: " prefix */
  subject?: string;
  profile?: AuthorProfile;
  thanks?: PostThanks;
}

export interface Topic {
  readonly id: number;
  readonly url: string;
  readonly title: string;
  readonly posts: readonly Post[];
  readonly status: ExistenceStatus;
  readonly scrapedAt: string;
  readonly pages: number;
}

export type ScrapeOutcome =
  | { kind: "topic"; topic: Topic }
  | { kind: "failure"; id: number; reason: string };

export interface TopicRange {
  start: number;
  end: number;
  step: number;
}

export type StatusCounts = Record<ExistenceStatus, number> & { total: number };

export interface TopicRef {
  id: number;
  title: string;
  posts: number;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  authenticated: boolean;
  counts: StatusCounts;
  topics: TopicRef[];
  failures: Array<{ id: number; reason: string }>;
  /** documents that could not be stored; `id` is null for the combined document */
  writeFailures: Array<{ id: number | null; reason: string }>;
}

export interface ParsedPage {
  title: string;
  posts: Post[];
}
