import { ParseFailure } from "../../errors";
import type { HttpClient } from "../../http/HttpClient";
import type { Logger } from "../../logger";
import { ContentParser } from "./ContentParser";
import { toIsoWithOffset } from "./dates";
import { ExistenceClassifier } from "./ExistenceClassifier";
import { ForumPage } from "./markup";
import type { Post, SessionContext, Topic } from "./types";

export interface TopicFetcherOptions {
  baseUrl: string;
  /** upper bound on pages per topic, guards against looping pagination */
  maxPages?: number;
}

/**
 * Fetches one topic page by page:
 *
 * START -> FETCH_PAGE -> CLASSIFY -> NOT_FOUND | EMPTY | FETCH_ERROR (done)
 *                                 -> HAS_CONTENT -> next page? -> FETCH_PAGE | DONE
 *
 * Transport errors and a later page that no longer looks like the topic are
 * thrown; the caller records them as failures.
 */
export class TopicFetcher {
  private readonly maxPages: number;

  constructor(
    private readonly http: HttpClient,
    private readonly options: TopicFetcherOptions,
    private readonly classifier: ExistenceClassifier = new ExistenceClassifier(),
    private readonly parser: ContentParser = new ContentParser(),
    private readonly logger?: Logger
  ) {
    this.maxPages = options.maxPages ?? 100;
  }

  topicUrl(id: number): string {
    const base = this.options.baseUrl.endsWith("/") ? this.options.baseUrl : `${this.options.baseUrl}/`;
    return new URL(`viewtopic.php?t=${id}`, base).toString();
  }

  async fetch(id: number, session: SessionContext): Promise<Topic> {
    const url = this.topicUrl(id);
    const posts: Post[] = [];
    const visited = new Set<string>();
    let title = "";
    let pages = 0;
    let nextUrl: string | null = url;

    while (nextUrl) {
      if (pages >= this.maxPages) {
        this.logger?.warn(`[topic ${id}] stopped after ${this.maxPages} pages`);
        break;
      }
      visited.add(nextUrl);

      this.logger?.debug(`[topic ${id}] GET ${nextUrl}`);
      const res = await this.http.get(nextUrl, session);
      const page = new ForumPage(res.status, res.url, res.body);
      pages += 1;

      const status = this.classifier.classify(page);
      if (pages === 1 && status !== "HAS_CONTENT") {
        const emptyTitle = status === "EMPTY" ? this.parser.parse(page).title : "";
        return this.build(id, url, emptyTitle, [], status, pages);
      }
      if (status !== "HAS_CONTENT") {
        throw new ParseFailure(`Topic ${id}: page ${pages} classified as ${status}`);
      }

      const parsed = this.parser.parse(page);
      if (pages === 1) title = parsed.title;
      posts.push(...parsed.posts);
      this.logger?.debug(`[topic ${id}] page ${pages}: ${parsed.posts.length} posts`);

      const candidate = this.parser.findNextPage(page);
      nextUrl = candidate && !visited.has(candidate) ? candidate : null;
    }

    return this.build(id, url, title, posts, "HAS_CONTENT", pages);
  }

  private build(
    id: number,
    url: string,
    title: string,
    posts: Post[],
    status: Topic["status"],
    pages: number
  ): Topic {
    return Object.freeze({
      id,
      url,
      title,
      posts: Object.freeze(posts.map(freezePost)),
      status,
      scrapedAt: toIsoWithOffset(new Date()),
      pages,
    });
  }
}

function freezePost(post: Post): Post {
  if (post.profile) Object.freeze(post.profile);
  if (post.thanks) {
    Object.freeze(post.thanks.users);
    Object.freeze(post.thanks);
  }
  return Object.freeze(post);
}
