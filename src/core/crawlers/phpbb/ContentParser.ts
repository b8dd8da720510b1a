import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { normalizePostDate } from "./dates";
import { ForumPage, normalizeText, SELECTORS, THANKS_HEADING_RE, THANKS_TOTAL_RE } from "./markup";
import type { AuthorProfile, ParsedPage, Post, PostThanks } from "./types";

export const UNKNOWN_AUTHOR = "(unknown)";
export const UNKNOWN_POST_ID = "(unknown)";

export interface ContentParserOptions {
  /** offset applied to dates that are only available as display text */
  displayOffsetMinutes?: number;
}

export class ContentParser {
  private readonly displayOffsetMinutes: number;

  constructor(options: ContentParserOptions = {}) {
    this.displayOffsetMinutes = options.displayOffsetMinutes ?? 0;
  }

  parse(page: ForumPage): ParsedPage {
    const $ = page.$;
    const posts: Post[] = [];

    $(SELECTORS.post).each((_, el) => {
      posts.push(this.parsePost($, $(el)));
    });

    return { title: this.parseTitle(page), posts };
  }

  /** Absolute URL of the next page, or null on the last page. */
  findNextPage(page: ForumPage): string | null {
    const href = page.$(SELECTORS.nextPage).first().attr("href");
    if (!href) return null;
    try {
      return new URL(href, page.url).toString();
    } catch {
      return null;
    }
  }

  private parseTitle(page: ForumPage): string {
    const $ = page.$;
    const header = normalizeText($(SELECTORS.topicHeader).first().text());
    if (header) return header;

    return stripReply(normalizeText($(SELECTORS.postSubject).first().text()));
  }

  private parsePost($: CheerioAPI, $post: Cheerio<Element>): Post {
    const rawId = $post.attr("id") ?? "";
    const id = rawId.replace(/^p/, "") || UNKNOWN_POST_ID;

    const $authorLine = $post.find(SELECTORS.postAuthorLine).first();
    let $author = $authorLine.find(SELECTORS.postAuthor).first();
    if (!$author.length) $author = $post.find(SELECTORS.postProfile).find(SELECTORS.postAuthor).first();
    const author = normalizeText($author.text()) || UNKNOWN_AUTHOR;
    const authorId = this.parseUserId($author.attr("href"));

    const $time = $authorLine.find(SELECTORS.postTime).first();
    const displayText = $time.length ? $time.text() : $authorLine.text();
    const postedAt = normalizePostDate($time.attr("datetime"), displayText, this.displayOffsetMinutes);

    const content = normalizeText($post.find(SELECTORS.postContent).first().text());
    const subject = stripReply(normalizeText($post.find(SELECTORS.postSubject).first().text()));

    return {
      id,
      author,
      authorId,
      postedAt,
      content,
      subject,
      profile: this.parseProfile($post.find(SELECTORS.postProfile).first()),
      thanks: this.parseThanks($, $post),
    };
  }

  private parseProfile($profile: Cheerio<Element>): AuthorProfile {
    const field = (selector: string) => labelledValue($profile.find(selector).first());
    const count = (selector: string) => firstNumber($profile.find(selector).first().text());
    return {
      rank: field(SELECTORS.profileRank),
      postCount: count(SELECTORS.profilePosts),
      joined: field(SELECTORS.profileJoined),
      profession: field(SELECTORS.profileProfession),
      location: field(SELECTORS.profileLocation),
      thanksGiven: count(SELECTORS.profileThanksGiven),
      thanksReceived: count(SELECTORS.profileThanksReceived),
    };
  }

  private parseThanks($: CheerioAPI, $post: Cheerio<Element>): PostThanks {
    const $list = $post
      .find(SELECTORS.thanksList)
      .filter((_, el) => THANKS_HEADING_RE.test($(el).children("dt").text()))
      .first();
    if (!$list.length) return { count: 0, users: [] };

    const users = $list
      .children("dd")
      .find(SELECTORS.postAuthor)
      .toArray()
      .map((el) => normalizeText($(el).text()))
      .filter((name) => name !== "");
    const total = THANKS_TOTAL_RE.exec($list.children("dt").text());
    return { count: total ? Number(total[1]) : users.length, users };
  }

  private parseUserId(href: string | undefined): string | null {
    if (!href) return null;
    const m = /[?&]u=(\d+)/.exec(href);
    return m ? m[1] : null;
  }
}

function stripReply(subject: string): string {
  return subject.replace(/^Re:\s*/i, "");
}

/** Text of a profile field without its `<strong>Label:</strong>`. */
function labelledValue($field: Cheerio<Element>): string | null {
  if (!$field.length) return null;
  const $copy = $field.clone();
  $copy.find("strong").remove();
  return normalizeText($copy.text()) || null;
}

function firstNumber(text: string): number | null {
  const m = /\d+/.exec(text);
  return m ? Number(m[0]) : null;
}
