import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { escapeUTF8 } from "entities";
import { ParseFailure } from "../errors";
import { EXISTENCE_STATUSES } from "../crawlers/phpbb/types";
import type {
  AuthorProfile,
  ExistenceStatus,
  Post,
  PostThanks,
  RunSummary,
  Topic,
} from "../crawlers/phpbb/types";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

// characters XML 1.0 cannot carry, unpaired surrogates included
const NOT_XML_CHAR =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;
const UNICODE_ESCAPE = /\\u([0-9A-Fa-f]{4})/g;

/**
 * Escapes text for element content. Characters XML cannot hold are written as
 * `\uXXXX`; a backslash that already starts such a sequence becomes `\u005c`.
 */
export function encodeXmlText(value: string): string {
  const escaped = value
    .replace(/\\(?=u[0-9A-Fa-f]{4})/g, "\\u005c")
    .replace(NOT_XML_CHAR, (ch) => `\\u${ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, "0")}`);
  return escapeUTF8(escaped).replace(/\r/g, "&#13;");
}

function encodeXmlAttr(value: string): string {
  return encodeXmlText(value).replace(/\n/g, "&#10;").replace(/\t/g, "&#9;");
}

/** Reverses the `\uXXXX` escapes of {@link encodeXmlText}. */
export function decodeXmlText(value: string): string {
  return value.replace(UNICODE_ESCAPE, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

function attrs(values: Record<string, string | number | boolean | null | undefined>): string {
  return Object.entries(values)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== null && entry[1] !== undefined)
    .map(([k, v]) => ` ${k}="${encodeXmlAttr(String(v))}"`)
    .join("");
}

function textElement(indent: string, name: string, value: string | null): string {
  if (value === null || value === "") return `${indent}<${name}/>`;
  return `${indent}<${name}>${encodeXmlText(value)}</${name}>`;
}

function profileElement(indent: string, profile: AuthorProfile): string {
  return `${indent}<profile${attrs({
    rank: profile.rank,
    post_count: profile.postCount,
    joined: profile.joined,
    profession: profile.profession,
    location: profile.location,
    thanks_given: profile.thanksGiven,
    thanks_received: profile.thanksReceived,
  })}/>`;
}

function thanksElement(indent: string, thanks: PostThanks): string[] {
  if (thanks.users.length === 0) return [`${indent}<thanks count="${thanks.count}"/>`];
  return [
    `${indent}<thanks count="${thanks.count}">`,
    ...thanks.users.map((user) => textElement(`${indent}  `, "user", user)),
    `${indent}</thanks>`,
  ];
}

function postElement(post: Post, indent: string): string[] {
  const inner = `${indent}  `;
  const lines = [`${indent}<post${attrs({ id: post.id, author_id: post.authorId })}>`];
  if (post.subject !== undefined) lines.push(textElement(inner, "subject", post.subject));
  lines.push(
    textElement(inner, "author", post.author),
    textElement(inner, "date", post.postedAt),
    textElement(inner, "content", post.content)
  );
  if (post.profile) lines.push(profileElement(inner, post.profile));
  if (post.thanks) lines.push(...thanksElement(inner, post.thanks));
  lines.push(`${indent}</post>`);
  return lines;
}

function topicElement(topic: Topic, indent: string): string[] {
  const i1 = `${indent}  `;
  const i2 = `${i1}  `;
  const lines = [
    `${indent}<topic${attrs({
      id: topic.id,
      status: topic.status,
      scraped_at: topic.scrapedAt,
      pages: topic.pages,
    })}>`,
    textElement(i1, "url", topic.url),
    textElement(i1, "title", topic.title),
  ];

  if (topic.posts.length === 0) {
    lines.push(`${i1}<posts count="0"/>`);
  } else {
    lines.push(`${i1}<posts count="${topic.posts.length}">`);
    for (const post of topic.posts) lines.push(...postElement(post, i2));
    lines.push(`${i1}</posts>`);
  }

  lines.push(`${indent}</topic>`);
  return lines;
}

export function renderTopic(topic: Topic): string {
  return [XML_DECLARATION, ...topicElement(topic, "")].join("\n") + "\n";
}

/** All topics of a run in one document, used when per-topic files are off. */
export function renderTopics(topics: readonly Topic[], generatedAt: string): string {
  const lines = [XML_DECLARATION, `<topics${attrs({ generated_at: generatedAt, count: topics.length })}>`];
  for (const topic of topics) lines.push(...topicElement(topic, "  "));
  lines.push("</topics>");
  return lines.join("\n") + "\n";
}

export function renderSummary(summary: RunSummary): string {
  const { counts } = summary;
  const lines = [
    XML_DECLARATION,
    `<scraping_summary${attrs({
      started_at: summary.startedAt,
      finished_at: summary.finishedAt,
      elapsed_ms: summary.elapsedMs,
      authenticated: summary.authenticated,
    })}>`,
    `  <counts${attrs({
      total: counts.total,
      has_content: counts.HAS_CONTENT,
      empty: counts.EMPTY,
      not_found: counts.NOT_FOUND,
      fetch_error: counts.FETCH_ERROR,
    })}/>`,
  ];

  if (summary.topics.length === 0) {
    lines.push('  <topics count="0"/>');
  } else {
    lines.push(`  <topics count="${summary.topics.length}">`);
    for (const t of summary.topics) {
      lines.push(`    <topic${attrs({ id: t.id, posts: t.posts })}>${encodeXmlText(t.title)}</topic>`);
    }
    lines.push("  </topics>");
  }

  if (summary.failures.length === 0) {
    lines.push('  <failures count="0"/>');
  } else {
    lines.push(`  <failures count="${summary.failures.length}">`);
    for (const f of summary.failures) {
      lines.push(`    <failure${attrs({ id: f.id })}>${encodeXmlText(f.reason)}</failure>`);
    }
    lines.push("  </failures>");
  }

  if (summary.writeFailures.length === 0) {
    lines.push('  <write_failures count="0"/>');
  } else {
    lines.push(`  <write_failures count="${summary.writeFailures.length}">`);
    for (const f of summary.writeFailures) {
      lines.push(`    <write_failure${attrs({ id: f.id })}>${encodeXmlText(f.reason)}</write_failure>`);
    }
    lines.push("  </write_failures>");
  }

  lines.push("</scraping_summary>");
  return lines.join("\n") + "\n";
}

function isStatus(value: string | undefined): value is ExistenceStatus {
  return EXISTENCE_STATUSES.some((s) => s === value);
}

function textOf(el: Cheerio<Element>): string {
  return decodeXmlText(el.text());
}

function attrOf(el: Cheerio<Element>, name: string): string | null {
  const value = el.attr(name);
  return value === undefined ? null : decodeXmlText(value);
}

function numberAttr(el: Cheerio<Element>, name: string): number | null {
  const value = el.attr(name);
  return value === undefined ? null : Number(value);
}

function readPost($: cheerio.CheerioAPI, p: Cheerio<Element>): Post {
  const date = textOf(p.children("date"));
  const post: Post = {
    id: attrOf(p, "id") ?? "",
    author: textOf(p.children("author")),
    authorId: attrOf(p, "author_id"),
    postedAt: date === "" ? null : date,
    content: textOf(p.children("content")),
  };

  const subject = p.children("subject");
  if (subject.length) post.subject = textOf(subject);

  const profile = p.children("profile");
  if (profile.length) {
    post.profile = {
      rank: attrOf(profile, "rank"),
      postCount: numberAttr(profile, "post_count"),
      joined: attrOf(profile, "joined"),
      profession: attrOf(profile, "profession"),
      location: attrOf(profile, "location"),
      thanksGiven: numberAttr(profile, "thanks_given"),
      thanksReceived: numberAttr(profile, "thanks_received"),
    };
  }

  const thanks = p.children("thanks");
  if (thanks.length) {
    post.thanks = {
      count: numberAttr(thanks, "count") ?? 0,
      users: thanks
        .children("user")
        .toArray()
        .map((node) => textOf($(node))),
    };
  }
  return post;
}

function readTopicElement($: cheerio.CheerioAPI, el: Cheerio<Element>): Topic {
  const id = Number(el.attr("id"));
  const status = el.attr("status");
  if (!Number.isInteger(id)) throw new ParseFailure(`Invalid topic id "${el.attr("id")}"`);
  if (!isStatus(status)) throw new ParseFailure(`Invalid topic status "${status}"`);

  const posts = el
    .find("posts > post")
    .toArray()
    .map((node) => readPost($, $(node)));

  return {
    id,
    url: textOf(el.children("url")),
    title: textOf(el.children("title")),
    posts,
    status,
    scrapedAt: el.attr("scraped_at") ?? "",
    pages: Number(el.attr("pages") ?? 0),
  };
}

/** Reads every `<topic>` of a topic or combined document. */
export function readTopics(xml: string): Topic[] {
  const $ = cheerio.load(xml, { xml: true });
  return $("topic")
    .toArray()
    .map((node) => readTopicElement($, $(node)));
}

export function readTopic(xml: string): Topic {
  const [topic] = readTopics(xml);
  if (!topic) throw new ParseFailure("No <topic> element in document");
  return topic;
}
