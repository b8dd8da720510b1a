import * as cheerio from "cheerio";

/** prosilver selectors */
export const SELECTORS = {
  topicHeader: "h2.topic-title",
  post: "div.post",
  postSubject: "div.postbody h3",
  postAuthorLine: "p.author",
  postProfile: "dl.postprofile",
  profileRank: "dd.profile-rank",
  profilePosts: "dd.profile-posts:not([data-user-give-id]):not([data-user-receive-id]) a",
  profileJoined: "dd.profile-joined",
  profileProfession: "dd.profile-profese",
  profileLocation: "dd.profile-phpbb_location",
  profileThanksGiven: "dd[data-user-give-id] a",
  profileThanksReceived: "dd[data-user-receive-id] a",
  thanksList: "div.postbody dl",
  postAuthor: "a.username, a.username-coloured, span.username, span.username-coloured",
  postTime: "time",
  postContent: "div.content",
  pagination: "div.pagination",
  nextPage: 'div.pagination li.next a, div.pagination a[rel="next"], a[rel="next"]',
  messagePanel: "#message",
  loginForm: 'form#login, form[action*="mode=login"]',
  logoutLink: 'a[href*="mode=logout"]',
  ssoForm: "form#kc-form-login",
} as const;

export const NOT_FOUND_MARKERS = [
  "the requested topic does not exist",
  "this topic does not exist",
  "požadované téma neexistuje",
  "toto téma neexistuje",
  "topic not found",
  "téma nenalezeno",
  "page not found",
  "stránka nenalezena",
];

export const RESTRICTED_MARKERS = [
  "requires you to be registered and logged in",
  "požaduje, abyste byli registrováni a přihlášeni",
  "you are not authorised to read this forum",
  "nemáte oprávnění číst",
];

/** heading of the per-post thanks list */
export const THANKS_HEADING_RE = /poděkovali|thank/i;
export const THANKS_TOTAL_RE = /(?:celkem|total)\D*(\d+)/i;

export const LOGOUT_MARKERS = ["logout", "odhlásit se"];

/** Below this a body cannot be a forum page. */
export const MIN_PAGE_LENGTH = 100;

export function normalizeText(txt: string): string {
  return txt.replace(/\s+/g, " ").trim();
}

/**
 * One fetched forum page. The cheerio document is built lazily and shared by
 * the classifier and the parser.
 */
export class ForumPage {
  private doc?: cheerio.CheerioAPI;

  constructor(
    readonly status: number,
    readonly url: string,
    readonly html: string
  ) {}

  get $(): cheerio.CheerioAPI {
    if (!this.doc) this.doc = cheerio.load(this.html);
    return this.doc;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }
}
