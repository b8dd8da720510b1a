import type { ExistenceStatus } from "./types";
import {
  ForumPage,
  MIN_PAGE_LENGTH,
  NOT_FOUND_MARKERS,
  normalizeText,
  RESTRICTED_MARKERS,
  SELECTORS,
} from "./markup";

/**
 * Decides what a fetched topic page says about the topic. Rules are checked
 * in order and the first match wins:
 *
 * 1. NOT_FOUND  - 404/410, or no topic header and a "does not exist" notice
 * 2. EMPTY      - a topic page (or login-required notice) with no posts and
 *                 no pagination
 * 3. HAS_CONTENT - at least one post entry
 * 4. FETCH_ERROR - anything else
 *
 * Markers are only looked up outside the topic itself, so a post quoting
 * "topic not found" does not turn a real topic into a missing one.
 */
export class ExistenceClassifier {
  classify(page: ForumPage): ExistenceStatus {
    if (page.status === 404 || page.status === 410) return "NOT_FOUND";
    if (!page.ok || page.html.trim().length < MIN_PAGE_LENGTH) return "FETCH_ERROR";

    const $ = page.$;
    const hasHeader = $(SELECTORS.topicHeader).length > 0;
    const notice = hasHeader ? "" : this.noticeText(page);

    if (!hasHeader && NOT_FOUND_MARKERS.some((m) => notice.includes(m))) return "NOT_FOUND";

    const postCount = $(SELECTORS.post).length;
    const hasPagination = $(SELECTORS.pagination).find("a").length > 0;
    const restricted =
      !hasHeader &&
      (RESTRICTED_MARKERS.some((m) => notice.includes(m)) || $(SELECTORS.loginForm).length > 0);

    if (postCount === 0 && !hasPagination && (hasHeader || restricted)) return "EMPTY";
    if (postCount > 0) return "HAS_CONTENT";
    return "FETCH_ERROR";
  }

  private noticeText(page: ForumPage): string {
    const $ = page.$;
    const panel = $(SELECTORS.messagePanel);
    const txt = panel.length ? panel.text() : $("body").text() || page.html;
    return normalizeText(txt).toLowerCase();
  }
}
