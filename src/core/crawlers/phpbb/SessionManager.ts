import * as cheerio from "cheerio";
import { CookieJar } from "tough-cookie";
import { AuthFailure, describeError } from "../../errors";
import type { HttpClient } from "../../http/HttpClient";
import type { FetchedResponse } from "../../http/types";
import type { Logger } from "../../logger";
import { LOGOUT_MARKERS, normalizeText, SELECTORS } from "./markup";
import type { Credentials, SessionContext } from "./types";

export function anonymousSession(): SessionContext {
  return { authenticated: false, username: null, jar: new CookieJar() };
}

/**
 * Logs in through the forum's SSO redirect chain:
 * forum login entry -> SSO form -> POST credentials -> redirects back to the
 * forum -> logout link visible on the index.
 *
 * Any failure yields an anonymous session; there is no second attempt.
 */
export class SessionManager {
  private readonly forumOrigin: string;

  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpClient,
    private readonly logger?: Logger
  ) {
    this.forumOrigin = new URL(baseUrl).origin;
  }

  get loginUrl(): string {
    return new URL("ucp.php?mode=login&redirect=index.php", this.withSlash(this.baseUrl)).toString();
  }

  async login(credentials: Credentials): Promise<SessionContext> {
    if (!credentials.username || !credentials.password) {
      this.logger?.info("No credentials configured, continuing anonymously");
      return anonymousSession();
    }

    // cookies collected during the handshake; only handed out once it succeeds
    const pending = anonymousSession();

    try {
      this.logger?.info(`Attempting to log in as ${credentials.username}...`);
      await this.handshake(credentials, pending);
      this.logger?.info("Login successful");
      return { authenticated: true, username: credentials.username, jar: pending.jar };
    } catch (error) {
      this.logger?.warn(`Login failed (${describeError(error)}); continuing without login`);
      return anonymousSession();
    }
  }

  private async handshake(credentials: Credentials, session: SessionContext): Promise<void> {
    const entry = await this.http.get(this.loginUrl, session);
    this.expectOk(entry, "login entry point");
    if (new URL(entry.url).origin === this.forumOrigin) {
      throw new AuthFailure("Login entry point did not redirect to the SSO provider");
    }

    const ssoOrigin = new URL(entry.url).origin;
    const { action, fields } = this.readSsoForm(entry);
    this.logger?.debug(`Submitting credentials to ${action}`);

    const submitted = await this.http.postForm(
      action,
      { ...fields, username: credentials.username, password: credentials.password },
      session,
      entry.url
    );
    this.expectOk(submitted, "credential submission");
    if (new URL(submitted.url).origin === ssoOrigin) {
      throw new AuthFailure("SSO provider rejected the credentials");
    }

    const index = await this.http.get(new URL("index.php", this.withSlash(this.baseUrl)).toString(), session);
    this.expectOk(index, "forum index");
    if (!this.hasLogout(index.body)) {
      throw new AuthFailure("No logout link after SSO login");
    }
  }

  private readSsoForm(res: FetchedResponse): { action: string; fields: Record<string, string> } {
    const $ = cheerio.load(res.body);
    const form = $(SELECTORS.ssoForm).first();
    if (!form.length) throw new AuthFailure("SSO login form not found");

    const actionAttr = form.attr("action");
    if (!actionAttr) throw new AuthFailure("SSO login form has no action");

    let action: string;
    try {
      action = new URL(actionAttr, res.url).toString();
    } catch {
      throw new AuthFailure(`SSO login form action is not a URL: ${actionAttr}`);
    }

    const fields: Record<string, string> = {};
    form.find('input[type="hidden"]').each((_, el) => {
      const name = $(el).attr("name");
      if (name) fields[name] = $(el).attr("value") ?? "";
    });
    return { action, fields };
  }

  private hasLogout(html: string): boolean {
    const $ = cheerio.load(html);
    if ($(SELECTORS.logoutLink).length > 0) return true;
    const txt = normalizeText($("body").text()).toLowerCase();
    return LOGOUT_MARKERS.some((m) => txt.includes(m));
  }

  private expectOk(res: FetchedResponse, step: string): void {
    if (res.status >= 400) throw new AuthFailure(`HTTP ${res.status} at ${step}`);
  }

  private withSlash(url: string): string {
    return url.endsWith("/") ? url : `${url}/`;
  }
}
