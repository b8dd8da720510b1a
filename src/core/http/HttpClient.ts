import { URLSearchParams } from "url";
import type { CookieJar } from "tough-cookie";
import { RateLimited, TooManyRedirects, TransportFailure } from "../errors";
import type { Logger } from "../logger";
import type { SessionContext } from "../crawlers/phpbb/types";
import type { RateLimiter } from "./RateLimiter";
import type {
  FetchedResponse,
  HttpMethod,
  RawResponse,
  RequestOptions,
  Transport,
} from "./types";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface HttpClientOptions {
  userAgent: string;
  maxRetries?: number;
  retryBaseMs?: number;
  maxRedirects?: number;
}

/**
 * Cookie-aware HTTP client on top of a single-hop Transport. Every call to
 * `request` passes the rate limiter once per attempt; redirect hops of one
 * attempt are not gated separately.
 */
export class HttpClient {
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly maxRedirects: number;

  constructor(
    private readonly transport: Transport,
    private readonly limiter: RateLimiter,
    private readonly options: HttpClientOptions,
    private readonly logger?: Logger
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseMs = options.retryBaseMs ?? 1000;
    this.maxRedirects = options.maxRedirects ?? 10;
  }

  async get(url: string, session: SessionContext): Promise<FetchedResponse> {
    return this.request({ method: "GET", url }, session);
  }

  async postForm(
    url: string,
    form: Record<string, string>,
    session: SessionContext,
    referer?: string
  ): Promise<FetchedResponse> {
    return this.request({ method: "POST", url, form, referer }, session);
  }

  async request(opts: RequestOptions, session: SessionContext): Promise<FetchedResponse> {
    let attempt = 0;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      await this.limiter.wait();
      try {
        const res = await this.followRedirects(opts, session.jar);
        if (res.status === 429) throw new RateLimited(res.url);
        if (res.status >= 500 && attempt < this.maxRetries) {
          attempt += 1;
          this.logger?.warn(`HTTP ${res.status} ${opts.method} ${opts.url}`);
          await this.backoff(attempt);
          continue;
        }
        if (res.status >= 400) this.logger?.debug(`HTTP ${res.status}`, opts.method, res.url);
        return res;
      } catch (error) {
        if (
          !(error instanceof TransportFailure) ||
          error instanceof TooManyRedirects ||
          attempt >= this.maxRetries
        ) {
          throw error;
        }
        attempt += 1;
        this.logger?.warn(`${error.name}: ${error.message} (${opts.method} ${opts.url})`);
        await this.backoff(attempt);
      }
    }
  }

  private async backoff(attempt: number): Promise<void> {
    const delay = Math.pow(2, attempt) * this.retryBaseMs;
    this.logger?.info(`Retry ${attempt}/${this.maxRetries} in ${delay}ms`);
    if (delay > 0) await new Promise((r) => setTimeout(r, delay));
  }

  private async followRedirects(opts: RequestOptions, jar: CookieJar): Promise<FetchedResponse> {
    let method: HttpMethod = opts.method;
    let url = opts.url;
    let body = opts.form ? new URLSearchParams(opts.form).toString() : undefined;
    let referer = opts.referer;
    const redirects: string[] = [];

    for (let hop = 0; ; hop += 1) {
      const cookie = await jar.getCookieString(url);
      const res = await this.transport.send({
        method,
        url,
        headers: this.getHeaders(method, cookie, referer),
        body: method === "POST" ? body : undefined,
      });
      await this.storeCookies(jar, url, res);

      const location = headerValue(res, "location");
      if (!REDIRECT_STATUSES.has(res.status) || !location) {
        return { status: res.status, url, body: res.body, redirects };
      }
      if (hop >= this.maxRedirects) throw new TooManyRedirects(url, hop);

      let next: string;
      try {
        next = new URL(location, url).toString();
      } catch {
        throw new TransportFailure(`Invalid redirect target "${location}"`, url, res.status);
      }
      this.logger?.debug(`[redirect] ${res.status} ${url} -> ${next}`);
      redirects.push(next);

      if (res.status === 303 || ((res.status === 301 || res.status === 302) && method === "POST")) {
        method = "GET";
        body = undefined;
      }
      referer = url;
      url = next;
    }
  }

  private async storeCookies(jar: CookieJar, url: string, res: RawResponse): Promise<void> {
    const raw = res.headers["set-cookie"];
    const cookies = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];
    for (const c of cookies) {
      await jar.setCookie(c, url, { ignoreError: true });
    }
  }

  private getHeaders(
    method: HttpMethod,
    cookie: string,
    referer?: string
  ): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": this.options.userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9,cs;q=0.8",
      Connection: "keep-alive",
      "Upgrade-Insecure-Requests": "1",
    };
    if (cookie) headers.Cookie = cookie;
    if (referer) headers.Referer = referer;
    if (method === "POST") headers["Content-Type"] = "application/x-www-form-urlencoded";
    return headers;
  }
}

function headerValue(res: RawResponse, name: string): string | undefined {
  const v = res.headers[name.toLowerCase()];
  return Array.isArray(v) ? v[0] : v;
}
