import { describe, expect, it } from "vitest";
import { SessionManager } from "../src/core/crawlers/phpbb/SessionManager";
import { TopicFetcher } from "../src/core/crawlers/phpbb/TopicFetcher";
import { FakeForum, FORUM, makePosts, SSO } from "./helpers/fakeForum";
import type { FakeForumOptions } from "./helpers/fakeForum";
import { makeHttp, quietLogger } from "./helpers/setup";

const credentials = { username: "alice", password: "test-secret" };

function setup(forum: FakeForum) {
  const http = makeHttp(forum);
  const logger = quietLogger();
  return { http, logger, manager: new SessionManager(FORUM, http, logger) };
}

describe("SessionManager", () => {
  it("builds the login entry URL from the base URL", () => {
    const { manager } = setup(new FakeForum());
    expect(manager.loginUrl).toBe(`${FORUM}/ucp.php?mode=login&redirect=index.php`);
  });

  it("logs in through the SSO redirect chain", async () => {
    const forum = new FakeForum();
    const { manager } = setup(forum);

    const session = await manager.login(credentials);

    expect(session.authenticated).toBe(true);
    expect(session.username).toBe("alice");
    expect(await session.jar.getCookieString(`${FORUM}/viewtopic.php?t=1`)).toContain("phpbb_sid=auth");

    const post = forum.requests.find((r) => r.method === "POST");
    expect(post?.url).toBe(`${SSO}/realms/forum/login-actions/authenticate?session_code=abc&tab_id=t1`);
    const form = new URLSearchParams(post?.body ?? "");
    expect(form.get("execution")).toBe("exec-123");
    expect(form.get("credentialId")).toBe("");
    expect(post?.headers.Referer).toBe(`${SSO}/realms/forum/protocol/openid-connect/auth?client_id=forum&response_type=code`);
  });

  it("lets an authenticated session read restricted topics", async () => {
    const forum = new FakeForum().addTopic(9, { title: "Members only", pages: [makePosts(9, 2)], restricted: true });
    const { http, manager } = setup(forum);
    const fetcher = new TopicFetcher(http, { baseUrl: FORUM });

    const session = await manager.login(credentials);
    const topic = await fetcher.fetch(9, session);

    expect(topic.status).toBe("HAS_CONTENT");
    expect(topic.posts).toHaveLength(2);
  });

  it("continues anonymously when no credentials are configured", async () => {
    const forum = new FakeForum();
    const { manager } = setup(forum);

    const session = await manager.login({ username: "", password: "" });

    expect(session).toMatchObject({ authenticated: false, username: null });
    expect(forum.requests).toHaveLength(0);
  });

  it("falls back to anonymous when the SSO provider rejects the credentials", async () => {
    const { manager, logger } = setup(new FakeForum());

    const session = await manager.login({ username: "alice", password: "wrong-secret" });

    expect(session.authenticated).toBe(false);
    expect(await session.jar.getCookieString(`${FORUM}/`)).toBe("");
    expect(logger.warn).toHaveBeenCalledWith(
      "Login failed (AuthFailure: SSO provider rejected the credentials); continuing without login"
    );
  });

  const ssoFailures: Array<[NonNullable<FakeForumOptions["sso"]>, string]> = [
    ["error", "AuthFailure: HTTP 503 at login entry point"],
    ["no-form", "AuthFailure: SSO login form not found"],
    ["local-login", "AuthFailure: Login entry point did not redirect to the SSO provider"],
  ];

  it.each(ssoFailures)("falls back to anonymous when the SSO step fails (%s)", async (mode, reason) => {
    const { manager, logger } = setup(new FakeForum({ sso: mode }));

    const session = await manager.login(credentials);

    expect(session.authenticated).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(`Login failed (${reason}); continuing without login`);
  });

  it("still fetches public topics after a failed login", async () => {
    const forum = new FakeForum({ sso: "error" })
      .addTopic(3, { title: "Public", pages: [makePosts(3, 3)] })
      .addTopic(4, { title: "Private", pages: [makePosts(4, 1)], restricted: true });
    const { http, manager } = setup(forum);
    const fetcher = new TopicFetcher(http, { baseUrl: FORUM });

    const session = await manager.login(credentials);
    const open = await fetcher.fetch(3, session);
    const closed = await fetcher.fetch(4, session);

    expect(session.authenticated).toBe(false);
    expect(open.status).toBe("HAS_CONTENT");
    expect(open.posts.map((p) => p.id)).toEqual(["301", "302", "303"]);
    expect(closed.status).toBe("EMPTY");
    expect(closed.posts).toEqual([]);
  });
});
