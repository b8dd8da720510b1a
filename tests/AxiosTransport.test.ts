import axios, { AxiosError, AxiosHeaders } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TransportFailure } from "../src/core/errors";
import { AxiosTransport } from "../src/core/http/AxiosTransport";

describe("AxiosTransport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends a single hop and lower-cases response headers", async () => {
    const request = vi.spyOn(axios, "request").mockResolvedValue({
      status: 302,
      statusText: "Found",
      headers: { Location: "/next", "Set-Cookie": ["sid=1; Path=/"] },
      data: "",
      config: { headers: new AxiosHeaders() },
    });

    const res = await new AxiosTransport(1000).send({
      method: "POST",
      url: "https://forum.example.org/login",
      headers: { "User-Agent": "test-agent/1.0" },
      body: "a=1",
    });

    expect(res).toEqual({
      status: 302,
      headers: { location: "/next", "set-cookie": ["sid=1; Path=/"] },
      body: "",
    });
    expect(request).toHaveBeenCalledWith(
      expect.objectContaining({
        method: "POST",
        url: "https://forum.example.org/login",
        data: "a=1",
        timeout: 1000,
        maxRedirects: 0,
      })
    );
  });

  it("wraps network errors as TransportFailure", async () => {
    vi.spyOn(axios, "request").mockRejectedValue(
      new AxiosError("timeout of 1000ms exceeded", "ECONNABORTED")
    );

    const failure = await new AxiosTransport(1000)
      .send({ method: "GET", url: "https://forum.example.org/", headers: {} })
      .catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(TransportFailure);
    expect(failure).toMatchObject({
      message: "ECONNABORTED: timeout of 1000ms exceeded",
      url: "https://forum.example.org/",
    });
  });
});
