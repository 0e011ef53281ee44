import { describe, expect, it } from "vitest";
import { HttpSession } from "../core/session";
import { createHttpClient } from "../core/utils";
import { CheckError } from "../errors";
import { FakeSite } from "./helpers/fake-site";

function sessionFor(site: FakeSite, maxRedirects = 10): HttpSession {
  const http = createHttpClient({
    timeout: 1000,
    insecure: false,
    userAgent: "test-agent",
    adapter: site.adapter,
  });
  return new HttpSession(http, maxRedirects);
}

async function failureOf(promise: Promise<unknown>): Promise<CheckError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CheckError) return err;
    throw err;
  }
  throw new Error("expected the request to fail");
}

describe("HttpSession", () => {
  it("follows redirects and records every hop", async () => {
    const site = new FakeSite()
      .redirect("GET", "http://example.com/login", "https://example.com/login", 301)
      .redirect("GET", "https://example.com/login", "/signin")
      .page("https://example.com/signin", "<p>sign in</p>");

    const response = await sessionFor(site).request("http://example.com/login", { method: "GET" });

    expect(response.finalUrl).toBe("https://example.com/signin");
    expect(response.statusCode).toBe(200);
    expect(response.body).toBe("<p>sign in</p>");
    expect(response.responseHeaders["content-type"]).toBe("text/html; charset=utf-8");
    expect(response.redirectChain).toEqual([
      { url: "http://example.com/login", status_code: 301 },
      { url: "https://example.com/login", status_code: 302 },
      { url: "https://example.com/signin", status_code: 200 },
    ]);
  });

  it("sends the configured User-Agent", async () => {
    const site = new FakeSite().page("https://example.com/", "ok");

    await sessionFor(site).request("https://example.com/", { method: "GET" });

    expect(site.requests[0].headers["user-agent"]).toBe("test-agent");
  });

  it("carries cookies set mid-chain to the next hop", async () => {
    const site = new FakeSite()
      .on("GET", "https://example.com/a", {
        status: 302,
        headers: { location: "/b", "set-cookie": ["sid=abc; Path=/", "theme=dark; Path=/"] },
      })
      .page("https://example.com/b", "done");

    await sessionFor(site).request("https://example.com/a", { method: "GET" });

    expect(site.requests[0].headers["cookie"]).toBeUndefined();
    expect(site.requests[1].headers["cookie"]).toBe("sid=abc; theme=dark");
  });

  it("turns a POST into a bodiless GET after 303", async () => {
    const site = new FakeSite()
      .redirect("POST", "https://example.com/session", "https://example.com/home", 303)
      .page("https://example.com/home", "home");

    await sessionFor(site).request("https://example.com/session", {
      method: "POST",
      body: "user=alice",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
    });

    expect(site.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      "POST https://example.com/session",
      "GET https://example.com/home",
    ]);
    expect(site.requests[0].body).toBe("user=alice");
    expect(site.requests[1].body).toBe("");
  });

  it("repeats the POST with its body after 307", async () => {
    const site = new FakeSite()
      .redirect("POST", "https://example.com/session", "https://auth.example.com/session", 307)
      .on("POST", "https://auth.example.com/session", { status: 200, body: "welcome" });

    const response = await sessionFor(site).request("https://example.com/session", {
      method: "POST",
      body: "user=alice",
    });

    expect(response.finalUrl).toBe("https://auth.example.com/session");
    expect(site.requests[1].method).toBe("POST");
    expect(site.requests[1].body).toBe("user=alice");
  });

  it("stops a redirect loop at the hop limit", async () => {
    const site = new FakeSite().redirect("GET", "https://example.com/loop", "/loop");

    const err = await failureOf(
      sessionFor(site, 2).request("https://example.com/loop", { method: "GET" })
    );

    expect(err.kind).toBe("NetworkError");
    expect(err.message).toBe("Too many redirects (more than 2) starting at https://example.com/loop");
    expect(site.requests).toHaveLength(3);
  });

  it("classifies certificate failures as TLSError", async () => {
    const site = new FakeSite().on("GET", "https://expired.example.com/", { error: "CERT_HAS_EXPIRED" });

    const err = await failureOf(
      sessionFor(site).request("https://expired.example.com/", { method: "GET" })
    );

    expect(err.kind).toBe("TLSError");
    expect(err.message).toBe(
      "SSL certificate error (CERT_HAS_EXPIRED); re-run with --insecure to skip verification (https://expired.example.com/)"
    );
  });

  it("classifies refused connections as NetworkError", async () => {
    const err = await failureOf(
      sessionFor(new FakeSite()).request("https://down.example.com/", { method: "GET" })
    );

    expect(err.kind).toBe("NetworkError");
    expect(err.message).toBe("Connection refused (https://down.example.com/)");
  });

  it("returns a 3xx without Location as the final response", async () => {
    const site = new FakeSite().on("GET", "https://example.com/odd", { status: 302, body: "" });

    const response = await sessionFor(site).request("https://example.com/odd", { method: "GET" });

    expect(response.statusCode).toBe(302);
    expect(response.redirectChain).toHaveLength(1);
  });
});
