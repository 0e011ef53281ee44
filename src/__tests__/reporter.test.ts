import { describe, expect, it } from "vitest";
import { exitCodeFor, renderJson, renderText } from "../reporter";
import type { CheckReport } from "../types";

const DIFFERENT: CheckReport = {
  verdict: "DIFFERENT_DOMAIN",
  login_url: "https://example.com/login",
  login_domain: "example.com",
  final_domain: "evil-example.net",
  final_url: "https://evil-example.net/collect",
  status_code: 200,
  redirect_chain: [
    { url: "https://example.com/session", status_code: 302 },
    { url: "https://evil-example.net/collect", status_code: 200 },
  ],
  form: {
    action_url: "https://example.com/session",
    method: "POST",
    username_field: "email",
    password_field: "pass",
  },
  similarity: 100,
  lookalike: true,
  final_domain_trusted: false,
  error: null,
};

const FAILED: CheckReport = {
  ...DIFFERENT,
  verdict: "ERROR",
  login_domain: "example.com",
  final_domain: null,
  final_url: null,
  status_code: null,
  redirect_chain: [],
  form: null,
  similarity: null,
  lookalike: false,
  error: { kind: "NoFormFound", message: "No <form> element found on https://example.com/login" },
};

describe("exitCodeFor", () => {
  it("maps verdicts to 0, 1 and 2", () => {
    expect(exitCodeFor("SAME_DOMAIN")).toBe(0);
    expect(exitCodeFor("DIFFERENT_DOMAIN")).toBe(1);
    expect(exitCodeFor("ERROR")).toBe(2);
  });
});

describe("renderText", () => {
  it("prints the verdict, final URL, redirect hops and the lookalike warning", () => {
    expect(renderText(DIFFERENT).split("\n")).toEqual([
      "DIFFERENT_DOMAIN: example.com -> evil-example.net",
      "  final URL: https://evil-example.net/collect (HTTP 200)",
      "  redirect: 302 https://example.com/session",
      "  warning: evil-example.net looks like example.com (similarity 100%)",
    ]);
  });

  it("notes an allowlisted final domain", () => {
    const trusted: CheckReport = {
      ...DIFFERENT,
      final_domain: "okta.com",
      final_url: "https://example.okta.com/sso",
      redirect_chain: [{ url: "https://example.okta.com/sso", status_code: 200 }],
      similarity: 20,
      lookalike: false,
      final_domain_trusted: true,
    };

    expect(renderText(trusted).split("\n")).toEqual([
      "DIFFERENT_DOMAIN: example.com -> okta.com",
      "  final URL: https://example.okta.com/sso (HTTP 200)",
      "  note: okta.com is on the allowlist",
    ]);
  });

  it("prints the error kind and message for ERROR", () => {
    expect(renderText(FAILED)).toBe(
      "ERROR (NoFormFound): No <form> element found on https://example.com/login"
    );
  });
});

describe("renderJson", () => {
  it("puts the verdict and domain keys first", () => {
    const parsed: Record<string, unknown> = JSON.parse(renderJson(DIFFERENT));

    expect(Object.keys(parsed).slice(0, 4)).toEqual([
      "verdict",
      "login_domain",
      "final_domain",
      "final_url",
    ]);
    expect(parsed["final_url"]).toBe("https://evil-example.net/collect");
    expect(parsed["lookalike"]).toBe(true);
  });

  it("keeps the domain keys as null on error", () => {
    const parsed: Record<string, unknown> = JSON.parse(renderJson(FAILED));

    expect(parsed).toMatchObject({
      verdict: "ERROR",
      login_domain: "example.com",
      final_domain: null,
      final_url: null,
      error: { kind: "NoFormFound", message: "No <form> element found on https://example.com/login" },
    });
  });
});
