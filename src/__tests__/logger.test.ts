import { Writable } from "stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../logger";

function collector(): { stream: Writable; lines: () => string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, lines: () => chunks.join("").split("\n").filter(Boolean) };
}

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes a step header followed by key/value lines", () => {
    const out = collector();
    const logger = new Logger({ stream: out.stream, colors: false });

    logger.info("FETCH_LOGIN_PAGE", { url: "https://example.com/login", skipped: undefined, insecure: false });

    const [header, ...rest] = out.lines();
    expect(header).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[RUN-[0-9a-f]{8}\] FETCH_LOGIN_PAGE$/);
    expect(rest).toEqual(["  url: https://example.com/login", "  insecure: false"]);
  });

  it("prints a warning message and its data", () => {
    const out = collector();
    const logger = new Logger({ stream: out.stream, colors: false });

    logger.warn("REDIRECT", "odd location", { hops: ["a", "b"] });

    expect(out.lines().slice(1)).toEqual(["  odd location", "  hops: [a, b]"]);
  });

  it("appends the time elapsed since the given start", () => {
    const out = collector();
    const logger = new Logger({ stream: out.stream, colors: false });
    vi.spyOn(Date, "now").mockReturnValue(10_250);

    logger.success("COMPARE_DOMAINS", { verdict: "SAME_DOMAIN" }, 10_000);

    expect(out.lines().slice(1)).toEqual(["  verdict: SAME_DOMAIN", "  duration: 250ms"]);
  });

  it("writes nothing when silent", () => {
    const out = collector();
    const logger = new Logger({ stream: out.stream, silent: true });

    logger.info("STEP");
    logger.error("STEP", new Error("boom"));

    expect(out.lines()).toEqual([]);
  });
});
