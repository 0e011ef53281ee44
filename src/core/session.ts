import type { AxiosInstance, AxiosResponse } from "axios";
import { CookieJar } from "tough-cookie";
import { CheckError } from "../errors";
import type { Logger } from "../logger";
import type { HttpMethod, RedirectHop, SubmissionResult } from "../types";
import { toCheckError } from "./utils";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface SessionRequest {
  method: HttpMethod;
  /** Pre-encoded request body; dropped when a redirect switches to GET */
  body?: string;
  headers?: Record<string, string>;
}

/** A followed request: the final response plus its body */
export interface SessionResponse extends SubmissionResult {
  body: string;
}

/**
 * Cookie-keeping HTTP session for one check. Owned by the pipeline and
 * passed from the login page fetch to the form submission, so whatever the
 * site set on the first visit goes back with the credentials.
 */
export class HttpSession {
  readonly jar = new CookieJar();

  constructor(
    private readonly http: AxiosInstance,
    private readonly maxRedirects: number,
    private readonly logger?: Logger
  ) {}

  /**
   * Send a request and follow redirects until a non-redirect response.
   * 303, and 301/302 after a POST, continue as GET without a body.
   * @param url - Absolute URL to request
   * @param request - Method, body and extra headers
   */
  async request(url: string, request: SessionRequest): Promise<SessionResponse> {
    let currentUrl = url;
    let method = request.method;
    let body = request.body;
    const chain: RedirectHop[] = [];

    for (;;) {
      const response = await this.send(currentUrl, method, body, request.headers);
      chain.push({ url: currentUrl, status_code: response.status });
      await this.storeCookies(response, currentUrl);

      const location = redirectLocation(response, currentUrl);
      if (location === null) {
        return {
          finalUrl: currentUrl,
          statusCode: response.status,
          responseHeaders: flattenHeaders(response.headers),
          redirectChain: chain,
          body: typeof response.data === "string" ? response.data : String(response.data ?? ""),
        };
      }

      if (chain.length > this.maxRedirects) {
        throw new CheckError(
          "NetworkError",
          `Too many redirects (more than ${this.maxRedirects}) starting at ${url}`
        );
      }

      if (
        response.status === 303 ||
        ((response.status === 301 || response.status === 302) && method === "POST")
      ) {
        method = "GET";
        body = undefined;
      }

      this.logger?.info("REDIRECT", {
        status: response.status,
        from: currentUrl,
        to: location,
      });
      currentUrl = location;
    }
  }

  private async send(
    url: string,
    method: HttpMethod,
    body: string | undefined,
    extraHeaders: Record<string, string> | undefined
  ): Promise<AxiosResponse<string>> {
    const headers: Record<string, string> = { ...extraHeaders };
    if (body === undefined) delete headers["Content-Type"];

    try {
      const cookie = await this.jar.getCookieString(url);
      if (cookie) headers["Cookie"] = cookie;
      return await this.http.request<string>({ url, method, data: body, headers });
    } catch (err) {
      throw toCheckError(err, url);
    }
  }

  private async storeCookies(response: AxiosResponse<string>, url: string): Promise<void> {
    for (const cookie of toStringList(response.headers["set-cookie"])) {
      await this.jar.setCookie(cookie, url, { ignoreError: true });
    }
  }
}

/**
 * Resolve the Location header of a redirect response against the URL that
 * produced it. Returns null for any response that is not a redirect.
 */
function redirectLocation(response: AxiosResponse<string>, currentUrl: string): string | null {
  if (!REDIRECT_STATUSES.has(response.status)) return null;
  const location: unknown = response.headers["location"];
  if (typeof location !== "string" || location.trim() === "") return null;
  try {
    return new URL(location.trim(), currentUrl).href;
  } catch {
    throw new CheckError(
      "NetworkError",
      `Invalid redirect location "${location}" from ${currentUrl}`
    );
  }
}

function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  if (typeof value === "string") return [value];
  return [];
}

/** Lower-case header names; multi-value headers joined with ", " */
function flattenHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    out[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : String(value);
  }
  return out;
}
