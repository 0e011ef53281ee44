import { AxiosError, AxiosHeaders } from "axios";
import type { AxiosAdapter, AxiosResponse } from "axios";

export interface FakeRequest {
  method: string;
  url: string;
  body: string;
  /** lower-cased header names */
  headers: Record<string, string>;
}

export interface FakeReply {
  status?: number;
  headers?: Record<string, string | string[]>;
  body?: string;
  /** fail the request with this transport error code instead of replying */
  error?: string;
}

type Route = FakeReply | ((req: FakeRequest) => FakeReply);

/**
 * In-process stand-in for the web: routes "METHOD url" to canned replies
 * and records every request that reaches it. Unrouted URLs refuse the
 * connection.
 */
export class FakeSite {
  readonly requests: FakeRequest[] = [];
  private readonly routes = new Map<string, Route>();

  on(method: "GET" | "POST", url: string, route: Route): this {
    this.routes.set(`${method} ${url}`, route);
    return this;
  }

  page(url: string, html: string, headers: Record<string, string | string[]> = {}): this {
    return this.on("GET", url, {
      status: 200,
      headers: { "content-type": "text/html; charset=utf-8", ...headers },
      body: html,
    });
  }

  redirect(method: "GET" | "POST", url: string, location: string, status = 302): this {
    return this.on(method, url, { status, headers: { location } });
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? "get").toUpperCase();
    const url = config.url ?? "";

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(config.headers.toJSON())) {
      if (value !== undefined && value !== null) headers[name.toLowerCase()] = String(value);
    }
    const req: FakeRequest = {
      method,
      url,
      body: typeof config.data === "string" ? config.data : "",
      headers,
    };
    this.requests.push(req);

    const route = this.routes.get(`${method} ${url}`);
    if (!route) {
      throw new AxiosError(`connect ECONNREFUSED ${url}`, "ECONNREFUSED", config);
    }
    const reply = typeof route === "function" ? route(req) : route;
    if (reply.error) {
      throw new AxiosError(`request failed: ${reply.error}`, reply.error, config);
    }

    const responseHeaders = new AxiosHeaders();
    for (const [name, value] of Object.entries(reply.headers ?? {})) {
      responseHeaders.set(name.toLowerCase(), value);
    }

    const response: AxiosResponse<string> = {
      data: reply.body ?? "",
      status: reply.status ?? 200,
      statusText: "",
      headers: responseHeaders,
      config,
      request: {},
    };
    return response;
  };
}
