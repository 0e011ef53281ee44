import * as https from "https";
import axios, { AxiosError } from "axios";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { CheckError } from "../errors";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

/** Error codes Node and OpenSSL raise when certificate verification fails */
const TLS_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_REVOKED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "EPROTO",
]);

export interface HttpClientOptions {
  timeout: number;
  insecure: boolean;
  userAgent: string;
  /** Replaces the network transport; tests pass an in-process fake here */
  adapter?: AxiosAdapter;
}

/**
 * Create a configured axios instance with realistic browser headers.
 * Redirects are not followed by axios: the session follows them itself so
 * cookies are stored at every hop. Every status resolves; callers decide.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeout,
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "User-Agent": options.userAgent,
    },
    maxRedirects: 0,
    validateStatus: () => true,
    responseType: "text",
    httpsAgent: new https.Agent({ rejectUnauthorized: !options.insecure }),
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
}

function isTlsCode(code: string | undefined): boolean {
  if (!code) return false;
  return TLS_ERROR_CODES.has(code) || code.startsWith("ERR_SSL_") || code.startsWith("ERR_TLS_");
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (isTlsCode(err.code))
      return `SSL certificate error (${err.code}); re-run with --insecure to skip verification`;
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Classify a transport failure as a TLSError or NetworkError.
 * CheckErrors pass through unchanged.
 * @param err - The caught error
 * @param url - The URL that was being requested
 */
export function toCheckError(err: unknown, url: string): CheckError {
  if (err instanceof CheckError) return err;
  const message = `${getErrorMessage(err)} (${url})`;
  if (err instanceof AxiosError && isTlsCode(err.code)) {
    return new CheckError("TLSError", message, { cause: err });
  }
  return new CheckError("NetworkError", message, { cause: err });
}

/**
 * Format a duration in milliseconds to a human-readable string like "1.2s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds % 60);
  return `${minutes}m ${seconds}s`;
}
