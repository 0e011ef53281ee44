import type { AxiosAdapter } from "axios";
import { readDomainsFromFile } from "./core/file-reader";
import { HttpSession } from "./core/session";
import { createHttpClient } from "./core/utils";
import { compareDomains, isTrustedDomain, registrableDomain } from "./domain-comparator";
import { CheckError, isCheckError } from "./errors";
import { locateLoginForm } from "./form-locator";
import { submitLoginForm } from "./form-submitter";
import { Logger } from "./logger";
import type { CheckConfig, CheckReport, DetectedForm, SubmissionResult } from "./types";

export interface PipelineDeps {
  logger?: Logger;
  /** Replaces the network transport for every request of the run */
  adapter?: AxiosAdapter;
}

/** Report with nothing filled in yet */
function emptyReport(loginUrl: string | null): CheckReport {
  return {
    verdict: "ERROR",
    login_url: loginUrl,
    login_domain: null,
    final_domain: null,
    final_url: null,
    status_code: null,
    redirect_chain: [],
    form: null,
    similarity: null,
    lookalike: false,
    final_domain_trusted: false,
    error: null,
  };
}

function asCheckError(err: unknown): CheckError {
  if (isCheckError(err)) return err;
  return new CheckError("NetworkError", err instanceof Error ? err.message : String(err), { cause: err });
}

/**
 * Build the ERROR report for a failure that happened before or outside a
 * run, such as invalid arguments.
 */
export function errorReport(err: unknown, loginUrl: string | null = null): CheckReport {
  const report = emptyReport(loginUrl);
  const failure = asCheckError(err);
  report.error = { kind: failure.kind, message: failure.message };
  return report;
}

/**
 * Run one check: fetch the login page, locate and submit its login form,
 * then compare the registrable domains of the login page and where the
 * submission ended up. Never throws: every failure becomes an ERROR report.
 */
export async function runCheck(config: CheckConfig, deps: PipelineDeps = {}): Promise<CheckReport> {
  const logger = deps.logger ?? new Logger({ silent: config.quiet });
  const { target } = config;
  const report = emptyReport(target.loginUrl);
  const startTime = Date.now();

  try {
    const loginDomain = registrableDomain(target.loginUrl);
    report.login_domain = loginDomain.domain;

    const allowlist = [...config.allowDomains];
    if (config.allowlistFile) {
      allowlist.push(...readDomainsFromFile(config.allowlistFile, config.allowlistColumn));
    }

    const http = createHttpClient({
      timeout: config.timeout,
      insecure: config.insecure,
      userAgent: config.userAgent,
      adapter: deps.adapter,
    });
    const session = new HttpSession(http, config.maxRedirects, logger);

    // ── Step 1: Fetch the login page ────────────────────────────────
    logger.info("FETCH_LOGIN_PAGE", { url: target.loginUrl, insecure: config.insecure });
    const page = await session.request(target.loginUrl, { method: "GET" });
    if (page.statusCode >= 400) {
      throw new CheckError(
        "NetworkError",
        `Login page answered HTTP ${page.statusCode} (${page.finalUrl})`
      );
    }
    logger.success("FETCH_LOGIN_PAGE", {
      finalUrl: page.finalUrl,
      status: page.statusCode,
      htmlSize: `${Math.round(page.body.length / 1024)}KB`,
    });

    // ── Step 2: Locate the login form ───────────────────────────────
    const detection = locateLoginForm(page.body, page.finalUrl, {
      usernameField: target.usernameField,
      passwordField: target.passwordField,
    });
    if (detection.status === "absent") {
      throw new CheckError("NoFormFound", detection.reason);
    }
    if (detection.status === "ambiguous") {
      throw new CheckError("AmbiguousForm", detection.reason);
    }
    const form: DetectedForm = detection.form;
    report.form = {
      action_url: form.actionUrl,
      method: form.method,
      username_field: form.usernameField,
      password_field: form.passwordField,
    };
    logger.success("FORM_DETECTED", {
      action: form.actionUrl,
      method: form.method,
      usernameField: form.usernameField,
      passwordField: form.passwordField,
      fields: [...form.fieldNames],
    });

    // ── Step 3: Submit it ───────────────────────────────────────────
    const submission: SubmissionResult = await submitLoginForm(
      session,
      form,
      target,
      page.finalUrl,
      logger
    );
    report.final_url = submission.finalUrl;
    report.status_code = submission.statusCode;
    report.redirect_chain = submission.redirectChain;

    // ── Step 4: Compare domains ─────────────────────────────────────
    const comparison = compareDomains(target.loginUrl, submission.finalUrl);
    report.verdict = comparison.verdict;
    report.login_domain = comparison.login_domain;
    report.final_domain = comparison.final_domain;
    report.similarity = comparison.similarity;
    report.lookalike = comparison.lookalike;
    report.final_domain_trusted = isTrustedDomain(comparison.final_domain, allowlist);

    logger.success("COMPARE_DOMAINS", {
      verdict: comparison.verdict,
      loginDomain: comparison.login_domain,
      finalDomain: comparison.final_domain,
      similarity: comparison.similarity,
    }, startTime);
    return report;
  } catch (err) {
    const failure = asCheckError(err);
    logger.error("CHECK_FAILED", failure, { kind: failure.kind });
    report.verdict = "ERROR";
    report.error = { kind: failure.kind, message: failure.message };
    return report;
  }
}
