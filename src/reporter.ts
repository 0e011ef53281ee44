import type { CheckReport, Verdict } from "./types";

const EXIT_CODES: Record<Verdict, number> = {
  SAME_DOMAIN: 0,
  DIFFERENT_DOMAIN: 1,
  ERROR: 2,
};

export function exitCodeFor(verdict: Verdict): number {
  return EXIT_CODES[verdict];
}

/**
 * Render a report as one pretty-printed JSON object. The verdict and the
 * three domain/URL keys come first and are always present (null when unknown).
 */
export function renderJson(report: CheckReport): string {
  const ordered = {
    verdict: report.verdict,
    login_domain: report.login_domain,
    final_domain: report.final_domain,
    final_url: report.final_url,
    login_url: report.login_url,
    status_code: report.status_code,
    redirect_chain: report.redirect_chain,
    form: report.form,
    similarity: report.similarity,
    lookalike: report.lookalike,
    final_domain_trusted: report.final_domain_trusted,
    error: report.error,
  };
  return JSON.stringify(ordered, null, 2);
}

/**
 * Render a report for a terminal: a verdict line followed by indented
 * detail lines for the redirect chain and any warnings.
 */
export function renderText(report: CheckReport): string {
  if (report.verdict === "ERROR") {
    const kind = report.error?.kind ?? "Error";
    const message = report.error?.message ?? "check failed";
    return `ERROR (${kind}): ${message}`;
  }

  const lines = [
    `${report.verdict}: ${report.login_domain ?? "?"} -> ${report.final_domain ?? "?"}`,
    `  final URL: ${report.final_url ?? "?"} (HTTP ${report.status_code ?? "?"})`,
  ];

  for (const hop of report.redirect_chain.slice(0, -1)) {
    lines.push(`  redirect: ${hop.status_code} ${hop.url}`);
  }

  if (report.lookalike) {
    lines.push(
      `  warning: ${report.final_domain} looks like ${report.login_domain} (similarity ${report.similarity}%)`
    );
  }
  if (report.final_domain_trusted) {
    lines.push(`  note: ${report.final_domain} is on the allowlist`);
  }

  return lines.join("\n");
}
