import { isIP } from "net";
import { distance } from "fastest-levenshtein";
import { parse } from "tldts";
import { CheckError } from "./errors";
import type { DomainComparison } from "./types";

/** Label similarity at or above which a foreign domain counts as a lookalike */
export const LOOKALIKE_THRESHOLD = 85;

export interface DomainInfo {
  hostname: string;
  /** eTLD+1, e.g. "example.co.uk" */
  domain: string;
  /** registrable domain without its public suffix, e.g. "example" */
  label: string;
}

/**
 * Reduce a URL to its registrable domain using the public suffix list,
 * private section included. IP hosts are their own registrable domain.
 * @param rawUrl - Absolute URL
 */
export function registrableDomain(rawUrl: string): DomainInfo {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    throw new CheckError("DomainParseError", `Cannot parse URL "${rawUrl}"`);
  }

  // URL already lower-cases the host and converts IDNs to punycode
  const hostname = url.hostname.replace(/\.$/, "");
  if (!hostname) {
    throw new CheckError("DomainParseError", `URL "${rawUrl}" has no host`);
  }

  const bareHost = hostname.replace(/^\[|\]$/g, "");
  if (isIP(bareHost)) {
    return { hostname, domain: bareHost, label: bareHost };
  }

  const parsed = parse(hostname, { allowPrivateDomains: true, extractHostname: false });
  if (!parsed.domain) {
    throw new CheckError(
      "DomainParseError",
      `Host "${hostname}" has no registrable domain (public suffix "${parsed.publicSuffix ?? ""}")`
    );
  }

  return {
    hostname,
    domain: parsed.domain,
    label: parsed.domainWithoutSuffix || parsed.domain,
  };
}

/**
 * Best Levenshtein similarity (0-100) of the shorter string against every
 * same-length window of the longer one.
 */
export function partialSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];

  let best = 0;
  for (let i = 0; i + short.length <= long.length; i++) {
    const window = long.slice(i, i + short.length);
    const score = 1 - distance(short, window) / short.length;
    if (score > best) best = score;
    if (best === 1) break;
  }
  return Math.round(best * 100);
}

/**
 * Compare the registrable domains of the login page and the final URL.
 * Subdomains of one registrable domain are the same domain.
 */
export function compareDomains(loginUrl: string, finalUrl: string): DomainComparison {
  const login = registrableDomain(loginUrl);
  const final = registrableDomain(finalUrl);
  const same = login.domain === final.domain;
  const similarity = same ? 100 : partialSimilarity(login.label, final.label);

  return {
    verdict: same ? "SAME_DOMAIN" : "DIFFERENT_DOMAIN",
    login_domain: login.domain,
    final_domain: final.domain,
    similarity,
    lookalike: !same && similarity >= LOOKALIKE_THRESHOLD,
  };
}

/**
 * Check a registrable domain against allowlist entries. Entries may be bare
 * domains, subdomains or full URLs; each is reduced to its registrable domain.
 */
export function isTrustedDomain(domain: string, allowlist: readonly string[]): boolean {
  for (const entry of allowlist) {
    const trimmed = entry.trim().toLowerCase().replace(/^\*\./, "");
    if (!trimmed) continue;
    const asUrl = trimmed.includes("://") ? trimmed : `http://${trimmed}`;
    let entryDomain: string;
    try {
      entryDomain = registrableDomain(asUrl).domain;
    } catch {
      entryDomain = trimmed;
    }
    if (entryDomain === domain) return true;
  }
  return false;
}
