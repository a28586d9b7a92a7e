import type { SourceDomains } from "../engine-config";
import { SourceTier } from "../types";

function matchesDomain(host: string, domains: string[]): boolean {
  return domains.some((d) => host === d || host.endsWith(`.${d}`));
}

const dealerRegexes = new WeakMap<SourceDomains, RegExp[]>();

function dealerPatterns(domains: SourceDomains): RegExp[] {
  let compiled = dealerRegexes.get(domains);
  if (!compiled) {
    compiled = domains.dealerPatterns.map((p) => new RegExp(`(?:^|[./-])(?:${p})(?:$|[./-])`, "i"));
    dealerRegexes.set(domains, compiled);
  }
  return compiled;
}

/**
 * OEM domains (and their subdomains) first, then brochures hosted elsewhere,
 * then dealers, then spec databases and trade press.
 */
export function classifySource(url: string, domains: SourceDomains): SourceTier {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return SourceTier.UNKNOWN;
  }
  const host = parsed.hostname.toLowerCase().replace(/^www\./, "").replace(/\.$/, "");
  const pathname = parsed.pathname.toLowerCase();

  if (matchesDomain(host, domains.oem)) return SourceTier.OEM_PRIMARY;
  if (domains.brochureExtensions.some((ext) => pathname.endsWith(ext))) return SourceTier.OEM_SECONDARY;
  if (matchesDomain(host, domains.dealers)) return SourceTier.DEALER;
  if (matchesDomain(host, domains.specDatabases) || matchesDomain(host, domains.industry)) {
    return SourceTier.THIRD_PARTY;
  }
  if (dealerPatterns(domains).some((re) => re.test(`${host}${pathname}`))) return SourceTier.DEALER;
  return SourceTier.UNKNOWN;
}
