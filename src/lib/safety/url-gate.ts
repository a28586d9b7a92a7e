import { promises as dns } from "dns";
import { DenyReason, type SafetyVerdict } from "../types";
import { classifyAddress, isIpLiteral } from "./ip-ranges";
import type { RobotsPolicy } from "./robots";

export const MAX_URL_LENGTH = 2048;

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

const METADATA_HOSTNAMES = new Set([
  "metadata",
  "metadata.google.internal",
  "metadata.google.com",
  "metadata.goog",
  "metadata.azure.com",
  "metadata.internal",
  "instance-data",
  "instance-data.ec2.internal",
]);

export type Resolver = (hostname: string) => Promise<string[]>;

export const defaultResolver: Resolver = async (hostname) => {
  const results = await dns.lookup(hostname, { all: true, verbatim: true });
  return results.map((r) => r.address);
};

export interface GateOptions {
  resolver?: Resolver;
  robots?: RobotsPolicy;
  respectRobots?: boolean;
}

function deny(reason: DenyReason, detail: string): SafetyVerdict {
  return { allowed: false, reason, detail };
}

function normalizeHostname(hostname: string): string {
  return hostname.toLowerCase().replace(/^\[|\]$/g, "").replace(/\.+$/, "");
}

/** Robots denials are policy, every other reason is a security deny. */
export function isSecurityDeny(reason: DenyReason): boolean {
  return reason !== DenyReason.ROBOTS_DISALLOWED;
}

/**
 * Decides whether a URL may be fetched. Fails closed: anything that cannot be
 * shown to point at a public address is denied. Nothing is cached and DNS is
 * resolved on every call.
 */
export async function isSafe(url: string, options: GateOptions = {}): Promise<SafetyVerdict> {
  if (!url || url.length > MAX_URL_LENGTH) {
    return deny(DenyReason.INVALID_URL, url ? `longer than ${MAX_URL_LENGTH} characters` : "empty URL");
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return deny(DenyReason.INVALID_URL, "not a valid URL");
  }
  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    return deny(DenyReason.INVALID_URL, `scheme ${parsed.protocol} not allowed`);
  }
  if (parsed.username || parsed.password) {
    return deny(DenyReason.INVALID_URL, "embedded credentials");
  }

  const host = normalizeHostname(parsed.hostname);
  if (!host) return deny(DenyReason.INVALID_URL, "missing host");

  if (METADATA_HOSTNAMES.has(host)) {
    return deny(DenyReason.CLOUD_METADATA, `metadata hostname ${host}`);
  }
  if (host === "localhost" || host.endsWith(".localhost")) {
    return deny(DenyReason.PRIVATE_IP, `loopback hostname ${host}`);
  }

  let addresses: string[];
  if (isIpLiteral(host)) {
    addresses = [host];
  } else {
    const resolver = options.resolver ?? defaultResolver;
    try {
      addresses = await resolver(host);
    } catch (err) {
      return deny(DenyReason.DNS_UNRESOLVED, `${host}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (addresses.length === 0) {
      return deny(DenyReason.DNS_UNRESOLVED, `${host}: no addresses`);
    }
  }

  for (const address of addresses) {
    const reason = classifyAddress(address);
    if (reason) return deny(reason, `${host} -> ${address}`);
  }

  if (options.robots && options.respectRobots !== false) {
    const allowed = await options.robots.isAllowed(parsed.toString());
    if (!allowed) {
      return deny(DenyReason.ROBOTS_DISALLOWED, `${parsed.pathname} disallowed by robots.txt`);
    }
  }

  return { allowed: true, url: parsed.toString() };
}

/**
 * Trims a user-supplied URL, assumes https when no scheme is given, and
 * returns it only when the gate allows it.
 */
export async function sanitizeUrl(raw: string, options: GateOptions = {}): Promise<string | null> {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  const verdict = await isSafe(withScheme, options);
  if (!verdict.allowed) {
    console.warn(`[url-gate] Rejected ${withScheme}: ${verdict.reason} (${verdict.detail})`);
    return null;
  }
  return verdict.url;
}
