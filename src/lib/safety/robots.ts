/**
 * robots.txt parsing and a per-origin policy with an injected cache and clock.
 */

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsGroup {
  agents: string[]; // lowercase product tokens, "*" for everyone
  rules: RobotsRule[];
  crawlDelay?: number; // seconds
}

export interface ParsedRobotsTxt {
  groups: RobotsGroup[];
  sitemaps: string[];
}

export type RobotsRules =
  | { kind: "rules"; parsed: ParsedRobotsTxt }
  | { kind: "allow_all" }
  | { kind: "disallow_all" };

export interface RobotsResponse {
  status: number;
  body: string;
}

export type RobotsFetch = (url: string) => Promise<RobotsResponse>;
export type Clock = () => number;

export const DEFAULT_ROBOTS_TTL_MS = 60 * 60 * 1000;

// ===== Parsing =====

export function parseRobotsTxt(content: string): ParsedRobotsTxt {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const line of content.split(/\r?\n/)) {
    const hash = line.indexOf("#");
    const trimmed = (hash === -1 ? line : line.slice(0, hash)).trim();
    if (!trimmed) continue;

    const colonIndex = trimmed.indexOf(":");
    if (colonIndex === -1) continue;
    const directive = trimmed.slice(0, colonIndex).trim().toLowerCase();
    const value = trimmed.slice(colonIndex + 1).trim();

    if (directive === "user-agent") {
      // Consecutive User-agent lines share one group.
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      collectingAgents = true;
      continue;
    }

    if (directive === "sitemap") {
      if (value) sitemaps.push(value);
      continue;
    }

    collectingAgents = false;
    if (!current) continue;

    if (directive === "allow" || directive === "disallow") {
      // An empty Disallow is no rule at all.
      if (value) current.rules.push({ allow: directive === "allow", pattern: value });
    } else if (directive === "crawl-delay") {
      const delay = parseFloat(value);
      if (!isNaN(delay) && delay >= 0) current.crawlDelay = delay;
    }
  }

  return { groups, sitemaps };
}

/**
 * Matches a robots path pattern against a path. `*` matches any run of
 * characters and a trailing `$` anchors the end; otherwise the pattern is a
 * prefix. Runs without regular expressions.
 */
export function matchesPattern(path: string, pattern: string): boolean {
  let pat = pattern;
  if (pat.endsWith("$")) pat = pat.slice(0, -1);
  else pat += "*";

  let p = 0;
  let s = 0;
  let star = -1;
  let mark = 0;
  while (s < path.length) {
    if (p < pat.length && pat[p] === "*") {
      star = p++;
      mark = s;
    } else if (p < pat.length && pat[p] === path[s]) {
      p++;
      s++;
    } else if (star !== -1) {
      p = star + 1;
      s = ++mark;
    } else {
      return false;
    }
  }
  while (p < pat.length && pat[p] === "*") p++;
  return p === pat.length;
}

/** Groups for the most specific agent naming us, else the "*" groups. */
export function selectGroups(parsed: ParsedRobotsTxt, userAgent: string): RobotsGroup[] {
  const token = userAgent.toLowerCase();
  let best = "";
  for (const group of parsed.groups) {
    for (const agent of group.agents) {
      if (agent !== "*" && token.startsWith(agent) && agent.length > best.length) best = agent;
    }
  }
  const wanted = best || "*";
  return parsed.groups.filter((g) => g.agents.includes(wanted));
}

/** Longest matching pattern decides; Allow wins a tie; no match allows. */
export function isPathAllowed(parsed: ParsedRobotsTxt, userAgent: string, path: string): boolean {
  if (path === "/robots.txt") return true;
  let decided: RobotsRule | null = null;
  for (const group of selectGroups(parsed, userAgent)) {
    for (const rule of group.rules) {
      if (!matchesPattern(path, rule.pattern)) continue;
      if (
        !decided ||
        rule.pattern.length > decided.pattern.length ||
        (rule.pattern.length === decided.pattern.length && rule.allow && !decided.allow)
      ) {
        decided = rule;
      }
    }
  }
  return decided ? decided.allow : true;
}

// ===== Cache =====

interface CacheEntry {
  rules: RobotsRules;
  expiresAt: number;
}

export class RobotsCache {
  private entries = new Map<string, CacheEntry>();

  constructor(
    private readonly clock: Clock = Date.now,
    private readonly ttlMs: number = DEFAULT_ROBOTS_TTL_MS
  ) {}

  get(domain: string): RobotsRules | undefined {
    const entry = this.entries.get(domain);
    if (!entry) return undefined;
    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(domain);
      return undefined;
    }
    return entry.rules;
  }

  put(domain: string, rules: RobotsRules): void {
    this.entries.set(domain, { rules, expiresAt: this.clock() + this.ttlMs });
  }

  expire(domain: string): boolean {
    return this.entries.delete(domain);
  }

  /** Drops every expired entry and returns how many went. */
  prune(): number {
    const now = this.clock();
    let removed = 0;
    for (const [domain, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(domain);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

// ===== Policy =====

export interface RobotsPolicyOptions {
  fetch: RobotsFetch;
  cache?: RobotsCache;
  userAgent: string;
}

export class RobotsPolicy {
  readonly cache: RobotsCache;
  private readonly fetchRobots: RobotsFetch;
  private readonly userAgent: string;
  private pending = new Map<string, Promise<RobotsRules | null>>();

  constructor(options: RobotsPolicyOptions) {
    this.cache = options.cache ?? new RobotsCache();
    this.fetchRobots = options.fetch;
    this.userAgent = options.userAgent;
  }

  /** Rules for the URL's origin; null when robots.txt could not be fetched. */
  async getRules(url: URL): Promise<RobotsRules | null> {
    const domain = url.origin;
    const cached = this.cache.get(domain);
    if (cached) return cached;

    const inFlight = this.pending.get(domain);
    if (inFlight) return inFlight;

    const request = this.load(domain).finally(() => this.pending.delete(domain));
    this.pending.set(domain, request);
    return request;
  }

  private async load(domain: string): Promise<RobotsRules | null> {
    let response: RobotsResponse;
    try {
      response = await this.fetchRobots(`${domain}/robots.txt`);
    } catch (error) {
      // Not cached: the next request tries again.
      console.warn(`[robots] Failed to fetch robots.txt for ${domain}:`, error instanceof Error ? error.message : error);
      return null;
    }

    let rules: RobotsRules;
    if (response.status >= 200 && response.status < 300) {
      rules = { kind: "rules", parsed: parseRobotsTxt(response.body) };
    } else if (response.status >= 400 && response.status < 500) {
      rules = { kind: "allow_all" };
    } else if (response.status >= 500) {
      rules = { kind: "disallow_all" };
    } else {
      rules = { kind: "allow_all" };
    }
    this.cache.put(domain, rules);
    return rules;
  }

  async isAllowed(url: string): Promise<boolean> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    const rules = await this.getRules(parsed);
    if (!rules || rules.kind === "allow_all") return true;
    if (rules.kind === "disallow_all") return false;
    return isPathAllowed(rules.parsed, this.userAgent, `${parsed.pathname}${parsed.search}`);
  }

  async getCrawlDelay(url: string): Promise<number | null> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return null;
    }
    const rules = await this.getRules(parsed);
    if (!rules || rules.kind !== "rules") return null;
    const delays = selectGroups(rules.parsed, this.userAgent)
      .map((g) => g.crawlDelay)
      .filter((d): d is number => d !== undefined);
    return delays.length > 0 ? Math.max(...delays) : null;
  }
}
