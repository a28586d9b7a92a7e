import { config } from "../lib/config";
import { getEngineConfig } from "../lib/engine-config";
import { createHttpRobotsFetch } from "../lib/scraping/fetcher";
import { RobotsCache, RobotsPolicy } from "../lib/safety/robots";
import { isSafe, isSecurityDeny } from "../lib/safety/url-gate";

async function main() {
  const args = process.argv.slice(2);
  const withRobots = args.includes("--robots");
  const urls = args.filter((a) => a !== "--robots");

  if (urls.length === 0) {
    console.error("Usage: check-url <url...> [--robots]");
    process.exit(1);
  }

  const robots = withRobots
    ? new RobotsPolicy({
        fetch: createHttpRobotsFetch(),
        cache: new RobotsCache(Date.now, getEngineConfig().engine.fetch.robotsTtlMs),
        userAgent: config.robotsAgentToken,
      })
    : undefined;

  let denied = 0;
  for (const url of urls) {
    const verdict = await isSafe(url, { robots });
    if (verdict.allowed) {
      console.log(`ALLOW ${verdict.url}`);
    } else {
      denied++;
      const kind = isSecurityDeny(verdict.reason) ? "security" : "policy";
      console.log(`DENY  ${url} ${verdict.reason} (${kind}): ${verdict.detail}`);
    }
  }

  process.exit(denied > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
