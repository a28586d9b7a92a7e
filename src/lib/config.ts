export const config = {
  dbPath: process.env.DB_PATH || "data/mining-specs.db",
  engineConfigDir: process.env.ENGINE_CONFIG_DIR || "config",
  maxConcurrentModels: parseInt(process.env.MAX_CONCURRENT_MODELS || "3", 10),
  maxConcurrentPerDomain: parseInt(process.env.MAX_CONCURRENT_PER_DOMAIN || "2", 10),
  respectRobots: process.env.RESPECT_ROBOTS !== "false",
  robotsAgentToken: process.env.ROBOTS_AGENT_TOKEN || "MiningSpecBot",
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
