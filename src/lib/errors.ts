import { DenyReason } from "./types";

export class UrlDeniedError extends Error {
  constructor(
    readonly url: string,
    readonly reason: DenyReason,
    readonly detail: string
  ) {
    super(`URL denied (${reason}): ${detail}`);
    this.name = "UrlDeniedError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid engine configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export class HttpError extends Error {
  readonly retryable: boolean;

  constructor(
    readonly url: string,
    readonly status: number,
    message: string = `HTTP ${status} for ${url}`
  ) {
    super(message);
    this.name = "HttpError";
    this.retryable = status === 429 || status >= 500;
  }
}
