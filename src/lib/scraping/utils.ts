import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { HttpError, UrlDeniedError } from "../errors";
import { isSafe } from "../safety/url-gate";
import type { SafetyVerdict } from "../types";

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("Aborted");
}

/** Resolves after `ms`, or rejects as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Exponential backoff with jitter: base * 2^attempt, scaled into [50%, 100%]. */
export function backoffDelay(attempt: number, baseMs: number, random: () => number = Math.random): number {
  return baseMs * Math.pow(2, attempt) * (0.5 + random() * 0.5);
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export type UrlGate = (url: string) => Promise<SafetyVerdict>;

export interface FetchPageOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  maxRedirects?: number;
  signal?: AbortSignal;
  gate?: UrlGate;
  /** Statuses handed back to the caller instead of being treated as failures. */
  acceptStatus?: (status: number) => boolean;
  accept?: string;
  /** Bytes of body kept; the rest of the stream is cancelled. */
  maxBodyBytes?: number;
  random?: () => number;
}

export interface FetchedPage {
  url: string; // final URL after redirects
  status: number;
  contentType: string;
  body: string;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_BODY_BYTES = 5 * 1024 * 1024;

type UndiciResponse = Awaited<ReturnType<typeof undiciFetch>>;

async function readBody(response: UndiciResponse, maxBytes: number): Promise<string> {
  const stream = response.body;
  if (!stream) return response.text();

  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = "";
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const room = maxBytes - received;
    if (value.byteLength > room) {
      text += decoder.decode(value.subarray(0, room), { stream: true });
      await reader.cancel();
      console.warn(`[fetch] ${response.url || "response"} truncated at ${maxBytes} bytes`);
      break;
    }
    received += value.byteLength;
    text += decoder.decode(value, { stream: true });
  }
  return text + decoder.decode();
}

async function checkGate(url: string, gate: UrlGate): Promise<void> {
  const verdict = await gate(url);
  if (!verdict.allowed) throw new UrlDeniedError(url, verdict.reason, verdict.detail);
}

async function requestOnce(
  url: string,
  options: Required<
    Pick<FetchPageOptions, "timeoutMs" | "maxRedirects" | "gate" | "acceptStatus" | "accept" | "maxBodyBytes">
  > & {
    signal?: AbortSignal;
  }
): Promise<FetchedPage> {
  const dispatcher = getProxyDispatcher();
  let current = url;

  // Redirects are followed by hand so every hop goes through the gate.
  for (let hop = 0; ; hop++) {
    await checkGate(current, options.gate);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    let status: number;
    let location: string | null;
    let contentType: string;
    let body: string;
    try {
      const fetchOptions: Parameters<typeof undiciFetch>[1] = {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept: options.accept,
          "Accept-Language": "en-US,en;q=0.9,es;q=0.8",
        },
        redirect: "manual",
        signal: controller.signal,
        dispatcher,
      };
      const response = await undiciFetch(current, fetchOptions);
      status = response.status;
      location = response.headers.get("location");
      contentType = response.headers.get("content-type") ?? "";
      if (REDIRECT_STATUSES.has(status)) {
        // Release the connection; redirect bodies are never read.
        await response.body?.cancel();
        body = "";
      } else {
        body = await readBody(response, options.maxBodyBytes);
      }
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    }

    if (REDIRECT_STATUSES.has(status) && location) {
      if (hop >= options.maxRedirects) {
        throw new HttpError(current, status, `Too many redirects (${options.maxRedirects}) from ${url}`);
      }
      current = new URL(location, current).toString();
      continue;
    }

    if (options.acceptStatus(status)) {
      return { url: current, status, contentType, body };
    }
    if (status === 403) {
      throw new HttpError(current, status, `Access denied (403) for ${current}`);
    }
    if (status < 200 || status >= 300) {
      throw new HttpError(current, status);
    }
    return { url: current, status, contentType, body };
  }
}

/**
 * GET with the URL gate on every hop, a per-attempt timeout and jittered
 * exponential backoff for 429, 5xx, timeouts and network errors. Gate
 * denials and other HTTP errors are never retried.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<FetchedPage> {
  const {
    retries = 3,
    retryDelayMs = 2000,
    timeoutMs = 15000,
    maxRedirects = 5,
    signal,
    gate = (u: string) => isSafe(u),
    acceptStatus = () => false,
    accept = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    maxBodyBytes = MAX_BODY_BYTES,
    random = Math.random,
  } = options;

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) throw abortError(signal);
    try {
      return await requestOnce(url, { timeoutMs, maxRedirects, gate, acceptStatus, accept, maxBodyBytes, signal });
    } catch (error: unknown) {
      if (error instanceof UrlDeniedError || signal?.aborted) throw error;
      const retryable = error instanceof HttpError ? error.retryable : true;
      if (!retryable || attempt >= retries) throw error;

      const wait = backoffDelay(attempt, retryDelayMs, random);
      console.warn(
        `[fetch] ${url}: ${error instanceof Error ? error.message : String(error)}; retry ${attempt + 1}/${retries} in ${Math.round(wait)}ms`
      );
      await delay(wait, signal);
    }
  }
}
