import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// Mock undici fetch
vi.mock("undici", () => ({
  fetch: vi.fn(),
  ProxyAgent: vi.fn(),
}));

import { fetch as undiciFetch } from "undici";
import { HttpError, UrlDeniedError } from "../lib/errors";
import { DomainLimiter, HttpDocumentFetcher } from "../lib/scraping/fetcher";
import { backoffDelay, delay, fetchPage, type UrlGate } from "../lib/scraping/utils";
import { DenyReason, type SafetyVerdict } from "../lib/types";

function response(status: number, body = "", headers: Record<string, string> = {}) {
  return {
    status,
    headers: new Headers(headers),
    text: () => Promise.resolve(body),
  };
}

const allowAll: UrlGate = async (url) => ({ allowed: true, url });

describe("fetchPage", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the body, status and content type", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValueOnce(
      response(200, "<html>ok</html>", { "content-type": "text/html; charset=utf-8" })
    );
    const gate = vi.fn(allowAll);

    const page = await fetchPage("https://www.example.com/930e", { gate });

    expect(page).toEqual({
      url: "https://www.example.com/930e",
      status: 200,
      contentType: "text/html; charset=utf-8",
      body: "<html>ok</html>",
    });
    expect(gate).toHaveBeenCalledWith("https://www.example.com/930e");
  });

  it("gates every redirect hop", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>)
      .mockResolvedValueOnce(response(302, "", { location: "/next" }))
      .mockResolvedValueOnce(response(200, "done"));
    const gate = vi.fn(allowAll);

    const page = await fetchPage("https://www.example.com/start", { gate });

    expect(page.url).toBe("https://www.example.com/next");
    expect(page.body).toBe("done");
    expect(gate.mock.calls).toEqual([["https://www.example.com/start"], ["https://www.example.com/next"]]);
  });

  it("cancels the body of every redirect it follows", async () => {
    const cancel = vi.fn(async () => {});
    (undiciFetch as ReturnType<typeof vi.fn>)
      .mockResolvedValueOnce({ ...response(302, "", { location: "/next" }), body: { cancel } })
      .mockResolvedValueOnce(response(200, "done"));

    const page = await fetchPage("https://www.example.com/start", { gate: allowAll });

    expect(page.body).toBe("done");
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("keeps at most maxBodyBytes of the body", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValueOnce(
      new Response("0123456789abcdef", { status: 200, headers: { "content-type": "text/html" } })
    );

    const page = await fetchPage("https://www.example.com/big", { gate: allowAll, maxBodyBytes: 10 });

    expect(page.body).toBe("0123456789");
    expect(page.status).toBe(200);
  });

  it("refuses a redirect into a private network", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValueOnce(
      response(301, "", { location: "http://10.0.0.1/admin" })
    );
    const gate = vi.fn<UrlGate>(async (url): Promise<SafetyVerdict> =>
      url.startsWith("http://10.")
        ? { allowed: false, reason: DenyReason.PRIVATE_IP, detail: "10.0.0.1 -> 10.0.0.1" }
        : { allowed: true, url }
    );

    await expect(fetchPage("https://www.example.com/start", { gate, retryDelayMs: 0 })).rejects.toBeInstanceOf(
      UrlDeniedError
    );
    expect(undiciFetch).toHaveBeenCalledTimes(1);
  });

  it("stops after too many redirects", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue(response(302, "", { location: "/loop" }));

    await expect(
      fetchPage("https://www.example.com/loop", { gate: allowAll, maxRedirects: 1, retries: 0 })
    ).rejects.toThrow("Too many redirects (1) from https://www.example.com/loop");
    expect(undiciFetch).toHaveBeenCalledTimes(2);
  });

  it("retries server errors with backoff", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>)
      .mockResolvedValueOnce(response(503))
      .mockResolvedValueOnce(response(200, "recovered"));

    const page = await fetchPage("https://www.example.com/930e", { gate: allowAll, retries: 2, retryDelayMs: 1 });

    expect(page.body).toBe("recovered");
    expect(undiciFetch).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue(response(404));

    const error = await fetchPage("https://www.example.com/missing", { gate: allowAll, retries: 3 }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(HttpError);
    expect(error instanceof HttpError && error.status).toBe(404);
    expect(undiciFetch).toHaveBeenCalledTimes(1);
  });

  it("names access denied responses", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue(response(403));
    await expect(fetchPage("https://www.example.com/930e", { gate: allowAll })).rejects.toThrow(
      "Access denied (403) for https://www.example.com/930e"
    );
  });

  it("hands back accepted statuses", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue(response(404, "not here"));
    const page = await fetchPage("https://www.example.com/robots.txt", { gate: allowAll, acceptStatus: () => true });
    expect(page.status).toBe(404);
    expect(page.body).toBe("not here");
  });

  it("never fetches a denied URL", async () => {
    const gate: UrlGate = async () => ({ allowed: false, reason: DenyReason.CLOUD_METADATA, detail: "metadata" });
    await expect(fetchPage("http://169.254.169.254/", { gate })).rejects.toThrow(
      "URL denied (cloud_metadata): metadata"
    );
    expect(undiciFetch).not.toHaveBeenCalled();
  });

  it("stops when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    await expect(fetchPage("https://www.example.com/", { gate: allowAll, signal: controller.signal })).rejects.toThrow(
      "cancelled"
    );
    expect(undiciFetch).not.toHaveBeenCalled();
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt with jitter in [50%, 100%]", () => {
    expect(backoffDelay(0, 1000, () => 0)).toBe(500);
    expect(backoffDelay(2, 1000, () => 0)).toBe(2000);
    expect(backoffDelay(2, 1000, () => 1)).toBe(4000);
  });
});

describe("delay", () => {
  it("rejects when aborted", async () => {
    const controller = new AbortController();
    const pending = delay(10_000, controller.signal);
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });
});

describe("DomainLimiter", () => {
  it("caps concurrent tasks per domain", async () => {
    const limiter = new DomainLimiter(1);
    const order: string[] = [];
    let release: () => void = () => {};
    const blocker = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = limiter.run("a.example", async () => {
      order.push("first:start");
      await blocker;
      order.push("first:end");
    });
    const second = limiter.run("a.example", async () => {
      order.push("second");
    });
    const other = limiter.run("b.example", async () => {
      order.push("other");
    });

    await other;
    expect(limiter.activeCount("a.example")).toBe(1);
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "other", "first:end", "second"]);
    expect(limiter.activeCount("a.example")).toBe(0);
  });
});

describe("HttpDocumentFetcher", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const gate = { resolver: async () => ["203.0.113.10"] };

  it("turns HTML pages into documents", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue(
      response(200, "<html><body><p>Operating weight: 180,000 kg</p></body></html>", { "content-type": "text/html" })
    );
    const fetcher = new HttpDocumentFetcher({ gate });

    const document = await fetcher.fetchDocument("https://www.komatsu.com/930e");

    expect(document?.text).toBe("Operating weight: 180,000 kg");
    expect(document?.sourceDomain).toBe("www.komatsu.com");
  });

  it("skips PDFs", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue(
      response(200, "%PDF-1.7", { "content-type": "application/pdf" })
    );
    const fetcher = new HttpDocumentFetcher({ gate });
    expect(await fetcher.fetchDocument("https://www.komatsu.com/930e-brochure")).toBeNull();
  });
});
