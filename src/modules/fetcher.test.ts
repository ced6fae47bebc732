import { afterEach, describe, it, expect, vi } from "vitest";
import {
  RemoteFetcher,
  deriveRemoteName,
  parseDispositionFilename,
} from "./fetcher";
import { Logger } from "../utils/logger";
import type { FetchConfig } from "../types";

type Route = (init?: RequestInit) => Response | Promise<Response>;

function fakeFetch(routes: Record<string, Route>, calls: string[] = []): typeof fetch {
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push(url);
    const route = routes[url];
    if (!route) throw new TypeError(`fetch failed: ${url}`);
    return route(init);
  };
}

function hangUntilAborted(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(new DOMException("aborted", "AbortError"));
      return;
    }
    signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
  });
}

const config: FetchConfig = {
  timeout: 1000,
  maxSize: 16,
  maxRedirects: 2,
  retries: 0,
  concurrency: 2,
};
const logger = new Logger("silent");
const decoder = new TextDecoder();

afterEach(() => {
  vi.useRealTimers();
});

describe("parseDispositionFilename", () => {
  it("prefers the extended filename", () => {
    expect(
      parseDispositionFilename(`attachment; filename="fallback.txt"; filename*=UTF-8''r%C3%A9sum%C3%A9.txt`),
    ).toBe("résumé.txt");
  });

  it("strips directories from quoted and bare names", () => {
    expect(parseDispositionFilename('attachment; filename="a/b/c.pdf"')).toBe("c.pdf");
    expect(parseDispositionFilename("inline; filename=plain.md")).toBe("plain.md");
  });

  it("returns empty without a filename", () => {
    expect(parseDispositionFilename(null)).toBe("");
    expect(parseDispositionFilename("inline")).toBe("");
  });
});

describe("deriveRemoteName", () => {
  it("falls back from disposition to URL segment to content type", () => {
    const url = new URL("https://example.test/files/download");
    expect(
      deriveRemoteName(url, new Headers({ "content-disposition": 'attachment; filename="x.docx"' }), 0),
    ).toBe("x.docx");
    expect(deriveRemoteName(new URL("https://example.test/a/notes.md?v=2"), new Headers(), 0)).toBe(
      "notes.md",
    );
    expect(
      deriveRemoteName(url, new Headers({ "content-type": "text/html; charset=utf-8" }), 2),
    ).toBe("remote_3.html");
    expect(deriveRemoteName(url, new Headers({ "content-type": "application/x-unknown" }), 0)).toBe(
      "remote_1",
    );
  });
});

describe("RemoteFetcher", () => {
  it("downloads URLs into items in URL order", async () => {
    const fetcher = new RemoteFetcher(
      config,
      logger,
      fakeFetch({
        "https://example.test/one.txt": () => new Response("first"),
        "https://example.test/get": () =>
          new Response("second", {
            headers: { "content-disposition": 'attachment; filename="two.html"' },
          }),
      }),
    );

    const report = await fetcher.fetchAll([
      "https://example.test/one.txt",
      "https://example.test/get",
    ]);

    expect(report.errors).toEqual([]);
    expect(report.items.map((item) => [item.name, item.sourceFormat, item.origin])).toEqual([
      ["one.txt", "txt", "remote-url"],
      ["two.html", "html", "remote-url"],
    ]);
    expect(decoder.decode(report.items[0]?.payload ?? new Uint8Array())).toBe("first");
  });

  it("bounds the body size", async () => {
    const fetcher = new RemoteFetcher(
      config,
      logger,
      fakeFetch({
        "https://example.test/big.txt": () => new Response("x".repeat(17)),
      }),
    );

    const report = await fetcher.fetchAll(["https://example.test/big.txt"]);

    expect(report.items).toEqual([
      {
        name: "big.txt",
        sourceFormat: "txt",
        origin: "remote-url",
        payload: null,
        defect: {
          kind: "FetchFailed",
          message: "https://example.test/big.txt: Response body exceeds maximum size of 16 bytes",
        },
      },
    ]);
    expect(report.errors).toEqual([
      {
        url: "https://example.test/big.txt",
        index: 0,
        reason: "too-large",
        message: "Response body exceeds maximum size of 16 bytes",
      },
    ]);
  });

  it("stops a streamed body once it passes the limit", async () => {
    let pulls = 0;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls++;
        controller.enqueue(new Uint8Array(10));
      },
    });
    const fetcher = new RemoteFetcher(
      config,
      logger,
      fakeFetch({ "https://example.test/stream.txt": () => new Response(body) }),
    );

    const report = await fetcher.fetchAll(["https://example.test/stream.txt"]);

    expect(report.errors[0]?.reason).toBe("too-large");
    expect(pulls).toBeLessThan(5);
  });

  it("follows redirects and names the item after the final URL", async () => {
    const fetcher = new RemoteFetcher(
      config,
      logger,
      fakeFetch({
        "https://example.test/start": () =>
          new Response(null, { status: 302, headers: { location: "/final.md" } }),
        "https://example.test/final.md": () => new Response("done"),
      }),
    );

    const report = await fetcher.fetchAll(["https://example.test/start"]);

    expect(report.items[0]?.name).toBe("final.md");
    expect(decoder.decode(report.items[0]?.payload ?? new Uint8Array())).toBe("done");
  });

  it("gives up after too many redirects", async () => {
    const fetcher = new RemoteFetcher(
      config,
      logger,
      fakeFetch({
        "https://example.test/a": () =>
          new Response(null, { status: 301, headers: { location: "https://example.test/b" } }),
        "https://example.test/b": () =>
          new Response(null, { status: 307, headers: { location: "https://example.test/a" } }),
      }),
    );

    const report = await fetcher.fetchAll(["https://example.test/a"]);

    expect(report.errors[0]?.message).toBe("Too many redirects (max 2)");
    expect(report.items[0]?.name).toBe("a");
  });

  it("reports non-success statuses without stopping the others", async () => {
    const fetcher = new RemoteFetcher(
      config,
      logger,
      fakeFetch({
        "https://example.test/a.txt": () => new Response("a"),
        "https://example.test/missing.txt": () =>
          new Response("nope", { status: 404, statusText: "Not Found" }),
        "https://example.test/c.txt": () => new Response("c"),
      }),
    );

    const report = await fetcher.fetchAll([
      "https://example.test/a.txt",
      "https://example.test/missing.txt",
      "https://example.test/c.txt",
    ]);

    expect(report.items.map((item) => [item.name, item.defect?.message ?? null])).toEqual([
      ["a.txt", null],
      ["missing.txt", "https://example.test/missing.txt: HTTP 404: Not Found"],
      ["c.txt", null],
    ]);
    expect(report.errors.map((error) => error.index)).toEqual([1]);
  });

  it("rejects invalid URLs and unsupported schemes", async () => {
    const calls: string[] = [];
    const fetcher = new RemoteFetcher(config, logger, fakeFetch({}, calls));

    const report = await fetcher.fetchAll(["not a url", "ftp://example.test/a.txt"]);

    expect(calls).toEqual([]);
    expect(report.items.map((item) => [item.name, item.defect?.message])).toEqual([
      ["remote_1", "not a url: Invalid URL: not a url"],
      ["a.txt", "ftp://example.test/a.txt: Unsupported URL scheme: ftp:"],
    ]);
    expect(report.errors.map((error) => error.reason)).toEqual(["invalid-url", "invalid-url"]);
  });

  it("times out slow requests", async () => {
    const fetcher = new RemoteFetcher(
      { ...config, timeout: 20 },
      logger,
      fakeFetch({ "https://example.test/slow.txt": hangUntilAborted }),
    );

    const report = await fetcher.fetchAll(["https://example.test/slow.txt"]);

    expect(report.errors).toEqual([
      {
        url: "https://example.test/slow.txt",
        index: 0,
        reason: "timeout",
        message: "Request timed out after 20ms",
      },
    ]);
  });

  it("reports cancellation", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = new RemoteFetcher(
      config,
      logger,
      fakeFetch({ "https://example.test/a.txt": hangUntilAborted }),
    );

    const report = await fetcher.fetchAll(["https://example.test/a.txt"], controller.signal);

    expect(report.errors[0]?.reason).toBe("cancelled");
    expect(report.items[0]?.defect?.message).toBe("https://example.test/a.txt: Fetch cancelled");
  });

  it("retries server errors with backoff", async () => {
    vi.useFakeTimers();
    let attempts = 0;
    const fetcher = new RemoteFetcher(
      { ...config, retries: 1 },
      logger,
      fakeFetch({
        "https://example.test/flaky.txt": () => {
          attempts++;
          return attempts === 1
            ? new Response("busy", { status: 503, statusText: "Service Unavailable" })
            : new Response("ok");
        },
      }),
    );

    const pending = fetcher.fetchAll(["https://example.test/flaky.txt"]);
    await vi.advanceTimersByTimeAsync(1000);
    const report = await pending;

    expect(attempts).toBe(2);
    expect(report.errors).toEqual([]);
    expect(decoder.decode(report.items[0]?.payload ?? new Uint8Array())).toBe("ok");
  });

  it("stops waiting between retries once cancelled", async () => {
    let attempts = 0;
    const controller = new AbortController();
    const fetcher = new RemoteFetcher(
      { ...config, retries: 3 },
      logger,
      fakeFetch({
        "https://example.test/busy.txt": () => {
          attempts++;
          return new Response(null, { status: 503, statusText: "Service Unavailable" });
        },
      }),
    );

    setTimeout(() => controller.abort(), 50);
    const started = Date.now();
    const report = await fetcher.fetchAll(["https://example.test/busy.txt"], controller.signal);

    expect(Date.now() - started).toBeLessThan(500);
    expect(attempts).toBe(1);
    expect(report.errors).toEqual([
      {
        url: "https://example.test/busy.txt",
        index: 0,
        reason: "cancelled",
        message: "Fetch cancelled",
      },
    ]);
  });

  it("does not retry client errors", async () => {
    let attempts = 0;
    const fetcher = new RemoteFetcher(
      { ...config, retries: 3 },
      logger,
      fakeFetch({
        "https://example.test/gone.txt": () => {
          attempts++;
          return new Response(null, { status: 410, statusText: "Gone" });
        },
      }),
    );

    const report = await fetcher.fetchAll(["https://example.test/gone.txt"]);

    expect(attempts).toBe(1);
    expect(report.errors[0]?.message).toBe("HTTP 410: Gone");
  });
});
