import { describe, test, expect } from "vitest";
import { DependencyApiFetcher, chunk } from "./dependency-api";
import type { RetryRunner } from "./fetcher.types";
import { RedirectFollower, RequestExecutor } from "#/http";
import { attempt } from "#/retry";
import { dependencyApiBody } from "#/test-utils/marshal-writer";
import {
  createMockLogger,
  createMockTransport,
  okResponse,
  statusResponse,
  type MockReply,
} from "#/test-utils/mocks";

const API = "https://gems.example.com/api/v1/dependencies";

function createFetcher(routes: Record<string, MockReply | MockReply[]>, batchSize = 100) {
  const transport = createMockTransport(routes);
  const logger = createMockLogger();
  const executor = new RequestExecutor({ transport, userAgent: "test-agent", logger });
  const follower = new RedirectFollower(executor, { redirectLimit: 5, logger });
  const retry: RetryRunner = (label, operation) => attempt(operation, { maxAttempts: 3, delayMs: 0, label });
  const fetcher = new DependencyApiFetcher({
    follower,
    fetchUri: new URL("https://gems.example.com/"),
    batchSize,
    retry,
    logger,
  });
  return { transport, logger, fetcher };
}

/** Answers every dependency query with the records of the requested names */
function registry(graph: Record<string, Array<[string, string]>>): MockReply {
  return (req) => {
    const names = req.url.searchParams.get("gems")?.split(",") ?? [];
    const records = names
      .filter((name) => name in graph)
      .map((name) => ({ name, number: "1.0.0", dependencies: graph[name] ?? [] }));
    return okResponse(dependencyApiBody(records));
  };
}

/** Route every query URL the transport might see to the same handler */
function routesFor(handler: MockReply, urls: string[]): Record<string, MockReply> {
  return Object.fromEntries(urls.map((url) => [url, handler]));
}

describe("chunk", () => {
  test("splits into batches of at most size items", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 2)).toEqual([]);
  });
});

describe("DependencyApiFetcher", () => {
  test("builds the query URI with comma-joined, encoded names", () => {
    const { fetcher } = createFetcher({});

    expect(fetcher.dependencyApiUri().toString()).toBe(API);
    expect(fetcher.dependencyApiUri(["rack", "a b"]).toString()).toBe(`${API}?gems=rack,a%20b`);
  });

  test("rejects a batch size below one", () => {
    expect(() => createFetcher({}, 0)).toThrow("batchSize must be at least 1, got 0");
  });

  describe("resolveClosure", () => {
    test("follows dependencies in exactly two rounds for A depending on B", async () => {
      const handler = registry({ a: [["b", ">= 1.0"]], b: [["a", ">= 0"]] });
      const { transport, fetcher } = createFetcher(routesFor(handler, [`${API}?gems=a`, `${API}?gems=b`]));

      const closure = await fetcher.resolveClosure(["a"]);

      expect(closure.rounds).toBe(2);
      expect(closure.specs.map((spec) => spec.name)).toEqual(["a", "b"]);
      expect([...closure.resolvedNames].sort()).toEqual(["a", "b"]);
      expect(transport.urls()).toEqual([`${API}?gems=a`, `${API}?gems=b`]);
    });

    test("issues no request for an empty name set", async () => {
      const { transport, fetcher } = createFetcher({});

      const closure = await fetcher.resolveClosure([]);

      expect(closure).toEqual({ specs: [], resolvedNames: new Set(), rounds: 0 });
      expect(transport.requests).toHaveLength(0);
    });

    test("partitions 250 names into 3 batches of at most 100", async () => {
      const names = Array.from({ length: 250 }, (_, i) => `gem${i}`);
      const batches = chunk(names, 100).map((batch) => `${API}?gems=${batch.join(",")}`);
      const { transport, fetcher } = createFetcher(routesFor(okResponse(dependencyApiBody([])), batches));

      const closure = await fetcher.resolveClosure(names);

      expect(transport.urls()).toEqual(batches);
      expect(closure.rounds).toBe(1);
      expect(closure.resolvedNames.size).toBe(250);
    });

    test("never queries a name twice", async () => {
      const handler = registry({
        a: [["b", ">= 0"], ["c", ">= 0"]],
        b: [["c", ">= 0"], ["d", ">= 0"]],
        c: [["a", ">= 0"]],
        d: [],
      });
      const { transport, fetcher } = createFetcher(
        routesFor(handler, [`${API}?gems=a`, `${API}?gems=b,c`, `${API}?gems=d`])
      );

      const closure = await fetcher.resolveClosure(["a"]);

      expect(transport.urls()).toEqual([`${API}?gems=a`, `${API}?gems=b,c`, `${API}?gems=d`]);
      expect(closure.rounds).toBe(3);
      expect([...closure.resolvedNames].sort()).toEqual(["a", "b", "c", "d"]);
    });

    test("retries a failed batch and continues", async () => {
      const { transport, fetcher } = createFetcher({
        [`${API}?gems=rack`]: [statusResponse(502), okResponse(dependencyApiBody([{ name: "rack", number: "3.0.8" }]))],
      });

      const closure = await fetcher.resolveClosure(["rack"]);

      expect(closure.specs.map((spec) => spec.name)).toEqual(["rack"]);
      expect(transport.requests).toHaveLength(2);
    });

    test("aborts the whole resolution when a batch keeps failing", async () => {
      const { fetcher } = createFetcher({
        [`${API}?gems=a`]: okResponse(dependencyApiBody([{ name: "a", number: "1.0", dependencies: [["b", ">= 0"]] }])),
        [`${API}?gems=b`]: statusResponse(500),
      });

      await expect(fetcher.resolveClosure(["a"])).rejects.toMatchObject({ kind: "HTTPError", status: 500 });
    });

    test("logs each query list", async () => {
      const { logger, fetcher } = createFetcher({ [`${API}?gems=rack`]: okResponse(dependencyApiBody([])) });

      await fetcher.resolveClosure(["rack"]);

      expect(logger.lines.filter((line) => line.startsWith("debug: Query List"))).toEqual([
        'debug: Query List: ["rack"]',
        "debug: Query List: []",
      ]);
    });
  });

  test("probe requests the bare endpoint", async () => {
    const { transport, fetcher } = createFetcher({ [API]: okResponse("") });

    await fetcher.probe();

    expect(transport.urls()).toEqual([API]);
  });
});
