/**
 * Tests for QueryExecutor
 */

import { describe, it, expect, vi } from "vitest";
import type { CodeSearchSource } from "../sources/types.js";
import { MemoryPageCache } from "../stores/memory.js";
import { ConfigurationError } from "./errors.js";
import { QueryExecutor } from "./query-executor.js";
import type { SearchPage, SearchResult } from "./types.js";

const result = (path: string): SearchResult => ({
  type: "code_search_result",
  file: { path },
});

// Serves pages[page - 1]; pages past the end are empty with no next link
function createMockSource(pages: SearchPage[]) {
  const searchCode = vi.fn(async (_query: string, page: number = 1): Promise<SearchPage> => {
    return pages[page - 1] ?? { values: [] };
  });
  const source: CodeSearchSource = { type: "bitbucket", searchCode };
  return { source, searchCode };
}

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("QueryExecutor", () => {
  describe("pagination", () => {
    it("fetches a single page when there is no next link", async () => {
      const { source, searchCode } = createMockSource([
        { values: [result("a.py"), result("b.py")] },
      ]);
      const executor = new QueryExecutor({ source });

      const results = await executor.fetchAll("foo");

      expect(results.map((r) => r.file?.path)).toEqual(["a.py", "b.py"]);
      expect(searchCode).toHaveBeenCalledTimes(1);
      expect(searchCode).toHaveBeenCalledWith("foo", 1);
    });

    it("follows next links and stops on the first page without one", async () => {
      const { source, searchCode } = createMockSource([
        { values: [result("a.py")], next: "https://api.example.org/page2" },
        { values: [result("b.py")], next: "https://api.example.org/page3" },
        { values: [result("c.py")] },
        { values: [result("never.py")] },
      ]);
      const executor = new QueryExecutor({ source });

      const results = await executor.fetchAll("foo lang:python");

      expect(results.map((r) => r.file?.path)).toEqual(["a.py", "b.py", "c.py"]);
      expect(searchCode.mock.calls).toEqual([
        ["foo lang:python", 1],
        ["foo lang:python", 2],
        ["foo lang:python", 3],
      ]);
    });

    it("treats a null next link as the last page", async () => {
      const { source, searchCode } = createMockSource([
        { values: [result("a.py")], next: null },
        { values: [result("b.py")] },
      ]);
      const executor = new QueryExecutor({ source });

      await executor.fetchAll("foo");

      expect(searchCode).toHaveBeenCalledTimes(1);
    });

    it("issues at most maxPages requests and warns when capped", async () => {
      const searchCode = vi.fn(async (): Promise<SearchPage> => ({
        values: [result("x.py")],
        next: "https://api.example.org/more",
      }));
      const logger = createMockLogger();
      const executor = new QueryExecutor({
        source: { type: "bitbucket", searchCode },
        maxPages: 3,
        logger,
      });

      const results = await executor.fetchAll("foo");

      expect(searchCode).toHaveBeenCalledTimes(3);
      expect(results).toHaveLength(3);
      expect(logger.warn).toHaveBeenCalledWith("Reached maximum page limit of 3");
    });

    it("lets a call override the configured page cap", async () => {
      const searchCode = vi.fn(async (): Promise<SearchPage> => ({
        values: [],
        next: "https://api.example.org/more",
      }));
      const executor = new QueryExecutor({ source: { type: "bitbucket", searchCode }, maxPages: 10 });

      await executor.fetchAll("foo", 2);

      expect(searchCode).toHaveBeenCalledTimes(2);
    });

    it("drops entries that are not code search results", async () => {
      const { source } = createMockSource([
        {
          values: [
            result("a.py"),
            { type: "something_else", file: { path: "b.py" } },
            { file: { path: "c.py" } },
          ],
        },
      ]);
      const executor = new QueryExecutor({ source });

      const results = await executor.fetchAll("foo");

      expect(results.map((r) => r.file?.path)).toEqual(["a.py"]);
    });

    it("keeps duplicates returned on different pages", async () => {
      const { source } = createMockSource([
        { values: [result("a.py")], next: "https://api.example.org/page2" },
        { values: [result("a.py")] },
      ]);
      const executor = new QueryExecutor({ source });

      const results = await executor.fetchAll("foo");

      expect(results.map((r) => r.file?.path)).toEqual(["a.py", "a.py"]);
    });

    it("tolerates pages without values", async () => {
      const { source } = createMockSource([{ next: "https://api.example.org/page2" }, {}]);
      const executor = new QueryExecutor({ source });

      expect(await executor.fetchAll("foo")).toEqual([]);
    });

    it("propagates source errors", async () => {
      const searchCode = vi.fn(async (): Promise<SearchPage> => {
        throw new Error("network down");
      });
      const executor = new QueryExecutor({ source: { type: "bitbucket", searchCode } });

      await expect(executor.fetchAll("foo")).rejects.toThrow("network down");
    });

    it("rejects a page cap below 1", () => {
      const { source } = createMockSource([]);
      expect(() => new QueryExecutor({ source, maxPages: 0 })).toThrow(ConfigurationError);
    });
  });

  describe("caching", () => {
    it("serves a cached page without a network call", async () => {
      const cache = new MemoryPageCache();
      await cache.set({ page: 1, query: "foo" }, { values: [result("cached.py")] }, 3600);
      const { source, searchCode } = createMockSource([{ values: [result("live.py")] }]);
      const logger = createMockLogger();
      const executor = new QueryExecutor({ source, cache, logger });

      const results = await executor.fetchAll("foo");

      expect(results.map((r) => r.file?.path)).toEqual(["cached.py"]);
      expect(searchCode).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith("Using cached response for page 1");
    });

    it("stores fetched pages under (page, query)", async () => {
      const cache = new MemoryPageCache();
      const page1: SearchPage = { values: [result("a.py")], next: "https://api.example.org/page2" };
      const page2: SearchPage = { values: [result("b.py")] };
      const { source } = createMockSource([page1, page2]);
      const executor = new QueryExecutor({ source, cache });

      await executor.fetchAll("foo");

      expect(await cache.get({ page: 1, query: "foo" })).toEqual(page1);
      expect(await cache.get({ page: 2, query: "foo" })).toEqual(page2);
      expect(await cache.get({ page: 1, query: "bar" })).toBeNull();
    });

    it("fetches again once the cached page expires", async () => {
      let now = 1_000_000;
      const cache = new MemoryPageCache({ now: () => now });
      const { source, searchCode } = createMockSource([{ values: [result("a.py")] }]);
      const executor = new QueryExecutor({ source, cache, cacheTtlSeconds: 60 });

      await executor.fetchAll("foo");
      await executor.fetchAll("foo");
      expect(searchCode).toHaveBeenCalledTimes(1);

      now += 60_000;
      await executor.fetchAll("foo");
      expect(searchCode).toHaveBeenCalledTimes(2);
    });
  });
});
