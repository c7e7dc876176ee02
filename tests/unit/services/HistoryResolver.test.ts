import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { HistoryResolver } from "../../../src/services/HistoryResolver";
import type { HistoryStore } from "../../../src/services/types/HistoryTypes";
import { InMemoryHistoryStore, contentRootFor } from "../../helpers/InMemoryHistoryStore";

describe("HistoryResolver", () => {
  let store: InMemoryHistoryStore;
  let resolver: HistoryResolver;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new InMemoryHistoryStore().publish("abc", 5);
    resolver = new HistoryResolver(store);
  });

  // ==========================================
  // Version selection
  // ==========================================

  describe("version selection", () => {
    it("should resolve an explicit version within bounds", async () => {
      const result = await resolver.resolve("abc", 2);

      expect(result).toEqual({
        ok: true,
        snapshot: { identifier: "abc", version: 2, contentRoot: contentRootFor("abc", 2) },
        bounds: { minVersion: 1, maxVersion: 5 },
      });
    });

    it("should resolve every version in range to itself", async () => {
      for (let version = 1; version <= 5; version++) {
        const result = await resolver.resolve("abc", version);
        expect(result.ok && result.snapshot.version).toBe(version);
      }
    });

    it("should resolve an absent version to the latest", async () => {
      const result = await resolver.resolve("abc");

      expect(result.ok && result.snapshot.version).toBe(5);
    });

    it("should treat version 0 as latest", async () => {
      const result = await resolver.resolve("abc", 0);

      expect(result.ok && result.snapshot.version).toBe(5);
    });

    it("should clamp a too-large version down to the latest", async () => {
      const result = await resolver.resolve("abc", 9);

      expect(result.ok && result.snapshot.version).toBe(5);
      expect(store.fetches).toEqual([["abc", 5]]);
    });

    it("should follow the history as it grows", async () => {
      await resolver.resolve("abc");
      store.publish("abc", 6);

      const result = await resolver.resolve("abc");

      expect(result.ok && result.snapshot.version).toBe(6);
    });
  });

  // ==========================================
  // Errors
  // ==========================================

  describe("errors", () => {
    it("should reject a negative version without asking the store", async () => {
      const result = await resolver.resolve("abc", -1);

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.code).toBe("invalid-version");
      expect(!result.ok && result.error.retryable).toBe(false);
      expect(store.lookups).toEqual([]);
    });

    it("should reject a fractional version", async () => {
      const result = await resolver.resolve("abc", 2.5);

      expect(!result.ok && result.error.code).toBe("invalid-version");
    });

    it("should reject a version below the first one in the history", async () => {
      const laterStart: HistoryStore = {
        lookupBounds: vi.fn().mockResolvedValue({ minVersion: 3, maxVersion: 7 }),
        fetchSnapshot: vi.fn(),
      };

      const result = await new HistoryResolver(laterStart).resolve("abc", 2);

      expect(!result.ok && result.error.code).toBe("invalid-version");
      expect(laterStart.fetchSnapshot).not.toHaveBeenCalled();
    });

    it("should report an unknown identifier as not-found", async () => {
      const result = await resolver.resolve("unknown-id");

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error).toEqual({
        kind: "resolve",
        code: "not-found",
        message: "unknown history unknown-id",
        retryable: false,
      });
    });

    it("should report a history without versions as not-found", async () => {
      const empty: HistoryStore = {
        lookupBounds: vi.fn().mockResolvedValue({ minVersion: 1, maxVersion: 0 }),
        fetchSnapshot: vi.fn(),
      };

      const result = await new HistoryResolver(empty).resolve("abc");

      expect(!result.ok && result.error.code).toBe("not-found");
    });

    it("should report store outages as retryable unavailable", async () => {
      store.outage = true;

      const result = await resolver.resolve("abc");

      expect(!result.ok && result.error.code).toBe("unavailable");
      expect(!result.ok && result.error.retryable).toBe(true);
    });

    it("should map unexpected store exceptions to unavailable", async () => {
      const broken: HistoryStore = {
        lookupBounds: vi.fn().mockRejectedValue(new TypeError("socket hang up")),
        fetchSnapshot: vi.fn(),
      };

      const result = await new HistoryResolver(broken).resolve("abc");

      expect(!result.ok && result.error.code).toBe("unavailable");
      expect(!result.ok && result.error.message).toBe("History lookup failed: socket hang up");
    });
  });

  // ==========================================
  // Snapshot cache
  // ==========================================

  describe("snapshot cache", () => {
    it("should fetch an already resolved snapshot only once", async () => {
      const first = await resolver.resolve("abc", 3);
      const second = await resolver.resolve("abc", 3);

      expect(store.fetches).toEqual([["abc", 3]]);
      expect(store.lookups).toEqual(["abc", "abc"]);
      expect(second.ok && first.ok && second.snapshot).toBe(first.ok && first.snapshot);
    });

    it("should evict the oldest snapshot beyond the cache size", async () => {
      const small = new HistoryResolver(store, { cacheSize: 1 });

      await small.resolve("abc", 1);
      await small.resolve("abc", 2);
      await small.resolve("abc", 1);

      expect(store.fetches).toEqual([
        ["abc", 1],
        ["abc", 2],
        ["abc", 1],
      ]);
    });
  });

  // ==========================================
  // Timeout
  // ==========================================

  describe("timeout", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should complete with unavailable when the store never answers", async () => {
      const silent: HistoryStore = {
        lookupBounds: () => new Promise<never>(() => {}),
        fetchSnapshot: vi.fn(),
      };
      const timed = new HistoryResolver(silent, { timeoutMs: 1000 });

      const pending = timed.resolve("abc");
      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toEqual({
        ok: false,
        error: {
          kind: "resolve",
          code: "unavailable",
          message: "Timed out after 1000ms resolving abc",
          retryable: true,
        },
      });
    });

    it("should not time out a lookup that answers in time", async () => {
      const timed = new HistoryResolver(store, { timeoutMs: 1000 });

      const result = await timed.resolve("abc", 4);

      expect(result.ok && result.snapshot.version).toBe(4);
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
