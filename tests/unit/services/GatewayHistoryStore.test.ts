// @vitest-environment node
import { describe, it, expect, vi, beforeEach } from "vitest";
import { GatewayHistoryStore } from "../../../src/services/GatewayHistoryStore";
import { HistoryStoreError } from "../../../src/services/types/HistoryTypes";
import type { RetryOptions } from "../../../src/utils/retry";

const GATEWAY = "http://gateway.test";

const NO_DELAY: RetryOptions = {
  maxRetries: 2,
  baseDelay: 0,
  maxDelay: 0,
  jitter: 0,
  shouldRetry: (error) => !(error instanceof HistoryStoreError && error.kind === "not-found"),
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

async function captureError(promise: Promise<unknown>): Promise<HistoryStoreError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HistoryStoreError) return error;
    throw error;
  }
  throw new Error("expected the store call to reject");
}

describe("GatewayHistoryStore", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let store: GatewayHistoryStore;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new GatewayHistoryStore(`${GATEWAY}/`, NO_DELAY);
  });

  // ==========================================
  // Happy path
  // ==========================================

  it("should read version bounds", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ minVersion: 1, maxVersion: 5 }));

    await expect(store.lookupBounds("abc")).resolves.toEqual({ minVersion: 1, maxVersion: 5 });
    expect(fetchMock).toHaveBeenCalledWith(`${GATEWAY}/history/abc`, {
      headers: { Accept: "application/json" },
    });
  });

  it("should read a snapshot and attach the identifier", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ version: 3, contentRoot: "bafy-root-3" }));

    await expect(store.fetchSnapshot("abc", 3)).resolves.toEqual({
      identifier: "abc",
      version: 3,
      contentRoot: "bafy-root-3",
    });
    expect(fetchMock).toHaveBeenCalledWith(`${GATEWAY}/history/abc/versions/3`, expect.anything());
  });

  it("should encode identifiers into the path", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ minVersion: 1, maxVersion: 1 }));

    await store.lookupBounds("a/b c");

    expect(fetchMock.mock.calls[0][0]).toBe(`${GATEWAY}/history/a%2Fb%20c`);
  });

  // ==========================================
  // Failures
  // ==========================================

  it("should report 404 as not-found without retrying", async () => {
    fetchMock.mockResolvedValue(new Response("", { status: 404 }));

    const error = await captureError(store.lookupBounds("abc"));

    expect(error.kind).toBe("not-found");
    expect(error.message).toBe("Not found on network: history abc");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should report 400 as not-found", async () => {
    fetchMock.mockResolvedValue(new Response("", { status: 400 }));

    const error = await captureError(store.fetchSnapshot("abc", 2));

    expect(error.kind).toBe("not-found");
  });

  it("should retry a server error and succeed", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ minVersion: 1, maxVersion: 2 }));

    await expect(store.lookupBounds("abc")).resolves.toEqual({ minVersion: 1, maxVersion: 2 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should give up as unavailable after the retries are spent", async () => {
    fetchMock.mockImplementation(async () => new Response("", { status: 500 }));

    const error = await captureError(store.lookupBounds("abc"));

    expect(error.kind).toBe("unavailable");
    expect(error.message).toBe("Gateway returned 500 for history abc");
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("should report an unreachable gateway as unavailable", async () => {
    const cause = new TypeError("fetch failed");
    fetchMock.mockRejectedValue(cause);

    const error = await captureError(store.lookupBounds("abc"));

    expect(error.kind).toBe("unavailable");
    expect(error.message).toBe("Gateway unreachable while fetching history abc");
    expect(error.cause).toBe(cause);
  });

  it("should reject payloads that fail validation", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ version: 0, contentRoot: "" }));

    const error = await captureError(store.fetchSnapshot("abc", 1));

    expect(error.kind).toBe("unavailable");
    expect(error.message).toBe("Gateway sent an unexpected payload for abc version 1");
  });

  it("should reject a snapshot for a different version than requested", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ version: 4, contentRoot: "bafy-root-4" }));

    const error = await captureError(store.fetchSnapshot("abc", 2));

    expect(error.kind).toBe("unavailable");
    expect(error.message).toBe("Gateway answered version 4 for abc version 2");
  });

  it("should reject a body that is not JSON", async () => {
    fetchMock.mockImplementation(async () => new Response("<html>", { status: 200 }));

    const error = await captureError(store.lookupBounds("abc"));

    expect(error.message).toBe("Gateway sent invalid JSON for history abc");
  });
});
