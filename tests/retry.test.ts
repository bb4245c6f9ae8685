import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { backoffDelay, fetchWithRetry, retryAfterDelay } from "../src/embedding/retry";

const ENDPOINT = "https://embeddings.test/v1/embed";
const FAST = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 };

describe("fetchWithRetry", () => {
  const mockFetch = vi.fn<typeof fetch>();

  /** Each call consumes the next outcome; the last one repeats */
  function replySequence(...outcomes: Array<number | Error>): void {
    let call = 0;
    mockFetch.mockImplementation(() => {
      const outcome = outcomes[Math.min(call++, outcomes.length - 1)] ?? 200;
      if (outcome instanceof Error) return Promise.reject(outcome);
      return Promise.resolve(new Response(`status ${outcome}`, { status: outcome }));
    });
  }

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  test("passes a successful reply straight through", async () => {
    replySequence(200);

    const response = await fetchWithRetry(ENDPOINT, { method: "POST" }, FAST);

    expect(await response.text()).toBe("status 200");
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  test.each([429, 500, 502, 503, 504])("retries HTTP %i", async status => {
    replySequence(status, 200);

    const response = await fetchWithRetry(ENDPOINT, { method: "POST" }, FAST);

    expect(response.status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  test("hands back the last retryable reply once attempts run out", async () => {
    replySequence(503);

    const response = await fetchWithRetry(ENDPOINT, { method: "POST" }, FAST);

    expect(response.status).toBe(503);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  test("returns client errors without retrying", async () => {
    replySequence(401);

    const response = await fetchWithRetry(ENDPOINT, { method: "POST" }, FAST);

    expect(response.status).toBe(401);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  test("retries transport failures", async () => {
    replySequence(new Error("connect ECONNRESET"), 200);

    const response = await fetchWithRetry(ENDPOINT, { method: "POST" }, FAST);

    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  test("rethrows the transport failure after the last attempt", async () => {
    replySequence(new Error("fetch failed"));

    await expect(fetchWithRetry(ENDPOINT, { method: "POST" }, FAST)).rejects.toThrow("fetch failed");
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  test("does not retry errors that are not transport failures", async () => {
    replySequence(new Error("invalid header value"), 200);

    await expect(fetchWithRetry(ENDPOINT, { method: "POST" }, FAST)).rejects.toThrow("invalid header value");
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  test("waits as long as retry-after asks before the next attempt", async () => {
    vi.useFakeTimers();
    let call = 0;
    mockFetch.mockImplementation(() =>
      Promise.resolve(
        call++ === 0
          ? new Response("slow down", { status: 429, headers: { "retry-after": "2" } })
          : new Response("ok", { status: 200 })
      )
    );

    const pending = fetchWithRetry(ENDPOINT, { method: "POST" }, { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5000 });

    await vi.advanceTimersByTimeAsync(1999);
    expect(mockFetch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect((await pending).status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  test("retries the statuses it is told to", async () => {
    replySequence(409, 200);

    const response = await fetchWithRetry(ENDPOINT, { method: "POST" }, { ...FAST, retryableStatuses: [409] });

    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});

describe("retry delays", () => {
  test("retryAfterDelay converts seconds and caps at the maximum", () => {
    expect(retryAfterDelay("2", 10000)).toBe(2000);
    expect(retryAfterDelay("30", 5000)).toBe(5000);
    expect(retryAfterDelay(null, 5000)).toBeNull();
    expect(retryAfterDelay("soon", 5000)).toBeNull();
  });

  test("backoffDelay grows exponentially within jitter and respects the cap", () => {
    const first = backoffDelay(0, 100, 10000);
    expect(first).toBeGreaterThanOrEqual(100);
    expect(first).toBeLessThan(200);

    const third = backoffDelay(2, 100, 10000);
    expect(third).toBeGreaterThanOrEqual(400);
    expect(third).toBeLessThan(500);

    expect(backoffDelay(10, 100, 1000)).toBe(1000);
  });
});
