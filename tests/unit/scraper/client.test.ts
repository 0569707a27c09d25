import { describe, it, expect, vi } from "vitest";

import { FetchError } from "../../../src/errors.js";
import {
  HttpClient,
  buildUrl,
  computeRetryDelay,
} from "../../../src/scraper/client.js";

function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), { status, headers });
}

function createClient(responses: (Response | Error)[]) {
  const queue = [...responses];
  const fetchStub = vi.fn<typeof fetch>(() => {
    const next = queue.shift();
    if (next === undefined) {
      return Promise.reject(new Error("no more responses"));
    }
    return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
  });
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const client = new HttpClient({ fetch: fetchStub, sleep, random: () => 0 });
  return { client, fetchStub, sleep };
}

describe("scraper/client", () => {
  // ============================================================================
  // Pure utility functions
  // ============================================================================

  describe("computeRetryDelay", () => {
    it("should keep the jittered delay for attempt 2 within [2.0, 2.5)", () => {
      for (const random of [0, 0.25, 0.5, 0.999]) {
        const delay = computeRetryDelay(2, 0.5, null, () => random);
        expect(delay).toBeGreaterThanOrEqual(2.0);
        expect(delay).toBeLessThan(2.5);
      }
    });

    it("should double the base delay per attempt", () => {
      expect(computeRetryDelay(0, 0.5, null, () => 0)).toBe(0.5);
      expect(computeRetryDelay(1, 0.5, null, () => 0)).toBe(1);
      expect(computeRetryDelay(3, 0.5, null, () => 0)).toBe(4);
    });

    it("should use a numeric Retry-After hint instead of backoff", () => {
      expect(computeRetryDelay(2, 0.5, "7", () => 0.9)).toBe(7);
    });

    it("should clamp a negative hint to zero", () => {
      expect(computeRetryDelay(0, 0.5, "-3", () => 0)).toBe(0);
    });

    it("should fall back to backoff for a non-numeric hint", () => {
      expect(
        computeRetryDelay(1, 0.5, "Wed, 21 Oct 2015 07:28:00 GMT", () => 0)
      ).toBe(1);
    });
  });

  describe("buildUrl", () => {
    it("should append query parameters", () => {
      expect(
        buildUrl("https://example.test/hub/api", { KEY: "test-key", Type: "json" })
      ).toBe("https://example.test/hub/api?KEY=test-key&Type=json");
    });

    it("should return the URL unchanged without parameters", () => {
      expect(buildUrl("https://example.test/a")).toBe("https://example.test/a");
    });
  });

  // ============================================================================
  // getJson
  // ============================================================================

  describe("getJson", () => {
    it("should return parsed JSON on the first success", async () => {
      const { client, fetchStub, sleep } = createClient([
        jsonResponse({ ok: true }),
      ]);

      await expect(
        client.getJson("https://example.test/data", { params: { a: "1" } })
      ).resolves.toEqual({ ok: true });
      expect(fetchStub).toHaveBeenCalledTimes(1);
      expect(fetchStub.mock.calls[0]?.[0]).toBe("https://example.test/data?a=1");
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should retry a retryable status and then succeed", async () => {
      const { client, fetchStub, sleep } = createClient([
        jsonResponse({}, 503),
        jsonResponse({}, 500),
        jsonResponse({ value: 42 }),
      ]);

      await expect(
        client.getJson("https://example.test/data", { backoffSeconds: 0.5 })
      ).resolves.toEqual({ value: 42 });
      expect(fetchStub).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000]);
    });

    it("should honour Retry-After in seconds", async () => {
      const { client, sleep } = createClient([
        jsonResponse({}, 429, { "Retry-After": "3" }),
        jsonResponse({ done: true }),
      ]);

      await client.getJson("https://example.test/data");
      expect(sleep).toHaveBeenCalledWith(3000);
    });

    it("should throw FetchError after retries + 1 attempts", async () => {
      const { client, fetchStub } = createClient([
        jsonResponse({}, 502),
        jsonResponse({}, 502),
        jsonResponse({}, 502),
      ]);

      const error = await client
        .getJson("https://example.test/data", { retries: 2, label: "test.api" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(fetchStub).toHaveBeenCalledTimes(3);
      if (error instanceof FetchError) {
        expect(error.attempts).toBe(3);
        expect(error.status).toBe(502);
        expect(error.label).toBe("test.api");
        expect(error.message).toBe(
          "test.api request failed after 3 attempt(s): HTTP 502"
        );
      }
    });

    it("should fail immediately on a non-retryable status", async () => {
      const { client, fetchStub, sleep } = createClient([
        jsonResponse({}, 404),
        jsonResponse({ never: true }),
      ]);

      const error = await client
        .getJson("https://example.test/missing", { label: "test.api" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.attempts).toBe(1);
        expect(error.status).toBe(404);
      }
      expect(fetchStub).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should retry transport failures and report a null status", async () => {
      const { client, fetchStub } = createClient([
        new TypeError("fetch failed"),
        new TypeError("fetch failed"),
      ]);

      const error = await client
        .getJson("https://example.test/data", { retries: 1, label: "test.api" })
        .catch((e: unknown) => e);

      expect(fetchStub).toHaveBeenCalledTimes(2);
      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.status).toBeNull();
        expect(error.cause).toBeInstanceOf(TypeError);
        expect(error.message).toBe(
          "test.api request failed after 2 attempt(s): fetch failed"
        );
      }
    });

    it("should treat an unparsable body as a transport failure", async () => {
      const { client, fetchStub } = createClient([
        new Response("<html>maintenance</html>", { status: 200 }),
        jsonResponse({ recovered: true }),
      ]);

      await expect(client.getJson("https://example.test/data")).resolves.toEqual(
        { recovered: true }
      );
      expect(fetchStub).toHaveBeenCalledTimes(2);
    });
  });
});
