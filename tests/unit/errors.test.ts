import { describe, it, expect } from "vitest";

import {
  FetchError,
  StoreError,
  SyncError,
  isTransientSyncFailure,
} from "../../src/errors.js";

function failedSync(cause: unknown): SyncError {
  return new SyncError("sync meals failed", { operation: "syncRange", cause });
}

function fetchFailure(status: number | null): FetchError {
  return new FetchError("neis.meals request failed", {
    label: "neis.meals",
    url: "https://neis.example.test/hub/mealServiceDietInfo",
    attempts: 1,
    status,
  });
}

describe("errors", () => {
  describe("isTransientSyncFailure", () => {
    it("should accept transport failures and retryable statuses", () => {
      expect(isTransientSyncFailure(failedSync(fetchFailure(null)))).toBe(true);
      expect(isTransientSyncFailure(failedSync(fetchFailure(429)))).toBe(true);
      expect(isTransientSyncFailure(failedSync(fetchFailure(503)))).toBe(true);
    });

    it("should reject other client errors", () => {
      expect(isTransientSyncFailure(failedSync(fetchFailure(400)))).toBe(false);
      expect(isTransientSyncFailure(failedSync(fetchFailure(401)))).toBe(false);
      expect(isTransientSyncFailure(failedSync(fetchFailure(404)))).toBe(false);
    });

    it("should reject failures that did not come from the network", () => {
      expect(
        isTransientSyncFailure(failedSync(new StoreError("locked", "meals")))
      ).toBe(false);
      expect(isTransientSyncFailure(fetchFailure(503))).toBe(false);
    });
  });
});
