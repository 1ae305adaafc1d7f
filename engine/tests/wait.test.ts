/**
 * Warden Engine — Bounded Polling Tests
 */

import { describe, it, expect } from "vitest";
import { pollUntil } from "../src/utils/wait";

describe("pollUntil", () => {
  it("returns the first non-null probe value", async () => {
    let calls = 0;
    const value = await pollUntil(
      async () => (++calls === 3 ? "ready" : null),
      { attempts: 5, intervalMs: 0, maxIntervalMs: 0 },
    );
    expect(value).toBe("ready");
    expect(calls).toBe(3);
  });

  it("returns null after the last attempt", async () => {
    let calls = 0;
    const value = await pollUntil(
      async () => {
        calls++;
        return null;
      },
      { attempts: 4, intervalMs: 0, maxIntervalMs: 0 },
    );
    expect(value).toBeNull();
    expect(calls).toBe(4);
  });

  it("always probes at least once", async () => {
    let calls = 0;
    await pollUntil(
      async () => {
        calls++;
        return null;
      },
      { attempts: 0, intervalMs: 0, maxIntervalMs: 0 },
    );
    expect(calls).toBe(1);
  });

  it("doubles the delay up to the cap", async () => {
    const delays: number[] = [];
    await pollUntil(async () => null, {
      attempts: 4,
      intervalMs: 10,
      maxIntervalMs: 25,
      onMiss: (_attempt, nextDelayMs) => delays.push(nextDelayMs),
    });
    expect(delays).toEqual([10, 20, 25]);
  });

  it("reports misses with their attempt number", async () => {
    const attempts: number[] = [];
    await pollUntil(async () => null, {
      attempts: 3,
      intervalMs: 0,
      maxIntervalMs: 0,
      onMiss: (attempt) => attempts.push(attempt),
    });
    expect(attempts).toEqual([1, 2]);
  });
});
