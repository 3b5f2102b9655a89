import { describe, it, expect, vi } from "vitest";
import {
  createResilientCaller,
  exponentialDelay,
  withBackoff,
} from "../modules/resilience/resilient.caller";

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

describe("withBackoff", () => {
  it("returns the result after two failures and waits base then twice base", async () => {
    const { delays, sleep } = recordingSleep();
    const operation = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValueOnce("ok");

    const result = await withBackoff(operation, { attempts: 3, baseDelayMs: 100, sleep });

    expect(result).toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it("rethrows the last error unchanged once attempts are exhausted", async () => {
    const { delays, sleep } = recordingSleep();
    const last = new Error("third");
    const operation = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(last);

    await expect(withBackoff(operation, { attempts: 3, baseDelayMs: 10, sleep })).rejects.toBe(
      last
    );
    expect(delays).toEqual([10, 20]);
  });

  it("does not wait when the first attempt succeeds", async () => {
    const { delays, sleep } = recordingSleep();
    await expect(withBackoff(async () => 42, { sleep })).resolves.toBe(42);
    expect(delays).toEqual([]);
  });

  it("reports each retry", async () => {
    const { sleep } = recordingSleep();
    const onRetry = vi.fn();
    const error = new Error("boom");
    const operation = vi
      .fn<[], Promise<number>>()
      .mockRejectedValueOnce(error)
      .mockResolvedValueOnce(1);

    await withBackoff(operation, { baseDelayMs: 5, sleep, onRetry });

    expect(onRetry).toHaveBeenCalledWith({ attempt: 0, delayMs: 5, error });
  });
});

describe("exponentialDelay", () => {
  it("doubles per attempt", () => {
    const delay = exponentialDelay(2000);
    expect([0, 1, 2].map(delay)).toEqual([2000, 4000, 8000]);
  });
});

describe("createResilientCaller", () => {
  it("applies its options to every call", async () => {
    const { delays, sleep } = recordingSleep();
    const caller = createResilientCaller({ attempts: 2, baseDelayMs: 7, sleep });
    const operation = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new Error("once"))
      .mockResolvedValueOnce("done");

    await expect(caller.call(operation)).resolves.toBe("done");
    expect(delays).toEqual([7]);
  });
});
