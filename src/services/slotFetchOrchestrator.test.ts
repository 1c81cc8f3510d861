import { describe, expect, it, vi } from "vitest";
import {
  OrchestratorListener,
  SlotFetchOrchestrator,
  SlotFetcher,
  settleSlotFetch
} from "./slotFetchOrchestrator";
import { MonitorError, TechnicalError, errorKindOf } from "../domain/errors";
import { RawSlotPayload, SlotFetchReport } from "../domain/slots";

const payload: RawSlotPayload = { data: { dev: { product_info: { prodname: "SL-900" } } } };
const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function recorder() {
  const progress: Array<[number, number]> = [];
  const results: number[] = [];
  const reports: SlotFetchReport[] = [];
  const errors: TechnicalError[] = [];
  let cancelled = 0;
  const listener: OrchestratorListener = {
    onProgress: (completed, total) => progress.push([completed, total]),
    onSlotResult: (slotId) => results.push(slotId),
    onAllComplete: (report) => reports.push(report),
    onCancelled: () => {
      cancelled += 1;
    },
    onError: (error) => errors.push(error)
  };
  return { listener, progress, results, reports, errors, cancelledCount: () => cancelled };
}

const options = { maxWorkers: 8, progressIntervalMs: 200, stopGraceMs: 1000 };

describe("slot fetch orchestrator", () => {
  it("reports partial success when some slots fail", async () => {
    const failing = new Set([2, 3, 5, 7, 8]);
    const fetcher: SlotFetcher = async (slotId) => {
      if (failing.has(slotId)) {
        throw new Error(`slot ${slotId} timed out`);
      }
      return payload;
    };
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(fetcher, events.listener, options);

    expect(orchestrator.start([1, 2, 3, 4, 5, 6, 7, 8])).toBe(true);
    const report = await orchestrator.whenSettled();

    expect(report?.status).toBe("partial_success");
    expect(report?.outcomes.size).toBe(8);
    expect(Array.from(report?.outcomes.values() ?? []).filter((outcome) => outcome.ok)).toHaveLength(3);
    expect(report?.outcomes.get(2)).toEqual({
      ok: false,
      slotId: 2,
      error: expect.objectContaining({ code: "monitor.unexpected_error", message: "slot 2 timed out" })
    });
    expect(events.results.sort((left, right) => left - right)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(events.reports).toHaveLength(1);
    expect(events.errors).toEqual([]);
    expect(orchestrator.state).toBe("completed");
  });

  it("emits a total failure error when nothing succeeds", async () => {
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(async () => ({ data: {} }), events.listener, options);

    orchestrator.start([1, 2]);
    const report = await orchestrator.whenSettled();

    expect(report?.status).toBe("none_succeeded");
    expect(report?.outcomes.get(1)).toEqual({
      ok: false,
      slotId: 1,
      error: { code: "client.section_unavailable", message: "No data sections could be fetched for slot 1." }
    });
    expect(events.errors.map((error) => error.code)).toEqual(["orchestrator.total_failure"]);
  });

  it("gives a total failure the kind every slot failed with", async () => {
    const events = recorder();
    const fetcher: SlotFetcher = async (slotId) => {
      throw new MonitorError({ code: "http.timeout", message: `Every data request for slot ${slotId} timed out.` });
    };
    const orchestrator = new SlotFetchOrchestrator(fetcher, events.listener, options);

    orchestrator.start([1, 2]);
    await orchestrator.whenSettled();

    expect(events.errors.map((error) => errorKindOf(error))).toEqual(["timeout"]);
  });

  it("keeps a total failure of mixed causes a connection error", async () => {
    const events = recorder();
    const fetcher: SlotFetcher = async (slotId) => {
      throw new MonitorError(
        slotId === 1
          ? { code: "http.timeout", message: "timed out" }
          : { code: "client.malformed_response", message: "not json" }
      );
    };
    const orchestrator = new SlotFetchOrchestrator(fetcher, events.listener, options);

    orchestrator.start([1, 2]);
    await orchestrator.whenSettled();

    expect(events.errors.map((error) => errorKindOf(error))).toEqual(["connection"]);
  });

  it("fetches each slot once when the list repeats ids", async () => {
    const fetcher = vi.fn<SlotFetcher>(async () => payload);
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(fetcher, events.listener, { ...options, now: () => 1000 });

    orchestrator.start([2, 1, 2, 1]);
    const report = await orchestrator.whenSettled();

    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(report?.outcomes.size).toBe(2);
    expect(events.progress).toEqual([[2, 2]]);
  });

  it("throttles progress but always reports the last task", async () => {
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(async () => payload, events.listener, {
      ...options,
      now: () => 1000
    });

    orchestrator.start([1, 2, 3, 4]);
    await orchestrator.whenSettled();

    expect(events.progress).toEqual([[4, 4]]);
  });

  it("reports progress for every task once the interval has passed", async () => {
    let clock = 0;
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(async () => payload, events.listener, {
      ...options,
      now: () => (clock += 250)
    });

    orchestrator.start([1, 2, 3]);
    await orchestrator.whenSettled();

    expect(events.progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3]
    ]);
  });

  it("bounds the worker pool", async () => {
    let active = 0;
    let peak = 0;
    const fetcher: SlotFetcher = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await flush();
      active -= 1;
      return payload;
    };
    const orchestrator = new SlotFetchOrchestrator(fetcher, {}, { ...options, maxWorkers: 3 });

    orchestrator.start([1, 2, 3, 4, 5, 6, 7]);
    const report = await orchestrator.whenSettled();

    expect(peak).toBe(3);
    expect(report?.status).toBe("all_succeeded");
  });

  it("discards results after cancellation and never completes", async () => {
    const gates: Array<() => void> = [];
    const fetcher: SlotFetcher = () =>
      new Promise<RawSlotPayload>((resolve) => {
        gates.push(() => resolve(payload));
      });
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(fetcher, events.listener, { ...options, maxWorkers: 2 });

    orchestrator.start([1, 2, 3, 4]);
    await flush();
    expect(gates).toHaveLength(2);

    const stopping = orchestrator.stop();
    gates.forEach((release) => release());
    await stopping;

    expect(orchestrator.state).toBe("cancelled");
    expect(gates).toHaveLength(2);
    expect(events.results).toEqual([]);
    expect(events.reports).toEqual([]);
    expect(events.cancelledCount()).toBe(1);
    expect((await orchestrator.whenSettled())?.status).toBe("cancelled");
  });

  it("aborts in-flight requests once the grace period runs out", async () => {
    const fetcher: SlotFetcher = (_slotId, signal) =>
      new Promise<RawSlotPayload>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(fetcher, events.listener, { ...options, stopGraceMs: 10 });

    orchestrator.start([1, 2]);
    await flush();
    await orchestrator.stop();

    expect(orchestrator.state).toBe("cancelled");
    expect(events.reports).toEqual([]);
    expect(events.results).toEqual([]);
  });

  it("ignores a start while running", async () => {
    const orchestrator = new SlotFetchOrchestrator(async () => payload, {}, options);
    expect(orchestrator.start([1])).toBe(true);
    expect(orchestrator.start([2])).toBe(false);
    await orchestrator.whenSettled();
    expect(orchestrator.start([2])).toBe(true);
    expect((await orchestrator.whenSettled())?.outcomes.has(2)).toBe(true);
  });

  it("fails the run when there is nothing to fetch", async () => {
    const events = recorder();
    const orchestrator = new SlotFetchOrchestrator(async () => payload, events.listener, options);

    orchestrator.start([]);

    expect(await orchestrator.whenSettled()).toBeUndefined();
    expect(orchestrator.state).toBe("failed");
    expect(events.errors.map((error) => error.code)).toEqual(["orchestrator.pool_failure"]);
  });

  it("keeps running when a listener throws", async () => {
    const onAllComplete = vi.fn();
    const orchestrator = new SlotFetchOrchestrator(
      async () => payload,
      {
        onSlotResult: () => {
          throw new Error("listener bug");
        },
        onAllComplete
      },
      options
    );

    orchestrator.start([1, 2]);
    const report = await orchestrator.whenSettled();

    expect(report?.status).toBe("all_succeeded");
    expect(onAllComplete).toHaveBeenCalledTimes(1);
  });
});

describe("single slot settlement", () => {
  it("turns a thrown error into a failed outcome", async () => {
    const fetcher: SlotFetcher = async () => {
      throw new Error("socket hang up");
    };
    const outcome = await settleSlotFetch(4, fetcher, new AbortController().signal);
    expect(outcome).toEqual({
      ok: false,
      slotId: 4,
      error: { code: "monitor.unexpected_error", message: "socket hang up", cause: expect.any(Error) }
    });
  });
});
