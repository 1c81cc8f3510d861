import { describe, expect, it } from "vitest";
import { TaskScope } from "./taskScope";

describe("task scope", () => {
  it("joins every spawned task and records failures", async () => {
    const scope = new TaskScope();
    const finished: number[] = [];
    scope.spawn(async () => {
      finished.push(1);
    });
    scope.spawn(async () => {
      throw new Error("boom");
    });

    await scope.join();

    expect(finished).toEqual([1]);
    expect(scope.size).toBe(0);
    expect(scope.errors).toHaveLength(1);
  });

  it("refuses new tasks once cancelled", () => {
    const scope = new TaskScope();
    scope.cancel();
    expect(scope.spawn(async () => undefined)).toBe(false);
    expect(scope.cancelled).toBe(true);
    expect(scope.aborted).toBe(false);
  });

  it("aborts in-flight tasks after the grace period", async () => {
    const scope = new TaskScope();
    scope.spawn(
      (signal) =>
        new Promise<void>((resolve) => {
          signal.addEventListener("abort", () => resolve());
        })
    );

    scope.cancel();
    expect(await scope.joinWithin(10)).toBe(false);
    scope.abort();
    expect(await scope.joinWithin(1000)).toBe(true);
  });
});
