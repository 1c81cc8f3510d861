import { TaskScope } from "./taskScope";
import { Logger, silentLogger } from "../adapters/log/logStream";
import { MonitorError, TechnicalError, asTechnicalError } from "../domain/errors";
import {
  FetchOutcome,
  RawSlotPayload,
  SlotFetchReport,
  SlotId,
  classifyRun,
  normalizeSlotIds,
  sectionCount
} from "../domain/slots";

export type OrchestratorState = "idle" | "running" | "completed" | "cancelled" | "failed";

export type SlotFetcher = (slotId: SlotId, signal: AbortSignal) => Promise<RawSlotPayload>;

export interface OrchestratorListener {
  onProgress?: (completed: number, total: number) => void;
  onSlotResult?: (slotId: SlotId, outcome: FetchOutcome) => void;
  onAllComplete?: (report: SlotFetchReport) => void;
  onCancelled?: () => void;
  onError?: (error: TechnicalError) => void;
}

export interface OrchestratorOptions {
  maxWorkers: number;
  progressIntervalMs: number;
  stopGraceMs: number;
  logger?: Logger;
  now?: () => number;
}

/** Runs one fetch and turns whatever happens into that slot's outcome. */
export async function settleSlotFetch(
  slotId: SlotId,
  fetcher: SlotFetcher,
  signal: AbortSignal,
  logger: Logger = silentLogger
): Promise<FetchOutcome> {
  try {
    const payload = await fetcher(slotId, signal);
    if (sectionCount(payload) === 0) {
      return {
        ok: false,
        slotId,
        error: {
          code: "client.section_unavailable",
          message: `No data sections could be fetched for slot ${slotId}.`
        }
      };
    }
    return { ok: true, slotId, payload };
  } catch (error) {
    const technical = asTechnicalError(error);
    logger.error(`Failed to fetch slot ${slotId}: ${technical.message}`);
    return { ok: false, slotId, error: technical };
  }
}

/** The failure every slot ended with, when they all failed the same way. */
function sharedFailure(outcomes: Iterable<FetchOutcome>): MonitorError | undefined {
  let shared: TechnicalError | undefined;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      return undefined;
    }
    if (shared && shared.code !== outcome.error.code) {
      return undefined;
    }
    shared = shared ?? outcome.error;
  }
  return shared ? new MonitorError(shared) : undefined;
}

/**
 * Fetches many slots through a bounded worker pool.
 *
 * `start()` returns at once; the run lives on its own promise chain exposed
 * by `whenSettled()`. Results that arrive after `stop()` are dropped, and a
 * cancelled run never reports `onAllComplete`.
 */
export class SlotFetchOrchestrator {
  private readonly fetcher: SlotFetcher;
  private readonly listener: OrchestratorListener;
  private readonly options: OrchestratorOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private currentState: OrchestratorState = "idle";
  private scope?: TaskScope;
  private activeRun?: Promise<SlotFetchReport | undefined>;

  constructor(fetcher: SlotFetcher, listener: OrchestratorListener, options: OrchestratorOptions) {
    this.fetcher = fetcher;
    this.listener = listener;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  isRunning(): boolean {
    return this.currentState === "running";
  }

  start(slots: ReadonlyArray<SlotId>): boolean {
    if (this.isRunning()) {
      this.logger.warn("Already fetching slot data");
      return false;
    }
    const scope = new TaskScope();
    this.currentState = "running";
    this.scope = scope;
    this.activeRun = this.execute(normalizeSlotIds(slots), scope);
    return true;
  }

  /** The report of the latest run; `undefined` when it failed or none was started. */
  whenSettled(): Promise<SlotFetchReport | undefined> {
    return this.activeRun ?? Promise.resolve(undefined);
  }

  async stop(): Promise<void> {
    const scope = this.scope;
    if (!this.isRunning() || !scope) {
      return;
    }
    this.logger.info("Stopping slot fetch");
    scope.cancel();
    const quiesced = await scope.joinWithin(this.options.stopGraceMs);
    if (!quiesced) {
      this.logger.warn(`Workers still busy after ${this.options.stopGraceMs} ms, aborting requests`);
      scope.abort();
    }
    await this.whenSettled();
  }

  private async execute(slots: SlotId[], scope: TaskScope): Promise<SlotFetchReport | undefined> {
    const startedAt = new Date().toISOString();
    const total = slots.length;
    const outcomes = new Map<SlotId, FetchOutcome>();
    let completed = 0;
    let lastProgressAt = this.now();

    try {
      const poolSize = Math.min(this.options.maxWorkers, total);
      if (!(poolSize >= 1)) {
        throw new MonitorError({
          code: "orchestrator.pool_failure",
          message: total === 0 ? "No slots to fetch." : `Cannot start a worker pool of size ${poolSize}.`
        });
      }
      this.logger.info(`Starting parallel fetch for ${total} slots with ${poolSize} workers`);

      const record = (outcome: FetchOutcome): void => {
        if (scope.cancelled) {
          return;
        }
        outcomes.set(outcome.slotId, outcome);
        this.notify((listener) => listener.onSlotResult?.(outcome.slotId, outcome));
        completed += 1;
        const now = this.now();
        if (completed === total || now - lastProgressAt >= this.options.progressIntervalMs) {
          lastProgressAt = now;
          this.notify((listener) => listener.onProgress?.(completed, total));
        }
      };

      const queue = slots.slice();
      for (let worker = 0; worker < poolSize; worker += 1) {
        scope.spawn(async (signal) => {
          while (!scope.cancelled) {
            const slotId = queue.shift();
            if (slotId === undefined) {
              return;
            }
            record(await settleSlotFetch(slotId, this.fetcher, signal, this.logger));
          }
        });
      }
      await scope.join();
      for (const failure of scope.errors) {
        this.logger.error(`Worker stopped: ${asTechnicalError(failure).message}`);
      }

      if (scope.cancelled) {
        this.currentState = "cancelled";
        this.logger.info(`Slot fetch cancelled after ${completed} of ${total} slots`);
        this.notify((listener) => listener.onCancelled?.());
        return { status: "cancelled", outcomes: new Map(), startedAt, finishedAt: new Date().toISOString() };
      }

      const report: SlotFetchReport = {
        status: classifyRun(outcomes.values()),
        outcomes,
        startedAt,
        finishedAt: new Date().toISOString()
      };
      const succeeded = Array.from(outcomes.values()).filter((outcome) => outcome.ok).length;
      this.currentState = "completed";
      this.logger.info(`Completed fetching ${succeeded} of ${total} slots`);
      this.notify((listener) => listener.onAllComplete?.(report));
      if (report.status === "none_succeeded") {
        const cause = sharedFailure(outcomes.values());
        this.notify((listener) =>
          listener.onError?.({
            code: "orchestrator.total_failure",
            message: `None of the ${total} slots could be fetched.`,
            cause
          })
        );
      }
      return report;
    } catch (error) {
      const technical = asTechnicalError(error);
      this.currentState = "failed";
      this.logger.error(`Slot fetch failed: ${technical.message}`);
      this.notify((listener) => listener.onError?.(technical));
      return undefined;
    }
  }

  private notify(deliver: (listener: OrchestratorListener) => void): void {
    try {
      deliver(this.listener);
    } catch (error) {
      this.logger.error(`Listener failed: ${(error as Error).message}`);
    }
  }
}
