import { Logger, silentLogger } from "../adapters/log/logStream";
import { ErrorKind } from "../domain/errors";
import { FetchOutcome, SlotFetchReport, SlotId } from "../domain/slots";

export interface MonitorListener {
  onSlotsDiscovered?: (slots: SlotId[]) => void;
  onProgress?: (completed: number, total: number) => void;
  onSlotResult?: (slotId: SlotId, outcome: FetchOutcome) => void;
  onAllComplete?: (report: SlotFetchReport) => void;
  onError?: (kind: ErrorKind, message: string) => void;
}

export class MonitorEvents {
  private readonly listeners = new Set<MonitorListener>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  subscribe(listener: MonitorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Delivers to every listener; one that throws does not stop the rest. */
  notify(deliver: (listener: MonitorListener) => void): void {
    for (const listener of Array.from(this.listeners)) {
      try {
        deliver(listener);
      } catch (error) {
        this.logger.error(`Listener failed: ${(error as Error).message}`);
      }
    }
  }
}
