import { DeviceApiAdapter } from "../adapters/http/deviceApiAdapter";
import { FetchLike } from "../adapters/http/httpClient";
import { LogStream, Logger } from "../adapters/log/logStream";
import { MonitorError, TechnicalError, asTechnicalError, errorKindOf } from "../domain/errors";
import { EndpointDto, MonitorSettingsDto, normalizeHost } from "../domain/settings";
import { FetchOutcome, SlotFetchReport, SlotId } from "../domain/slots";
import { MonitorEvents, MonitorListener } from "./monitorEvents";
import { discoverSlots } from "./slotDiscoveryService";
import { OrchestratorState, SlotFetchOrchestrator, settleSlotFetch } from "./slotFetchOrchestrator";

export interface DeviceMonitorDependencies {
  fetchImpl?: FetchLike;
  logStream?: LogStream;
  now?: () => number;
}

interface Connection {
  endpoint: EndpointDto;
  adapter: DeviceApiAdapter;
  orchestrator: SlotFetchOrchestrator;
}

/**
 * Entry point for callers: connect to one device, discover its slots and
 * fetch them one at a time or all at once. Results and failures are pushed
 * to subscribed listeners as well as returned.
 */
export class DeviceMonitorService {
  readonly logs: LogStream;
  private readonly settings: MonitorSettingsDto;
  private readonly dependencies: DeviceMonitorDependencies;
  private readonly logger: Logger;
  private readonly events: MonitorEvents;
  private readonly singleFetches = new Set<AbortController>();
  private connection?: Connection;

  constructor(settings: MonitorSettingsDto, dependencies: DeviceMonitorDependencies = {}) {
    this.settings = settings;
    this.dependencies = dependencies;
    this.logs = dependencies.logStream ?? new LogStream();
    this.logger = this.logs.logger("DeviceMonitor");
    this.events = new MonitorEvents(this.logger);
  }

  subscribe(listener: MonitorListener): () => void {
    return this.events.subscribe(listener);
  }

  isConnected(): boolean {
    return this.connection !== undefined;
  }

  get endpoint(): EndpointDto | undefined {
    return this.connection?.endpoint;
  }

  get fetchState(): OrchestratorState {
    return this.connection?.orchestrator.state ?? "idle";
  }

  async connect(
    host = this.settings.host,
    username = this.settings.username,
    password = this.settings.password
  ): Promise<void> {
    await this.close();
    try {
      const endpoint: EndpointDto = { host: normalizeHost(host), username, password };
      if (!endpoint.host) {
        throw new MonitorError({
          code: "settings.invalid_host",
          message: "Device host is empty."
        });
      }
      const adapter = new DeviceApiAdapter(endpoint, this.settings, {
        fetchImpl: this.dependencies.fetchImpl,
        logger: this.logs.logger("DeviceApi")
      });
      await adapter.authenticate();
      this.connection = {
        endpoint,
        adapter,
        orchestrator: this.createOrchestrator(adapter)
      };
      this.logger.info(`Connected to ${adapter.origin}`);
    } catch (error) {
      const technical = asTechnicalError(error);
      this.logger.error(`Connection failed: ${technical.message}`);
      this.report(technical);
      throw error;
    }
  }

  async discoverSlots(): Promise<SlotId[]> {
    const { adapter } = this.requireConnection();
    const slots = await discoverSlots(adapter, this.settings.maxSlots, this.logs.logger("SlotDiscovery"));
    this.events.notify((listener) => listener.onSlotsDiscovered?.(slots));
    return slots;
  }

  /** Full fetch of one slot, with the combined-document fallback. */
  async fetchOne(slotId: SlotId): Promise<FetchOutcome> {
    const { adapter } = this.requireConnection();
    const controller = new AbortController();
    this.singleFetches.add(controller);
    try {
      const outcome = await settleSlotFetch(
        slotId,
        (id, signal) => adapter.fetchSlot(id, signal),
        controller.signal,
        this.logger
      );
      this.events.notify((listener) => listener.onSlotResult?.(slotId, outcome));
      if (!outcome.ok) {
        this.report(outcome.error);
      }
      return outcome;
    } finally {
      this.singleFetches.delete(controller);
    }
  }

  /**
   * Focused fetch of every listed slot through the worker pool. Resolves
   * with the run's report, or `undefined` when a run is already active or
   * the pool could not be started.
   */
  async fetchAll(slotIds: ReadonlyArray<SlotId>): Promise<SlotFetchReport | undefined> {
    const { orchestrator } = this.requireConnection();
    if (!orchestrator.start(slotIds)) {
      return undefined;
    }
    return orchestrator.whenSettled();
  }

  async cancel(): Promise<void> {
    for (const controller of this.singleFetches) {
      controller.abort();
    }
    await this.connection?.orchestrator.stop();
  }

  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    await this.cancel();
    connection.adapter.session.invalidate();
    this.connection = undefined;
    this.logger.info(`Disconnected from ${connection.adapter.origin}`);
  }

  private requireConnection(): Connection {
    if (!this.connection) {
      throw new MonitorError({
        code: "monitor.not_connected",
        message: "Not connected to a device.",
        hint: "Call connect() first."
      });
    }
    return this.connection;
  }

  private createOrchestrator(adapter: DeviceApiAdapter): SlotFetchOrchestrator {
    return new SlotFetchOrchestrator(
      (slotId, signal) => adapter.fetchFocused(slotId, signal),
      {
        onProgress: (completed, total) => this.events.notify((listener) => listener.onProgress?.(completed, total)),
        onSlotResult: (slotId, outcome) => this.events.notify((listener) => listener.onSlotResult?.(slotId, outcome)),
        onAllComplete: (report) => this.events.notify((listener) => listener.onAllComplete?.(report)),
        onError: (error) => this.report(error)
      },
      {
        maxWorkers: this.settings.maxWorkers,
        progressIntervalMs: this.settings.progressIntervalMs,
        stopGraceMs: this.settings.stopGraceMs,
        logger: this.logs.logger("SlotFetchOrchestrator"),
        now: this.dependencies.now
      }
    );
  }

  private report(error: TechnicalError): void {
    if (error.code === "orchestrator.cancelled") {
      return;
    }
    const kind = errorKindOf(error);
    this.events.notify((listener) => listener.onError?.(kind, error.message));
  }
}
