import { Environment, loadSettingsFromEnv } from "./adapters/env/settingsEnv";
import { LoggingHandle, createLogging } from "./adapters/log/logging";
import {
  DeviceMonitorDependencies,
  DeviceMonitorService
} from "./services/deviceMonitorService";

export * from "./domain/errors";
export * from "./domain/settings";
export * from "./domain/sections";
export * from "./domain/slots";
export * from "./domain/deviceView";
export { parseTolerantJson } from "./domain/json";
export { DeviceApiAdapter } from "./adapters/http/deviceApiAdapter";
export type { ProbeResult } from "./adapters/http/deviceApiAdapter";
export { DeviceSession } from "./adapters/http/deviceSession";
export type { SessionState } from "./adapters/http/deviceSession";
export type { FetchLike } from "./adapters/http/httpClient";
export { LogStream, silentLogger } from "./adapters/log/logStream";
export type { LogEntry, LogLevel, Logger } from "./adapters/log/logStream";
export { createLogging } from "./adapters/log/logging";
export { loadSettingsFromEnv } from "./adapters/env/settingsEnv";
export { DeviceMonitorService } from "./services/deviceMonitorService";
export type { DeviceMonitorDependencies } from "./services/deviceMonitorService";
export type { MonitorListener } from "./services/monitorEvents";
export { discoverSlots } from "./services/slotDiscoveryService";
export { SlotFetchOrchestrator } from "./services/slotFetchOrchestrator";
export type { OrchestratorState } from "./services/slotFetchOrchestrator";
export { useSlotMonitorViewModel } from "./viewmodels/useSlotMonitorViewModel";
export type { SlotMonitorViewModel } from "./viewmodels/useSlotMonitorViewModel";

export interface EnvMonitor {
  monitor: DeviceMonitorService;
  logging: LoggingHandle;
}

/** Builds a monitor from `SHELF_*` variables with console and file logging attached. */
export function createMonitorFromEnv(
  env: Environment,
  dependencies: Omit<DeviceMonitorDependencies, "logStream"> = {}
): EnvMonitor {
  const settings = loadSettingsFromEnv(env);
  const logging = createLogging(settings);
  const monitor = new DeviceMonitorService(settings, { ...dependencies, logStream: logging.stream });
  return { monitor, logging };
}
