import { MonitorError } from "./errors";
import { isRecord } from "./json";

export const SETTINGS_SCHEMA_VERSION = 1;

export interface EndpointDto {
  host: string;
  username: string;
  password: string;
}

export interface MonitorSettingsDto extends EndpointDto {
  version: number;
  requestTimeoutS: number;
  focusedTimeoutS: number;
  maxSlots: number;
  maxWorkers: number;
  progressIntervalMs: number;
  stopGraceMs: number;
  debugLogging: boolean;
  logFile: string;
}

export function defaultSettings(): MonitorSettingsDto {
  return {
    version: SETTINGS_SCHEMA_VERSION,
    host: "",
    username: "admin",
    password: "",
    requestTimeoutS: 10,
    focusedTimeoutS: 5,
    maxSlots: 10,
    maxWorkers: 8,
    progressIntervalMs: 200,
    stopGraceMs: 2000,
    debugLogging: false,
    logFile: ""
  };
}

function assertFiniteNumber(value: unknown, field: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new MonitorError({
      code: "settings.invalid_number",
      message: `${field} must be a number >= ${min}.`
    });
  }
  return parsed;
}

function assertInteger(value: unknown, field: string, min: number): number {
  const parsed = assertFiniteNumber(value, field, min);
  if (!Number.isInteger(parsed)) {
    throw new MonitorError({
      code: "settings.invalid_number",
      message: `${field} must be a whole number.`
    });
  }
  return parsed;
}

/** Accepts `host` or `host:port`; a scheme or a path is stripped. */
export function normalizeHost(raw: string): string {
  const host = raw
    .trim()
    .replace(/^[a-z]+:\/\//i, "")
    .replace(/\/.*$/, "");
  if (/\s/.test(host)) {
    throw new MonitorError({
      code: "settings.invalid_host",
      message: `Device host "${raw}" is not a valid host name or address.`
    });
  }
  return host;
}

export function normalizeSettings(input: unknown): MonitorSettingsDto {
  const defaults = defaultSettings();
  const candidate: Record<string, unknown> = isRecord(input) ? input : {};

  const version = Number(candidate.version ?? defaults.version);
  if (version !== SETTINGS_SCHEMA_VERSION) {
    throw new MonitorError({
      code: "settings.unsupported_version",
      message: `Unsupported settings version ${version}.`
    });
  }

  return {
    version,
    host: normalizeHost(String(candidate.host ?? defaults.host)),
    username: String(candidate.username ?? defaults.username),
    password: String(candidate.password ?? defaults.password),
    requestTimeoutS: assertFiniteNumber(candidate.requestTimeoutS ?? defaults.requestTimeoutS, "requestTimeoutS", 1),
    focusedTimeoutS: assertFiniteNumber(candidate.focusedTimeoutS ?? defaults.focusedTimeoutS, "focusedTimeoutS", 1),
    maxSlots: assertInteger(candidate.maxSlots ?? defaults.maxSlots, "maxSlots", 1),
    maxWorkers: assertInteger(candidate.maxWorkers ?? defaults.maxWorkers, "maxWorkers", 1),
    progressIntervalMs: assertFiniteNumber(
      candidate.progressIntervalMs ?? defaults.progressIntervalMs,
      "progressIntervalMs",
      0
    ),
    stopGraceMs: assertFiniteNumber(candidate.stopGraceMs ?? defaults.stopGraceMs, "stopGraceMs", 0),
    debugLogging: Boolean(candidate.debugLogging ?? defaults.debugLogging),
    logFile: String(candidate.logFile ?? defaults.logFile).trim()
  };
}
