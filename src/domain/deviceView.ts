import { isRecord, readPath } from "./json";

export const UNKNOWN_TEXT = "Unknown";

export interface ProductInfo {
  readonly name: string;
  readonly serial: string;
  readonly swVersion: string;
  readonly buildTime: string;
}

export interface TimeInfo {
  readonly localTime: string;
  readonly uptime: string;
}

export interface MemoryPool {
  readonly used: number;
  readonly size: number;
}

export interface MemoryInfo {
  readonly threshold: string;
  readonly pools: Readonly<Record<string, MemoryPool>>;
}

export interface AlarmInfo {
  readonly totalCount: number;
  readonly criticalCount: number;
  readonly majorCount: number;
  readonly minorCount: number;
  readonly warningCount: number;
}

export interface CanonicalDeviceView {
  readonly product: ProductInfo;
  readonly time: TimeInfo;
  readonly memory: MemoryInfo;
  readonly alarms: AlarmInfo;
}

/**
 * Where a sub-record may live in a payload. Rules are tried in order and the
 * first path that resolves to an object (holding `requires`, when given) wins.
 */
export interface ExtractionRule {
  path: ReadonlyArray<string>;
  requires?: string;
}

// `data.<section>.data.<section>` is what the per-section endpoints produce
// once unioned into the `data` envelope.
export const PRODUCT_RULES: ReadonlyArray<ExtractionRule> = [
  { path: ["data", "dev", "product_info"] },
  { path: ["data", "dev", "data", "dev", "product_info"] },
  { path: ["device_info", "product_info"] },
  { path: ["dev", "product_info"] },
  { path: ["device", "product_info"] },
  { path: ["product_info"] }
];

export const TIME_RULES: ReadonlyArray<ExtractionRule> = [
  { path: ["data", "dev", "time"] },
  { path: ["data", "dev", "data", "dev", "time"] },
  { path: ["device_info", "time"] },
  { path: ["dev", "time"] },
  { path: ["device", "time"] },
  { path: ["time", "time"] },
  { path: ["time"], requires: "localtimetxt" }
];

export const MEMORY_RULES: ReadonlyArray<ExtractionRule> = [
  { path: ["data", "dev", "mem_usage"] },
  { path: ["data", "dev", "data", "dev", "mem_usage"] },
  { path: ["data", "store", "mem_usage"] },
  { path: ["data", "store", "data", "store", "mem_usage"] },
  { path: ["data", "store"], requires: "pool_coll" },
  { path: ["device_info", "mem_usage"] },
  { path: ["dev", "mem_usage"] },
  { path: ["device", "mem_usage"] },
  { path: ["memory", "mem_usage"] },
  { path: ["memory"], requires: "pool_coll" },
  { path: ["mem_usage"] }
];

export const ALARM_RULES: ReadonlyArray<ExtractionRule> = [
  { path: ["data", "dev", "alarms", "status", "severities"] },
  { path: ["data", "dev", "data", "dev", "alarms", "status", "severities"] },
  { path: ["data", "alarms", "status", "severities"] },
  { path: ["data", "alarms", "severities"] },
  { path: ["data", "alarms", "group_status", "glob_severities"] },
  { path: ["data", "alarms", "data", "alarms", "status", "severities"] },
  { path: ["data", "alarms", "data", "alarms", "group_status", "glob_severities"] },
  { path: ["device_info", "alarms", "status", "severities"] },
  { path: ["alarms", "status", "severities"] },
  { path: ["alarms", "severities"] },
  { path: ["alarms", "group_status", "glob_severities"] }
];

export function findRecord(
  payload: unknown,
  rules: ReadonlyArray<ExtractionRule>
): Record<string, unknown> {
  for (const rule of rules) {
    const candidate = readPath(payload, rule.path);
    if (isRecord(candidate) && (!rule.requires || rule.requires in candidate)) {
      return candidate;
    }
  }
  return {};
}

function readText(container: Record<string, unknown>, key: string, fallback = UNKNOWN_TEXT): string {
  const value = container[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return fallback;
}

function readCount(container: Record<string, unknown>, key: string): number {
  const value = container[key];
  const parsed = typeof value === "string" && value.trim() ? Number(value) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : 0;
}

function readPools(container: Record<string, unknown>): Record<string, MemoryPool> {
  const pools: Record<string, MemoryPool> = {};
  const collection = container.pool_coll;
  if (!isRecord(collection)) {
    return pools;
  }
  for (const [poolId, pool] of Object.entries(collection)) {
    if (isRecord(pool)) {
      pools[poolId] = Object.freeze({ used: readCount(pool, "used"), size: readCount(pool, "size") });
    }
  }
  return pools;
}

export function normalizeDeviceView(payload: unknown): CanonicalDeviceView {
  const product = findRecord(payload, PRODUCT_RULES);
  const time = findRecord(payload, TIME_RULES);
  const memory = findRecord(payload, MEMORY_RULES);
  const alarms = findRecord(payload, ALARM_RULES);

  return Object.freeze({
    product: Object.freeze({
      name: readText(product, "prodname"),
      serial: readText(product, "serialfull"),
      swVersion: readText(product, "swver"),
      buildTime: readText(product, "swbuildtime")
    }),
    time: Object.freeze({
      localTime: readText(time, "localtimetxt"),
      uptime: readText(time, "uptimetxt")
    }),
    memory: Object.freeze({
      threshold: readText(memory, "threshold", "0"),
      pools: Object.freeze(readPools(memory))
    }),
    alarms: Object.freeze({
      totalCount: readCount(alarms, "n_total"),
      criticalCount: readCount(alarms, "n_critical"),
      majorCount: readCount(alarms, "n_major"),
      minorCount: readCount(alarms, "n_minor"),
      warningCount: readCount(alarms, "n_warning")
    })
  });
}

export function poolUsagePercent(pool: MemoryPool): number {
  return pool.size > 0 ? (pool.used / pool.size) * 100 : 0;
}
