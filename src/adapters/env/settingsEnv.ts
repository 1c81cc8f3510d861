import { MonitorSettingsDto, defaultSettings, normalizeSettings } from "../../domain/settings";

export type Environment = Record<string, string | undefined>;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

function pick(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Overlays `SHELF_*` variables on the defaults and validates the result. */
export function loadSettingsFromEnv(env: Environment): MonitorSettingsDto {
  const defaults = defaultSettings();
  const debug = pick(env, "SHELF_DEBUG");
  return normalizeSettings({
    ...defaults,
    host: pick(env, "SHELF_HOST") ?? defaults.host,
    username: pick(env, "SHELF_USERNAME") ?? defaults.username,
    password: env.SHELF_PASSWORD ?? defaults.password,
    requestTimeoutS: pick(env, "SHELF_REQUEST_TIMEOUT_S") ?? defaults.requestTimeoutS,
    focusedTimeoutS: pick(env, "SHELF_FOCUSED_TIMEOUT_S") ?? defaults.focusedTimeoutS,
    maxSlots: pick(env, "SHELF_MAX_SLOTS") ?? defaults.maxSlots,
    maxWorkers: pick(env, "SHELF_MAX_WORKERS") ?? defaults.maxWorkers,
    debugLogging: debug === undefined ? defaults.debugLogging : TRUE_VALUES.has(debug.toLowerCase()),
    logFile: pick(env, "SHELF_LOG_FILE") ?? defaults.logFile
  });
}
