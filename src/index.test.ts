import { afterEach, describe, expect, it, vi } from "vitest";
import { createMonitorFromEnv } from "./index";

describe("monitor from environment", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds a disconnected monitor whose logs reach the console", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { monitor, logging } = createMonitorFromEnv({ SHELF_HOST: "10.0.0.5", SHELF_MAX_WORKERS: "2" });

    expect(monitor.isConnected()).toBe(false);
    expect(monitor.fetchState).toBe("idle");
    monitor.logs.logger("Startup").info("ready");
    await logging.dispose();

    expect(logSpy).toHaveBeenCalledWith("[Startup] ready");
  });
});
