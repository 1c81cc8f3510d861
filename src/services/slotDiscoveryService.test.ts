import { describe, expect, it } from "vitest";
import { discoverSlots } from "./slotDiscoveryService";
import { DeviceApiAdapter } from "../adapters/http/deviceApiAdapter";
import { LogStream } from "../adapters/log/logStream";
import { FakeDevice } from "../test/fakeDevice";

const endpoint = { host: "shelf.local", username: "admin", password: "test-secret" };
const timeouts = { requestTimeoutS: 1, focusedTimeoutS: 1 };

describe("slot discovery", () => {
  it("uses the aggregate slot list when the device provides one", async () => {
    const device = new FakeDevice({ requireLogin: true }).json("/api/data/shelf/slots/detected_coll", {
      data: { shelf: { slots: { detected_coll: { "7": {}, "2": {} } } } }
    });
    const adapter = new DeviceApiAdapter(endpoint, timeouts, { fetchImpl: device.fetch });

    expect(await discoverSlots(adapter, 10)).toEqual([2, 7]);
    expect(device.requestsTo("/slot/1/api/data/dev.json")).toHaveLength(0);
  });

  it("probes slots when the aggregate endpoint is unavailable", async () => {
    const device = new FakeDevice()
      .json("/slot/1/api/data/dev.json", { dev: {} })
      .json("/slot/3/api/data/dev.json", { dev: {} })
      .json("/slot/5/api/data/dev.json", { dev: {} });
    const adapter = new DeviceApiAdapter(endpoint, timeouts, { fetchImpl: device.fetch });

    expect(await discoverSlots(adapter, 10)).toEqual([1, 3, 5]);
    expect(device.requestsTo("/slot/10/api/data/dev.json")).toHaveLength(1);
    expect(device.requestsTo("/slot/11/api/data/dev.json")).toHaveLength(0);
  });

  it("assumes slot 1 when nothing answers", async () => {
    const logs = new LogStream();
    const adapter = new DeviceApiAdapter(endpoint, timeouts, {
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      }
    });

    expect(await discoverSlots(adapter, 3, logs.logger("SlotDiscovery"))).toEqual([1]);
    const warnings = logs
      .history()
      .filter((entry) => entry.level === "warn")
      .map((entry) => entry.message);
    expect(warnings[warnings.length - 1]).toBe(
      "discovery.no_slots_found: no slot answered, assuming slot 1"
    );
  });
});
