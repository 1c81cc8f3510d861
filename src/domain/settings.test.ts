import { describe, expect, it } from "vitest";
import {
  defaultSettings,
  normalizeHost,
  normalizeSettings
} from "./settings";

describe("settings normalization", () => {
  it("accepts defaults", () => {
    const normalized = normalizeSettings(defaultSettings());
    expect(normalized.version).toBe(1);
    expect(normalized.maxWorkers).toBe(8);
    expect(normalized.requestTimeoutS).toBe(10);
  });

  it("fills missing fields from the defaults", () => {
    const normalized = normalizeSettings({ host: "10.0.0.5", maxSlots: "4" });
    expect(normalized.maxSlots).toBe(4);
    expect(normalized.focusedTimeoutS).toBe(5);
    expect(normalized.host).toBe("10.0.0.5");
    expect(normalized.username).toBe("admin");
  });

  it("rejects invalid numbers", () => {
    expect(() => normalizeSettings({ ...defaultSettings(), maxWorkers: 0 })).toThrowError(/maxWorkers/);
    expect(() => normalizeSettings({ ...defaultSettings(), maxSlots: 2.5 })).toThrowError(/whole number/i);
    expect(() => normalizeSettings({ ...defaultSettings(), requestTimeoutS: "soon" })).toThrowError(/number/i);
  });

  it("rejects unsupported versions", () => {
    expect(() => normalizeSettings({ ...defaultSettings(), version: 2 })).toThrowError(/unsupported/i);
  });
});

describe("host normalization", () => {
  it("strips scheme and path but keeps the port", () => {
    expect(normalizeHost(" http://10.0.0.5:8080/slot/1 ")).toBe("10.0.0.5:8080");
    expect(normalizeHost("shelf-a")).toBe("shelf-a");
  });

  it("rejects hosts with whitespace", () => {
    expect(() => normalizeHost("shelf a")).toThrowError(/not a valid host/);
  });
});
