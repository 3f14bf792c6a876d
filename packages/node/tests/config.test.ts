/**
 * Tests for config.ts - loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.DEFAULT_COMPANY_CODE).toBe("DEFAULT");
    expect(config.COMPANY_CODES).toEqual([]);
    expect(config.SEED_CHART_OF_ACCOUNTS).toBe(true);
    expect(config.VOUCHER_PREFIX).toBe("CT");
    expect(config.ENTRY_PREFIX).toBe("BT");
    expect(config.DEFAULT_COST_METHOD).toBe("FIFO");
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      DEFAULT_COMPANY_CODE: "CTY01",
      SEED_CHART_OF_ACCOUNTS: "false",
      VOUCHER_PREFIX: "PT",
      ENTRY_PREFIX: "NK",
      DEFAULT_COST_METHOD: "WEIGHTED_AVERAGE",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.DEFAULT_COMPANY_CODE).toBe("CTY01");
    expect(config.SEED_CHART_OF_ACCOUNTS).toBe(false);
    expect(config.VOUCHER_PREFIX).toBe("PT");
    expect(config.ENTRY_PREFIX).toBe("NK");
    expect(config.DEFAULT_COST_METHOD).toBe("WEIGHTED_AVERAGE");
  });

  it("splits the company list on commas", () => {
    expect(loadConfig({ COMPANY_CODES: "CTY01, CTY02,,CTY03 " }).COMPANY_CODES).toEqual([
      "CTY01",
      "CTY02",
      "CTY03",
    ]);
  });

  it("rejects a malformed company code", () => {
    expect(() => loadConfig({ COMPANY_CODES: "CTY01,bad code" })).toThrow();
    expect(() => loadConfig({ DEFAULT_COMPANY_CODE: "a/b" })).toThrow();
  });

  it("accepts 1 and 0 as flags", () => {
    expect(loadConfig({ SEED_CHART_OF_ACCOUNTS: "1" }).SEED_CHART_OF_ACCOUNTS).toBe(true);
    expect(loadConfig({ SEED_CHART_OF_ACCOUNTS: "0" }).SEED_CHART_OF_ACCOUNTS).toBe(false);
  });

  it("rejects an invalid port", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "70000" })).toThrow();
  });

  it("rejects an unknown cost method", () => {
    expect(() => loadConfig({ DEFAULT_COST_METHOD: "AVERAGE" })).toThrow();
  });

  it("rejects a prefix with separators", () => {
    expect(() => loadConfig({ VOUCHER_PREFIX: "CT/" })).toThrow();
  });

  it("rejects an invalid flag", () => {
    expect(() => loadConfig({ SEED_CHART_OF_ACCOUNTS: "yes" })).toThrow();
  });
});
