import { describe, expect, it } from "vitest";
import { UsageService } from "../services/usageService";

describe("UsageService", () => {
  it("counts hits per endpoint and UTC day", () => {
    const usage = new UsageService();
    usage.trackApiHit("/api/v1/fields", new Date("2026-01-02T08:00:00Z"));
    usage.trackApiHit("/api/v1/fields", new Date("2026-01-02T23:59:59Z"));
    usage.trackApiHit("/api/health", new Date("2026-01-02T10:00:00Z"));
    usage.trackApiHit("/api/v1/fields", new Date("2026-01-03T00:00:00Z"));

    expect(usage.getApiUsageData()).toEqual([
      { day_timestamp: 1767398400, endpoint: "/api/v1/fields", count: 1 },
      { day_timestamp: 1767312000, endpoint: "/api/health", count: 1 },
      { day_timestamp: 1767312000, endpoint: "/api/v1/fields", count: 2 },
    ]);
  });

  it("ignores empty endpoints", () => {
    const usage = new UsageService();
    usage.trackApiHit("");
    expect(usage.getApiUsageData()).toEqual([]);
  });

  it("returns copies and can be reset", () => {
    const usage = new UsageService();
    usage.trackApiHit("/api/health");
    const [row] = usage.getApiUsageData();
    row.count = 99;
    expect(usage.getApiUsageData()[0].count).toBe(1);

    usage.reset();
    expect(usage.getApiUsageData()).toEqual([]);
  });
});
