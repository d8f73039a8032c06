// src/services/usageService.ts
import { createServiceLogger } from "../utils/logger";

const logger = createServiceLogger("Usage Service");

/** Hits for one endpoint on one UTC day. */
export interface ApiUsageRow {
  day_timestamp: number; // Unix epoch seconds at 00:00 UTC
  endpoint: string;
  count: number;
}

/**
 * Per-endpoint daily request counts, kept in memory for the process lifetime.
 */
class UsageService {
  private counts = new Map<string, ApiUsageRow>();

  public trackApiHit(endpoint: string, now: Date = new Date()): void {
    if (!endpoint) {
      logger.warn("Empty endpoint received for API hit tracking.");
      return;
    }

    const dayTimestamp = Math.floor(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()) / 1000,
    );
    const key = `${dayTimestamp}|${endpoint}`;
    const row = this.counts.get(key);
    if (row) {
      row.count++;
    } else {
      this.counts.set(key, { day_timestamp: dayTimestamp, endpoint, count: 1 });
    }
    logger.debug(`Tracked API hit for endpoint: ${endpoint} on day ${dayTimestamp}`);
  }

  /** Newest day first, endpoints alphabetical within a day. */
  public getApiUsageData(): ApiUsageRow[] {
    return [...this.counts.values()]
      .map((row) => ({ ...row }))
      .sort(
        (a, b) => b.day_timestamp - a.day_timestamp || a.endpoint.localeCompare(b.endpoint),
      );
  }

  public reset(): void {
    this.counts.clear();
  }
}

const usageService = new UsageService();
export { usageService, UsageService };
