// src/middleware/apiTracker.ts
import { Request, Response, NextFunction } from "express";
import { usageService } from "../services/usageService";
import { createServiceLogger } from "../utils/logger";

const logger = createServiceLogger("HTTP");

/** Usage key shared by every request that matched no route. */
export const UNMATCHED_ENDPOINT = "(unmatched)";

export const trackApiUsage = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const startedAt = Date.now();

  // Track the hit *after* the response is finished to not delay the response
  res.on("finish", () => {
    // Route params are resolved by now; group by the matched pattern
    const routePath: unknown = req.route?.path;
    const endpoint =
      typeof routePath === "string" ? `${req.baseUrl || ""}${routePath}` : UNMATCHED_ENDPOINT;

    logger.debug(`${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
    if (req.method !== "OPTIONS") {
      usageService.trackApiHit(endpoint);
    }
  });

  next();
};
