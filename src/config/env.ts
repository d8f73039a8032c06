// src/config/env.ts
import * as dotenv from "dotenv";
import { safeParseInt } from "../utils/parseValidate";

dotenv.config();

/**
 * Runtime settings read from the environment (and `.env`, if present).
 */
export interface AppEnv {
  port: number;
  nodeEnv: string;
  logLevel: string;
  /** Directory for file logs; console only when unset */
  logDir: string | null;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  healthCheckApiKey: string | null;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  return {
    port: safeParseInt(source.PORT, { min: 0, max: 65535, defaultValue: 3000 }) ?? 3000,
    nodeEnv: source.NODE_ENV || "development",
    logLevel: source.LOG_LEVEL || "info",
    logDir: source.LOG_DIR || null,
    rateLimitWindowMs:
      safeParseInt(source.RATE_LIMIT_WINDOW_MS, { min: 1000, defaultValue: 15 * 60 * 1000 }) ??
      15 * 60 * 1000,
    rateLimitMax: safeParseInt(source.RATE_LIMIT_MAX, { min: 1, defaultValue: 1000 }) ?? 1000,
    healthCheckApiKey: source.HEALTH_CHECK_API_KEY || null,
  };
}

export const env: AppEnv = loadEnv();
