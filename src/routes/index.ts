// src/routes/index.ts
import { Router, RequestHandler } from "express";
import { logger } from "../utils/logger";
import { AppEnv } from "../config/env";
import { usageService } from "../services/usageService";
import codecRoutes from "./codecRoutes";

// Basic health check endpoint - publicly accessible
const basicHealthCheckHandler: RequestHandler = (_req, res) => {
  res.status(200).json({
    status: "OK",
    timestamp: new Date().toISOString()
  });
};

// Detailed health check endpoint - protected with API key
const detailedHealthCheckHandler = (settings: AppEnv): RequestHandler => (req, res) => {
  const apiKey = req.headers['x-api-key'] || req.query.api_key;
  const configuredApiKey = settings.healthCheckApiKey;

  // If no API key is configured, only allow on localhost
  if (!configuredApiKey) {
    const clientIp = req.ip || '';
    const isLocalhost = clientIp === '127.0.0.1' || clientIp === '::1' || clientIp === '::ffff:127.0.0.1';

    if (!isLocalhost) {
      logger.warn(`Unauthorized access attempt to detailed health check from IP: ${clientIp}`);
      res.status(403).json({ error: "Forbidden: detailed health check only available from localhost when no API key is configured" });
      return;
    }
  } else if (apiKey !== configuredApiKey) {
    logger.warn("Invalid API key used for detailed health check");
    res.status(403).json({ error: "Forbidden: invalid API key" });
    return;
  }

  const memory = process.memoryUsage();
  res.status(200).json({
    status: "OK",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: settings.nodeEnv,
    memoryUsage: {
      rss: Math.round(memory.rss / 1024 / 1024) + 'MB',
      heapTotal: Math.round(memory.heapTotal / 1024 / 1024) + 'MB',
      heapUsed: Math.round(memory.heapUsed / 1024 / 1024) + 'MB'
    },
    usage: usageService.getApiUsageData()
  });
};

export function createRoutes(settings: AppEnv): Router {
  const router = Router();

  // Prefix all codec routes with /api/v1
  router.use("/api/v1", codecRoutes);

  router.get("/api/health", basicHealthCheckHandler);
  router.get("/api/health/detailed", detailedHealthCheckHandler(settings));

  return router;
}
