// src/app.ts
import express, { Express, Request, Response, NextFunction } from "express";
import { rateLimit } from "express-rate-limit";
import { trackApiUsage } from "./middleware/apiTracker";
import { logger } from "./utils/logger";
import { env, AppEnv } from "./config/env";
import { createRoutes } from "./routes";

/**
 * Builds the express application without binding a port.
 */
export function createApp(settings: AppEnv = env): Express {
  const app: Express = express();

  // --- Trust Proxy ---
  // Enable if running behind a reverse proxy (Nginx, etc.) for accurate rate limiting
  app.set("trust proxy", 1);

  // --- Rate Limiter ---
  const limiter = rateLimit({
    windowMs: settings.rateLimitWindowMs,
    limit: settings.rateLimitMax,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: "Too many requests from this IP, please try again later",
    handler: (req, res, _next, options) => {
      logger.warn(
        `Rate limit exceeded for IP ${req.ip}. Endpoint: ${req.method} ${req.originalUrl}`,
      );
      res.status(options.statusCode).send(options.message);
    },
  });

  // --- Middleware ---
  app.use(express.json({ limit: "100kb" }));
  app.use("/", limiter);
  app.use(trackApiUsage);

  // --- Security Headers ---
  app.use((_req, res, next) => {
    res.removeHeader("X-Powered-By");
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");

    if (settings.nodeEnv === "production") {
      res.setHeader("Strict-Transport-Security", "max-age=15552000; includeSubDomains");
    }

    next();
  });

  // --- Use Routes ---
  app.use("/", createRoutes(settings));

  app.get("/", (_req: Request, res: Response) => {
    res.send("Directions query codec is running!");
  });

  // --- Global Error Handler ---
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    // express.json() rejects unparsable bodies with a 400 status
    const status =
      "status" in err && typeof err.status === "number" && err.status < 500 ? err.status : 500;
    if (status < 500) {
      logger.warn(`Rejected request body on ${req.method} ${req.path}: ${err.message}`);
      res.status(status).json({ error: err.message });
      return;
    }

    logger.error("Unhandled API error:", {
      error: err,
      path: req.path,
      method: req.method,
      ip: req.ip,
    });

    if (settings.nodeEnv === "production") {
      res.status(500).json({ error: "Something went wrong on the server." });
    } else {
      res.status(500).json({
        error: "Something went wrong on the server.",
        message: err.message,
        stack: err.stack,
      });
    }
  });

  return app;
}
