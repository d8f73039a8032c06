// src/utils/logger.ts
import winston from "winston";
import path from "path";
import fs from "fs";
import { env } from "../config/env";

// Error objects lose message/stack under plain JSON.stringify
function serializeMeta(meta: Record<string, unknown>, space?: number): string {
  if (!Object.keys(meta).length) return "";
  try {
    return JSON.stringify(
      meta,
      (_key, value: unknown) => {
        if (value instanceof Error) {
          return { name: value.name, message: value.message, stack: value.stack };
        }
        return value;
      },
      space,
    );
  } catch (e) {
    return "[Meta serialization error]";
  }
}

function formatLine(info: winston.Logform.TransformableInfo, space?: number): string {
  const { timestamp, level, message, service, ...meta } = info;
  const messageStr = typeof message === "object" ? JSON.stringify(message) : String(message);
  const servicePrefix = typeof service === "string" ? `[${service}] ` : "";
  const metaString = serializeMeta(meta, space);
  return `[${String(timestamp)}] ${level}: ${servicePrefix}${messageStr}${metaString ? ` ${metaString}` : ""}`;
}

// Console logs (with colors, pretty meta)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf((info) => formatLine(info, 2)),
);

// File logs (without colors, compact meta)
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf((info) => formatLine(info)),
);

type LogTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance;

function createTransports(logLevel: string, logDir: string | null): LogTransport[] {
  const transports: LogTransport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      level: logLevel,
    }),
  ];

  if (logDir) {
    const absoluteLogDir = path.resolve(logDir);
    if (!fs.existsSync(absoluteLogDir)) {
      fs.mkdirSync(absoluteLogDir, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename: path.join(absoluteLogDir, "combined.log"),
        level: logLevel,
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
        tailable: true,
      }),
      new winston.transports.File({
        filename: path.join(absoluteLogDir, "error.log"),
        level: "error",
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 3,
        tailable: true,
      }),
    );
  }

  return transports;
}

const logger = winston.createLogger({
  level: env.logLevel,
  format: winston.format.json(),
  transports: createTransports(env.logLevel, env.logDir),
  exitOnError: false,
});

/**
 * Child logger whose lines are prefixed with `[name]`.
 */
function createServiceLogger(name: string): winston.Logger {
  return logger.child({ service: name });
}

export type Logger = winston.Logger;
export { logger, createServiceLogger };
