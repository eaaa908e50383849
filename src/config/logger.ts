import winston from "winston";
import { config } from "./index.js";

/**
 * Process-wide structured logger.
 *
 * JSON lines on stdout; the Console transport writes synchronously, so a log
 * call made just before `process.exit` is not lost.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "pressroom-platform" },
  transports: [new winston.transports.Console({ silent: config.nodeEnv === "test" })],
});
