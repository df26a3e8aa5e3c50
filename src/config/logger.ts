import winston from "winston";

const { combine, timestamp, errors, json } = winston.format;

/**
 * Process-wide logger. Call style: `logger.info("message", { ...meta })`.
 *
 * Reads LOG_LEVEL directly rather than through config so that config parsing
 * errors can themselves be logged.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "usage-ledger" },
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === "test",
    }),
  ],
});
