import winston from "winston";
import { config } from "./index.js";

/**
 * format.errors only unwraps an Error passed as the log message, and
 * format.json turns an Error nested in meta into `{}`. This expands nested
 * Errors (e.g. `{ err }`) so their message and stack reach the log line.
 */
export const nestedErrors = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = { name: value.name, message: value.message, stack: value.stack };
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    nestedErrors(),
    winston.format.json(),
  ),
  defaultMeta: { service: "ephemeral-pg" },
  transports: [new winston.transports.Console()],
});
