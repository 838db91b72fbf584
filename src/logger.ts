import winston from "winston";
import { cfg } from "./config";

export const logger = winston.createLogger({
  level: cfg.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : "";
      return `${timestamp} [${level}]: ${message} ${metaStr}`.trimEnd();
    })
  ),
  transports: [new winston.transports.Console()],
});
