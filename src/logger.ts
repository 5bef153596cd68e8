import winston from "winston";

export const logger = winston.createLogger({
  level: process.env.PEERCHAT_LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: "peerchat" },
  transports: [new winston.transports.Console({ level: "warn" })],
});
