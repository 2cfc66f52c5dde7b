import winston from "winston";

const { combine, errors, json, timestamp } = winston.format;

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "peer-trust" },
  transports: [new winston.transports.Console({ silent: process.env.NODE_ENV === "test" })],
});
