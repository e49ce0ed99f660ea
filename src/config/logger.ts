import winston from "winston";
import { env } from "./env.js";

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "products-api" },
  transports: [
    new winston.transports.Console({
      format: env.isDev
        ? winston.format.combine(
            winston.format.colorize(),
            winston.format.simple(),
          )
        : winston.format.json(), // one JSON object per line for log shippers
    }),
  ],
});

export default logger;
