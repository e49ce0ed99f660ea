import dotenv from "dotenv";
dotenv.config();

const NODE_ENV = process.env.NODE_ENV || "development";
const isDev = NODE_ENV === "development";

export const env = Object.freeze({
  NODE_ENV,
  PORT: parseInt(process.env.PORT || "3000", 10),
  CORS_ORIGIN: process.env.CORS_ORIGIN || "http://localhost:5173",
  LOG_LEVEL: process.env.LOG_LEVEL || (isDev ? "debug" : "info"),

  // HTTPS redirection is off unless TLS is terminated in front of us
  FORCE_HTTPS: process.env.FORCE_HTTPS === "true",
  HTTPS_PORT: parseInt(process.env.HTTPS_PORT || "443", 10),

  isDev,
  isProd: NODE_ENV === "production",
  isTest: NODE_ENV === "test",
} as const);
