/**
 * API configuration — all values come from the environment (.env)
 */

export const API_CONFIG = {
  port: parseInt(process.env.PORT || "3000"),
  corsOrigin: process.env.CORS_ORIGIN || "*",
  bodyLimit: process.env.BODY_LIMIT || "10mb",
  rateLimitMax: parseInt(process.env.RATE_LIMIT_MAX || "200", 10),
  rateLimitBurst: parseInt(process.env.RATE_LIMIT_BURST || "30", 10),
  /** Largest measurement table accepted in one request */
  maxRows: parseInt(process.env.MAX_ROWS || "50000", 10),
};
