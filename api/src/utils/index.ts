export { API_CONFIG } from "./config.js";
export { default as logger } from "./logger.js";
