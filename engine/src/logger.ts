import winston from "winston";

/** Timestamp and stack capture shared by every EffMap logger */
export const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.errors({ stack: true }),
);

/** `12:04:31 info: [MapSession] <Sheet1> Grid: 31 speed columns × 12 torque rows (4ms)` */
export const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp, module: mod, sheet, duration, stack }) => {
    const tag = mod ? ` [${mod}]` : "";
    const where = sheet !== undefined ? ` <${sheet}>` : "";
    if (stack) return `${timestamp} ${level}:${tag}${where} ${message}\n${stack}`;
    const time = duration !== undefined ? ` (${duration})` : "";
    return `${timestamp} ${level}:${tag}${where} ${message}${time}`;
  }),
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: baseFormat,
  transports: [new winston.transports.Console({ format: consoleFormat, silent: process.env.NODE_ENV === "test" })],
});

export default logger;
