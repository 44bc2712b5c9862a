import winston from "winston";

const { combine, timestamp, errors, splat, printf } = winston.format;

const lineFormat = printf(({ level, message, timestamp: time, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  const trace = typeof stack === "string" ? `\n${stack}` : "";
  return `${time} [${level}] ${message}${extra}${trace}`;
});

// stdout is reserved for the uploaded URL, so every level goes to stderr
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  format: combine(timestamp(), errors({ stack: true }), splat(), lineFormat),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});

export default logger;
