import { createLogger, transports, format, Logger } from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import path from "path";
import { config } from "../config/config";

const logsDirectory = config.logging.directory;

function lineFormat(label: string) {
  return format.combine(
    format.label({ label }),
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.printf(({ level, message, label, timestamp }) => {
      return `${timestamp} [${label}] ${level}: ${message}`;
    })
  );
}

const logger = createLogger({
  level: config.logging.level,
  format: lineFormat(config.logging.label),
  transports: [new transports.Console()],
});

// REST and WebSocket exchanges, one line per request/response
export const trafficLogger: Logger = createLogger({
  level: "info",
  format: lineFormat("webapi"),
  silent: !config.logging.toFile,
  transports: [],
});

if (config.logging.toFile) {
  logger.add(
    new DailyRotateFile({
      filename: path.join(logsDirectory, "application-%DATE%.log"),
      datePattern: "YYYY-MM-DD",
      zippedArchive: true,
      maxSize: "20m",
      maxFiles: "7d",
    })
  );
  logger.add(
    new transports.File({
      filename: path.join(logsDirectory, "error.log"),
      level: "error",
    })
  );
  trafficLogger.add(
    new DailyRotateFile({
      filename: path.join(logsDirectory, "webapi-%DATE%.log"),
      datePattern: "YYYY-MM-DD",
      maxSize: "20m",
      maxFiles: "3d",
    })
  );
}

export default logger;
