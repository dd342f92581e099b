import winston from "winston";
import { loadConfig } from "../configs/environment";

const config = loadConfig();

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    return `[${timestamp}] ${level}: ${stack || message}${extra}`;
  })
);

const transports: winston.transport[] = [];

if (config.logging.enableConsole) {
  transports.push(new winston.transports.Console({ format: consoleFormat }));
}

if (config.logging.enableFile) {
  transports.push(
    new winston.transports.File({
      filename: config.logging.file,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.errors({ stack: true }),
  transports,
  // winston warns when a logger has nowhere to write
  silent: transports.length === 0,
});
