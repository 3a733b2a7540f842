import winston from "winston";
import { env } from "./config";

const { combine, timestamp, printf, errors } = winston.format;

const lineFormat = printf(({ level, message, timestamp: time, stack, ...metadata }) => {
  let line = `${String(time)} [${level}]: ${String(message)}`;
  if (Object.keys(metadata).length > 0) line += ` ${JSON.stringify(metadata)}`;
  if (typeof stack === "string") line += `\n${stack}`;
  return line;
});

export const logger = winston.createLogger({
  level: env.SRL_LOG_LEVEL,
  silent: env.NODE_ENV === "test",
  format: combine(errors({ stack: true }), timestamp({ format: "YYYY-MM-DD HH:mm:ss" }), lineFormat),
  transports: [new winston.transports.Console()],
});
