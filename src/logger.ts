import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

function isLevel(value: string): value is pino.Level {
  return ["fatal", "error", "warn", "info", "debug", "trace"].includes(value);
}

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const level: pino.Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

  // Write to stdout and the log file
  const streams: pino.StreamEntry[] = [
    { level, stream: process.stdout },
    {
      level,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// For Fastify: config it can take directly
export const fastifyLoggerConfig =
  destination !== undefined
    ? { level: LOG_LEVEL, stream: destination }
    : { level: LOG_LEVEL };

// Child loggers for different modules
export const apiLogger = logger.child({ module: "upstream-api" });
export const dbLogger = logger.child({ module: "database" });
export const syncLogger = logger.child({ module: "sync" });
export const serverLogger = logger.child({ module: "server" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
