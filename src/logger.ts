import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

function resolveLevel(value: string | undefined): pino.LevelWithSilent {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE ?? "";

/**
 * stdout, plus LOG_FILE when set. Tests run with LOG_LEVEL=silent and
 * never open the file.
 */
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === "" || LOG_LEVEL === "silent") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  return pino.multistream([
    { level: LOG_LEVEL, stream: process.stdout },
    {
      level: LOG_LEVEL,
      stream: pino.destination({ dest: LOG_FILE, sync: false }),
    },
  ]);
}

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: { service: "legis-sync" },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Failures are logged as { error }, not pino's default { err }
  serializers: { error: pino.stdSerializers.err },
};

const destination = createDestination();

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// One child per layer; sync jobs add { entity } on top of syncLogger
export const sourceLogger = logger.child({ module: "source" });
export const dbLogger = logger.child({ module: "store" });
export const syncLogger = logger.child({ module: "sync" });
export const hydrateLogger = logger.child({ module: "hydrate" });

if (destination !== undefined) {
  logger.debug({ logFile: LOG_FILE, logLevel: LOG_LEVEL }, "File logging on");
}
