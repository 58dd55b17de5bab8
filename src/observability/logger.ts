import pino from "pino";
import { createWriteStream } from "fs";

// Vitest sets VITEST; keep test output clean unless LOG_LEVEL asks otherwise
const logLevel = process.env.LOG_LEVEL || (process.env.VITEST ? "silent" : "info");
const logFile = process.env.LOG_FILE;

const streams: Array<{ stream: NodeJS.WritableStream }> = [
  { stream: process.stdout }
];

if (logFile) {
  streams.push({
    stream: createWriteStream(logFile, { flags: "a" })
  });
}

const destination = streams.length > 1
  ? pino.multistream(streams)
  : process.stdout;

export const logger = pino(
  {
    level: logLevel,
    base: { service: "kmc-dashboard" }
  },
  destination
);

export function childLogger(component: string): pino.Logger {
  return logger.child({ component });
}
