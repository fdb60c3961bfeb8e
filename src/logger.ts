import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import { loadConfig } from "./config";
import type { GraphConfig } from "./config";

export type LoggerOptions = {
  config?: GraphConfig;
  destination?: DestinationStream;
};

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  let { logLevel } = options.config ?? loadConfig();
  let opts = { name, level: logLevel };
  return options.destination ? pino(opts, options.destination) : pino(opts);
}
