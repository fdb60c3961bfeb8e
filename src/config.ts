import { z } from "zod";
import { ConfigurationError } from "./errors";

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const GraphConfigSchema = z.object({
  logLevel: LogLevelSchema.default("warn"),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;

/**
 * Reads the package configuration from environment variables.
 *
 * - `GRAPH_LOG_LEVEL`: pino level for the package loggers (default `warn`).
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): GraphConfig {
  const result = GraphConfigSchema.safeParse({
    logLevel: env.GRAPH_LOG_LEVEL,
  });
  if (!result.success) {
    throw new ConfigurationError(
      "GRAPH_LOG_LEVEL",
      `Invalid GRAPH_LOG_LEVEL "${env.GRAPH_LOG_LEVEL}": expected one of ${LogLevelSchema.options.join(", ")}`
    );
  }
  return result.data;
}
