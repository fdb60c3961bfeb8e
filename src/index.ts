export { Graph, MAX_SIZE } from "./Graph";
export { makeSpanningTree } from "./spanningTree";
export { defaultRandom, seededRandom, shuffle } from "./random";
export { createLogger } from "./logger";
export type { LoggerOptions } from "./logger";
export { loadConfig, GraphConfigSchema, LogLevelSchema } from "./config";
export type { GraphConfig } from "./config";
export {
  GraphError,
  NodeIndexError,
  GraphSizeError,
  RandomSourceError,
  ConfigurationError,
} from "./errors";
export type { GraphErrorCode } from "./errors";
export type {
  NodeId,
  Edge,
  RandomSource,
  SpanningTreeOptions,
  SpanningTreeStats,
} from "./type";
