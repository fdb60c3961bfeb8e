export type GraphErrorCode =
  | "NODE_INDEX_OUT_OF_RANGE"
  | "INVALID_GRAPH_SIZE"
  | "INVALID_RANDOM_VALUE"
  | "INVALID_CONFIGURATION";

/**
 * Base class for every error thrown by this package.
 * `name` is set to the concrete class so callers can tell them apart in logs.
 */
export abstract class GraphError extends Error {
  readonly code: GraphErrorCode;

  constructor(message: string, code: GraphErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NodeIndexError extends GraphError {
  readonly node: number;
  readonly size: number;

  constructor(node: number, size: number) {
    super(
      `Node ${node} is out of range for a graph of size ${size}`,
      "NODE_INDEX_OUT_OF_RANGE"
    );
    this.node = node;
    this.size = size;
  }
}

export class GraphSizeError extends GraphError {
  readonly size: number;

  constructor(size: number) {
    super(
      `Graph size must be an integer in [0, 2^32 - 1], got ${size}`,
      "INVALID_GRAPH_SIZE"
    );
    this.size = size;
  }
}

export class RandomSourceError extends GraphError {
  readonly value: number;

  constructor(value: number, message?: string) {
    super(
      message ?? `Random source returned ${value}, expected a value in [0, 1)`,
      "INVALID_RANDOM_VALUE"
    );
    this.value = value;
  }
}

export class ConfigurationError extends GraphError {
  readonly configKey: string;

  constructor(configKey: string, message?: string) {
    super(
      message ?? `Invalid or missing configuration: ${configKey}`,
      "INVALID_CONFIGURATION"
    );
    this.configKey = configKey;
  }
}
