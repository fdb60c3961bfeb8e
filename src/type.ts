import type { Logger } from "pino";

export type NodeId = number;

// Canonical form is [min, max]; a self-loop is [s, s].
export type Edge = readonly [NodeId, NodeId];

/** Returns a float in [0, 1), the same contract as Math.random. */
export type RandomSource = () => number;

export type SpanningTreeOptions = {
  random?: RandomSource;
  logger?: Logger;
};

export type SpanningTreeStats = {
  nodes: number;
  candidates: number;
  accepted: number;
  rejected: number;
};
