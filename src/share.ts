import { NodeIndexError } from "./errors";

export const nullthrows = <T>(
  x: T | null | undefined,
  message?: string
): NonNullable<T> => {
  if (x != null) {
    return x;
  }
  const error = new Error(
    message !== undefined ? message : "Got unexpected " + x
  );
  throw error;
};

export const isNodeIndex = (node: number, size: number): boolean =>
  Number.isInteger(node) && node >= 0 && node < size;

export function assertNodeIndex(node: number, size: number) {
  if (!isNodeIndex(node, size)) {
    throw new NodeIndexError(node, size);
  }
}

export const assert = (v: unknown, msg?: string | Error) => {
  if (!v) {
    if (msg instanceof Error) throw msg;
    throw new Error(msg);
  }
};
