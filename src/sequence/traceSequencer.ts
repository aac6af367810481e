import path from "path";
import { MalformedInputNameError } from "../errors/conversionErrors";
import { InputTrace } from "../types/inputTrace";

export interface SequenceOptions {
  delimiter: string;
  /** 1-based index of the delimiter-separated token holding the sort key. */
  field: number;
}

export const DEFAULT_SEQUENCE_OPTIONS: SequenceOptions = {
  delimiter: "_",
  field: 3
};

export function traceBasename(tracePath: string): string {
  return path.parse(tracePath).name;
}

/**
 * Reads the leading integer of the configured field, so `x_y_12.pcap` keys on 12.
 */
export function extractSortKey(tracePath: string, options: SequenceOptions = DEFAULT_SEQUENCE_OPTIONS): number {
  const tokens = tracePath.split(options.delimiter);
  if (options.field < 1 || tokens.length < options.field) {
    throw new MalformedInputNameError(
      tracePath,
      `expected at least ${options.field} "${options.delimiter}"-separated fields, found ${tokens.length}`
    );
  }

  const token = tokens[options.field - 1];
  const match = token.match(/^\d+/);
  if (!match) {
    throw new MalformedInputNameError(tracePath, `field ${options.field} ("${token}") is not numeric`);
  }
  return Number.parseInt(match[0], 10);
}

function compareTraces(a: InputTrace, b: InputTrace): number {
  if (a.sortKey !== b.sortKey) return a.sortKey - b.sortKey;
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

export function sequenceTraces(
  tracePaths: Iterable<string>,
  options: SequenceOptions = DEFAULT_SEQUENCE_OPTIONS
): readonly InputTrace[] {
  const traces: InputTrace[] = [];
  for (const tracePath of tracePaths) {
    traces.push(
      Object.freeze({
        path: tracePath,
        sortKey: extractSortKey(tracePath, options),
        basename: traceBasename(tracePath)
      })
    );
  }
  traces.sort(compareTraces);
  return Object.freeze(traces);
}
