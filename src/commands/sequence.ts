import { discoverTraces } from "../discovery/traceDiscovery";
import { sequenceTraces, SequenceOptions } from "../sequence/traceSequencer";
import { InputTrace } from "../types/inputTrace";
import { consoleLogger, Logger } from "../utils/logger";

export interface SequenceCommandOptions extends SequenceOptions {
  inputDir: string;
  traceExtension: string;
}

/** Prints the conversion order so it can be checked before a long batch. */
export async function runSequence(
  options: SequenceCommandOptions,
  logger: Logger = consoleLogger
): Promise<readonly InputTrace[]> {
  const tracePaths = await discoverTraces(options.inputDir, options.traceExtension);
  const traces = sequenceTraces(tracePaths, { delimiter: options.delimiter, field: options.field });
  traces.forEach((trace, index) => {
    logger.log(`${String(index + 1).padStart(4)}  ${String(trace.sortKey).padStart(6)}  ${trace.path}`);
  });
  logger.log(`${traces.length} trace(s)`);
  return traces;
}
