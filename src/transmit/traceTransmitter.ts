import { promises as fs, constants as fsConstants } from "fs";
import { ExportSendFailedError, TraceReadFailedError } from "../errors/conversionErrors";
import { CollectorEndpoint } from "../types/inputTrace";
import { ExportCommandBuilder, formatEndpoint, softflowdCommand } from "../tools/commands";
import { describeExit, runTool, ToolRunResult } from "../tools/runTool";

export const DEFAULT_EXPORT_VERSION = 5;

export interface TransmitOptions {
  exportVersion?: number;
  command?: ExportCommandBuilder;
  signal?: AbortSignal;
  onOutput?: (chunk: string) => void;
}

export async function transmitTrace(
  tracePath: string,
  endpoint: CollectorEndpoint,
  options: TransmitOptions = {}
): Promise<void> {
  try {
    await fs.access(tracePath, fsConstants.R_OK);
  } catch (error) {
    throw new TraceReadFailedError(tracePath, error);
  }

  const build = options.command ?? softflowdCommand();
  const tool = build(tracePath, endpoint, options.exportVersion ?? DEFAULT_EXPORT_VERSION);

  let result: ToolRunResult;
  try {
    result = await runTool(tool, { signal: options.signal, onStdout: options.onOutput });
  } catch (error) {
    if (options.signal?.aborted) throw error;
    throw new ExportSendFailedError(`Cannot launch ${tool.command}: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  if (result.code !== 0) {
    throw new ExportSendFailedError(
      `Replay of ${tracePath} to ${formatEndpoint(endpoint)} failed (${describeExit(result)})`
    );
  }
}
