import { DumpToolFailedError } from "../errors/conversionErrors";
import { DumpCommandBuilder, nfdumpCommand } from "../tools/commands";
import { describeExit, runTool, ToolRunResult } from "../tools/runTool";
import { writeTextAtomic } from "../utils/fs";
import { normalizeFlowDump } from "./flowRecords";

export interface NormalizeScratchOptions {
  command?: DumpCommandBuilder;
  signal?: AbortSignal;
}

export interface NormalizeScratchResult {
  outputPath: string;
  recordCount: number;
}

export async function readScratchDump(scratchDir: string, options: NormalizeScratchOptions = {}): Promise<string> {
  const build = options.command ?? nfdumpCommand();
  const tool = build(scratchDir);

  let result: ToolRunResult;
  try {
    result = await runTool(tool, { signal: options.signal, captureStdout: true });
  } catch (error) {
    if (options.signal?.aborted) throw error;
    throw new DumpToolFailedError(
      `Cannot launch ${tool.command}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  if (result.code !== 0) {
    throw new DumpToolFailedError(`Dump of ${scratchDir} failed (${describeExit(result)})`);
  }
  return result.stdout;
}

export async function normalizeScratchDir(
  scratchDir: string,
  outputPath: string,
  options: NormalizeScratchOptions = {}
): Promise<NormalizeScratchResult> {
  const dump = await readScratchDump(scratchDir, options);
  const normalized = normalizeFlowDump(dump);
  await writeTextAtomic(outputPath, normalized);
  return {
    outputPath,
    recordCount: normalized ? normalized.split("\n").length - 1 : 0
  };
}
