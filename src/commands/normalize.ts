import path from "path";
import { pathExists } from "../utils/fs";
import { normalizeScratchDir, NormalizeScratchResult } from "../normalize/normalizeScratch";
import { nfdumpCommand } from "../tools/commands";
import { consoleLogger, Logger } from "../utils/logger";

export interface NormalizeCommandOptions {
  scratchDir: string;
  outPath: string;
  nfdumpBin?: string;
}

export async function runNormalize(
  options: NormalizeCommandOptions,
  logger: Logger = consoleLogger
): Promise<NormalizeScratchResult> {
  const scratchDir = path.resolve(options.scratchDir);
  if (!(await pathExists(scratchDir))) {
    throw new Error(`Collector directory not found: ${scratchDir}`);
  }
  const outPath = path.resolve(options.outPath);
  const result = await normalizeScratchDir(scratchDir, outPath, { command: nfdumpCommand(options.nfdumpBin) });
  logger.log(`Wrote ${result.recordCount} record(s) to ${result.outputPath}`);
  return result;
}
