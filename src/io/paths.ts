import path from "path";

export function flowFilePath(outputDir: string, traceBasename: string, outputExtension: string): string {
  return path.join(outputDir, `${traceBasename}${outputExtension}`);
}

export function mergedFlowFilePath(outputDir: string, mergedFilename: string): string {
  return path.join(outputDir, mergedFilename);
}
