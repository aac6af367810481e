import path from "path";
import { listFilesRecursive } from "../utils/fs";

export function hasExtension(filePath: string, extension: string): boolean {
  const normalized = extension.startsWith(".") ? extension : `.${extension}`;
  return path.extname(filePath).toLowerCase() === normalized.toLowerCase();
}

export async function discoverTraces(inputDir: string, traceExtension: string): Promise<string[]> {
  return listFilesRecursive(inputDir, (filePath) => hasExtension(filePath, traceExtension));
}
