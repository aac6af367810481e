import { spawn } from "child_process";
import { ToolCommand } from "./commands";

export interface ToolRunOptions {
  signal?: AbortSignal;
  /** Collect stdout into the result instead of discarding it. */
  captureStdout?: boolean;
  onStdout?: (chunk: string) => void;
}

export interface ToolRunResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a tool to completion. Rejects only when the process cannot be spawned
 * (or is aborted); a non-zero exit is reported through `code`.
 */
export function runTool(tool: ToolCommand, options: ToolRunOptions = {}): Promise<ToolRunResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(tool.command, tool.args, {
      signal: options.signal,
      stdio: ["ignore", "pipe", "pipe"]
    });
    const stdoutChunks: string[] = [];
    let stderr = "";
    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");
    proc.stdout.on("data", (chunk: string) => {
      if (options.captureStdout) stdoutChunks.push(chunk);
      options.onStdout?.(chunk);
    });
    proc.stderr.on("data", (chunk: string) => (stderr += chunk));
    proc.on("error", reject);
    proc.on("close", (code, signal) => {
      resolve({ code, signal, stdout: stdoutChunks.join(""), stderr });
    });
  });
}

export function describeExit(result: Pick<ToolRunResult, "code" | "signal" | "stderr">): string {
  const status = result.signal ? `signal=${result.signal}` : `code=${result.code}`;
  const stderr = result.stderr.trim();
  return stderr ? `${status}: ${stderr}` : status;
}
