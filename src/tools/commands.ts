import { CollectorEndpoint } from "../types/inputTrace";

export interface ToolCommand {
  command: string;
  args: string[];
}

export type CollectorCommandBuilder = (endpoint: CollectorEndpoint, scratchDir: string) => ToolCommand;
export type ExportCommandBuilder = (tracePath: string, endpoint: CollectorEndpoint, exportVersion: number) => ToolCommand;
export type DumpCommandBuilder = (scratchDir: string) => ToolCommand;

export interface ToolBinaries {
  nfcapd: string;
  softflowd: string;
  nfdump: string;
}

export const DEFAULT_TOOL_BINARIES: ToolBinaries = {
  nfcapd: "nfcapd",
  softflowd: "softflowd",
  nfdump: "nfdump"
};

export function formatEndpoint(endpoint: CollectorEndpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

export function nfcapdCommand(binary = DEFAULT_TOOL_BINARIES.nfcapd): CollectorCommandBuilder {
  return (endpoint, scratchDir) => ({
    command: binary,
    args: ["-b", endpoint.host, "-p", String(endpoint.port), "-l", scratchDir]
  });
}

export function softflowdCommand(binary = DEFAULT_TOOL_BINARIES.softflowd): ExportCommandBuilder {
  return (tracePath, endpoint, exportVersion) => ({
    command: binary,
    args: ["-n", formatEndpoint(endpoint), "-v", String(exportVersion), "-r", tracePath]
  });
}

// -N: plain numbers, -o long: one flow per line, -R: every file in the directory
export function nfdumpCommand(binary = DEFAULT_TOOL_BINARIES.nfdump): DumpCommandBuilder {
  return (scratchDir) => ({
    command: binary,
    args: ["-N", "-o", "long", "-R", scratchDir]
  });
}
