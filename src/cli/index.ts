#!/usr/bin/env node
import path from "path";
import { readFileSync } from "fs";
import dotenv from "dotenv";
import { Command } from "commander";
import { runConvert } from "../commands/convert";
import { runSequence } from "../commands/sequence";
import { runNormalize } from "../commands/normalize";
import { ConversionConfigInput, configFromEnv, loadConfigFile, resolveConversionConfig } from "../config/conversionConfig";
import { describeError } from "../errors/conversionErrors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.PCAP2NF_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function readPackageVersion(): string {
  const raw = readFileSync(path.resolve(__dirname, "..", "..", "package.json"), "utf8");
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

type ConvertFlags = {
  config?: string;
  input?: string;
  scratch?: string;
  out?: string;
  merge?: boolean;
  mergedFilename?: string;
  traceExt?: string;
  outExt?: string;
  sortDelimiter?: string;
  sortField?: string;
  host?: string;
  port?: string;
  exportVersion?: string;
  startupTimeoutMs?: string;
  stopTimeoutMs?: string;
  settleMs?: string;
  manifest?: string;
};

type SequenceFlags = {
  input?: string;
  traceExt?: string;
  sortDelimiter?: string;
  sortField?: string;
};

type NormalizeFlags = {
  scratch: string;
  out: string;
};

function convertFlagsToConfig(flags: ConvertFlags): Partial<Record<keyof ConversionConfigInput, unknown>> {
  return {
    inputDir: flags.input,
    scratchDir: flags.scratch,
    outputDir: flags.out,
    merge: flags.merge,
    mergedFilename: flags.mergedFilename,
    traceExtension: flags.traceExt,
    outputExtension: flags.outExt,
    sortDelimiter: flags.sortDelimiter,
    sortField: flags.sortField,
    host: flags.host,
    port: flags.port,
    exportVersion: flags.exportVersion,
    startupTimeoutMs: flags.startupTimeoutMs,
    stopTimeoutMs: flags.stopTimeoutMs,
    settleMs: flags.settleMs,
    manifestPath: flags.manifest
  };
}

function abortOnSignals(): AbortController {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    console.error(`Received ${signal}, stopping after the collector shuts down...`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return controller;
}

const program = new Command();

program
  .name("pcap2nf")
  .description("Convert packet captures into normalized NetFlow record files")
  .version(readPackageVersion());

program.option(
  "--env-file <path>",
  "Path to .env file (overrides PCAP2NF_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("convert")
  .description("Replay every trace through nfcapd/softflowd and write normalized flow files")
  .option("--config <path>", "JSON config file")
  .option("--input <dir>", "Directory scanned recursively for traces")
  .option("--scratch <dir>", "Temporary collector directory (emptied and removed)")
  .option("--out <dir>", "Output directory for flow files")
  .option("--merge", "Merge all traces into a single flow file")
  .option("--no-merge", "Write one flow file per trace")
  .option("--merged-filename <name>", "File name of the merged flow file")
  .option("--trace-ext <ext>", "Trace file extension")
  .option("--out-ext <ext>", "Flow file extension")
  .option("--sort-delimiter <char>", "Delimiter splitting trace paths into fields")
  .option("--sort-field <n>", "1-based field holding the numeric sort key")
  .option("--host <host>", "Collector bind address")
  .option("--port <port>", "Collector UDP port")
  .option("--export-version <n>", "NetFlow export version used for replay")
  .option("--startup-timeout-ms <ms>", "Wait for the collector to bind its port")
  .option("--stop-timeout-ms <ms>", "Wait for the collector to exit after SIGTERM")
  .option("--settle-ms <ms>", "Extra wait after the collector exits")
  .option("--manifest <path>", "Write a JSON conversion manifest to this path")
  .action(async (_opts: unknown, command: Command) => {
    const flags = command.opts<ConvertFlags>();
    const file = flags.config ? await loadConfigFile(flags.config) : {};
    const config = resolveConversionConfig({ cli: convertFlagsToConfig(flags), file, env: process.env });
    const controller = abortOnSignals();
    const result = await runConvert(config, { signal: controller.signal });

    const succeeded = result.units.filter((unit) => unit.status === "success");
    console.log(`${succeeded.length}/${result.units.length} unit(s) converted`);
    for (const unit of succeeded) {
      console.log(`  ${unit.outputPath}`);
    }
    if (result.manifestPath) {
      console.log(`Manifest: ${result.manifestPath}`);
    }
    if (result.state === "Failed") {
      const failed =
        result.failedUnit === null
          ? (result.transitions[result.transitions.length - 2] ?? "Idle")
          : `unit ${result.failedUnit + 1}`;
      throw new Error(`Batch failed at ${failed}: ${describeError(result.error)}`);
    }
    if (result.manifestError !== null) {
      throw new Error(`Manifest not written: ${describeError(result.manifestError)}`);
    }
  });

program
  .command("sequence")
  .description("Print the order in which traces would be converted")
  .option("--input <dir>", "Directory scanned recursively for traces")
  .option("--trace-ext <ext>", "Trace file extension")
  .option("--sort-delimiter <char>", "Delimiter splitting trace paths into fields")
  .option("--sort-field <n>", "1-based field holding the numeric sort key")
  .action(async (_opts: unknown, command: Command) => {
    const flags = command.opts<SequenceFlags>();
    const env = configFromEnv(process.env);
    const config = resolveConversionConfig({
      cli: {
        inputDir: flags.input,
        traceExtension: flags.traceExt,
        sortDelimiter: flags.sortDelimiter,
        sortField: flags.sortField,
        outputDir: env.outputDir ?? ".",
        merge: false
      },
      env: process.env
    });
    await runSequence({
      inputDir: config.inputDir,
      traceExtension: config.traceExtension,
      delimiter: config.sortDelimiter,
      field: config.sortField
    });
  });

program
  .command("normalize")
  .description("Dump an existing collector directory into a normalized flow file")
  .requiredOption("--scratch <dir>", "Directory holding nfcapd.* files")
  .requiredOption("--out <path>", "Output flow file")
  .action(async (_opts: unknown, command: Command) => {
    const flags = command.opts<NormalizeFlags>();
    await runNormalize({ scratchDir: flags.scratch, outPath: flags.out, nfdumpBin: process.env.NFDUMP_BIN });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
