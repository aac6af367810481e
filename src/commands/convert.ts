import { CollectorSession } from "../capture/collectorSession";
import { ConversionConfig } from "../config/conversionConfig";
import { discoverTraces } from "../discovery/traceDiscovery";
import {
  BatchAbortedError,
  ConversionError,
  describeError,
  InvalidConfigError,
  OutputPathCollisionError,
  ScratchDirNotEmptyError
} from "../errors/conversionErrors";
import { writeConversionManifest } from "../io/conversionManifest";
import { flowFilePath, mergedFlowFilePath } from "../io/paths";
import { normalizeScratchDir, NormalizeScratchResult } from "../normalize/normalizeScratch";
import { sequenceTraces } from "../sequence/traceSequencer";
import { nfcapdCommand, nfdumpCommand, formatEndpoint, softflowdCommand } from "../tools/commands";
import { transmitTrace } from "../transmit/traceTransmitter";
import {
  BatchState,
  ConversionManifest,
  ConversionManifestError,
  ConversionManifestUnit,
  ConversionMode
} from "../types/conversionManifest";
import { CollectorEndpoint, InputTrace } from "../types/inputTrace";
import { drainDir, ensureDir, removeDir, removeFile } from "../utils/fs";
import { consoleLogger, Logger } from "../utils/logger";
import { nowUtcIsoSeconds } from "../utils/time";

export interface CaptureSessionHandle {
  start(endpoint: CollectorEndpoint, scratchDir: string): Promise<void>;
  stop(): Promise<void>;
}

/** The external-tool side of a conversion; swapped out in tests. */
export interface ConversionToolkit {
  createSession(): CaptureSessionHandle;
  transmit(tracePath: string, endpoint: CollectorEndpoint, signal?: AbortSignal): Promise<void>;
  normalize(scratchDir: string, outputPath: string, signal?: AbortSignal): Promise<NormalizeScratchResult>;
}

export interface ConvertDependencies {
  toolkit?: ConversionToolkit;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface ConversionUnitResult {
  index: number;
  traces: readonly InputTrace[];
  outputPath: string;
  status: "success" | "error";
  recordCount: number | null;
  startedAt: string;
  endedAt: string;
  error: ConversionManifestError | null;
}

export interface ConversionResult {
  state: "Done" | "Failed";
  mode: ConversionMode;
  transitions: BatchState[];
  traces: readonly InputTrace[];
  units: ConversionUnitResult[];
  failedUnit: number | null;
  error: unknown;
  manifestPath: string | null;
  manifestError: unknown;
}

interface PlannedUnit {
  index: number;
  traces: readonly InputTrace[];
  outputPath: string;
}

const BANNER = "------------------------------------------------------------";

export function createCliToolkit(config: ConversionConfig, logger: Logger = consoleLogger): ConversionToolkit {
  return {
    createSession: () =>
      new CollectorSession({
        command: nfcapdCommand(config.nfcapdBin),
        startupTimeoutMs: config.startupTimeoutMs,
        stopTimeoutMs: config.stopTimeoutMs,
        settleMs: config.settleMs,
        logger
      }),
    transmit: (tracePath, endpoint, signal) =>
      transmitTrace(tracePath, endpoint, {
        exportVersion: config.exportVersion,
        command: softflowdCommand(config.softflowdBin),
        signal,
        onOutput: (chunk) => process.stdout.write(chunk)
      }),
    normalize: (scratchDir, outputPath, signal) =>
      normalizeScratchDir(scratchDir, outputPath, { command: nfdumpCommand(config.nfdumpBin), signal })
  };
}

function toManifestError(error: unknown): ConversionManifestError {
  const manifestError: ConversionManifestError = {
    code: error instanceof ConversionError ? error.code : "UNEXPECTED",
    message: error instanceof Error ? error.message : String(error)
  };
  if (error instanceof Error && error.stack) manifestError.stack = error.stack;
  return manifestError;
}

function planUnits(config: ConversionConfig, traces: readonly InputTrace[]): PlannedUnit[] {
  if (traces.length === 0) return [];
  if (config.merge) {
    const mergedFilename = config.mergedFilename;
    if (!mergedFilename) {
      throw new InvalidConfigError("mergedFilename is required in merge mode");
    }
    return [{ index: 0, traces, outputPath: mergedFlowFilePath(config.outputDir, mergedFilename) }];
  }
  const owners = new Map<string, InputTrace>();
  return traces.map((trace, index) => {
    const outputPath = flowFilePath(config.outputDir, trace.basename, config.outputExtension);
    const owner = owners.get(outputPath);
    if (owner) {
      throw new OutputPathCollisionError(outputPath, [owner.path, trace.path]);
    }
    owners.set(outputPath, trace);
    return { index, traces: [trace], outputPath };
  });
}

/**
 * Converts every trace under `config.inputDir` into flow-record files,
 * either one merged file or one file per trace.
 */
export async function runConvert(config: ConversionConfig, deps: ConvertDependencies = {}): Promise<ConversionResult> {
  const logger = deps.logger ?? consoleLogger;
  const toolkit = deps.toolkit ?? createCliToolkit(config, logger);
  const signal = deps.signal;
  const mode: ConversionMode = config.merge ? "merged" : "per-input";
  const endpoint: CollectorEndpoint = { host: config.host, port: config.port };
  const startedAt = nowUtcIsoSeconds();

  const transitions: BatchState[] = ["Idle"];
  const transition = (next: BatchState): void => {
    logger.log(`[batch] ${transitions[transitions.length - 1]} -> ${next}`);
    transitions.push(next);
  };
  const abortCheck = (): void => {
    if (signal?.aborted) throw new BatchAbortedError();
  };

  const result: ConversionResult = {
    state: "Failed",
    mode,
    transitions,
    traces: [],
    units: [],
    failedUnit: null,
    error: null,
    manifestPath: null,
    manifestError: null
  };

  transition("Sequencing");
  let units: PlannedUnit[];
  try {
    abortCheck();
    const tracePaths = await discoverTraces(config.inputDir, config.traceExtension);
    result.traces = sequenceTraces(tracePaths, { delimiter: config.sortDelimiter, field: config.sortField });
    units = planUnits(config, result.traces);
  } catch (error) {
    transition("Failed");
    logger.error(`Sequencing failed: ${describeError(error)}`);
    result.error = error;
    return result;
  }

  logger.log(`Found ${result.traces.length} trace(s) in ${config.inputDir}`);
  transition(mode === "merged" ? "MergedRun" : "PerInputRun");
  try {
    await ensureDir(config.outputDir);
  } catch (error) {
    result.error = error;
    units = [];
    logger.error(`Cannot create output directory ${config.outputDir}: ${describeError(error)}`);
  }

  for (const unit of units) {
    const unitStartedAt = nowUtcIsoSeconds();
    const stage = mode === "merged" ? "(Stage 1/2)" : `[${unit.index + 1}/${units.length}]`;
    logger.log(`${stage} Replay ${unit.traces.length} trace(s) into ${config.scratchDir}`);

    try {
      const normalized = await convertUnit(unit, { toolkit, endpoint, scratchDir: config.scratchDir, logger, signal });
      result.units.push({
        index: unit.index,
        traces: unit.traces,
        outputPath: normalized.outputPath,
        status: "success",
        recordCount: normalized.recordCount,
        startedAt: unitStartedAt,
        endedAt: nowUtcIsoSeconds(),
        error: null
      });
      logger.log(`Wrote ${normalized.recordCount} record(s) to ${normalized.outputPath}`);
      logger.log(BANNER);
    } catch (caught) {
      const error = signal?.aborted && !(caught instanceof BatchAbortedError) ? new BatchAbortedError() : caught;
      result.units.push({
        index: unit.index,
        traces: unit.traces,
        outputPath: unit.outputPath,
        status: "error",
        recordCount: null,
        startedAt: unitStartedAt,
        endedAt: nowUtcIsoSeconds(),
        error: toManifestError(error)
      });
      result.failedUnit = unit.index;
      result.error = error;
      const names = unit.traces.map((trace) => trace.basename).join(", ");
      logger.error(`Unit ${unit.index + 1} (${names}) failed: ${describeError(error)}`);
      break;
    }
  }

  if (result.error === null) {
    transition("Finalizing");
  }
  if (!(result.error instanceof ScratchDirNotEmptyError)) {
    try {
      await removeDir(config.scratchDir);
    } catch (error) {
      logger.warn(`Could not remove scratch directory ${config.scratchDir}: ${describeError(error)}`);
    }
  }

  result.state = result.error === null ? "Done" : "Failed";
  transition(result.state);

  if (config.manifestPath) {
    const manifest = buildManifest(config, result, { endpoint, startedAt, endedAt: nowUtcIsoSeconds() });
    try {
      await writeConversionManifest(config.manifestPath, manifest);
      result.manifestPath = config.manifestPath;
    } catch (error) {
      // reported beside the batch outcome, which stands
      logger.error(`Cannot write manifest ${config.manifestPath}: ${describeError(error)}`);
      result.manifestError = error;
    }
  }

  return result;
}

interface UnitContext {
  toolkit: ConversionToolkit;
  endpoint: CollectorEndpoint;
  scratchDir: string;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * start -> transmit each trace -> stop -> normalize -> drain. stop() is
 * idempotent, so the failure path calls it again whatever stage failed.
 */
async function convertUnit(unit: PlannedUnit, ctx: UnitContext): Promise<NormalizeScratchResult> {
  const { toolkit, endpoint, scratchDir, logger, signal } = ctx;
  const abortCheck = (): void => {
    if (signal?.aborted) throw new BatchAbortedError();
  };

  abortCheck();
  await ensureDir(scratchDir);
  const session = toolkit.createSession();

  try {
    await session.start(endpoint, scratchDir);

    for (const trace of unit.traces) {
      abortCheck();
      logger.log(`PCAP file: ${trace.path}`);
      await toolkit.transmit(trace.path, endpoint, signal);
    }

    await session.stop();
    abortCheck();

    logger.log(`Normalize ${scratchDir} into ${unit.outputPath}`);
    const normalized = await toolkit.normalize(scratchDir, unit.outputPath, signal);
    try {
      await drainDir(scratchDir);
    } catch (drainError) {
      // a unit that fails here must not leave its flow file behind
      await removeFile(normalized.outputPath);
      throw drainError;
    }
    return normalized;
  } catch (error) {
    await session.stop().catch((stopError: unknown) => {
      logger.warn(`Collector stop on ${formatEndpoint(endpoint)} failed: ${describeError(stopError)}`);
    });
    // leftovers from something else are not ours to delete
    if (!(error instanceof ScratchDirNotEmptyError)) {
      await drainDir(scratchDir).catch((drainError: unknown) => {
        logger.warn(`Could not drain ${scratchDir}: ${describeError(drainError)}`);
      });
    }
    throw error;
  }
}

interface ManifestTimes {
  endpoint: CollectorEndpoint;
  startedAt: string;
  endedAt: string;
}

function buildManifest(config: ConversionConfig, result: ConversionResult, times: ManifestTimes): ConversionManifest {
  return {
    schema_version: "1.0",
    mode: result.mode,
    input_dir: config.inputDir,
    output_dir: config.outputDir,
    scratch_dir: config.scratchDir,
    endpoint: formatEndpoint(times.endpoint),
    started_at: times.startedAt,
    ended_at: times.endedAt,
    state: result.state,
    trace_count: result.traces.length,
    units: result.units.map(
      (unit): ConversionManifestUnit => ({
        unit_index: unit.index,
        traces: unit.traces.map((trace) => trace.path),
        output_path: unit.outputPath,
        status: unit.status,
        record_count: unit.recordCount,
        started_at: unit.startedAt,
        ended_at: unit.endedAt,
        error: unit.error
      })
    ),
    failed_unit: result.failedUnit
  };
}
