export type ConversionErrorCode =
  | "MALFORMED_INPUT_NAME"
  | "COLLECTOR_SPAWN_FAILED"
  | "ENDPOINT_BIND_FAILED"
  | "COLLECTOR_STOP_TIMEOUT"
  | "SCRATCH_DIR_NOT_EMPTY"
  | "SESSION_ALREADY_ACTIVE"
  | "OUTPUT_PATH_COLLISION"
  | "TRACE_READ_FAILED"
  | "EXPORT_SEND_FAILED"
  | "DUMP_TOOL_FAILED"
  | "BATCH_ABORTED"
  | "INVALID_CONFIG";

/**
 * Base class for every failure the conversion pipeline reports.
 */
export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: ConversionErrorCode,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ConversionError";
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}

/**
 * A trace file name does not carry a numeric sort key at the configured field.
 */
export class MalformedInputNameError extends ConversionError {
  constructor(
    public readonly tracePath: string,
    reason: string
  ) {
    super(`Cannot derive sort key from ${tracePath}: ${reason}`, "MALFORMED_INPUT_NAME");
    this.name = "MalformedInputNameError";
    Object.setPrototypeOf(this, MalformedInputNameError.prototype);
  }
}

export class CollectorSpawnFailedError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super(message, "COLLECTOR_SPAWN_FAILED", cause);
    this.name = "CollectorSpawnFailedError";
    Object.setPrototypeOf(this, CollectorSpawnFailedError.prototype);
  }
}

export class EndpointBindFailedError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super(message, "ENDPOINT_BIND_FAILED", cause);
    this.name = "EndpointBindFailedError";
    Object.setPrototypeOf(this, EndpointBindFailedError.prototype);
  }
}

/**
 * The collector did not exit after the termination signal, so its scratch
 * output cannot be assumed flushed.
 */
export class CollectorStopTimeoutError extends ConversionError {
  constructor(
    public readonly pid: number | undefined,
    public readonly timeoutMs: number
  ) {
    super(`Collector (pid ${pid ?? "unknown"}) did not exit within ${timeoutMs}ms`, "COLLECTOR_STOP_TIMEOUT");
    this.name = "CollectorStopTimeoutError";
    Object.setPrototypeOf(this, CollectorStopTimeoutError.prototype);
  }
}

export class ScratchDirNotEmptyError extends ConversionError {
  constructor(public readonly scratchDir: string) {
    super(`Scratch directory is not empty: ${scratchDir}`, "SCRATCH_DIR_NOT_EMPTY");
    this.name = "ScratchDirNotEmptyError";
    Object.setPrototypeOf(this, ScratchDirNotEmptyError.prototype);
  }
}

export class SessionAlreadyActiveError extends ConversionError {
  constructor() {
    super("A capture session is already active", "SESSION_ALREADY_ACTIVE");
    this.name = "SessionAlreadyActiveError";
    Object.setPrototypeOf(this, SessionAlreadyActiveError.prototype);
  }
}

/**
 * Two traces in different directories share a basename, so per-input mode
 * would write both to the same flow file.
 */
export class OutputPathCollisionError extends ConversionError {
  constructor(
    public readonly outputPath: string,
    public readonly tracePaths: readonly string[]
  ) {
    super(`Traces ${tracePaths.join(" and ")} would both be written to ${outputPath}`, "OUTPUT_PATH_COLLISION");
    this.name = "OutputPathCollisionError";
    Object.setPrototypeOf(this, OutputPathCollisionError.prototype);
  }
}

export class TraceReadFailedError extends ConversionError {
  constructor(
    public readonly tracePath: string,
    cause?: unknown
  ) {
    super(`Cannot read trace ${tracePath}`, "TRACE_READ_FAILED", cause);
    this.name = "TraceReadFailedError";
    Object.setPrototypeOf(this, TraceReadFailedError.prototype);
  }
}

export class ExportSendFailedError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super(message, "EXPORT_SEND_FAILED", cause);
    this.name = "ExportSendFailedError";
    Object.setPrototypeOf(this, ExportSendFailedError.prototype);
  }
}

export class DumpToolFailedError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super(message, "DUMP_TOOL_FAILED", cause);
    this.name = "DumpToolFailedError";
    Object.setPrototypeOf(this, DumpToolFailedError.prototype);
  }
}

export class BatchAbortedError extends ConversionError {
  constructor() {
    super("Conversion batch was aborted", "BATCH_ABORTED");
    this.name = "BatchAbortedError";
    Object.setPrototypeOf(this, BatchAbortedError.prototype);
  }
}

export class InvalidConfigError extends ConversionError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "INVALID_CONFIG");
    this.name = "InvalidConfigError";
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof ConversionError) return `${error.code}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}
