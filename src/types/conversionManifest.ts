export type BatchState = "Idle" | "Sequencing" | "MergedRun" | "PerInputRun" | "Finalizing" | "Done" | "Failed";

export type ConversionMode = "merged" | "per-input";

export interface ConversionManifestError {
  code: string;
  message: string;
  stack?: string;
}

export interface ConversionManifestUnit {
  unit_index: number;
  traces: string[];
  output_path: string;
  status: "success" | "error";
  record_count: number | null;
  started_at: string;
  ended_at: string;
  error: ConversionManifestError | null;
}

export interface ConversionManifest {
  schema_version: "1.0";
  mode: ConversionMode;
  input_dir: string;
  output_dir: string;
  scratch_dir: string;
  endpoint: string;
  started_at: string;
  ended_at: string;
  state: "Done" | "Failed";
  trace_count: number;
  units: ConversionManifestUnit[];
  failed_unit: number | null;
}
