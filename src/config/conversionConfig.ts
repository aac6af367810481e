import path from "path";
import { z } from "zod";
import { InvalidConfigError } from "../errors/conversionErrors";
import { DEFAULT_TOOL_BINARIES } from "../tools/commands";
import { readJson } from "../utils/fs";

const booleanLike = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => ["y", "n", "yes", "no", "true", "false", "1", "0"].includes(value), {
      message: "expected y/n, yes/no, true/false or 1/0"
    })
    .transform((value) => ["y", "yes", "true", "1"].includes(value))
]);

const extension = z
  .string()
  .min(1)
  .transform((value) => (value.startsWith(".") ? value : `.${value}`));

export const ConversionConfigSchema = z
  .object({
    inputDir: z.string().min(1),
    scratchDir: z.string().min(1).default("nf-binary"),
    outputDir: z.string().min(1),
    merge: booleanLike.default(false),
    mergedFilename: z.string().min(1).optional(),
    traceExtension: extension.default(".pcap"),
    outputExtension: extension.default(".nf"),
    sortDelimiter: z.string().min(1).default("_"),
    sortField: z.coerce.number().int().positive().default(3),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.coerce.number().int().min(1).max(65535).default(9995),
    exportVersion: z.coerce.number().int().positive().default(5),
    startupTimeoutMs: z.coerce.number().int().nonnegative().default(3000),
    stopTimeoutMs: z.coerce.number().int().positive().default(10000),
    settleMs: z.coerce.number().int().nonnegative().default(0),
    nfcapdBin: z.string().min(1).default(DEFAULT_TOOL_BINARIES.nfcapd),
    softflowdBin: z.string().min(1).default(DEFAULT_TOOL_BINARIES.softflowd),
    nfdumpBin: z.string().min(1).default(DEFAULT_TOOL_BINARIES.nfdump),
    manifestPath: z.string().min(1).optional()
  })
  .superRefine((config, ctx) => {
    if (config.merge && !config.mergedFilename) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mergedFilename"],
        message: "required when merge is enabled"
      });
    }
    if (config.mergedFilename && path.basename(config.mergedFilename) !== config.mergedFilename) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mergedFilename"],
        message: "must be a file name, not a path"
      });
    }
  });

export type ConversionConfigInput = z.input<typeof ConversionConfigSchema>;
export type ConversionConfig = z.output<typeof ConversionConfigSchema>;

type RawConfig = Partial<Record<keyof ConversionConfigInput, unknown>>;

const ENV_KEYS: Record<string, keyof ConversionConfigInput> = {
  PCAP2NF_INPUT_DIR: "inputDir",
  PCAP2NF_SCRATCH_DIR: "scratchDir",
  PCAP2NF_OUTPUT_DIR: "outputDir",
  PCAP2NF_MERGE: "merge",
  PCAP2NF_MERGED_FILENAME: "mergedFilename",
  PCAP2NF_TRACE_EXTENSION: "traceExtension",
  PCAP2NF_OUTPUT_EXTENSION: "outputExtension",
  PCAP2NF_SORT_DELIMITER: "sortDelimiter",
  PCAP2NF_SORT_FIELD: "sortField",
  PCAP2NF_HOST: "host",
  PCAP2NF_PORT: "port",
  PCAP2NF_EXPORT_VERSION: "exportVersion",
  PCAP2NF_STARTUP_TIMEOUT_MS: "startupTimeoutMs",
  PCAP2NF_STOP_TIMEOUT_MS: "stopTimeoutMs",
  PCAP2NF_SETTLE_MS: "settleMs",
  PCAP2NF_MANIFEST: "manifestPath",
  NFCAPD_BIN: "nfcapdBin",
  SOFTFLOWD_BIN: "softflowdBin",
  NFDUMP_BIN: "nfdumpBin"
};

export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") raw[configKey] = value;
  }
  return raw;
}

function withoutUndefined(raw: RawConfig): RawConfig {
  const result: RawConfig = {};
  for (const key of Object.values(ENV_KEYS)) {
    if (raw[key] !== undefined) result[key] = raw[key];
  }
  return result;
}

export async function loadConfigFile(configPath: string): Promise<RawConfig> {
  const data = await readJson<unknown>(configPath);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new InvalidConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return { ...data };
}

export interface ConfigSources {
  cli?: RawConfig;
  file?: RawConfig;
  env?: NodeJS.ProcessEnv;
}

/** Flag > config file > environment > default. */
export function resolveConversionConfig(sources: ConfigSources): ConversionConfig {
  const merged: RawConfig = {
    ...configFromEnv(sources.env ?? {}),
    ...withoutUndefined(sources.file ?? {}),
    ...withoutUndefined(sources.cli ?? {})
  };
  const parsed = ConversionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new InvalidConfigError(`Invalid conversion config: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
