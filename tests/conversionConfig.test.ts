import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { configFromEnv, loadConfigFile, resolveConversionConfig } from "../src/config/conversionConfig";
import { InvalidConfigError } from "../src/errors/conversionErrors";
import { makeTempDir } from "./helpers/fakeTools";

describe("conversion config", () => {
  it("fills defaults", () => {
    const config = resolveConversionConfig({ cli: { inputDir: "pcap", outputDir: "nf" } });

    expect(config).toEqual({
      inputDir: "pcap",
      scratchDir: "nf-binary",
      outputDir: "nf",
      merge: false,
      traceExtension: ".pcap",
      outputExtension: ".nf",
      sortDelimiter: "_",
      sortField: 3,
      host: "127.0.0.1",
      port: 9995,
      exportVersion: 5,
      startupTimeoutMs: 3000,
      stopTimeoutMs: 10000,
      settleMs: 0,
      nfcapdBin: "nfcapd",
      softflowdBin: "softflowd",
      nfdumpBin: "nfdump"
    });
  });

  it("lets flags override the config file and the file override the environment", () => {
    const config = resolveConversionConfig({
      env: { PCAP2NF_INPUT_DIR: "env-in", PCAP2NF_OUTPUT_DIR: "env-out", PCAP2NF_PORT: "2055", PCAP2NF_HOST: "::1" },
      file: { outputDir: "file-out", port: 9996 },
      cli: { port: "9997", scratchDir: undefined }
    });

    expect(config.inputDir).toBe("env-in");
    expect(config.outputDir).toBe("file-out");
    expect(config.port).toBe(9997);
    expect(config.host).toBe("::1");
    expect(config.scratchDir).toBe("nf-binary");
  });

  it("reads y/n merge flags the way the batch script did", () => {
    const merged = resolveConversionConfig({
      env: { PCAP2NF_MERGE: "y", PCAP2NF_MERGED_FILENAME: "0112_750-818.nf" },
      cli: { inputDir: "in", outputDir: "out" }
    });
    const split = resolveConversionConfig({ env: { PCAP2NF_MERGE: "n" }, cli: { inputDir: "in", outputDir: "out" } });

    expect(merged.merge).toBe(true);
    expect(merged.mergedFilename).toBe("0112_750-818.nf");
    expect(split.merge).toBe(false);
  });

  it("normalizes extensions to start with a dot", () => {
    const config = resolveConversionConfig({
      cli: { inputDir: "in", outputDir: "out", traceExtension: "pcapng", outputExtension: ".flows" }
    });

    expect(config.traceExtension).toBe(".pcapng");
    expect(config.outputExtension).toBe(".flows");
  });

  it("requires a merged file name in merge mode", () => {
    expect(() => resolveConversionConfig({ cli: { inputDir: "in", outputDir: "out", merge: true } })).toThrowError(
      "Invalid conversion config: mergedFilename: required when merge is enabled"
    );
  });

  it("rejects a merged file name that is a path", () => {
    expect(() =>
      resolveConversionConfig({ cli: { inputDir: "in", outputDir: "out", merge: true, mergedFilename: "x/all.nf" } })
    ).toThrowError("mergedFilename: must be a file name, not a path");
  });

  it("collects every invalid field", () => {
    try {
      resolveConversionConfig({ cli: { outputDir: "out", port: "70000", merge: "maybe" } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      const issues = error instanceof InvalidConfigError ? error.issues : [];
      expect(issues.map((issue) => issue.split(":")[0])).toEqual(["inputDir", "merge", "port"]);
    }
  });

  it("ignores empty environment values", () => {
    expect(configFromEnv({ PCAP2NF_INPUT_DIR: "", NFDUMP_BIN: "/opt/nfdump/bin/nfdump" })).toEqual({
      nfdumpBin: "/opt/nfdump/bin/nfdump"
    });
  });

  it("loads a JSON config file", async () => {
    const dir = await makeTempDir("config");
    const configPath = path.join(dir, "pcap2nf.json");
    await fs.writeFile(configPath, JSON.stringify({ inputDir: "in", outputDir: "out", merge: "y", mergedFilename: "all.nf" }));

    try {
      const config = resolveConversionConfig({ file: await loadConfigFile(configPath) });
      expect(config.merge).toBe(true);
      expect(config.mergedFilename).toBe("all.nf");
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("rejects a config file that is not an object", async () => {
    const dir = await makeTempDir("config");
    const configPath = path.join(dir, "pcap2nf.json");
    await fs.writeFile(configPath, "[1, 2]");

    try {
      await expect(loadConfigFile(configPath)).rejects.toBeInstanceOf(InvalidConfigError);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
