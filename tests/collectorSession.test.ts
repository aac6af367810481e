import { existsSync, promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CollectorSession } from "../src/capture/collectorSession";
import { EndpointProbe } from "../src/capture/endpointProbe";
import {
  CollectorSpawnFailedError,
  CollectorStopTimeoutError,
  EndpointBindFailedError,
  ScratchDirNotEmptyError,
  SessionAlreadyActiveError
} from "../src/errors/conversionErrors";
import { nfcapdCommand } from "../src/tools/commands";
import { silentLogger } from "../src/utils/logger";
import { exitingCollector, fakeCollector, makeTempDir, stubbornCollector } from "./helpers/fakeTools";

const endpoint = { host: "127.0.0.1", port: 9995 };

/** "Listening" once the fake collector has written its ready marker. */
function readyProbe(readyFile: string): EndpointProbe {
  return async () => existsSync(readyFile);
}

describe("collector session", () => {
  let workDir: string;
  let scratchDir: string;
  let readyFile: string;
  let session: CollectorSession | null;

  beforeEach(async () => {
    workDir = await makeTempDir("session");
    scratchDir = path.join(workDir, "nf-binary");
    readyFile = path.join(workDir, "collector.ready");
    session = null;
  });

  afterEach(async () => {
    await session?.stop().catch(() => undefined);
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("builds the nfcapd command for the endpoint and scratch directory", () => {
    expect(nfcapdCommand()(endpoint, "nf-binary")).toEqual({
      command: "nfcapd",
      args: ["-b", "127.0.0.1", "-p", "9995", "-l", "nf-binary"]
    });
  });

  it("treats stop without a running collector as a no-op", async () => {
    session = new CollectorSession({ logger: silentLogger });

    await expect(session.stop()).resolves.toBeUndefined();
    expect(session.active).toBe(false);
    expect(session.endpoint).toBeNull();
  });

  it("waits for the collector to flush before stop returns", async () => {
    session = new CollectorSession({
      command: fakeCollector(readyFile, "10 a\n20 b\n"),
      probe: readyProbe(readyFile),
      pollIntervalMs: 20,
      logger: silentLogger
    });

    await session.start(endpoint, scratchDir);
    expect(session.active).toBe(true);
    expect(session.endpoint).toEqual(endpoint);
    expect(await fs.readdir(scratchDir)).toEqual([]);

    await session.stop();

    expect(session.active).toBe(false);
    expect(await fs.readFile(path.join(scratchDir, "nfcapd.201812010918"), "utf8")).toBe("10 a\n20 b\n");
    await expect(session.stop()).resolves.toBeUndefined();
  });

  it("refuses to start a second collector on the same session", async () => {
    session = new CollectorSession({
      command: fakeCollector(readyFile, ""),
      probe: readyProbe(readyFile),
      pollIntervalMs: 20,
      logger: silentLogger
    });
    await session.start(endpoint, scratchDir);

    await expect(session.start(endpoint, path.join(workDir, "other"))).rejects.toBeInstanceOf(
      SessionAlreadyActiveError
    );
  });

  it("requires an empty scratch directory", async () => {
    await fs.mkdir(scratchDir);
    await fs.writeFile(path.join(scratchDir, "nfcapd.old"), "left over");
    session = new CollectorSession({ command: fakeCollector(readyFile, ""), probe: readyProbe(readyFile), logger: silentLogger });

    await expect(session.start(endpoint, scratchDir)).rejects.toBeInstanceOf(ScratchDirNotEmptyError);
    expect(session.active).toBe(false);
  });

  it("fails before spawning when the endpoint is already bound", async () => {
    let launched = false;
    session = new CollectorSession({
      command: (target, dir) => {
        launched = true;
        return fakeCollector(readyFile, "")(target, dir);
      },
      probe: async () => true,
      logger: silentLogger
    });

    await expect(session.start(endpoint, scratchDir)).rejects.toBeInstanceOf(EndpointBindFailedError);
    expect(launched).toBe(false);
  });

  it("reports an endpoint that cannot be bound at all as a bind failure", async () => {
    const unavailable = Object.assign(new Error("bind EADDRNOTAVAIL 127.0.0.1:9995"), { code: "EADDRNOTAVAIL" });
    session = new CollectorSession({
      command: fakeCollector(readyFile, ""),
      probe: async () => {
        throw unavailable;
      },
      logger: silentLogger
    });

    const attempt = session.start(endpoint, scratchDir);

    await expect(attempt).rejects.toBeInstanceOf(EndpointBindFailedError);
    await expect(attempt).rejects.toThrow("Cannot bind 127.0.0.1:9995: bind EADDRNOTAVAIL 127.0.0.1:9995");
    expect(session.active).toBe(false);
    expect(existsSync(readyFile)).toBe(false);
  });

  it("reports a missing collector binary", async () => {
    session = new CollectorSession({
      command: nfcapdCommand(path.join(workDir, "no-such-nfcapd")),
      probe: async () => false,
      logger: silentLogger
    });

    await expect(session.start(endpoint, scratchDir)).rejects.toBeInstanceOf(CollectorSpawnFailedError);
    expect(session.active).toBe(false);
  });

  it("reports a collector that exits during startup", async () => {
    session = new CollectorSession({
      command: exitingCollector(3, "bind: Address already in use"),
      probe: async () => false,
      pollIntervalMs: 20,
      startupTimeoutMs: 5000,
      logger: silentLogger
    });

    const attempt = session.start(endpoint, scratchDir);

    await expect(attempt).rejects.toBeInstanceOf(CollectorSpawnFailedError);
    await expect(attempt).rejects.toThrow("Collector exited during startup (code=3): bind: Address already in use");
    expect(session.active).toBe(false);
  });

  it("continues with a warning when listening is never confirmed", async () => {
    const warnings: string[] = [];
    session = new CollectorSession({
      command: fakeCollector(readyFile, ""),
      probe: async () => false,
      pollIntervalMs: 20,
      startupTimeoutMs: 100,
      logger: { ...silentLogger, warn: (message: string) => warnings.push(message) }
    });

    await session.start(endpoint, scratchDir);

    expect(session.active).toBe(true);
    expect(warnings).toEqual(["Collector on 127.0.0.1:9995 not confirmed listening after 100ms; continuing"]);
  });

  it("escalates a collector that ignores SIGTERM", async () => {
    session = new CollectorSession({
      command: stubbornCollector(readyFile),
      probe: readyProbe(readyFile),
      pollIntervalMs: 20,
      stopTimeoutMs: 300,
      logger: silentLogger
    });
    await session.start(endpoint, scratchDir);

    await expect(session.stop()).rejects.toBeInstanceOf(CollectorStopTimeoutError);
    expect(session.active).toBe(false);
    await expect(session.stop()).resolves.toBeUndefined();
  });
});
