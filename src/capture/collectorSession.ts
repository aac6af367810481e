import { ChildProcess, spawn } from "child_process";
import { once } from "events";
import { setTimeout as sleep } from "timers/promises";
import {
  CollectorSpawnFailedError,
  CollectorStopTimeoutError,
  EndpointBindFailedError,
  ScratchDirNotEmptyError,
  SessionAlreadyActiveError
} from "../errors/conversionErrors";
import { CollectorEndpoint } from "../types/inputTrace";
import { CollectorCommandBuilder, formatEndpoint, nfcapdCommand } from "../tools/commands";
import { ensureDir, isDirEmpty } from "../utils/fs";
import { consoleLogger, Logger } from "../utils/logger";
import { EndpointProbe, udpEndpointInUse } from "./endpointProbe";

export const DEFAULT_STARTUP_TIMEOUT_MS = 3000;
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_STOP_TIMEOUT_MS = 10000;
const KILL_GRACE_MS = 2000;
const STDERR_LIMIT = 4096;

export interface CollectorSessionOptions {
  command?: CollectorCommandBuilder;
  probe?: EndpointProbe;
  startupTimeoutMs?: number;
  pollIntervalMs?: number;
  /** How long stop() waits for the collector to exit after SIGTERM. */
  stopTimeoutMs?: number;
  /** Extra wait after the collector has exited. */
  settleMs?: number;
  logger?: Logger;
}

interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

function waitForExit(exited: Promise<ExitInfo>, timeoutMs: number): Promise<ExitInfo | null> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(null), timeoutMs);
    exited.then(
      (info) => {
        clearTimeout(timer);
        resolve(info);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

async function probeEndpoint(probe: EndpointProbe, endpoint: CollectorEndpoint): Promise<boolean> {
  try {
    return await probe(endpoint);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EndpointBindFailedError(`Cannot bind ${formatEndpoint(endpoint)}: ${reason}`, error);
  }
}

/**
 * One collector process bound to one endpoint, writing into one scratch
 * directory. A session instance runs at most one process at a time.
 */
export class CollectorSession {
  private child: ChildProcess | null = null;
  private exitInfo: ExitInfo | null = null;
  private exited: Promise<ExitInfo> | null = null;
  private stderr = "";
  private boundEndpoint: CollectorEndpoint | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: CollectorSessionOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
  }

  get active(): boolean {
    return this.child !== null && this.exitInfo === null;
  }

  get endpoint(): CollectorEndpoint | null {
    return this.boundEndpoint;
  }

  async start(endpoint: CollectorEndpoint, scratchDir: string): Promise<void> {
    if (this.child) {
      throw new SessionAlreadyActiveError();
    }

    await ensureDir(scratchDir);
    if (!(await isDirEmpty(scratchDir))) {
      throw new ScratchDirNotEmptyError(scratchDir);
    }

    const probe = this.options.probe ?? udpEndpointInUse;
    if (await probeEndpoint(probe, endpoint)) {
      throw new EndpointBindFailedError(`Endpoint ${formatEndpoint(endpoint)} is already bound`);
    }

    const tool = (this.options.command ?? nfcapdCommand())(endpoint, scratchDir);
    const child = spawn(tool.command, tool.args, { stdio: ["ignore", "ignore", "pipe"] });
    this.child = child;
    this.exitInfo = null;
    this.stderr = "";
    this.boundEndpoint = endpoint;
    // "close" rather than "exit": stderr is fully read by then
    this.exited = new Promise((resolve) => {
      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        const info = { code, signal };
        if (this.child === child) this.exitInfo = info;
        resolve(info);
      });
    });
    child.on("error", (error) => {
      this.logger.warn(`Collector process error: ${error.message}`);
    });
    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      if (this.stderr.length < STDERR_LIMIT) this.stderr += chunk;
    });

    try {
      await once(child, "spawn");
    } catch (error) {
      this.reset();
      throw new CollectorSpawnFailedError(
        `Cannot launch collector ${tool.command}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    try {
      await this.waitUntilListening(endpoint, probe);
    } catch (error) {
      await this.stop().catch((stopError: unknown) => {
        this.logger.warn(`Collector cleanup after failed start: ${String(stopError)}`);
      });
      throw error;
    }
  }

  private async waitUntilListening(endpoint: CollectorEndpoint, probe: EndpointProbe): Promise<void> {
    const startupTimeoutMs = this.options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    const pollIntervalMs = this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + startupTimeoutMs;

    while (Date.now() < deadline) {
      if (this.exitInfo) {
        const status = this.exitInfo.signal ? `signal=${this.exitInfo.signal}` : `code=${this.exitInfo.code}`;
        const stderr = this.stderr.trim();
        throw new CollectorSpawnFailedError(
          `Collector exited during startup (${status})${stderr ? `: ${stderr}` : ""}`
        );
      }
      if (await probeEndpoint(probe, endpoint)) return;
      await sleep(pollIntervalMs);
    }

    this.logger.warn(
      `Collector on ${formatEndpoint(endpoint)} not confirmed listening after ${startupTimeoutMs}ms; continuing`
    );
  }

  /**
   * Sends SIGTERM and waits for the collector to exit, which is when its
   * buffered flows are on disk. No-op without a running process.
   */
  async stop(): Promise<void> {
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) return;

    if (this.exitInfo) {
      this.reset();
      return;
    }

    const stopTimeoutMs = this.options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    child.kill("SIGTERM");
    const outcome = await waitForExit(exited, stopTimeoutMs);

    if (outcome === null) {
      const pid = child.pid;
      child.kill("SIGKILL");
      await waitForExit(exited, KILL_GRACE_MS);
      this.reset();
      throw new CollectorStopTimeoutError(pid, stopTimeoutMs);
    }

    this.reset();
    const settleMs = this.options.settleMs ?? 0;
    if (settleMs > 0) {
      await sleep(settleMs);
    }
  }

  private reset(): void {
    this.child = null;
    this.exited = null;
    this.exitInfo = null;
    this.boundEndpoint = null;
  }
}
