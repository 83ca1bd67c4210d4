import { readFile } from "node:fs/promises";
import type { ScanType } from "../core/models.js";
import { sleep as defaultSleep, type Sleep } from "../utils/sleep.js";
import { generateLog, randomInt, samplePorts, type LogFormat, type Random } from "./logs.js";
import type { Transport } from "./transport.js";

/** Ports a perimeter firewall routinely drops; repeats keep traffic under scan thresholds. */
export const COMMON_PORTS = [22, 80, 443, 8080, 3389, 25, 53, 110, 143, 993];

const PREVIEW_WIDTH = 70;

export interface ProgressReporter {
  update(text: string): void;
}

export interface SimulationDeps {
  random?: Random;
  sleep?: Sleep;
  now?: () => number;
  progress?: ProgressReporter;
  signal?: AbortSignal;
}

export interface ScanSimulation {
  sourceIp: string;
  ports: number;
  delayMs: number;
  batchSize: number;
  format: LogFormat;
}

export interface NormalSimulation {
  sourceIp: string;
  count: number;
  format: LogFormat;
}

export interface ReplaySimulation {
  file: string;
  delayMs: number;
  batchSize: number;
}

export interface SimulationReport {
  /** Lines the run intended to send. */
  total: number;
  sent: number;
  batches: number;
  elapsedMs: number;
}

export interface NormalReport extends SimulationReport {
  uniquePorts: number;
}

interface Batching {
  batchSize: number;
  delayMs: number;
}

type BatchDescriber = (sent: number, batch: readonly string[], index: number) => string;

function counter(sent: number, total: number): string {
  return `[${String(sent).padStart(4)}/${total}]`;
}

function preview(line: string): string {
  return `${line.slice(0, PREVIEW_WIDTH)}...`;
}

async function sendBatched(
  lines: readonly string[],
  transport: Transport,
  { batchSize, delayMs }: Batching,
  deps: SimulationDeps,
  describe: BatchDescriber
): Promise<{ sent: number; batches: number }> {
  const sleep = deps.sleep ?? defaultSleep;
  const size = Math.max(batchSize, 1);
  let buffer: string[] = [];
  let sent = 0;
  let batches = 0;

  for (let i = 0; i < lines.length; i++) {
    deps.signal?.throwIfAborted();
    buffer.push(lines[i]);

    if (buffer.length >= size || i === lines.length - 1) {
      await transport.send(buffer.join("\n"));
      sent += buffer.length;
      batches++;
      deps.progress?.update(describe(sent, buffer, i));
      buffer = [];

      if (delayMs > 0 && i < lines.length - 1) {
        await sleep(delayMs, deps.signal);
      }
    }
  }

  return { sent, batches };
}

export function estimateDurationMs(sim: ScanSimulation): number {
  return (sim.ports * sim.delayMs) / Math.max(sim.batchSize, 1);
}

/**
 * Sends `drop` lines for distinct random ports from one source. Fast and
 * slow runs differ only in pacing and in how progress is described.
 */
export async function simulateScan(
  kind: ScanType,
  transport: Transport,
  sim: ScanSimulation,
  deps: SimulationDeps = {}
): Promise<SimulationReport> {
  const random = deps.random ?? Math.random;
  const now = deps.now ?? Date.now;
  const start = now();

  const ports = samplePorts(sim.ports, random);
  const lines = ports.map((port) => generateLog(sim.format, sim.sourceIp, port, "drop", random));

  const describe: Record<ScanType, BatchDescriber> = {
    fast: (sent, batch, i) =>
      `${counter(sent, ports.length)} Sent ${batch.length} log(s) | Last port: ${ports[i]}`,
    slow: (sent, _batch, i) =>
      `${counter(sent, ports.length)} Port: ${String(ports[i]).padEnd(5)} | ` +
      `Elapsed: ${((now() - start) / 1000).toFixed(1)}s`,
  };

  const { sent, batches } = await sendBatched(lines, transport, sim, deps, describe[kind]);
  return { total: lines.length, sent, batches, elapsedMs: now() - start };
}

export async function simulateNormal(
  transport: Transport,
  sim: NormalSimulation,
  deps: SimulationDeps = {}
): Promise<NormalReport> {
  const random = deps.random ?? Math.random;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;
  const start = now();

  const ports = Array.from(
    { length: sim.count },
    () => COMMON_PORTS[randomInt(0, COMMON_PORTS.length - 1, random)]
  );

  for (let i = 0; i < ports.length; i++) {
    deps.signal?.throwIfAborted();
    const line = generateLog(sim.format, sim.sourceIp, ports[i], "drop", random);
    await transport.send(line);
    deps.progress?.update(`${counter(i + 1, sim.count)} Port: ${ports[i]} | ${preview(line)}`);

    if (i < ports.length - 1) {
      await sleep(randomInt(500, 2000, random), deps.signal);
    }
  }

  return {
    total: ports.length,
    sent: ports.length,
    batches: ports.length,
    elapsedMs: now() - start,
    uniquePorts: new Set(ports).size,
  };
}

async function readReplayLines(file: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err) {
      if (err.code === "ENOENT") throw new Error(`File '${file}' does not exist.`);
      if (err.code === "EACCES" || err.code === "EPERM") {
        throw new Error(`No permission to read '${file}'.`);
      }
    }
    throw err;
  }

  return content.split(/\r\n|\r|\n/).filter((line) => line.trim().length > 0);
}

/** Sends a file's non-blank lines as-is. An empty file sends nothing. */
export async function replayFile(
  transport: Transport,
  sim: ReplaySimulation,
  deps: SimulationDeps = {}
): Promise<SimulationReport> {
  const now = deps.now ?? Date.now;
  const start = now();
  const lines = await readReplayLines(sim.file);

  const { sent, batches } = await sendBatched(lines, transport, sim, deps, (count, batch) =>
    `${counter(count, lines.length)} Sent ${batch.length} line(s) | ${preview(batch[0])}`
  );
  return { total: lines.length, sent, batches, elapsedMs: now() - start };
}
