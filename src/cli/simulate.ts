import { Command, Option } from "commander";
import { logError, logInfo, logWarning } from "../display/output.js";
import { LOG_FORMATS, type LogFormat } from "../simulator/logs.js";
import {
  estimateDurationMs,
  replayFile,
  simulateNormal,
  simulateScan,
  type ScanSimulation,
  type SimulationDeps,
  type SimulationReport,
} from "../simulator/runner.js";
import { UdpTransport, type SimulationTarget, type Transport } from "../simulator/transport.js";
import { createSimulationProgress } from "./display.js";
import { parseDelay, parsePort, parsePositiveInt } from "./options.js";

interface CommonTrafficOptions {
  format: LogFormat;
  source: string;
}

interface ScanCommandOptions extends CommonTrafficOptions {
  ports: number;
  delay: number;
  batch: number;
}

interface NormalCommandOptions extends CommonTrafficOptions {
  count: number;
}

interface ReplayCommandOptions {
  file: string;
  delay: number;
  batch: number;
}

// A type alias, since commander's opts() needs an indexable shape.
type TargetOptions = { host: string; port: number };

type Run<T extends SimulationReport> = (transport: Transport, deps: SimulationDeps) => Promise<T>;

function seconds(ms: number): string {
  return `${ms / 1000}s`;
}

/**
 * Runs one simulation against a fresh UDP socket. Ctrl-C aborts the run;
 * failures are logged and set a non-zero exit code.
 */
async function runSimulation<T extends SimulationReport>(
  target: SimulationTarget,
  run: Run<T>
): Promise<T | undefined> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  const transport = new UdpTransport(target);
  const progress = createSimulationProgress();

  try {
    const report = await run(transport, { progress, signal: controller.signal });
    if (report.total > 0) {
      progress.succeed(`${report.sent}/${report.total} sent in ${(report.elapsedMs / 1000).toFixed(1)}s`);
    }
    return report;
  } catch (err) {
    progress.fail();
    if (controller.signal.aborted) {
      logWarning("Interrupted by user.");
    } else {
      logError(err instanceof Error ? err.message : String(err));
    }
    process.exitCode = 1;
    return undefined;
  } finally {
    process.off("SIGINT", onInterrupt);
    await transport.close();
  }
}

function delayOption(defaultSeconds: number): Option {
  return new Option("--delay <seconds>", "Pause between datagrams")
    .argParser(parseDelay)
    .default(defaultSeconds * 1000, String(defaultSeconds));
}

function addTrafficOptions(cmd: Command): Command {
  return cmd
    .addOption(
      new Option("--format <format>", "Log format").choices(LOG_FORMATS).default("gaia")
    )
    .option("--source <ip>", "Simulated source IP", "192.168.11.7");
}

/** Normal traffic sends one line per datagram, so only scans batch. */
function addScanOptions(cmd: Command): Command {
  return addTrafficOptions(cmd).option(
    "--batch <n>",
    "Log lines per UDP datagram",
    parsePositiveInt,
    1
  );
}

function scanSimulation(opts: ScanCommandOptions): ScanSimulation {
  return {
    sourceIp: opts.source,
    ports: opts.ports,
    delayMs: opts.delay,
    batchSize: opts.batch,
    format: opts.format,
  };
}

function logScanHeader(label: string, sim: ScanSimulation): void {
  logInfo(`Simulating ${label} from ${sim.sourceIp} (format: ${sim.format.toUpperCase()})`);
  logInfo(`Ports: ${sim.ports} | Delay: ${seconds(sim.delayMs)} | Batch: ${sim.batchSize}`);
}

function logTarget(target: SimulationTarget): void {
  logInfo(`Target: ${target.host}:${target.port}`);
}

export function registerSimulateCommands(program: Command): void {
  const simulate = program
    .command("simulate")
    .description("Send synthetic firewall logs to a running detector over UDP")
    .option("--host <host>", "Detector address", "127.0.0.1")
    .option("--port <port>", "Detector UDP port", parsePort, 5555);

  addScanOptions(
    simulate
      .command("fast-scan")
      .description("Many unique ports from one source in a short burst")
      .option("--ports <n>", "Unique ports to scan", parsePositiveInt, 20)
      .addOption(delayOption(0.1))
  ).action(async (opts: ScanCommandOptions, cmd: Command) => {
    const target = cmd.optsWithGlobals<TargetOptions>();
    const sim = scanSimulation(opts);
    logScanHeader("FAST SCAN", sim);
    logTarget(target);

    const report = await runSimulation(target, (transport, deps) =>
      simulateScan("fast", transport, sim, deps)
    );
    if (report) {
      logInfo(`Fast scan complete: ${report.sent} logs sent (${sim.format.toUpperCase()})`);
      logInfo(`The detector should alert if its fast threshold is below ${sim.ports} ports`);
    }
  });

  addScanOptions(
    simulate
      .command("slow-scan")
      .description("Unique ports from one source spread over several minutes")
      .option("--ports <n>", "Unique ports to scan", parsePositiveInt, 40)
      .addOption(delayOption(7))
  ).action(async (opts: ScanCommandOptions, cmd: Command) => {
    const target = cmd.optsWithGlobals<TargetOptions>();
    const sim = scanSimulation(opts);
    const estimate = estimateDurationMs(sim) / 1000;
    logScanHeader("SLOW SCAN", sim);
    logInfo(`Estimated time: ~${estimate.toFixed(0)}s (${(estimate / 60).toFixed(1)} min)`);
    logTarget(target);

    const report = await runSimulation(target, (transport, deps) =>
      simulateScan("slow", transport, sim, deps)
    );
    if (report) {
      logInfo(
        `Slow scan complete: ${report.sent} logs in ${(report.elapsedMs / 1000).toFixed(1)}s ` +
          `(${sim.format.toUpperCase()})`
      );
      logInfo(`The detector should alert if its slow threshold is below ${sim.ports} ports`);
    }
  });

  addTrafficOptions(
    simulate
      .command("normal")
      .description("Traffic on common ports that stays under detection thresholds")
      .option("--count <n>", "Log lines to send", parsePositiveInt, 5)
  ).action(async (opts: NormalCommandOptions, cmd: Command) => {
    const target = cmd.optsWithGlobals<TargetOptions>();
    const format = opts.format.toUpperCase();
    logInfo(`Sending NORMAL traffic from ${opts.source} (format: ${format})`);
    logInfo(`Logs: ${opts.count}`);
    logTarget(target);

    const report = await runSimulation(target, (transport, deps) =>
      simulateNormal(transport, { sourceIp: opts.source, count: opts.count, format: opts.format }, deps)
    );
    if (report) {
      logInfo(
        `Normal traffic complete: ${report.sent} logs, ${report.uniquePorts} unique ports (${format})`
      );
      logInfo("The detector should not raise any alert");
    }
  });

  simulate
    .command("replay")
    .description("Send the lines of a log file, one log per line")
    .requiredOption("--file <path>", "Log file to replay")
    .addOption(delayOption(0.1))
    .option("--batch <n>", "Lines per UDP datagram", parsePositiveInt, 1)
    .action(async (opts: ReplayCommandOptions, cmd: Command) => {
      const target = cmd.optsWithGlobals<TargetOptions>();
      logInfo(`Replaying logs from: ${opts.file}`);
      logInfo(`Delay: ${seconds(opts.delay)} | Batch: ${opts.batch}`);
      logTarget(target);

      const report = await runSimulation(target, (transport, deps) =>
        replayFile(transport, { file: opts.file, delayMs: opts.delay, batchSize: opts.batch }, deps)
      );
      if (!report) return;
      if (report.total === 0) {
        logWarning("The file is empty. Nothing to send.");
      } else {
        logInfo(`Replay complete: ${report.sent} logs sent from '${opts.file}'`);
      }
    });
}
