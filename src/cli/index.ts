#!/usr/bin/env node

import { Command, Option } from "commander";
import { DEFAULT_CONFIG, VERSION } from "../core/models.js";
import { parseEndpoint, parsePort, parseThreshold, type Threshold } from "./options.js";
import { renderPreview, type PreviewOptions } from "./preview.js";
import { registerSimulateCommands } from "./simulate.js";

const { network, detection } = DEFAULT_CONFIG;

function thresholdOption(flags: string, description: string, fallback: Threshold): Option {
  return new Option(flags, description)
    .argParser(parseThreshold)
    .default(fallback, `${fallback.ports}/${fallback.window}`);
}

const program = new Command();

program
  .name("scanwatch")
  .description("Network scan detector console: startup banner, alert rendering and traffic simulation")
  .version(VERSION);

program
  .command("preview", { isDefault: true })
  .description("Render the startup banner for a configuration, plus sample output")
  .option("--parser <name>", "Log parser name", network.parser)
  .option("--listen-port <port>", "UDP listen port", parsePort, network.listenPort)
  .option("--siem <host:port>", "Forward alerts to a SIEM endpoint", parseEndpoint)
  .option("--email", "Enable e-mail alerting")
  .addOption(
    thresholdOption("--fast <ports/secs>", "Fast scan threshold", {
      ports: detection.fastScan.portThreshold,
      window: detection.fastScan.timeWindowSecs,
    })
  )
  .addOption(
    thresholdOption("--slow <ports/mins>", "Slow scan threshold", {
      ports: detection.slowScan.portThreshold,
      window: detection.slowScan.timeWindowMins,
    })
  )
  .option("--alerts", "Also render sample alerts and a stats line")
  .action((opts: PreviewOptions) => {
    renderPreview(opts);
  });

registerSimulateCommands(program);

await program.parseAsync();
