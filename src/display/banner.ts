import { VERSION, type AppConfig } from "../core/models.js";
import type { Style, Theme } from "./theme.js";

export const RULE_WIDTH = 62;

const COLUMN_WIDTH = 14;

/** Pads on the visible text so escape codes do not skew the columns. */
function cell(text: string, style: Style): string {
  return style(text) + " ".repeat(Math.max(0, COLUMN_WIDTH - text.length));
}

function row(label: string, value: string, nextLabel: string, nextValue: string): string {
  return `  ${label.padEnd(9)}${value} ${nextLabel.padEnd(9)}${nextValue}`;
}

export function formatBanner(config: AppConfig, theme: Theme): string[] {
  const rule = theme.frame("=".repeat(RULE_WIDTH));
  const { network, alerting, detection } = config;

  const siem = alerting.siem.enabled
    ? cell(`${alerting.siem.host}:${alerting.siem.port}`, theme.active)
    : cell("OFF", theme.inactive);
  const email = alerting.email.enabled ? theme.active("ON") : theme.inactive("OFF");

  const fast = `>${detection.fastScan.portThreshold} ports/${detection.fastScan.timeWindowSecs}s`;
  const slow = `>${detection.slowScan.portThreshold} ports/${detection.slowScan.timeWindowMins}min`;

  return [
    "",
    rule,
    theme.title("  SCANWATCH  ::  Intrusion Detection System"),
    theme.muted(`  Network Scan Detector v${VERSION}`),
    "",
    row(
      "Parser:",
      cell(network.parser.toUpperCase(), theme.value),
      "Listen:",
      theme.value(`UDP/${network.listenPort}`)
    ),
    row("SIEM:", siem, "Email:", email),
    row("Fast:", cell(fast, theme.emphasis), "Slow:", theme.emphasis(slow)),
    rule,
    "",
  ];
}
