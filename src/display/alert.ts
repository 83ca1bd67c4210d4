import { portCount, scanTypeLabel, type Alert } from "../core/models.js";
import { RULE_WIDTH } from "./banner.js";
import { formatStamp } from "./log.js";
import type { Theme } from "./theme.js";

export const MAX_DISPLAY_PORTS = 25;

/**
 * Joins the first {@link MAX_DISPLAY_PORTS} ports in iteration order and
 * notes how many were left out. Iteration stops at the cap.
 */
export function formatPortList(ports: Iterable<number>, total: number): string {
  const shown: string[] = [];
  for (const port of ports) {
    if (shown.length >= MAX_DISPLAY_PORTS) break;
    shown.push(String(port));
  }

  const suffix =
    total > MAX_DISPLAY_PORTS ? ` ... (+${total - MAX_DISPLAY_PORTS} more)` : "";
  return shown.join(", ") + suffix;
}

export function formatAlert(alert: Alert, theme: Theme): string[] {
  const style = theme.alert[alert.scanType];
  const total = portCount(alert.uniquePorts);
  const rule = style("-".repeat(RULE_WIDTH));

  return [
    rule,
    `${formatStamp(alert.timestamp, theme)} ${style("[ALERT]")} ` +
      `${theme.emphasis(`[IP: ${alert.sourceIp}]`)} ${style(scanTypeLabel[alert.scanType])} detected!`,
    `  ${style(String(total))} unique ports in time window`,
    `  Ports: ${formatPortList(alert.uniquePorts, total)}`,
    rule,
  ];
}
