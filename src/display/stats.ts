import type { Theme } from "./theme.js";
import { formatStamp } from "./log.js";

export function formatStats(trackedIps: number, cleanedIps: number, now: Date, theme: Theme): string {
  return (
    `${formatStamp(now, theme)} ${theme.statTag("[STAT]")} ` +
    `${theme.emphasis(String(trackedIps))} IP-uri urmarite | ` +
    `Cleanup: ${theme.emphasis(String(cleanedIps))} sterse`
  );
}
