import { logLevelTag, type LogLevel } from "../core/models.js";
import { formatTimestamp } from "../utils/time.js";
import type { Theme } from "./theme.js";

export function formatStamp(date: Date, theme: Theme): string {
  return theme.muted(`[${formatTimestamp(date)}]`);
}

export function formatLogLine(level: LogLevel, message: string, now: Date, theme: Theme): string {
  const tag = theme.levelTag[level](logLevelTag[level]);
  const body = level === "error" ? theme.errorBody(message) : message;
  return `${formatStamp(now, theme)} ${tag} ${body}`;
}
