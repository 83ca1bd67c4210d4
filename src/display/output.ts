import type { Alert, AppConfig, LogLevel } from "../core/models.js";
import { formatAlert } from "./alert.js";
import { formatBanner } from "./banner.js";
import { formatLogLine } from "./log.js";
import { formatStats } from "./stats.js";
import { themeFor, type OutputStream, type Theme } from "./theme.js";

export interface DisplayOptions {
  stream?: OutputStream;
  /** Defaults to a theme matching the stream's terminal capability. */
  theme?: Theme;
  clock?: () => Date;
}

/**
 * Writes renderer output to a stream. Every call emits its whole block in a
 * single write so lines from concurrent producers never interleave.
 */
export class Display {
  readonly theme: Theme;
  private readonly stream: OutputStream;
  private readonly clock: () => Date;

  constructor(opts: DisplayOptions = {}) {
    this.stream = opts.stream ?? process.stdout;
    this.theme = opts.theme ?? themeFor(this.stream);
    this.clock = opts.clock ?? (() => new Date());
  }

  renderBanner(config: AppConfig): void {
    this.emit(formatBanner(config, this.theme));
  }

  logInfo(message: string): void {
    this.log("info", message);
  }

  logWarning(message: string): void {
    this.log("warn", message);
  }

  logError(message: string): void {
    this.log("error", message);
  }

  renderAlert(alert: Alert): void {
    this.emit(formatAlert(alert, this.theme));
  }

  renderStats(trackedIps: number, cleanedIps: number): void {
    this.emit([formatStats(trackedIps, cleanedIps, this.clock(), this.theme)]);
  }

  private log(level: LogLevel, message: string): void {
    this.emit([formatLogLine(level, message, this.clock(), this.theme)]);
  }

  private emit(lines: string[]): void {
    this.stream.write(lines.join("\n") + "\n");
  }
}

export const stdoutDisplay = new Display();

export function renderBanner(config: AppConfig): void {
  stdoutDisplay.renderBanner(config);
}

export function logInfo(message: string): void {
  stdoutDisplay.logInfo(message);
}

export function logWarning(message: string): void {
  stdoutDisplay.logWarning(message);
}

export function logError(message: string): void {
  stdoutDisplay.logError(message);
}

export function renderAlert(alert: Alert): void {
  stdoutDisplay.renderAlert(alert);
}

export function renderStats(trackedIps: number, cleanedIps: number): void {
  stdoutDisplay.renderStats(trackedIps, cleanedIps);
}
