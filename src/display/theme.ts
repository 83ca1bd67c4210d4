import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { LogLevel, ScanType } from "../core/models.js";

export type Style = (text: string) => string;

export interface Theme {
  frame: Style;
  title: Style;
  muted: Style;
  value: Style;
  active: Style;
  inactive: Style;
  emphasis: Style;
  statTag: Style;
  levelTag: Record<LogLevel, Style>;
  errorBody: Style;
  alert: Record<ScanType, Style>;
}

export interface OutputStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export function createTheme(colors: ChalkInstance): Theme {
  return {
    frame: colors.cyan.bold,
    title: colors.white.bold,
    muted: colors.dim,
    value: colors.yellow.bold,
    active: colors.green.bold,
    inactive: colors.red.bold,
    emphasis: colors.white.bold,
    statTag: colors.cyan.bold,
    levelTag: {
      info: colors.blue.bold,
      warn: colors.yellow.bold,
      error: colors.red.bold,
    },
    errorBody: colors.red,
    alert: {
      fast: colors.red.bold,
      slow: colors.yellow.bold,
    },
  };
}

/**
 * Color depth for a stream: chalk's detected level when the stream is a
 * terminal, none otherwise, so redirected output never carries escapes.
 */
export function colorLevelFor(stream: OutputStream): ChalkInstance["level"] {
  return stream.isTTY === true ? chalk.level : 0;
}

export function themeFor(stream: OutputStream): Theme {
  return createTheme(new Chalk({ level: colorLevelFor(stream) }));
}

export const plainTheme: Theme = createTheme(new Chalk({ level: 0 }));
