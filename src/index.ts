/**
 * scanwatch — console renderer for a network scan detector
 *
 * Programmatic API for the detection pipeline and its periodic tasks.
 *
 * @example
 * ```typescript
 * import { renderBanner, renderAlert, renderStats, DEFAULT_CONFIG } from 'scanwatch';
 *
 * renderBanner(DEFAULT_CONFIG);
 * renderAlert({
 *   sourceIp: '203.0.113.42',
 *   scanType: 'fast',
 *   timestamp: new Date(),
 *   uniquePorts: new Set([22, 80, 443]),
 * });
 * renderStats(42, 5);
 *
 * // Render into another stream, or get the text without writing it
 * import { Display, formatAlert, plainTheme } from 'scanwatch';
 * const display = new Display({ stream: process.stderr });
 * const lines = formatAlert(alert, plainTheme);
 * ```
 */

export {
  renderBanner,
  logInfo,
  logWarning,
  logError,
  renderAlert,
  renderStats,
  Display,
  stdoutDisplay,
  type DisplayOptions,
  formatBanner,
  formatAlert,
  formatPortList,
  formatLogLine,
  formatStats,
  createTheme,
  themeFor,
  colorLevelFor,
  plainTheme,
  RULE_WIDTH,
  MAX_DISPLAY_PORTS,
  type Theme,
  type Style,
  type OutputStream,
} from "./display/index.js";

// Re-export types for consumers
export {
  type Alert,
  type AppConfig,
  type ScanType,
  type LogLevel,
  type NetworkConfig,
  type AlertingConfig,
  type SiemConfig,
  type FastScanConfig,
  type SlowScanConfig,
  DEFAULT_CONFIG,
  VERSION,
  scanTypeLabel,
  logLevelTag,
  portCount,
} from "./core/models.js";

export * from "./simulator/index.js";
