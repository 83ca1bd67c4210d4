export const VERSION = "0.1.0";

export type ScanType = "fast" | "slow";

export const scanTypeLabel: Record<ScanType, string> = {
  fast: "Fast Scan",
  slow: "Slow Scan",
};

export interface Alert {
  sourceIp: string;
  scanType: ScanType;
  timestamp: Date;
  /** Unique destination ports, in the order the detector collected them. */
  uniquePorts: ReadonlySet<number> | readonly number[];
}

export type LogLevel = "info" | "warn" | "error";

export const logLevelTag: Record<LogLevel, string> = {
  info: "[INFO]",
  warn: "[WARN]",
  error: "[ERROR]",
};

export interface NetworkConfig {
  parser: string;
  listenPort: number;
}

export interface SiemConfig {
  enabled: boolean;
  host: string;
  port: number;
}

export interface AlertingConfig {
  siem: SiemConfig;
  email: { enabled: boolean };
}

export interface FastScanConfig {
  portThreshold: number;
  timeWindowSecs: number;
}

export interface SlowScanConfig {
  portThreshold: number;
  timeWindowMins: number;
}

export interface AppConfig {
  network: NetworkConfig;
  alerting: AlertingConfig;
  detection: {
    fastScan: FastScanConfig;
    slowScan: SlowScanConfig;
  };
}

export const DEFAULT_CONFIG: AppConfig = {
  network: { parser: "gaia", listenPort: 5555 },
  alerting: {
    siem: { enabled: false, host: "127.0.0.1", port: 514 },
    email: { enabled: false },
  },
  detection: {
    fastScan: { portThreshold: 15, timeWindowSecs: 10 },
    slowScan: { portThreshold: 30, timeWindowMins: 5 },
  },
};

export function portCount(ports: Alert["uniquePorts"]): number {
  return "size" in ports ? ports.size : ports.length;
}
