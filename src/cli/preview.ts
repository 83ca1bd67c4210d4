import { DEFAULT_CONFIG, type Alert, type AppConfig } from "../core/models.js";
import { stdoutDisplay, type Display } from "../display/output.js";
import type { Endpoint, Threshold } from "./options.js";

export interface PreviewOptions {
  parser: string;
  listenPort: number;
  siem?: Endpoint;
  email?: boolean;
  fast: Threshold;
  slow: Threshold;
  alerts?: boolean;
}

export function buildConfig(opts: PreviewOptions): AppConfig {
  const siem = opts.siem
    ? { enabled: true, host: opts.siem.host, port: opts.siem.port }
    : { ...DEFAULT_CONFIG.alerting.siem, enabled: false };

  return {
    network: { parser: opts.parser, listenPort: opts.listenPort },
    alerting: { siem, email: { enabled: opts.email === true } },
    detection: {
      fastScan: { portThreshold: opts.fast.ports, timeWindowSecs: opts.fast.window },
      slowScan: { portThreshold: opts.slow.ports, timeWindowMins: opts.slow.window },
    },
  };
}

export function sampleAlerts(now: Date): Alert[] {
  return [
    {
      sourceIp: "203.0.113.42",
      scanType: "fast",
      timestamp: now,
      uniquePorts: new Set(Array.from({ length: 30 }, (_, i) => 20 + i)),
    },
    {
      sourceIp: "198.51.100.7",
      scanType: "slow",
      timestamp: now,
      uniquePorts: [22, 3389, 5900],
    },
  ];
}

export function renderPreview(opts: PreviewOptions, display: Display = stdoutDisplay): void {
  const config = buildConfig(opts);

  display.renderBanner(config);
  display.logInfo(
    `Listening on UDP/${config.network.listenPort} (parser: ${config.network.parser.toUpperCase()})`
  );

  if (opts.alerts) {
    for (const alert of sampleAlerts(new Date())) {
      display.renderAlert(alert);
    }
    display.renderStats(42, 5);
  }
}
