import { describe, it, expect } from "vitest";
import { Display } from "../display/output.js";
import type { OutputStream } from "../display/theme.js";
import { buildConfig, renderPreview, type PreviewOptions } from "./preview.js";

const at = new Date(2024, 10, 20, 15, 30, 5);

const base: PreviewOptions = {
  parser: "cef",
  listenPort: 6000,
  fast: { ports: 15, window: 10 },
  slow: { ports: 30, window: 5 },
};

function recordingDisplay(): { display: Display; chunks: string[] } {
  const chunks: string[] = [];
  const stream: OutputStream = {
    isTTY: false,
    write: (chunk) => {
      chunks.push(chunk);
      return true;
    },
  };
  return { display: new Display({ stream, clock: () => at }), chunks };
}

describe("buildConfig", () => {
  it("leaves SIEM and e-mail off unless requested", () => {
    const config = buildConfig(base);
    expect(config.alerting.siem.enabled).toBe(false);
    expect(config.alerting.email.enabled).toBe(false);
    expect(config.network).toEqual({ parser: "cef", listenPort: 6000 });
  });

  it("maps thresholds and endpoints onto the snapshot", () => {
    const config = buildConfig({
      ...base,
      siem: { host: "10.0.0.5", port: 514 },
      email: true,
      fast: { ports: 20, window: 5 },
      slow: { ports: 50, window: 15 },
    });

    expect(config.alerting).toEqual({
      siem: { enabled: true, host: "10.0.0.5", port: 514 },
      email: { enabled: true },
    });
    expect(config.detection).toEqual({
      fastScan: { portThreshold: 20, timeWindowSecs: 5 },
      slowScan: { portThreshold: 50, timeWindowMins: 15 },
    });
  });
});

describe("renderPreview", () => {
  it("renders the banner and a listener line", () => {
    const { display, chunks } = recordingDisplay();
    renderPreview(base, display);

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toContain("  Parser:  CEF");
    expect(chunks[1]).toBe("[2024-11-20 15:30:05] [INFO] Listening on UDP/6000 (parser: CEF)\n");
  });

  it("adds sample alerts and stats on request", () => {
    const { display, chunks } = recordingDisplay();
    renderPreview({ ...base, alerts: true }, display);

    expect(chunks).toHaveLength(5);
    expect(chunks[2]).toContain("[IP: 203.0.113.42] Fast Scan detected!");
    expect(chunks[2]).toContain("... (+5 more)");
    expect(chunks[3]).toContain("  Ports: 22, 3389, 5900\n");
    expect(chunks[4]).toBe("[2024-11-20 15:30:05] [STAT] 42 IP-uri urmarite | Cleanup: 5 sterse\n");
  });
});
