import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { DEFAULT_CONFIG, type AppConfig } from "../core/models.js";
import { formatBanner, RULE_WIDTH } from "./banner.js";
import { createTheme, plainTheme } from "./theme.js";

const RULE = "=".repeat(RULE_WIDTH);

const enabled: AppConfig = {
  network: { parser: "cef", listenPort: 6000 },
  alerting: {
    siem: { enabled: true, host: "10.0.0.5", port: 514 },
    email: { enabled: true },
  },
  detection: {
    fastScan: { portThreshold: 20, timeWindowSecs: 5 },
    slowScan: { portThreshold: 50, timeWindowMins: 10 },
  },
};

function stripAnsi(text: string): string {
  return text.replace(/\x1b\[\d+m/g, "");
}

describe("formatBanner", () => {
  it("renders the default configuration", () => {
    expect(formatBanner(DEFAULT_CONFIG, plainTheme)).toEqual([
      "",
      RULE,
      "  SCANWATCH  ::  Intrusion Detection System",
      "  Network Scan Detector v0.1.0",
      "",
      `  Parser:  GAIA${" ".repeat(11)}Listen:  UDP/5555`,
      `  SIEM:    OFF${" ".repeat(12)}Email:   OFF`,
      "  Fast:    >15 ports/10s  Slow:    >30 ports/5min",
      RULE,
      "",
    ]);
  });

  it("shows enabled endpoints as active values", () => {
    const lines = formatBanner(enabled, plainTheme);

    expect(lines[5]).toBe(`  Parser:  CEF${" ".repeat(12)}Listen:  UDP/6000`);
    expect(lines[6]).toBe("  SIEM:    10.0.0.5:514   Email:   ON");
    expect(lines[7]).toBe("  Fast:    >20 ports/5s   Slow:    >50 ports/10min");
  });

  it("frames the content with exactly two rules", () => {
    for (const config of [DEFAULT_CONFIG, enabled]) {
      const lines = formatBanner(config, plainTheme);
      expect(lines.filter((line) => line === RULE)).toHaveLength(2);
      expect(lines.indexOf(RULE)).toBe(1);
      expect(lines.lastIndexOf(RULE)).toBe(8);
    }
  });

  it("prints OFF only for disabled outputs", () => {
    const countOff = (lines: string[]): number =>
      lines.join("\n").split("OFF").length - 1;

    expect(countOff(formatBanner(DEFAULT_CONFIG, plainTheme))).toBe(2);
    expect(countOff(formatBanner(enabled, plainTheme))).toBe(0);

    const siemOnly: AppConfig = {
      ...enabled,
      alerting: { ...enabled.alerting, email: { enabled: false } },
    };
    expect(countOff(formatBanner(siemOnly, plainTheme))).toBe(1);
  });

  it("keeps columns aligned when styled", () => {
    const colored = formatBanner(enabled, createTheme(new Chalk({ level: 1 })));
    const plain = formatBanner(enabled, plainTheme);

    expect(colored[6]).toContain("\x1b[");
    expect(colored.map(stripAnsi)).toEqual(plain);
  });
});
