import { describe, it, expect } from "vitest";
import chalk, { Chalk } from "chalk";
import { colorLevelFor, createTheme, plainTheme, themeFor } from "./theme.js";

const write = (): boolean => true;

describe("colorLevelFor", () => {
  it("disables color for streams that are not terminals", () => {
    expect(colorLevelFor({ isTTY: false, write })).toBe(0);
    expect(colorLevelFor({ write })).toBe(0);
  });

  it("uses the detected level for terminals", () => {
    expect(colorLevelFor({ isTTY: true, write })).toBe(chalk.level);
  });
});

describe("themes", () => {
  it("passes text through unchanged without color", () => {
    expect(plainTheme.alert.fast("x")).toBe("x");
    expect(plainTheme.levelTag.error("[ERROR]")).toBe("[ERROR]");
    expect(themeFor({ isTTY: false, write }).frame("===")).toBe("===");
  });

  it("gives fast and slow alerts different palettes", () => {
    const theme = createTheme(new Chalk({ level: 1 }));
    const fast = theme.alert.fast("x");
    const slow = theme.alert.slow("x");

    expect(fast).toContain("\x1b[31m");
    expect(fast).not.toContain("\x1b[33m");
    expect(slow).toContain("\x1b[33m");
    expect(slow).not.toContain("\x1b[31m");
  });
});
