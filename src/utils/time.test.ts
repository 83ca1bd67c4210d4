import { describe, it, expect } from "vitest";
import { formatTimestamp } from "./time.js";

describe("formatTimestamp", () => {
  it("formats local time to the second", () => {
    expect(formatTimestamp(new Date(2024, 10, 20, 15, 30, 5))).toBe("2024-11-20 15:30:05");
  });

  it("zero-pads every field", () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5, 999))).toBe("2024-01-02 03:04:05");
  });
});
