import { describe, it, expect } from "vitest";
import { buildDuration, formatDuration } from "./stats";

describe("formatDuration", () => {
  it("prints milliseconds under a second", () => {
    expect(formatDuration(250)).toBe("250ms");
  });

  it("prints seconds with two decimals under a minute", () => {
    expect(formatDuration(1500)).toBe("1.50s");
  });

  it("prints minutes and whole seconds", () => {
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("buildDuration", () => {
  it("measures from start to end time", () => {
    expect(
      buildDuration({
        posts: 0,
        tags: 0,
        pages: 0,
        feeds: 0,
        assets: 0,
        startTime: new Date(1_000),
        endTime: new Date(3_500),
      }),
    ).toBe(2_500);
  });
});
