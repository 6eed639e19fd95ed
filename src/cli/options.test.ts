import { describe, it, expect } from "vitest";
import { applyOptions } from "./options";
import type { SiteConfig } from "../types";

const config: SiteConfig = {
  source: "env-source",
  destination: "build/",
  baseUrl: "https://env.test",
  directories: { posts: "posts", templates: "templates", assets: "assets" },
  templates: { extension: ".html.hbs" },
  logging: { level: "warn" },
};

describe("applyOptions", () => {
  it("lets explicit flags win over loaded configuration", () => {
    const result = applyOptions(config, {
      source: "flag-source",
      dest: "out",
      baseUrl: "https://flag.test",
    });

    expect(result.source).toBe("flag-source");
    expect(result.destination).toBe("out");
    expect(result.baseUrl).toBe("https://flag.test");
  });

  it("keeps loaded values when flags are absent", () => {
    expect(applyOptions(config, {})).toEqual(config);
  });

  it("raises the log level to info when verbose", () => {
    expect(applyOptions(config, { verbose: true }).logging.level).toBe("info");
  });

  it("keeps a more verbose configured level when verbose", () => {
    const debug: SiteConfig = { ...config, logging: { level: "debug" } };

    expect(applyOptions(debug, { verbose: true }).logging.level).toBe("debug");
  });
});
