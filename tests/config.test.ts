import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, loadConfig, parseConfig } from "../src/config.js";

describe("parseConfig", () => {
  it("fills every field with its default", () => {
    expect(parseConfig({})).toEqual({
      variablePrefix: "MD11_",
      variableScope: "L:",
      title: "MD-11",
      referenceLinks: [],
    });
  });

  it("names the offending field", () => {
    expect(() => parseConfig({ variablePrefix: 3 }, "test.json")).toThrow(
      /^Invalid configuration in test\.json: variablePrefix: /,
    );
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "event-mapper-config-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("returns the defaults when the file is missing", async () => {
    expect(await loadConfig(join(tmpDir, "generator.config.json"))).toEqual(DEFAULT_CONFIG);
  });

  it("merges file values over the defaults", async () => {
    const file = join(tmpDir, "generator.config.json");
    await writeFile(file, JSON.stringify({ title: "DC-10", outputPath: "out" }), "utf-8");

    expect(await loadConfig(file)).toEqual({
      variablePrefix: "MD11_",
      variableScope: "L:",
      title: "DC-10",
      referenceLinks: [],
      outputPath: "out",
    });
  });

  it("rejects a file that is not JSON", async () => {
    const file = join(tmpDir, "generator.config.json");
    await writeFile(file, "title = DC-10", "utf-8");

    await expect(loadConfig(file)).rejects.toThrow(/^Could not parse JSON from /);
  });
});
