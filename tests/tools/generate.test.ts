import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG } from "../../src/config.js";
import {
  executeGenerateDefinitions,
  formatGenerateResult,
  validateOutputPath,
} from "../../src/tools/generate.js";

const FIXTURES = path.join(import.meta.dirname, "..", "fixtures");
const CATEGORY = path.join(FIXTURES, "center_panel.json");
const VARIABLES = path.join(FIXTURES, "variables.json");

const EXPECTED_YAML = [
  "# MD-11 Center Panel",
  "",
  "shared:",
  "  - # Park",
  "    type: ToggleSwitch",
  "    var_name: L:MD11_CTR_PARK_GRD",
  "    var_units: Bool",
  "    var_type: bool",
  "    event_name: CTR_PARK_GRD_LEFT_BUTTON_DOWN",
  "",
  "  - # CTR_PARK_LEFT_BUTTON_DOWN",
  "    type: event",
  "    event_name: CTR_PARK_LEFT_BUTTON_DOWN",
  "",
  "  - # Autobrake",
  "    type: ToggleSwitch",
  "    var_name: L:MD11_CTR_AUTOBRAKE",
  "    var_units: Bool",
  "    var_type: bool",
  "    event_name: CTR_AUTOBRAKE_SW_LEFT_BUTTON_DOWN",
  "    off_event_name: CTR_AUTOBRAKE_SW_RIGHT_BUTTON_DOWN",
  "    unreliable: true",
  "",
].join("\n");

describe("validateOutputPath", () => {
  it("rejects non-YAML extensions", () => {
    expect(() => validateOutputPath("/tmp/out.txt")).toThrow("outputPath must end with .yaml or .yml");
  });

  it("rejects path traversal", () => {
    expect(() => validateOutputPath("defs/../../out.yaml")).toThrow(/path traversal/);
  });

  it("resolves relative paths against the working directory", () => {
    expect(validateOutputPath("defs/out.yml")).toBe(path.resolve(process.cwd(), "defs/out.yml"));
  });
});

describe("executeGenerateDefinitions", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(tmpdir(), "event-mapper-generate-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("generates YAML from category and variable files", async () => {
    const result = await executeGenerateDefinitions({ source: CATEGORY, variables: VARIABLES });

    expect(result.category).toBe("center_panel");
    expect(result.eventCount).toBe(4);
    expect(result.skippedCount).toBe(1);
    expect(result.controls).toHaveLength(3);
    expect(result.typeCounts).toEqual({ ToggleSwitch: 2, event: 1 });
    expect(result.content).toBe(EXPECTED_YAML);
    expect(result.writtenTo).toBeUndefined();
  });

  it("treats every control as plain events without variables", async () => {
    const result = await executeGenerateDefinitions({ source: CATEGORY });
    expect(result.typeCounts).toEqual({ event: 4 });
  });

  it("looks variables up under an overridden prefix", async () => {
    const result = await executeGenerateDefinitions({
      source: CATEGORY,
      variables: '{"variables": {"DC10_CTR_PARK_GRD": "boolean"}}',
      variablePrefix: "DC10_",
    });
    expect(result.typeCounts).toEqual({ ToggleSwitch: 1, event: 3 });
  });

  it("accepts inline category JSON and a description override", async () => {
    const result = await executeGenerateDefinitions(
      {
        source: JSON.stringify({ category: "pedestal", events: ["PED_STBY_COMPASS_TOGGLE"] }),
        description: "Pedestal Controls",
      },
      { ...DEFAULT_CONFIG, title: "DC-10", referenceLinks: ["https://example.com/events"] },
    );

    expect(result.content.split("\n").slice(0, 4)).toEqual([
      "# DC-10 Pedestal Controls",
      "# https://example.com/events",
      "",
      "shared:",
    ]);
  });

  it("writes the file when outputPath is given", async () => {
    const outputPath = path.join(tmpDir, "nested", "center_panel.yaml");
    const result = await executeGenerateDefinitions({
      source: CATEGORY,
      variables: VARIABLES,
      outputPath,
    });

    expect(result.writtenTo).toBe(outputPath);
    expect(await readFile(outputPath, "utf-8")).toBe(EXPECTED_YAML);
  });

  it("rejects duplicate events", async () => {
    const source = JSON.stringify({ category: "c", events: ["EVT_A", "EVT_A"] });
    await expect(executeGenerateDefinitions({ source })).rejects.toThrow(/Duplicate event "EVT_A"/);
  });

  it("rejects a missing variables file", async () => {
    await expect(
      executeGenerateDefinitions({ source: CATEGORY, variables: path.join(tmpDir, "none.json") }),
    ).rejects.toThrow(/^Could not read /);
  });
});

describe("formatGenerateResult", () => {
  it("summarizes counts and includes the YAML", async () => {
    const result = await executeGenerateDefinitions({ source: CATEGORY, variables: VARIABLES });
    const lines = formatGenerateResult(result).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "Generated definitions for center_panel: 4 event(s) → 3 control(s), 1 skipped as present.",
      "  - ToggleSwitch: 2",
      "  - event: 1",
      "",
      "```yaml",
    ]);
    expect(lines[5]).toBe("# MD-11 Center Panel");
    expect(lines[lines.length - 1]).toBe("```");
  });

  it("reports the written path first", () => {
    const text = formatGenerateResult({
      category: "c",
      content: "# MD-11\n\nshared: []\n",
      controls: [],
      eventCount: 0,
      skippedCount: 0,
      typeCounts: {},
      writtenTo: "/tmp/c.yaml",
    });

    expect(text.split("\n").slice(0, 3)).toEqual([
      "FILE WRITTEN SUCCESSFULLY to: /tmp/c.yaml",
      "",
      "Generated definitions for c: 0 event(s) → 0 control(s), 0 skipped as present.",
    ]);
  });
});
