import { describe, it, expect } from "vitest";
import {
  checkCoverage,
  coveragePercentage,
  markPresent,
  summarizeCoverage,
} from "../../src/core/coverage.js";

const corpus = ["shared:", "  - # A", "    type: event", "    event_name: EVT_A", ""].join("\n");

describe("checkCoverage", () => {
  it("reports found and missing events with a percentage", () => {
    expect(checkCoverage(["EVT_A", "EVT_B"], corpus)).toEqual({
      entries: [
        { event: "EVT_A", found: true },
        { event: "EVT_B", found: false },
      ],
      found: 1,
      total: 2,
      percentage: 50,
    });
  });

  it("strips presence markers and ignores blank entries", () => {
    const result = checkCoverage(["EVT_A // present", "  ", "EVT_B // present"], corpus);

    expect(result.entries).toEqual([
      { event: "EVT_A", found: true },
      { event: "EVT_B", found: false },
    ]);
    expect(result.total).toBe(2);
  });

  it("matches names as substrings of the corpus", () => {
    expect(checkCoverage(["EVT"], corpus).found).toBe(1);
  });

  it("reports 0 percent for an empty checklist", () => {
    expect(checkCoverage([], corpus)).toEqual({ entries: [], found: 0, total: 0, percentage: 0 });
  });

  it("does not modify the checklist", () => {
    const checklist = Object.freeze(["EVT_A // present", "EVT_B"]);
    checkCoverage(checklist, corpus);
    expect(checklist).toEqual(["EVT_A // present", "EVT_B"]);
  });
});

describe("coveragePercentage", () => {
  it("rounds to one decimal place", () => {
    expect(coveragePercentage(1, 3)).toBe(33.3);
    expect(coveragePercentage(2, 3)).toBe(66.7);
    expect(coveragePercentage(3, 3)).toBe(100);
  });
});

describe("markPresent", () => {
  it("marks found entries and clears stale markers", () => {
    const checklist = ["EVT_A", "EVT_B // present"];
    const result = checkCoverage(checklist, corpus);

    expect(markPresent(checklist, result)).toEqual(["EVT_A // present", "EVT_B"]);
  });
});

describe("summarizeCoverage", () => {
  it("totals several checklists", () => {
    const results = [
      checkCoverage(["EVT_A", "EVT_B"], corpus),
      checkCoverage(["EVT_A", "EVT_A"], corpus),
    ];

    expect(summarizeCoverage(results)).toEqual({ found: 3, total: 4, percentage: 75 });
  });
});
