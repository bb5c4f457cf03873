import { describe, it, expect } from "vitest";
import { groupEvents } from "../../src/core/grouping.js";
import type { RawEvent } from "../../src/types.js";

function ev(name: string): RawEvent {
  return { name, overrides: {} };
}

describe("groupEvents", () => {
  it("orders groups by first appearance", () => {
    const groups = groupEvents([
      ev("OVHD_APU_MASTER_BT_LEFT_BUTTON_DOWN"),
      ev("OBS_VOL_KB_WHEEL_UP"),
      ev("OVHD_APU_MASTER_BT_LEFT_BUTTON_UP"),
      ev("OBS_VOL_KB_WHEEL_DOWN"),
    ]);

    expect(groups.map((g) => [g.base, g.kind, g.members.length])).toEqual([
      ["OVHD_APU_MASTER_BT", "button", 2],
      ["OBS_VOL_KB", "wheel", 2],
    ]);
  });

  it("merges left and right switch presses into one switch group", () => {
    const groups = groupEvents([ev("APU_SW_LEFT_BUTTON_DOWN"), ev("APU_SW_RIGHT_BUTTON_DOWN")]);

    expect(groups).toHaveLength(1);
    expect(groups[0].base).toBe("APU");
    expect(groups[0].kind).toBe("switch");
    expect(groups[0].members.map((m) => m.role)).toEqual(["switch_left", "switch_right"]);
  });

  it("keeps a button and a switch with the same base apart", () => {
    const groups = groupEvents([ev("APU_LEFT_BUTTON_DOWN"), ev("APU_SW_LEFT_BUTTON_DOWN")]);

    expect(groups.map((g) => `${g.kind}:${g.base}`)).toEqual(["button:APU", "switch:APU"]);
  });

  it("keeps orphan halves as partial groups", () => {
    const groups = groupEvents([ev("OVHD_HORN_BT_LEFT_BUTTON_UP")]);

    expect(groups).toEqual([
      {
        base: "OVHD_HORN_BT",
        kind: "button",
        members: [{ event: ev("OVHD_HORN_BT_LEFT_BUTTON_UP"), role: "button_up" }],
      },
    ]);
  });

  it("assigns every input event to exactly one group", () => {
    const input = [
      ev("CTR_PARK_GRD_LEFT_BUTTON_DOWN"),
      ev("CTR_PARK_LEFT_BUTTON_DOWN"),
      ev("PED_DU1_BRT_KB_WHEEL_UP"),
      ev("PED_DU1_BRT_KB_WHEEL_DOWN"),
      ev("PED_STBY_COMPASS_TOGGLE"),
      ev("APU_SW_RIGHT_BUTTON_DOWN"),
    ];
    const groups = groupEvents(input);

    const names = groups.flatMap((g) => g.members.map((m) => m.event.name));
    expect(names).toHaveLength(input.length);
    expect(new Set(names)).toEqual(new Set(input.map((e) => e.name)));
    expect(groups).toHaveLength(5);
  });

  it("returns no groups for an empty batch", () => {
    expect(groupEvents([])).toEqual([]);
  });
});
