import { describe, it, expect } from "vitest";
import { checkLayoutRules, defaultLayoutRules, layoutNodes } from "./layout.js";
import { fixtureRules } from "./test_fixtures.js";
import { ConfigError } from "./util.js";

const rules = fixtureRules();

describe("layoutNodes", () => {
  const levels = {
    primary: ["B", "A"],
    broad: ["Other", "Group1", "Group2"],
    specific: ["None", "Alpha", "Beta", "Gamma"],
  };
  const placed = layoutNodes(levels, rules.taxonomy, rules.layout);

  it("emits nodes level by level in the given order", () => {
    expect(placed.map((n) => `${n.level}:${n.category}`)).toEqual([
      "1:B",
      "1:A",
      "2:Other",
      "2:Group1",
      "2:Group2",
      "3:None",
      "3:Alpha",
      "3:Beta",
      "3:Gamma",
    ]);
  });

  it("spreads primary categories evenly down the left column", () => {
    expect(placed[0]).toEqual({ category: "B", label: "B", level: 1, x: 0.01, y: 0.05, visible: true });
    expect(placed[1].label).toBe("Cat A");
    expect(placed[1].y).toBeCloseTo(0.5, 12);
  });

  it("pins no-signal categories to the top as invisible collectors", () => {
    expect(placed[2]).toEqual({ category: "Other", label: "", level: 2, x: 0.5, y: 0.001, visible: false });
    expect(placed[5]).toEqual({ category: "None", label: "", level: 3, x: 0.8, y: 0.001, visible: false });
  });

  it("uses anchors and positions, falling back to column defaults", () => {
    expect(placed.slice(3, 5).map((n) => n.y)).toEqual([0.3, 0.7]);
    expect(placed.slice(6).map((n) => n.y)).toEqual([0.1, 0.6, 0.5]);
  });

  it("keeps x strictly increasing by level", () => {
    const xs = [1, 2, 3].map((l) => new Set(placed.filter((n) => n.level === l).map((n) => n.x)));
    expect(xs.map((s) => [...s])).toEqual([[0.01], [0.5], [0.8]]);
  });

  it("blanks broad labels when asked", () => {
    const nodes = layoutNodes(levels, rules.taxonomy, { ...rules.layout, broadLabels: false });
    expect(nodes.filter((n) => n.level === 2).map((n) => n.label)).toEqual(["", "", ""]);
    expect(nodes.filter((n) => n.level === 2).map((n) => n.visible)).toEqual([false, true, true]);
  });

  it("handles empty levels", () => {
    expect(layoutNodes({ primary: [], broad: [], specific: [] }, rules.taxonomy)).toEqual([]);
  });
});

describe("checkLayoutRules", () => {
  it("accepts the defaults", () => {
    expect(() => checkLayoutRules(defaultLayoutRules)).not.toThrow();
  });

  it("rejects columns out of order", () => {
    const bad = { ...defaultLayoutRules, columns: { left: 0.5, middle: 0.4, right: 0.8 } };
    expect(() => checkLayoutRules(bad)).toThrow(ConfigError);
  });

  it("rejects positions outside the unit interval", () => {
    const bad = { ...defaultLayoutRules, specificPositions: { Alpha: 1.5 } };
    expect(() => checkLayoutRules(bad)).toThrow("layout: specific_positions.Alpha must be within [0, 1], got 1.5");
  });

  it("rejects a primary band that runs past the bottom edge", () => {
    const bad = { ...defaultLayoutRules, primaryTop: 0.5, primarySpan: 0.9 };
    expect(() => checkLayoutRules(bad)).toThrow(
      "layout: primary_top + primary_span must not exceed 1, got 0.5 + 0.9",
    );
    expect(() => checkLayoutRules({ ...defaultLayoutRules, primaryTop: 0.25, primarySpan: 0.75 })).not.toThrow();
  });

  it("falls back to the defaults for names inherited from Object", () => {
    const placed = layoutNodes({ primary: ["A"], broad: ["constructor"], specific: ["toString"] }, rules.taxonomy);
    expect(placed.map((n) => n.y)).toEqual([0.05, 0.7, 0.5]);
  });
});
