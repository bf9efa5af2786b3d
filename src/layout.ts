import { ConfigError, lookup, type CategoryNode, type Level } from "./util.js";
import type { Taxonomy } from "./taxonomy.js";

export type LayoutRules = {
  columns: { left: number; middle: number; right: number };
  primaryTop: number;
  primarySpan: number;
  broadAnchors: Record<string, number>;
  broadDefault: number;
  specificPositions: Record<string, number>;
  specificDefault: number;
  collectorY: number;
  broadLabels: boolean;
};

export type OrderedLevels = {
  primary: readonly string[];
  broad: readonly string[];
  specific: readonly string[];
};

export type PlacedNode = Omit<CategoryNode, "color">;

export const defaultLayoutRules: LayoutRules = {
  columns: { left: 0.01, middle: 0.5, right: 0.8 },
  primaryTop: 0.05,
  primarySpan: 0.9,
  broadAnchors: {},
  broadDefault: 0.7,
  specificPositions: {},
  specificDefault: 0.5,
  collectorY: 0.001,
  broadLabels: true,
};

function inUnit(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 1;
}

export function checkLayoutRules(rules: LayoutRules): void {
  const { left, middle, right } = rules.columns;
  if (![left, middle, right].every(inUnit) || !(left < middle && middle < right)) {
    throw new ConfigError(`layout: columns must satisfy 0 <= left < middle < right <= 1, got ${left}, ${middle}, ${right}`);
  }
  const positions: Array<[string, number]> = [
    ["primary_top", rules.primaryTop],
    ["primary_span", rules.primarySpan],
    ["broad_default", rules.broadDefault],
    ["specific_default", rules.specificDefault],
    ["collector_y", rules.collectorY],
    ...Object.entries(rules.broadAnchors).map(([k, v]): [string, number] => [`broad_anchors.${k}`, v]),
    ...Object.entries(rules.specificPositions).map(([k, v]): [string, number] => [`specific_positions.${k}`, v]),
  ];
  for (const [name, v] of positions) {
    if (!inUnit(v)) throw new ConfigError(`layout: ${name} must be within [0, 1], got ${v}`);
  }
  if (rules.primaryTop + rules.primarySpan > 1) {
    throw new ConfigError(
      `layout: primary_top + primary_span must not exceed 1, got ${rules.primaryTop} + ${rules.primarySpan}`,
    );
  }
}

function collector(category: string, level: Level, x: number, rules: LayoutRules): PlacedNode {
  return { category, label: "", level, x, y: rules.collectorY, visible: false };
}

/**
 * Places every category in its level's column. Primary categories are spread
 * evenly top to bottom; broad categories and specific topics sit at fixed
 * anchors from the rules. The no-signal category of levels 2 and 3 becomes an
 * invisible collector pinned to the top of its column.
 */
export function layoutNodes(
  levels: OrderedLevels,
  taxonomy: Taxonomy,
  rules: LayoutRules = defaultLayoutRules,
): PlacedNode[] {
  const { left, middle, right } = rules.columns;
  const out: PlacedNode[] = [];

  const spacing = levels.primary.length > 0 ? rules.primarySpan / levels.primary.length : 0;
  levels.primary.forEach((category, i) => {
    out.push({
      category,
      label: taxonomy.displayLabelFor(category),
      level: 1,
      x: left,
      y: rules.primaryTop + i * spacing,
      visible: true,
    });
  });

  for (const category of levels.broad) {
    if (category === taxonomy.noSignal.broad) {
      out.push(collector(category, 2, middle, rules));
      continue;
    }
    out.push({
      category,
      label: rules.broadLabels ? category : "",
      level: 2,
      x: middle,
      y: lookup(rules.broadAnchors, category) ?? rules.broadDefault,
      visible: true,
    });
  }

  for (const category of levels.specific) {
    if (category === taxonomy.noSignal.specific) {
      out.push(collector(category, 3, right, rules));
      continue;
    }
    out.push({
      category,
      label: category,
      level: 3,
      x: right,
      y: lookup(rules.specificPositions, category) ?? rules.specificDefault,
      visible: true,
    });
  }

  return out;
}
