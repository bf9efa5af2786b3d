import { lookup, type Level } from "./util.js";

export type ColorRules = {
  primary: string;
  broad: Record<string, string>;
  specific: Record<string, string>;
  fallback: string;
  edgeAlpha: number;
};

export type ColorEncoder = {
  nodeColor(category: string, level: Level): string;
  edgeColor(target: string, level: Level, sourceVisible: boolean, targetVisible: boolean): string;
};

export const TRANSPARENT = "rgba(0,0,0,0)";

const NEUTRAL_GRAY = "#BDC3C7";

export const defaultColorRules: ColorRules = {
  primary: "#A1B2B9",
  broad: {},
  specific: {},
  fallback: NEUTRAL_GRAY,
  edgeAlpha: 0.6,
};

export function parseHex(hex: string): [number, number, number] | undefined {
  const m = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex.trim());
  if (!m) return undefined;
  const digits = m[1].length === 3 ? m[1].replace(/./g, (c) => c + c) : m[1];
  const channel = (i: number): number => parseInt(digits.slice(i, i + 2), 16);
  return [channel(0), channel(2), channel(4)];
}

export function hexToRgba(hex: string, alpha = 0.5): string {
  const rgb = parseHex(hex) ?? parseHex(NEUTRAL_GRAY) ?? [189, 195, 199];
  return `rgba(${rgb[0]}, ${rgb[1]}, ${rgb[2]}, ${alpha})`;
}

export function createColorEncoder(rules: ColorRules = defaultColorRules): ColorEncoder {
  const nodeColor = (category: string, level: Level): string => {
    if (level === 1) return rules.primary;
    const table = level === 2 ? rules.broad : rules.specific;
    const color = lookup(table, category) ?? rules.fallback;
    return parseHex(color) ? color : NEUTRAL_GRAY;
  };
  return {
    nodeColor,
    edgeColor(target, level, sourceVisible, targetVisible) {
      if (!sourceVisible || !targetVisible) return TRANSPARENT;
      return hexToRgba(nodeColor(target, level), rules.edgeAlpha);
    },
  };
}
