import yaml from "js-yaml";
import { ConfigError, asArray, deepFreeze, isRecord, readText, type AggregationMode } from "./util.js";
import { buildTaxonomy, type Taxonomy } from "./taxonomy.js";
import { checkLayoutRules, defaultLayoutRules, type LayoutRules } from "./layout.js";
import { defaultColorRules, parseHex, type ColorRules } from "./color.js";
import { defaultRenderRules, type RenderRules } from "./render_svg.js";

export type DiagramSettings = {
  mode: AggregationMode;
  excludePrimary: string[];
  includeNoSignal: boolean;
  primaryColumn: string;
};

export type DiagramRules = {
  taxonomy: Taxonomy;
  layout: LayoutRules;
  colors: ColorRules;
  render: RenderRules;
  diagram: DiagramSettings;
};

type Raw = Record<string, unknown>;

function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

function section(raw: Raw, key: string, path = key): Raw {
  const v = raw[key];
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new ConfigError(`rules: '${path}' must be a mapping`);
  return v;
}

function num(raw: Raw, key: string, path: string, fallback: number): number {
  const v = raw[key];
  if (v === undefined || v === null) return fallback;
  const n = asNum(v);
  if (n === undefined) throw new ConfigError(`rules: '${path}.${key}' must be a number, got ${JSON.stringify(v)}`);
  return n;
}

function bool(raw: Raw, key: string, path: string, fallback: boolean): boolean {
  const v = raw[key];
  if (v === undefined || v === null) return fallback;
  if (typeof v !== "boolean") throw new ConfigError(`rules: '${path}.${key}' must be true or false`);
  return v;
}

function str(raw: Raw, key: string, path: string, fallback?: string): string {
  const v = raw[key];
  if ((v === undefined || v === null) && fallback !== undefined) return fallback;
  if (typeof v !== "string" || v.trim().length === 0) {
    throw new ConfigError(`rules: '${path}.${key}' must be a non-empty string`);
  }
  return v;
}

function stringList(v: unknown, path: string): string[] {
  return asArray<unknown>(v).map((x, i) => {
    if (typeof x !== "string") throw new ConfigError(`rules: '${path}[${i}]' must be a string`);
    return x;
  });
}

function stringMap(v: unknown, path: string): Record<string, string> {
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new ConfigError(`rules: '${path}' must be a mapping`);
  return Object.fromEntries(
    Object.entries(v).map(([k, x]): [string, string] => {
      if (typeof x !== "string") throw new ConfigError(`rules: '${path}.${k}' must be a string`);
      return [k, x];
    }),
  );
}

function numberMap(v: unknown, path: string): Record<string, number> {
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new ConfigError(`rules: '${path}' must be a mapping`);
  return Object.fromEntries(
    Object.entries(v).map(([k, x]): [string, number] => {
      const n = asNum(x);
      if (n === undefined) throw new ConfigError(`rules: '${path}.${k}' must be a number`);
      return [k, n];
    }),
  );
}

function colorMap(v: unknown, path: string): Record<string, string> {
  const out = stringMap(v, path);
  for (const [k, c] of Object.entries(out)) {
    if (!parseHex(c)) throw new ConfigError(`rules: '${path}.${k}' is not a hex color: ${c}`);
  }
  return out;
}

function parseTaxonomy(raw: Raw): Taxonomy {
  const tax = section(raw, "taxonomy");
  const order = section(raw, "order");
  const vocabulary = stringList(tax.vocabulary, "taxonomy.vocabulary");
  if (vocabulary.length === 0) throw new ConfigError("rules: 'taxonomy.vocabulary' must list at least one indicator");
  const groups = section(tax, "broad_categories", "taxonomy.broad_categories");
  const broadCategories = Object.fromEntries(
    Object.entries(groups).map(([broad, topics]): [string, string[]] => [
      broad,
      stringList(topics, `taxonomy.broad_categories.${broad}`),
    ]),
  );
  const noSignal = section(tax, "no_signal", "taxonomy.no_signal");
  return buildTaxonomy({
    vocabulary,
    indicators: stringMap(tax.indicators, "taxonomy.indicators"),
    broadCategories,
    noSignal: {
      broad: str(noSignal, "broad", "taxonomy.no_signal"),
      specific: str(noSignal, "specific", "taxonomy.no_signal"),
    },
    primaryLabels: stringMap(tax.primary_labels, "taxonomy.primary_labels"),
    order: {
      primary: stringList(order.primary, "order.primary"),
      broad: stringList(order.broad, "order.broad"),
      specific: stringList(order.specific, "order.specific"),
    },
  });
}

function parseLayout(raw: Raw): LayoutRules {
  const l = section(raw, "layout");
  const cols = section(l, "columns", "layout.columns");
  const d = defaultLayoutRules;
  const rules: LayoutRules = {
    columns: {
      left: num(cols, "left", "layout.columns", d.columns.left),
      middle: num(cols, "middle", "layout.columns", d.columns.middle),
      right: num(cols, "right", "layout.columns", d.columns.right),
    },
    primaryTop: num(l, "primary_top", "layout", d.primaryTop),
    primarySpan: num(l, "primary_span", "layout", d.primarySpan),
    broadAnchors: numberMap(l.broad_anchors, "layout.broad_anchors"),
    broadDefault: num(l, "broad_default", "layout", d.broadDefault),
    specificPositions: numberMap(l.specific_positions, "layout.specific_positions"),
    specificDefault: num(l, "specific_default", "layout", d.specificDefault),
    collectorY: num(l, "collector_y", "layout", d.collectorY),
    broadLabels: bool(l, "broad_labels", "layout", d.broadLabels),
  };
  checkLayoutRules(rules);
  return rules;
}

function parseColors(raw: Raw): ColorRules {
  const c = section(raw, "colors");
  const d = defaultColorRules;
  const primary = str(c, "primary", "colors", d.primary);
  const fallback = str(c, "fallback", "colors", d.fallback);
  for (const [k, v] of [["primary", primary], ["fallback", fallback]]) {
    if (!parseHex(v)) throw new ConfigError(`rules: 'colors.${k}' is not a hex color: ${v}`);
  }
  const edgeAlpha = num(c, "edge_alpha", "colors", d.edgeAlpha);
  if (edgeAlpha < 0 || edgeAlpha > 1) throw new ConfigError(`rules: 'colors.edge_alpha' must be within [0, 1]`);
  return {
    primary,
    broad: colorMap(c.broad, "colors.broad"),
    specific: colorMap(c.specific, "colors.specific"),
    fallback,
    edgeAlpha,
  };
}

function parseRender(raw: Raw): RenderRules {
  const r = section(raw, "render");
  const d = defaultRenderRules;
  const rules: RenderRules = {
    width: num(r, "width", "render", d.width),
    height: num(r, "height", "render", d.height),
    pad: num(r, "pad", "render", d.pad),
    thickness: num(r, "thickness", "render", d.thickness),
    fontSize: num(r, "font_size", "render", d.fontSize),
  };
  if (rules.width <= rules.thickness || rules.height <= 0) {
    throw new ConfigError(`rules: render canvas ${rules.width}x${rules.height} is too small`);
  }
  return rules;
}

export function parseMode(v: unknown, path = "diagram.mode"): AggregationMode {
  if (v === "binary" || v === "proportional") return v;
  throw new ConfigError(`rules: '${path}' must be 'binary' or 'proportional', got ${JSON.stringify(v)}`);
}

function parseDiagram(raw: Raw): DiagramSettings {
  const g = section(raw, "diagram");
  return {
    mode: g.mode === undefined || g.mode === null ? "proportional" : parseMode(g.mode),
    excludePrimary: stringList(g.exclude_primary, "diagram.exclude_primary"),
    includeNoSignal: bool(g, "include_no_signal", "diagram", true),
    primaryColumn: str(g, "primary_column", "diagram", "primary_category"),
  };
}

/**
 * Narrows a loaded rules document into typed, frozen tables. The taxonomy
 * section is required; every other section merges over built-in defaults.
 */
export function parseRules(raw: unknown): DiagramRules {
  if (!isRecord(raw)) throw new ConfigError("rules: document must be a mapping");
  return deepFreeze({
    taxonomy: parseTaxonomy(raw),
    layout: parseLayout(raw),
    colors: parseColors(raw),
    render: parseRender(raw),
    diagram: parseDiagram(raw),
  });
}

export function loadRules(path: string): DiagramRules {
  return parseRules(yaml.load(readText(path)));
}
