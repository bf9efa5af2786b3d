import type { AggregationMode, DiagramEdge, DiagramGraph, EntityRecord, Flow, Level } from "./util.js";
import { deepFreeze } from "./util.js";
import { aggregateFlows, type FlowSets } from "./aggregate.js";
import { orderCategories } from "./order.js";
import { layoutNodes, type OrderedLevels, type PlacedNode } from "./layout.js";
import { createColorEncoder, TRANSPARENT, type ColorEncoder } from "./color.js";
import type { DiagramRules } from "./rules.js";

export type BuildOptions = {
  mode?: AggregationMode;
  exclude?: (primary: string) => boolean;
  includeNoSignal?: boolean;
};

function indexOf(levels: readonly string[], offset: number): Map<string, number> {
  return new Map(levels.map((c, i) => [c, offset + i]));
}

function edgesBetween(
  flows: readonly Flow[],
  sources: Map<string, number>,
  targets: Map<string, number>,
  placed: readonly PlacedNode[],
  targetLevel: Level,
  colors: ColorEncoder,
): DiagramEdge[] {
  const edges: DiagramEdge[] = [];
  for (const f of flows) {
    const source = sources.get(f.source);
    const target = targets.get(f.target);
    if (source === undefined || target === undefined || f.weight <= 0) continue;
    edges.push({
      source,
      target,
      weight: f.weight,
      color: colors.edgeColor(f.target, targetLevel, placed[source].visible, placed[target].visible),
    });
  }
  return edges.sort((a, b) => a.source - b.source || a.target - b.target);
}

/**
 * Puts ordered levels, aggregated flows and placed nodes into index-addressed
 * form. Node indices follow level 1, then level 2, then level 3; edges list all
 * primary → broad flows before broad → specific ones, each sorted by
 * (source index, target index).
 */
export function assembleGraph(
  levels: OrderedLevels,
  flows: FlowSets,
  placed: readonly PlacedNode[],
  colors: ColorEncoder,
): DiagramGraph {
  const primaryIdx = indexOf(levels.primary, 0);
  const broadIdx = indexOf(levels.broad, levels.primary.length);
  const specificIdx = indexOf(levels.specific, levels.primary.length + levels.broad.length);

  const nodes = placed.map((n) => ({
    ...n,
    label: n.visible ? n.label : "",
    color: n.visible ? colors.nodeColor(n.category, n.level) : TRANSPARENT,
  }));
  const edges = [
    ...edgesBetween(flows.primaryToBroad, primaryIdx, broadIdx, placed, 2, colors),
    ...edgesBetween(flows.broadToSpecific, broadIdx, specificIdx, placed, 3, colors),
  ];
  return deepFreeze({ nodes, edges });
}

export function orderLevels(flows: FlowSets, rules: DiagramRules): OrderedLevels {
  const { order } = rules.taxonomy;
  return {
    primary: orderCategories(flows.primaryCategories, order.primary),
    broad: orderCategories(flows.primaryToBroad.map((f) => f.target), order.broad),
    specific: orderCategories(flows.broadToSpecific.map((f) => f.target), order.specific),
  };
}

export function excludePredicate(excluded: readonly string[]): ((primary: string) => boolean) | undefined {
  if (excluded.length === 0) return undefined;
  const set = new Set(excluded);
  return (primary) => set.has(primary);
}

export function buildDiagram(
  rows: readonly EntityRecord[],
  rules: DiagramRules,
  options: BuildOptions = {},
): DiagramGraph {
  const flows = aggregateFlows(rows, rules.taxonomy, {
    mode: options.mode ?? rules.diagram.mode,
    exclude: options.exclude ?? excludePredicate(rules.diagram.excludePrimary),
    includeNoSignal: options.includeNoSignal ?? rules.diagram.includeNoSignal,
  });
  const levels = orderLevels(flows, rules);
  const placed = layoutNodes(levels, rules.taxonomy, rules.layout);
  return assembleGraph(levels, flows, placed, createColorEncoder(rules.colors));
}
