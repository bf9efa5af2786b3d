import type { AggregationMode, EntityRecord, Flow } from "./util.js";
import type { Taxonomy } from "./taxonomy.js";

export type AggregateOptions = {
  mode: AggregationMode;
  vocabulary?: readonly string[];
  exclude?: (primary: string) => boolean;
  includeNoSignal?: boolean;
};

export type Contribution = {
  topic: string;
  weight: number;
};

export type FlowSets = {
  primaryCategories: string[];
  primaryToBroad: Flow[];
  broadToSpecific: Flow[];
};

type FlowTable = Map<string, Map<string, number>>;

function addFlow(table: FlowTable, source: string, target: string, weight: number): void {
  let row = table.get(source);
  if (!row) {
    row = new Map<string, number>();
    table.set(source, row);
  }
  row.set(target, (row.get(target) ?? 0) + weight);
}

function flatten(table: FlowTable): Flow[] {
  const out: Flow[] = [];
  for (const [source, row] of table) {
    for (const [target, weight] of row) {
      if (weight > 0) out.push({ source, target, weight });
    }
  }
  return out;
}

export function activeIndicators(row: EntityRecord, vocabulary: readonly string[]): string[] {
  return vocabulary.filter((name) => row.indicators[name] === 1);
}

/**
 * Splits one row's weight over its specific topics.
 *
 * A row without any active indicator goes to the no-signal topic with weight 1
 * in both modes; that bucket counts absence and is never normalised.
 */
export function entityContributions(
  row: EntityRecord,
  taxonomy: Taxonomy,
  mode: AggregationMode,
  vocabulary: readonly string[] = taxonomy.vocabulary,
  includeNoSignal = true,
): Contribution[] {
  const active = activeIndicators(row, vocabulary);
  if (active.length === 0) {
    return includeNoSignal ? [{ topic: taxonomy.noSignal.specific, weight: 1 }] : [];
  }
  const weight = mode === "proportional" ? 1 / active.length : 1;
  return active.map((name) => ({ topic: taxonomy.specificTopicFor(name), weight }));
}

export function aggregateFlows(
  rows: readonly EntityRecord[],
  taxonomy: Taxonomy,
  options: AggregateOptions,
): FlowSets {
  const vocabulary = options.vocabulary ?? taxonomy.vocabulary;
  // Resolve every indicator once so an unknown one fails before any row is counted.
  for (const name of vocabulary) taxonomy.specificTopicFor(name);
  const includeNoSignal = options.includeNoSignal ?? true;
  const kept = options.exclude ? rows.filter((r) => !options.exclude?.(r.primary)) : rows;

  const primaryCategories: string[] = [];
  const seen = new Set<string>();
  const byTopic: FlowTable = new Map();
  for (const row of kept) {
    if (!seen.has(row.primary)) {
      seen.add(row.primary);
      primaryCategories.push(row.primary);
    }
    for (const c of entityContributions(row, taxonomy, options.mode, vocabulary, includeNoSignal)) {
      addFlow(byTopic, row.primary, c.topic, c.weight);
    }
  }

  const toBroad: FlowTable = new Map();
  const toSpecific: FlowTable = new Map();
  for (const [primary, topics] of byTopic) {
    for (const [topic, weight] of topics) {
      const broad = taxonomy.broadCategoryFor(topic);
      addFlow(toBroad, primary, broad, weight);
      addFlow(toSpecific, broad, topic, weight);
    }
  }

  return {
    primaryCategories,
    primaryToBroad: flatten(toBroad),
    broadToSpecific: flatten(toSpecific),
  };
}
