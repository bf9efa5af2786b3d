import type { EntityRecord } from "./util.js";
import type { Taxonomy } from "./taxonomy.js";
import { activeIndicators } from "./aggregate.js";
import { orderCategories } from "./order.js";

export type BroadReach = {
  broad: string;
  count: number;
  shareOfSignal: number;
};

export type SignalSummary = {
  total: number;
  withSignal: number;
  noSignal: number;
  noSignalPct: number;
  reach: BroadReach[];
};

function pct(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

/**
 * Counts rows reached by each broad category (a row counts once per broad
 * category however many of its topics are active) and rows with no signal.
 */
export function summarizeSignals(
  rows: readonly EntityRecord[],
  taxonomy: Taxonomy,
  exclude?: (primary: string) => boolean,
): SignalSummary {
  const kept = exclude ? rows.filter((r) => !exclude(r.primary)) : rows;
  const broadOf = new Map(
    taxonomy.vocabulary.map((name) => [name, taxonomy.broadCategoryFor(taxonomy.specificTopicFor(name))]),
  );
  const broads = orderCategories(broadOf.values(), taxonomy.order.broad).filter(
    (b) => b !== taxonomy.noSignal.broad,
  );
  const counts = new Map(broads.map((b) => [b, 0]));

  let withSignal = 0;
  for (const row of kept) {
    const active = activeIndicators(row, taxonomy.vocabulary);
    if (active.length === 0) continue;
    withSignal += 1;
    const hit = new Set(active.map((name) => broadOf.get(name)));
    for (const b of broads) {
      if (hit.has(b)) counts.set(b, (counts.get(b) ?? 0) + 1);
    }
  }

  const noSignal = kept.length - withSignal;
  return {
    total: kept.length,
    withSignal,
    noSignal,
    noSignalPct: pct(noSignal, kept.length),
    reach: broads.map((broad) => {
      const count = counts.get(broad) ?? 0;
      return { broad, count, shareOfSignal: pct(count, withSignal) };
    }),
  };
}

export function formatSummary(s: SignalSummary): string[] {
  return [
    ...s.reach.map((r) => `Rows with ${r.broad} signal: ${r.count}`),
    `Rows with no signal: ${s.noSignal} (${s.noSignalPct.toFixed(1)}%)`,
    `Total rows: ${s.total}`,
    `Of the ${s.withSignal} rows with any signal:`,
    ...s.reach.map((r) => `  ${r.shareOfSignal.toFixed(1)}% have ${r.broad} signal`),
  ];
}
