import { parseRules, type DiagramRules } from "./rules.js";
import type { EntityRecord } from "./util.js";

export const VOCABULARY = ["topic1", "topic2", "topic3"];

export function fixtureRulesDoc(): Record<string, unknown> {
  return {
    taxonomy: {
      vocabulary: VOCABULARY,
      indicators: { topic1: "Alpha", topic2: "Beta", topic3: "Gamma" },
      broad_categories: {
        Group1: ["Alpha", "Gamma"],
        Group2: ["Beta"],
        Other: ["None"],
      },
      no_signal: { broad: "Other", specific: "None" },
      primary_labels: { A: "Cat A" },
    },
    order: {
      primary: ["B", "A"],
      broad: ["Other", "Group1", "Group2"],
      specific: ["None", "Alpha", "Beta", "Gamma"],
    },
    colors: {
      primary: "#A1B2B9",
      edge_alpha: 0.5,
      broad: { Group1: "#FF0000", Group2: "#00FF00" },
      specific: { Alpha: "#0000FF", Beta: "#112233" },
    },
    layout: {
      broad_anchors: { Group1: 0.3 },
      specific_positions: { Alpha: 0.1, Beta: 0.6 },
    },
    diagram: { mode: "binary" },
  };
}

export function fixtureRules(): DiagramRules {
  return parseRules(fixtureRulesDoc());
}

export function row(primary: string, ...active: string[]): EntityRecord {
  const indicators: Record<string, number> = {};
  for (const name of VOCABULARY) indicators[name] = active.includes(name) ? 1 : 0;
  return { primary, indicators };
}

/** Two rows with topic1 and topic2 set and one row with nothing, all in "A". */
export function sampleRows(): EntityRecord[] {
  return [row("A", "topic1", "topic2"), row("A", "topic1", "topic2"), row("A")];
}
