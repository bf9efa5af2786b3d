import { XMLBuilder } from "fast-xml-parser";
import type { DiagramGraph } from "./util.js";

type KeySpec = {
  id: string;
  for: "node" | "edge";
  type: "string" | "int" | "double" | "boolean";
};

const KEYS: KeySpec[] = [
  { id: "label", for: "node", type: "string" },
  { id: "category", for: "node", type: "string" },
  { id: "level", for: "node", type: "int" },
  { id: "color", for: "node", type: "string" },
  { id: "x", for: "node", type: "double" },
  { id: "y", for: "node", type: "double" },
  { id: "visible", for: "node", type: "boolean" },
  { id: "weight", for: "edge", type: "double" },
  { id: "color", for: "edge", type: "string" },
];

function data(values: Record<string, string | number | boolean>): Array<Record<string, string>> {
  return Object.entries(values).map(([key, v]) => ({ "@_key": key, "#text": String(v) }));
}

export function graphToGraphml(graph: DiagramGraph): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });
  const doc = {
    graphml: {
      "@_xmlns": "http://graphml.graphdrawing.org/xmlns",
      key: KEYS.map((k) => ({
        "@_id": k.for === "edge" ? `e_${k.id}` : k.id,
        "@_for": k.for,
        "@_attr.name": k.id,
        "@_attr.type": k.type,
      })),
      graph: {
        "@_id": "G",
        "@_edgedefault": "directed",
        node: graph.nodes.map((n, i) => ({
          "@_id": `n${i}`,
          data: data({
            label: n.label,
            category: n.category,
            level: n.level,
            color: n.color,
            x: n.x,
            y: n.y,
            visible: n.visible,
          }),
        })),
        edge: graph.edges.map((e, i) => ({
          "@_id": `e${i}`,
          "@_source": `n${e.source}`,
          "@_target": `n${e.target}`,
          data: data({ e_weight: e.weight, e_color: e.color }),
        })),
      },
    },
  };
  return `<?xml version="1.0" encoding="UTF-8"?>\n${builder.build(doc)}`;
}
