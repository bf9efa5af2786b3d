import { describe, it, expect } from "vitest";
import { XMLParser } from "fast-xml-parser";
import { graphToGraphml } from "./graphml_export.js";
import { buildDiagram } from "./build_graph.js";
import { fixtureRules, sampleRows } from "./test_fixtures.js";

describe("graphToGraphml", () => {
  const xml = graphToGraphml(buildDiagram(sampleRows(), fixtureRules()));
  const doc = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: "@_" }).parse(xml);

  it("starts with an XML declaration", () => {
    expect(xml.startsWith(`<?xml version="1.0" encoding="UTF-8"?>\n<graphml`)).toBe(true);
  });

  it("declares node and edge keys", () => {
    expect(doc.graphml.key).toHaveLength(9);
    expect(doc.graphml.key[7]).toEqual({
      "@_id": "e_weight",
      "@_for": "edge",
      "@_attr.name": "weight",
      "@_attr.type": "double",
    });
  });

  it("writes every node and edge by index", () => {
    expect(doc.graphml.graph.node).toHaveLength(7);
    expect(doc.graphml.graph.edge).toHaveLength(6);
    expect(doc.graphml.graph.node[0]["@_id"]).toBe("n0");
    expect(doc.graphml.graph.node[0].data[0]).toEqual({ "@_key": "label", "#text": "Cat A" });
    expect(doc.graphml.graph.edge[4]["@_source"]).toBe("n2");
    expect(doc.graphml.graph.edge[4]["@_target"]).toBe("n5");
  });

  it("escapes text", () => {
    expect(xml).toContain(`<data key="e_color">rgba(255, 0, 0, 0.5)</data>`);
    expect(graphToGraphml({ nodes: [{ category: "a&b", label: "a&b", level: 1, color: "#000", x: 0, y: 0, visible: true }], edges: [] }))
      .toContain(`<data key="label">a&amp;b</data>`);
  });
});
