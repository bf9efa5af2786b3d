#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { loadRules, parseMode } from "./rules.js";
import { parseRowsCsv } from "./rows_parse.js";
import { buildDiagram, excludePredicate } from "./build_graph.js";
import { formatSummary, summarizeSignals } from "./summary.js";
import { renderSvg } from "./render_svg.js";
import { graphToGraphml } from "./graphml_export.js";
import { exportImage, imageFormatFor } from "./export_image.js";

async function main() {
  const [rowsPath, rulesPath, outSvg, ...extra] = process.argv.slice(2);
  if (!rowsPath || !rulesPath || !outSvg) {
    console.error("Usage: node dist/main.js <rows.csv> <rules.yaml> <out.svg> [out.json|out.graphml|out.pdf|out.png ...]");
    process.exit(1);
  }
  const outputs = new Set([".json", ".graphml", ".pdf", ".png"]);
  const unsupported = extra.filter((out) => !outputs.has(path.extname(out).toLowerCase()));
  if (unsupported.length > 0) throw new Error(`Unsupported output type: ${unsupported.join(", ")}`);
  const rules = loadRules(rulesPath);
  const mode = process.env.DIAGRAM_MODE ? parseMode(process.env.DIAGRAM_MODE, "DIAGRAM_MODE") : rules.diagram.mode;

  console.error(`Loading rows from ${rowsPath}...`);
  const rows = parseRowsCsv(fs.readFileSync(rowsPath, "utf8"), rules.taxonomy.vocabulary, rules.diagram.primaryColumn);
  console.error(`Loaded ${rows.length} rows`);

  console.error(`Building ${mode} flow diagram...`);
  const graph = buildDiagram(rows, rules, { mode });
  if (graph.edges.length === 0) console.error("No flows found!");
  console.error(`Diagram: nodes=${graph.nodes.length} edges=${graph.edges.length}`);
  for (const line of formatSummary(summarizeSignals(rows, rules.taxonomy, excludePredicate(rules.diagram.excludePrimary)))) {
    console.error(line);
  }

  const css = fileURLToPath(new URL("../styles/sankey.css", import.meta.url));
  fs.writeFileSync(outSvg, renderSvg(graph, css, rules.render), "utf8");
  console.error(`Saved SVG to ${outSvg}`);

  for (const out of extra) {
    const ext = path.extname(out).toLowerCase();
    if (ext === ".json") {
      fs.writeFileSync(out, JSON.stringify(graph, null, 2), "utf8");
    } else if (ext === ".graphml") {
      fs.writeFileSync(out, graphToGraphml(graph), "utf8");
    } else if (imageFormatFor(out)) {
      exportImage(outSvg, out);
    }
    console.error(`Saved ${ext.slice(1).toUpperCase()} to ${out}`);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
