import fs from "fs";
import type { DiagramGraph } from "./util.js";

export type RenderRules = {
  width: number;
  height: number;
  pad: number;
  thickness: number;
  fontSize: number;
};

export const defaultRenderRules: RenderRules = {
  width: 600,
  height: 1000,
  pad: 15,
  thickness: 20,
  fontSize: 20,
};

type Box = {
  x0: number;
  x1: number;
  y0: number;
  h: number;
  outOffset: number;
  inOffset: number;
};

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function cls(s: string): string {
  return s.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "").toLowerCase();
}

function fmt(n: number): string {
  return String(Math.round(n * 100) / 100);
}

/**
 * Node heights are proportional to throughput (the larger of inflow and
 * outflow), using the tightest scale across the three columns so the fullest
 * column fits the canvas with `pad` between nodes.
 */
function nodeBoxes(graph: DiagramGraph, rules: RenderRules): { boxes: Box[]; scale: number } {
  const inflow = graph.nodes.map(() => 0);
  const outflow = graph.nodes.map(() => 0);
  for (const e of graph.edges) {
    outflow[e.source] += e.weight;
    inflow[e.target] += e.weight;
  }
  const value = graph.nodes.map((_, i) => Math.max(inflow[i], outflow[i]));

  const columns = new Map<number, { total: number; count: number }>();
  graph.nodes.forEach((n, i) => {
    const col = columns.get(n.level) ?? { total: 0, count: 0 };
    col.total += value[i];
    col.count += 1;
    columns.set(n.level, col);
  });
  let scale = Infinity;
  for (const col of columns.values()) {
    if (col.total <= 0) continue;
    const room = Math.max(0, rules.height - rules.pad * (col.count - 1));
    scale = Math.min(scale, room / col.total);
  }
  if (!Number.isFinite(scale)) scale = 0;

  const boxes = graph.nodes.map((n, i) => {
    const h = n.visible ? Math.max(value[i] * scale, 1) : value[i] * scale;
    const x0 = n.x * (rules.width - rules.thickness);
    const cy = n.y * rules.height;
    const y0 = Math.min(Math.max(cy - h / 2, 0), Math.max(0, rules.height - h));
    return { x0, x1: x0 + rules.thickness, y0, h, outOffset: 0, inOffset: 0 };
  });
  return { boxes, scale };
}

export function renderSvg(graph: DiagramGraph, cssPath?: string, rules: RenderRules = defaultRenderRules): string {
  const css = cssPath ? fs.readFileSync(cssPath, "utf8") : "";
  const { boxes, scale } = nodeBoxes(graph, rules);
  const maxLevel = Math.max(0, ...graph.nodes.map((n) => n.level));

  const links = graph.edges.map((e) => {
    const s = boxes[e.source];
    const t = boxes[e.target];
    const w = e.weight * scale;
    const sy = s.y0 + s.outOffset;
    const ty = t.y0 + t.inOffset;
    s.outOffset += w;
    t.inOffset += w;
    const xm = (s.x1 + t.x0) / 2;
    const d = [
      `M${fmt(s.x1)},${fmt(sy)}`,
      `C${fmt(xm)},${fmt(sy)} ${fmt(xm)},${fmt(ty)} ${fmt(t.x0)},${fmt(ty)}`,
      `L${fmt(t.x0)},${fmt(ty + w)}`,
      `C${fmt(xm)},${fmt(ty + w)} ${fmt(xm)},${fmt(sy + w)} ${fmt(s.x1)},${fmt(sy + w)}`,
      "Z",
    ].join(" ");
    return `\n    <path class="link" d="${d}" fill="${esc(e.color)}" data-weight="${fmt(e.weight)}"/>`;
  }).join("");

  const rects = graph.nodes.map((n, i) => {
    if (!n.visible) return "";
    const b = boxes[i];
    return `\n    <g class="node level-${n.level} ${cls(n.category)}" data-category="${esc(n.category)}">\n      <rect x="${fmt(b.x0)}" y="${fmt(b.y0)}" width="${fmt(rules.thickness)}" height="${fmt(b.h)}" fill="${esc(n.color)}"/>\n    </g>`;
  }).join("");

  const labels = graph.nodes.map((n, i) => {
    if (!n.visible || n.label === "") return "";
    const b = boxes[i];
    const right = n.level === maxLevel && maxLevel > 1;
    const x = right ? b.x0 - 6 : b.x1 + 6;
    const anchor = right ? "end" : "start";
    return `\n    <text class="nodeLabel" x="${fmt(x)}" y="${fmt(b.y0 + b.h / 2)}" text-anchor="${anchor}" dominant-baseline="middle">${esc(n.label)}</text>`;
  }).join("");

  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="${rules.width}" height="${rules.height}" viewBox="0 0 ${rules.width} ${rules.height}">\n<style>\n${css}\n.nodeLabel {\n  font-size: ${rules.fontSize}px;\n}\n</style>\n<g class="links">${links}\n</g>\n<g class="nodes">${rects}\n</g>\n<g class="nodeLabels">${labels}\n</g>\n</svg>`;
}
