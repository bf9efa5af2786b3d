import fs from "fs";

export type Level = 1 | 2 | 3;

export type AggregationMode = "binary" | "proportional";

export type EntityRecord = {
  primary: string;
  indicators: Record<string, number>;
};

export type Flow = {
  source: string;
  target: string;
  weight: number;
};

export type CategoryNode = {
  category: string;
  label: string;
  level: Level;
  color: string;
  x: number;
  y: number;
  visible: boolean;
};

export type DiagramEdge = {
  source: number;
  target: number;
  weight: number;
  color: string;
};

export type DiagramGraph = {
  readonly nodes: readonly CategoryNode[];
  readonly edges: readonly DiagramEdge[];
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Own-property lookup; inherited members such as `toString` read as missing. */
export function lookup<V>(table: Readonly<Record<string, V>>, key: string): V | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function deepFreeze<T>(v: T): T {
  if (typeof v === "object" && v !== null && !Object.isFrozen(v)) {
    Object.freeze(v);
    for (const child of Object.values(v)) deepFreeze(child);
  }
  return v;
}
