import fs from "fs";
import { pathToFileURL } from "url";
import Papa from "papaparse";
import { ConfigError, die, type EntityRecord } from "./util.js";
import { loadRules } from "./rules.js";

function parseIndicator(raw: string | undefined, row: number, column: string): number {
  const v = (raw ?? "").trim().toLowerCase();
  if (v === "" || v === "0" || v === "0.0" || v === "false") return 0;
  if (v === "1" || v === "1.0" || v === "true") return 1;
  throw new ConfigError(`rows: row ${row} column '${column}' must be 0 or 1, got '${raw}'`);
}

export function checkColumns(fields: readonly string[], vocabulary: readonly string[], primaryColumn: string): void {
  const present = new Set(fields);
  const missing = [primaryColumn, ...vocabulary].filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new ConfigError(`rows: missing column(s) ${missing.join(", ")}`);
  }
}

/**
 * Reads one entity per CSV record. Only the primary column and the vocabulary
 * columns are kept; other columns are ignored.
 */
export function parseRowsCsv(
  text: string,
  vocabulary: readonly string[],
  primaryColumn = "primary_category",
): EntityRecord[] {
  const parsed = Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true });
  const firstError = parsed.errors[0];
  if (firstError) die(`rows: ${firstError.message} (row ${firstError.row ?? "?"})`);
  checkColumns(parsed.meta.fields ?? [], vocabulary, primaryColumn);

  return parsed.data.map((rec, i) => {
    const row = i + 1;
    const primary = (rec[primaryColumn] ?? "").trim();
    if (!primary) throw new ConfigError(`rows: row ${row} has no '${primaryColumn}'`);
    const indicators: Record<string, number> = {};
    for (const name of vocabulary) indicators[name] = parseIndicator(rec[name], row, name);
    return { primary, indicators };
  });
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const rules = loadRules(process.argv[3]);
  const output = process.argv[4] ?? "-";
  const rows = parseRowsCsv(fs.readFileSync(input, "utf8"), rules.taxonomy.vocabulary, rules.diagram.primaryColumn);
  const data = JSON.stringify(rows, null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    fs.writeFileSync(output, data, "utf8");
  }
  console.error(`rows_parse: rows=${rows.length}`);
}
