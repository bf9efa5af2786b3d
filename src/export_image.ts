import fs from "fs";
import path from "path";
import { spawnSync, type SpawnSyncOptions } from "child_process";
import { pathToFileURL } from "url";

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnSyncOptions,
) => { status: number | null; error?: Error };

export type ImageFormat = "pdf" | "png";

export function imageFormatFor(file: string): ImageFormat | undefined {
  const ext = path.extname(file).toLowerCase();
  if (ext === ".pdf") return "pdf";
  if (ext === ".png") return "png";
  return undefined;
}

export function buildArgs(svg: string, out: string, format: ImageFormat): string[] {
  const args = [`--export-type=${format}`, `--export-filename=${out}`];
  // 2x the 96 dpi default
  if (format === "png") args.push("--export-dpi=192");
  return [...args, svg];
}

function hasCode(err: Error): err is Error & { code: string } {
  return "code" in err && typeof err.code === "string";
}

export function exportImage(
  svg: string,
  out: string,
  inkscapeBin = process.env.INKSCAPE_BIN && process.env.INKSCAPE_BIN.trim().length > 0
    ? process.env.INKSCAPE_BIN
    : "inkscape",
  spawn: SpawnFn = spawnSync,
): void {
  const format = imageFormatFor(out);
  if (!format) {
    throw new Error(`Unsupported image type for ${out} (expected .pdf or .png)`);
  }
  if (!fs.existsSync(svg)) {
    throw new Error(`SVG input not found: ${svg}`);
  }
  const res = spawn(inkscapeBin, buildArgs(svg, out, format), {
    stdio: "inherit",
  });

  if (res.error) {
    if (hasCode(res.error) && res.error.code === "ENOENT") {
      throw new Error(
        `Inkscape not found ('${inkscapeBin}'). Install Inkscape or set INKSCAPE_BIN to the executable path.`,
      );
    }
    throw new Error(`Failed to launch Inkscape ('${inkscapeBin}'): ${res.error.message}`);
  }
  if (res.status !== 0) {
    throw new Error(`Inkscape export failed with exit code ${res.status}`);
  }
  if (!fs.existsSync(out)) {
    throw new Error(`Inkscape reported success but ${format.toUpperCase()} was not created: ${out}`);
  }
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const svg = process.argv[2];
  const out = process.argv[3];
  try {
    exportImage(svg, out);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
