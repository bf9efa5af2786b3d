import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { buildArgs, exportImage, imageFormatFor, type SpawnFn } from "./export_image.js";

describe("exportImage", () => {
  let dir: string;
  let svg: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "flow-export-"));
    svg = path.join(dir, "diagram.svg");
    fs.writeFileSync(svg, "<svg/>", "utf8");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("picks the format from the extension", () => {
    expect(imageFormatFor("out/diagram.PDF")).toBe("pdf");
    expect(imageFormatFor("diagram.png")).toBe("png");
    expect(imageFormatFor("diagram.html")).toBeUndefined();
  });

  it("exports PNG at double resolution", () => {
    expect(buildArgs("a.svg", "a.png", "png")).toEqual([
      "--export-type=png",
      "--export-filename=a.png",
      "--export-dpi=192",
      "a.svg",
    ]);
    expect(buildArgs("a.svg", "a.pdf", "pdf")).toEqual(["--export-type=pdf", "--export-filename=a.pdf", "a.svg"]);
  });

  it("runs inkscape and checks the output exists", () => {
    const out = path.join(dir, "diagram.pdf");
    const spawn = vi.fn<SpawnFn>(() => {
      fs.writeFileSync(out, "%PDF", "utf8");
      return { status: 0 };
    });
    exportImage(svg, out, "inkscape-test", spawn);
    expect(spawn).toHaveBeenCalledWith("inkscape-test", buildArgs(svg, out, "pdf"), { stdio: "inherit" });
  });

  it("explains a missing executable", () => {
    const missing = Object.assign(new Error("spawn inkscape ENOENT"), { code: "ENOENT" });
    const spawn = vi.fn<SpawnFn>(() => ({ status: null, error: missing }));
    expect(() => exportImage(svg, path.join(dir, "d.pdf"), "inkscape", spawn)).toThrow(
      "Inkscape not found ('inkscape'). Install Inkscape or set INKSCAPE_BIN to the executable path.",
    );
  });

  it("fails on a non-zero exit or a missing output", () => {
    const failing = vi.fn<SpawnFn>(() => ({ status: 2 }));
    expect(() => exportImage(svg, path.join(dir, "d.png"), "inkscape", failing)).toThrow(
      "Inkscape export failed with exit code 2",
    );
    const silent = vi.fn<SpawnFn>(() => ({ status: 0 }));
    const out = path.join(dir, "d.png");
    expect(() => exportImage(svg, out, "inkscape", silent)).toThrow(
      `Inkscape reported success but PNG was not created: ${out}`,
    );
  });

  it("rejects unsupported types and missing input before spawning", () => {
    const spawn = vi.fn<SpawnFn>(() => ({ status: 0 }));
    expect(() => exportImage(svg, path.join(dir, "d.html"), "inkscape", spawn)).toThrow(/Unsupported image type/);
    expect(() => exportImage(path.join(dir, "nope.svg"), path.join(dir, "d.pdf"), "inkscape", spawn)).toThrow(
      /SVG input not found/,
    );
    expect(spawn).not.toHaveBeenCalled();
  });
});
