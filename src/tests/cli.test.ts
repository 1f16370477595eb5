import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../cli.js";
import { RESULTS_FILENAME } from "../config.js";

const workspaces: string[] = [];

function workspace(files: Record<string, string> = {}): string {
  const dir = mkdtempSync(join(tmpdir(), "numstat-cli-"));
  workspaces.push(dir);
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content);
  }
  return dir;
}

describe("runCli", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of workspaces.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("appends a statistics block and exits 0", () => {
    const cwd = workspace({ "data.txt": "3.5 foo 7\n-2.1 bar\n" });

    const code = runCli(["data.txt"], { cwd, now: () => new Date(2026, 9, 19, 8, 5, 3) });

    expect(code).toBe(0);
    const lines = readFileSync(join(cwd, RESULTS_FILENAME), "utf-8").split("\n");
    expect(lines[0]).toBe("Run timestamp: 2026-10-19 08:05:03");
    expect(lines[2]).toBe("Source file:          data.txt");
    expect(lines[3]).toBe("Valid samples:        3");
    expect(lines[4]).toBe("Rejected entries:     2");
    expect(lines[6]).toBe("Mean:                 2.8000");
    expect(lines[7]).toBe("Median:               3.5000");
    expect(lines[8]).toBe("Mode:                 none (every value occurs once)");
    expect(lines[9]).toBe("Variance:             14.0467");
    expect(lines[10]).toBe("Standard deviation:   3.7479");
    expect(lines[12]).toMatch(/^Computation time: {5}\d+\.\d{4} ms$/);
    expect(lines.slice(13)).toEqual(["", ""]);
  });

  it("warns about each rejected token", () => {
    const cwd = workspace({ "data.txt": "1\nfoo\n2 bar\n" });

    runCli(["data.txt"], { cwd });

    expect(console.error).toHaveBeenCalledWith("Warning: line 2: 'foo' is not a number, skipped");
    expect(console.error).toHaveBeenCalledWith("Warning: line 3: 'bar' is not a number, skipped");
  });

  it("keeps earlier blocks intact across runs", () => {
    const cwd = workspace({ "data.txt": "1 2 2 3\n" });
    const resultsPath = join(cwd, RESULTS_FILENAME);

    expect(runCli(["data.txt"], { cwd, now: () => new Date(2026, 9, 19, 8, 0, 0) })).toBe(0);
    const first = readFileSync(resultsPath, "utf-8");
    expect(runCli(["data.txt"], { cwd, now: () => new Date(2026, 9, 19, 9, 0, 0) })).toBe(0);
    const second = readFileSync(resultsPath, "utf-8");

    expect(second.length).toBeGreaterThan(first.length);
    expect(second.startsWith(first)).toBe(true);
    expect(second.slice(first.length)).toContain("Run timestamp: 2026-10-19 09:00:00");
  });

  it("appends a no-data block when nothing parses", () => {
    const cwd = workspace({ "junk.txt": "foo bar\n" });

    expect(runCli(["junk.txt"], { cwd })).toBe(0);

    const lines = readFileSync(join(cwd, RESULTS_FILENAME), "utf-8").split("\n");
    expect(lines.slice(3)).toEqual([
      "Valid samples:        0",
      "Rejected entries:     2",
      "No valid numeric data found.",
      "",
      "",
    ]);
  });

  it("fails without touching the results file when the input is missing", () => {
    const cwd = workspace({ [RESULTS_FILENAME]: "previous history\n\n" });

    const code = runCli(["missing.txt"], { cwd });

    expect(code).toBe(1);
    expect(readFileSync(join(cwd, RESULTS_FILENAME), "utf-8")).toBe("previous history\n\n");
    expect(console.error).toHaveBeenCalledWith(
      `Error: cannot read input file ${join(cwd, "missing.txt")}: no such file or directory`,
    );
  });

  it("does not create the results file when the input is missing", () => {
    const cwd = workspace();

    expect(runCli(["missing.txt"], { cwd })).toBe(1);
    expect(existsSync(join(cwd, RESULTS_FILENAME))).toBe(false);
  });

  it("exits 1 when the results file cannot be appended", () => {
    const cwd = workspace({ "data.txt": "1 2 3\n" });
    const resultsPath = join(cwd, RESULTS_FILENAME);
    mkdirSync(resultsPath);

    expect(runCli(["data.txt"], { cwd })).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      `Error: cannot append results to ${resultsPath}: is a directory`,
    );
  });

  it("prints usage and exits 1 without an input file", () => {
    expect(runCli([], { cwd: workspace() })).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Error: missing input data file");
  });

  it("rejects more than one input file", () => {
    expect(runCli(["a.txt", "b.txt"], { cwd: workspace() })).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Error: expected one input data file, got 2");
  });

  it("prints help and exits 0", () => {
    expect(runCli(["--help"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("Usage:\n  numstat <data-file>"));
  });
});
