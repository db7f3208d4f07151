/**
 * CLI program tests (in-process, in-memory directory tree)
 */
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stripVTControlCharacters } from "node:util";
import { createMemoryReader, type DirectoryReader, memoryFault } from "@dirshape/tree";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram } from "../src/program";

// ============================================================================
// Helpers
// ============================================================================

type RunResult = {
  stdout: string;
  stderr: string;
};

const sampleReader = createMemoryReader({
  root: {
    pkg: {
      a: { "f.go": "" },
      b: { "f.go": "" },
    },
    scripts: { "x.sh": "", "y.sh": "", "z.sh": "" },
  },
});

const collect = (lines: string[]) => stripVTControlCharacters(lines.join("\n"));

async function runCli(args: string[], reader: DirectoryReader = sampleReader): Promise<RunResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
    stdout.push(parts.map(String).join(" "));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...parts: unknown[]) => {
    stderr.push(parts.map(String).join(" "));
  });

  const program = createProgram({ reader });
  program.exitOverride();
  try {
    await program.parseAsync(args, { from: "user" });
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
  return { stdout: collect(stdout), stderr: collect(stderr) };
}

let home: string;

beforeEach(() => {
  home = mkdtempSync(join(tmpdir(), "dirshape-cli-"));
  vi.stubEnv("DIRSHAPE_HOME", home);
});

afterEach(() => {
  vi.unstubAllEnvs();
  rmSync(home, { recursive: true, force: true });
});

// ============================================================================
// Tree output
// ============================================================================

describe("dirshape [path]", () => {
  it("should print the tree with default limits", async () => {
    const { stdout } = await runCli(["/root", "--no-color"]);

    expect(stdout).toBe(
      [
        "/root/",
        "├── pkg/",
        "│   ├── a/",
        "│   │   └── f.go",
        "│   └── ... (1 identical dirs)",
        "└── scripts/",
        "    ├── x.sh",
        "    ├── y.sh",
        "    └── z.sh",
        "[5 directories, 5 files]",
      ].join("\n")
    );
  });

  it("should apply file and group limits", async () => {
    const { stdout } = await runCli(["/root", "--no-color", "-f", "2", "-d", "0"]);

    expect(stdout.split("\n")).toEqual([
      "/root/",
      "├── pkg/",
      "│   ├── a/",
      "│   │   └── f.go",
      "│   └── b/",
      "│       └── f.go",
      "└── scripts/",
      "    ├── x.sh",
      "    ├── y.sh",
      "    └── ... [0 directories, 3 files, showing first 2]",
      "[5 directories, 5 files]",
    ]);
  });

  it("should stop at the depth limit", async () => {
    const { stdout } = await runCli(["/root", "--no-color", "-L", "1"]);
    expect(stdout.split("\n")).toEqual([
      "/root/",
      "├── pkg/",
      "└── scripts/",
      "[3 directories, 0 files]",
    ]);
  });

  it("should print JSON", async () => {
    const { stdout } = await runCli(["/root", "--format", "json", "-f", "1"]);
    const tree = JSON.parse(stdout);

    expect(tree.name).toBe("root");
    expect(tree.totalDirs).toBe(4);
    expect(tree.totalFiles).toBe(5);
    expect(tree.children[1].shownFiles).toEqual(["x.sh"]);
    expect(tree.children[1].hiddenFiles).toBe(2);
  });

  it("should print YAML", async () => {
    const { stdout } = await runCli(["/root/scripts", "--format", "yaml"]);
    expect(stdout).toContain("name: scripts\n");
    expect(stdout).toContain("totalFiles: 3\n");
  });

  it("should use configured defaults", async () => {
    await runCli(["config", "set", "files", "1"]);
    const { stdout } = await runCli(["/root/scripts", "--no-color"]);

    expect(stdout.split("\n")).toEqual([
      "/root/scripts/",
      "├── x.sh",
      "└── ... [0 directories, 3 files, showing first 1]",
      "[1 directories, 3 files]",
    ]);
  });

  it("should warn about unreadable directories", async () => {
    const reader = createMemoryReader({ root: { locked: memoryFault("EACCES"), open: {} } });
    const { stdout, stderr } = await runCli(["/root", "--no-color"], reader);

    expect(stdout.split("\n")).toContain("├── locked [Permission denied]");
    expect(stderr).toBe("⚠ 1 directory could not be read");
  });

  it("should not warn in quiet mode", async () => {
    const reader = createMemoryReader({ root: { locked: memoryFault("EPERM") } });
    const { stderr } = await runCli(["/root", "--no-color", "-q"], reader);
    expect(stderr).toBe("");
  });

  it("should log visited directories when verbose", async () => {
    const { stderr } = await runCli(["/root/pkg", "--no-color", "-v"]);
    expect(stderr.split("\n")).toEqual([
      "⋯ Limits: files=5 dirs=1 level=unlimited",
      "⋯ Read /root/pkg/a",
      "⋯ Read /root/pkg/b",
      "⋯ Read /root/pkg",
    ]);
  });

  it("should reject negative limits", async () => {
    await expect(runCli(["/root", "--files=-1"])).rejects.toThrow("--files must be >= 0");
    await expect(runCli(["/root", "--level=-1"])).rejects.toThrow("--level must be >= 0");
  });

  it("should reject a missing root", async () => {
    await expect(runCli(["/missing"])).rejects.toThrow("/missing: no such file or directory");
  });

  it("should reject table output", async () => {
    await expect(runCli(["/root", "--format", "table"])).rejects.toThrow(
      "Format table is not supported for tree output"
    );
  });

  it("should reject unknown formats", async () => {
    await expect(runCli(["/root", "--format", "xml"])).rejects.toThrow(
      "Unknown output format: xml (expected text|json|yaml|table)"
    );
  });
});

// ============================================================================
// Config commands
// ============================================================================

describe("dirshape config", () => {
  it("should set and get a value", async () => {
    const set = await runCli(["config", "set", "dirs", "3"]);
    expect(set.stdout).toBe("✓ Set dirs = 3");

    const get = await runCli(["config", "get", "dirs"]);
    expect(get.stdout).toBe("3");
  });

  it("should list values", async () => {
    const { stdout } = await runCli(["config", "list", "--format", "json"]);
    expect(JSON.parse(stdout)).toEqual({ files: 5, dirs: 1, level: 0, color: true });
  });

  it("should list values as key-value text", async () => {
    const { stdout } = await runCli(["config", "list"]);
    expect(stdout.split("\n")).toEqual(["files  5", "dirs   1", "level  0", "color  true"]);
  });

  it("should list values as a key/value table", async () => {
    const { stdout } = await runCli(["config", "list", "--format", "table"]);
    expect(stdout).toMatch(/│ KEY\s+│ VALUE\s+│/);
    expect(stdout).toMatch(/│ files\s+│ 5\s+│/);
    expect(stdout).toMatch(/│ color\s+│ true\s+│/);
  });

  it("should print the config path", async () => {
    const { stdout } = await runCli(["config", "path"]);
    expect(stdout).toBe(join(home, "config.json"));
  });

  it("should reject invalid values", async () => {
    await expect(runCli(["config", "set", "color", "maybe"])).rejects.toThrow(
      'Invalid value for color: must be "true" or "false"'
    );
  });
});
