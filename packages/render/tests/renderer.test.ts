/**
 * Renderer tests
 */
import { createMemoryReader, memoryFault, walk } from "@dirshape/tree";
import { describe, expect, it } from "vitest";
import { formatRootLabel, renderLines, renderTree } from "../src/renderer.ts";

const reader = createMemoryReader({
  root: {
    pkg: {
      a: { "f.go": "" },
      b: { "f.go": "" },
    },
    scripts: { "x.sh": "", "y.sh": "", "z.sh": "" },
  },
});

describe("renderTree", () => {
  it("should draw groups, files and summaries", () => {
    const root = walk("/root", { maxFilesPerDir: 2 }, reader);
    const text = renderTree("root/", root, { maxDirsPerGroup: 1, color: false });

    expect(text).toBe(
      [
        "root/",
        "├── pkg/",
        "│   ├── a/",
        "│   │   └── f.go",
        "│   └── ... (1 identical dirs)",
        "└── scripts/",
        "    ├── x.sh",
        "    ├── y.sh",
        "    └── ... [0 directories, 3 files, showing first 2]",
        "[5 directories, 5 files]",
        "",
      ].join("\n")
    );
  });

  it("should expand every member when unbounded", () => {
    const root = walk("/root", {}, reader);
    const lines = Array.from(renderLines(".", root, { color: false }));

    expect(lines).toEqual([
      ".",
      "├── pkg/",
      "│   ├── a/",
      "│   │   └── f.go",
      "│   └── b/",
      "│       └── f.go",
      "└── scripts/",
      "    ├── x.sh",
      "    ├── y.sh",
      "    └── z.sh",
      "[5 directories, 5 files]",
    ]);
  });

  it("should annotate unreadable directories", () => {
    const broken = createMemoryReader({
      root: { locked: memoryFault("EACCES"), bad: memoryFault("EIO") },
    });
    const lines = Array.from(renderLines("root/", walk("/root", {}, broken), { color: false }));

    expect(lines).toEqual([
      "root/",
      "├── bad [EIO: i/o error, scandir '/root/bad']",
      "└── locked [Permission denied]",
      "[3 directories, 0 files]",
    ]);
  });

  it("should draw unexplored directories without contents", () => {
    const root = walk("/root", { maxDepth: 1 }, reader);
    expect(Array.from(renderLines("root/", root, { color: false }))).toEqual([
      "root/",
      "├── pkg/",
      "└── scripts/",
      "[3 directories, 0 files]",
    ]);
  });
});

describe("formatRootLabel", () => {
  it("should keep the current directory as a dot", () => {
    expect(formatRootLabel("")).toBe(".");
    expect(formatRootLabel(".")).toBe(".");
    expect(formatRootLabel("./")).toBe(".");
  });

  it("should append a separator", () => {
    expect(formatRootLabel("src")).toBe("src/");
    expect(formatRootLabel("./a/../lib")).toBe("lib/");
  });

  it("should keep input that already ends with a separator", () => {
    expect(formatRootLabel("src/")).toBe("src/");
    expect(formatRootLabel("/")).toBe("/");
  });
});
