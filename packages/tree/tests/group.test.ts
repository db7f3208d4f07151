/**
 * Grouping tests
 */
import { describe, expect, it } from "vitest";
import { groupIdentical } from "../src/group.ts";
import type { DirectoryNode } from "../src/types.ts";

const dir = (name: string, signature: string, depth = 1): DirectoryNode => ({
  name,
  path: `/root/${name}`,
  depth,
  children: [],
  files: [],
  hiddenFileCount: 0,
  immediateDirCount: 0,
  immediateFileCount: 0,
  totalDirCount: 0,
  totalFileCount: 0,
  signature,
});

const names = (members: DirectoryNode[]) => members.map((m) => m.name);

describe("groupIdentical", () => {
  it("should return no groups for no siblings", () => {
    expect(groupIdentical([])).toEqual([]);
  });

  it("should keep first-seen group order and sibling member order", () => {
    const groups = groupIdentical([dir("A", "s1"), dir("B", "s2"), dir("C", "s1"), dir("D", "s1")]);

    expect(groups.map((g) => g.signature)).toEqual(["s1", "s2"]);
    expect(names(groups[0]?.members ?? [])).toEqual(["A", "C", "D"]);
    expect(names(groups[1]?.members ?? [])).toEqual(["B"]);
  });

  it("should not sort groups by signature or size", () => {
    const groups = groupIdentical([dir("a", "zz"), dir("b", "aa"), dir("c", "aa")]);
    expect(groups.map((g) => g.signature)).toEqual(["zz", "aa"]);
  });

  it("should give each distinct signature its own group", () => {
    const groups = groupIdentical([dir("a", "s1"), dir("b", "s2"), dir("c", "s3")]);
    expect(groups.map((g) => names(g.members))).toEqual([["a"], ["b"], ["c"]]);
  });

  it("should fall back to name and depth for an empty signature", () => {
    const groups = groupIdentical([dir("x", ""), dir("y", ""), dir("x", "", 2)]);

    expect(groups.map((g) => g.signature)).toEqual([
      "name:x:depth:1",
      "name:y:depth:1",
      "name:x:depth:2",
    ]);
  });

  it("should return the full partition", () => {
    const siblings = Array.from({ length: 50 }, (_, i) => dir(`d${i}`, "same"));
    const groups = groupIdentical(siblings);
    expect(groups).toHaveLength(1);
    expect(groups[0]?.members).toHaveLength(50);
  });
});
