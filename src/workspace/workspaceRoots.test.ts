import path from "node:path";

import { describe, expect, it } from "vitest";

import { parseWorkspaceRoots } from "./workspaceRoots.js";

describe("parseWorkspaceRoots", () => {
  it("splits on the delimiter and drops empty entries", () => {
    expect(parseWorkspaceRoots("/a/go::/b/go: ", { home: "/home/u", delimiter: ":" })).toEqual([
      "/a/go",
      "/b/go",
    ]);
    expect(parseWorkspaceRoots("C:\\go;D:\\work", { home: "C:\\Users\\u", delimiter: ";" })).toEqual([
      "C:\\go",
      "D:\\work",
    ]);
  });

  it("falls back to <home>/go", () => {
    expect(parseWorkspaceRoots(undefined, { home: "/home/u" })).toEqual([path.join("/home/u", "go")]);
    expect(parseWorkspaceRoots("  ", { home: "/home/u", delimiter: ":" })).toEqual([path.join("/home/u", "go")]);
  });
});
