import { describe, expect, it } from "vitest";

import { buildInvocationSpec, normalizeTargets, toRunArgs, type InvocationInput } from "./assemble.js";

const baseInput: InvocationInput = {
  packageRef: "github.com/u/tool",
  image: "karalabe/xgo-latest",
  remote: "",
  branch: "",
  pack: "",
  deps: "",
  outputDir: "/out",
  outPrefix: "",
  flags: { verbose: false, steps: false, race: false },
  targets: "*/*",
  cacheDir: "/tmp/crossgo-cache",
};

describe("normalizeTargets", () => {
  it("turns wildcards into regex any-markers and keeps slashes", () => {
    expect(normalizeTargets("*/*")).toBe("./.");
    expect(normalizeTargets("linux/amd64, windows/*,,")).toBe("linux/amd64 windows/.");
    expect(normalizeTargets("linux/arm-7")).toBe("linux/arm-7");
  });
});

describe("buildInvocationSpec", () => {
  it("assembles a remote build without workspace mounts", () => {
    const spec = buildInvocationSpec(baseInput);

    expect(toRunArgs(spec)).toEqual([
      "--rm",
      "-v",
      "/out:/build",
      "-v",
      "/tmp/crossgo-cache:/deps-cache:ro",
      "-e",
      "REPO_REMOTE=",
      "-e",
      "REPO_BRANCH=",
      "-e",
      "PACK=",
      "-e",
      "DEPS=",
      "-e",
      "OUT=",
      "-e",
      "FLAG_V=false",
      "-e",
      "FLAG_X=false",
      "-e",
      "FLAG_RACE=false",
      "-e",
      "TARGETS=./.",
      "karalabe/xgo-latest",
      "github.com/u/tool",
    ]);
  });

  it("adds read-only workspace mounts and EXT_GOPATH for local builds", () => {
    const spec = buildInvocationSpec({
      ...baseInput,
      remote: "https://example.com/u/tool.git",
      branch: "dev",
      pack: "cmd/tool",
      deps: "http://x/a.tgz",
      outPrefix: "tool",
      flags: { verbose: true, steps: false, race: true },
      targets: "linux/amd64,windows/*",
      workspaceMounts: [
        { hostPath: "/real/lib", sandboxPath: "/ext-go/1/src/github.com/u/lib", sandboxPrefix: "/ext-go/1" },
        { hostPath: "/home/u/go/src", sandboxPath: "/ext-go/2/src", sandboxPrefix: "/ext-go/2" },
      ],
    });

    expect(spec.mounts).toEqual([
      { hostPath: "/out", sandboxPath: "/build", readOnly: false },
      { hostPath: "/tmp/crossgo-cache", sandboxPath: "/deps-cache", readOnly: true },
      { hostPath: "/real/lib", sandboxPath: "/ext-go/1/src/github.com/u/lib", readOnly: true },
      { hostPath: "/home/u/go/src", sandboxPath: "/ext-go/2/src", readOnly: true },
    ]);
    expect(Object.fromEntries(spec.env)).toEqual({
      REPO_REMOTE: "https://example.com/u/tool.git",
      REPO_BRANCH: "dev",
      PACK: "cmd/tool",
      DEPS: "http://x/a.tgz",
      OUT: "tool",
      FLAG_V: "true",
      FLAG_X: "false",
      FLAG_RACE: "true",
      TARGETS: "linux/amd64 windows/.",
      EXT_GOPATH: "/ext-go/1:/ext-go/2",
    });

    const args = toRunArgs(spec);
    expect(args.slice(-4)).toEqual(["-e", "EXT_GOPATH=/ext-go/1:/ext-go/2", "karalabe/xgo-latest", "github.com/u/tool"]);
    expect(args).toContain("/real/lib:/ext-go/1/src/github.com/u/lib:ro");
  });
});
