import { describe, expect, it } from "vitest";

import { hasFlag, parseArgs, pickArg } from "./args.js";

const spec = { values: ["go", "targets", "dest"], booleans: ["v", "race"] };

describe("parseArgs", () => {
  it("accepts single and double dash, inline and separate values", () => {
    const parsed = parseArgs(["-go", "1.21", "--targets=linux/amd64", "-v", "./pkg"], spec);
    expect(pickArg(parsed, "go")).toBe("1.21");
    expect(pickArg(parsed, "targets")).toBe("linux/amd64");
    expect(pickArg(parsed, "dest")).toBeNull();
    expect(hasFlag(parsed, "v")).toBe(true);
    expect(hasFlag(parsed, "race")).toBe(false);
    expect(parsed.positionals).toEqual(["./pkg"]);
  });

  it("lets an explicit =false switch a boolean back off", () => {
    const parsed = parseArgs(["--race", "--race=false", "github.com/a/b"], spec);
    expect(hasFlag(parsed, "race")).toBe(false);
    expect(parsed.positionals).toEqual(["github.com/a/b"]);
  });

  it("treats everything after -- as positional", () => {
    const parsed = parseArgs(["-v", "--", "-weird"], spec);
    expect(parsed.positionals).toEqual(["-weird"]);
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseArgs(["-bogus"], spec)).toThrow("flag provided but not defined: -bogus");
    expect(() => parseArgs(["--dest"], spec)).toThrow("flag needs an argument: -dest");
    expect(() => parseArgs(["-v=maybe"], spec)).toThrow(/invalid boolean value/);
  });
});
