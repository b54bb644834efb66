import { describe, expect, it } from "vitest";

import { CrossBuildError, describeCause, isCrossBuildError } from "./errors.js";

describe("CrossBuildError", () => {
  it("appends the cause message and keeps the cause", () => {
    const cause = new Error("EACCES: permission denied");
    const err = new CrossBuildError("dependency", "failed to create dependency cache /tmp/c", cause);

    expect(err.message).toBe("failed to create dependency cache /tmp/c: EACCES: permission denied");
    expect(err.stage).toBe("dependency");
    expect(err.cause).toBe(cause);
    expect(isCrossBuildError(err)).toBe(true);
    expect(isCrossBuildError(cause)).toBe(false);
  });

  it("keeps a bare message without a cause", () => {
    const err = new CrossBuildError("usage", "expected exactly one package argument, got 2");
    expect(err.message).toBe("expected exactly one package argument, got 2");
    expect(err.cause).toBeUndefined();
  });

  it("describes non-error causes", () => {
    expect(describeCause("plain")).toBe("plain");
    expect(describeCause(null)).toBe("unknown error");
  });
});
