import { describe, expect, it, vi } from "vitest";

import { CrossBuildError } from "../errors.js";
import { checkEngine, ensureImage } from "./availability.js";
import type { ContainerEngine } from "./cliRuntime.js";

function fakeEngine(overrides: Partial<ContainerEngine> = {}): ContainerEngine {
  return {
    cli: "docker",
    assertAvailable: vi.fn(async () => {}),
    listImages: vi.fn(async () => []),
    pullImage: vi.fn(async () => 0),
    run: vi.fn(async () => 0),
    ...overrides,
  };
}

const log = () => {};

describe("checkEngine", () => {
  it("wraps an unavailable engine as an environment error", async () => {
    const engine = fakeEngine({
      assertAvailable: vi.fn(async () => {
        throw new Error("daemon not running");
      }),
    });

    const p = checkEngine(engine, log);
    await expect(p).rejects.toBeInstanceOf(CrossBuildError);
    await expect(p).rejects.toMatchObject({
      stage: "environment",
      message: "failed to check docker installation: daemon not running",
    });
  });
});

describe("ensureImage", () => {
  it("does not pull an image that is already present", async () => {
    const engine = fakeEngine({ listImages: vi.fn(async () => ["karalabe/xgo-latest:latest"]) });

    await expect(ensureImage(engine, "karalabe/xgo-latest", log)).resolves.toBe("found");
    expect(engine.pullImage).not.toHaveBeenCalled();
  });

  it("pulls the exact reference when it is missing", async () => {
    const engine = fakeEngine();

    await expect(ensureImage(engine, "karalabe/xgo-1.21", log)).resolves.toBe("pulled");
    expect(engine.pullImage).toHaveBeenCalledWith("karalabe/xgo-1.21");
  });

  it("fails when the pull exits non-zero", async () => {
    const engine = fakeEngine({ pullImage: vi.fn(async () => 1) });

    await expect(ensureImage(engine, "karalabe/xgo-1.21", log)).rejects.toMatchObject({
      stage: "image",
      message: "failed to pull image karalabe/xgo-1.21: docker pull exited with 1",
    });
  });

  it("fails when the image listing fails", async () => {
    const engine = fakeEngine({
      listImages: vi.fn(async (): Promise<string[]> => {
        throw new Error("permission denied");
      }),
    });

    await expect(ensureImage(engine, "karalabe/xgo-1.21", log)).rejects.toMatchObject({
      stage: "image",
      message: "failed to check image availability: permission denied",
    });
  });
});
