import { describe, expect, it } from "vitest";

import { imageListed, normalizeImageRef } from "./imageRef.js";

describe("normalizeImageRef", () => {
  it("defaults the tag and drops the Docker Hub registry", () => {
    expect(normalizeImageRef("karalabe/xgo-latest")).toBe("karalabe/xgo-latest:latest");
    expect(normalizeImageRef("docker.io/karalabe/xgo-latest:latest")).toBe("karalabe/xgo-latest:latest");
    expect(normalizeImageRef("docker.io/library/alpine")).toBe("alpine:latest");
    expect(normalizeImageRef("localhost:5000/img")).toBe("localhost:5000/img:latest");
    expect(normalizeImageRef("img@sha256:abc")).toBe("img@sha256:abc");
  });
});

describe("imageListed", () => {
  const listing = ["<none>:<none>", "docker.io/karalabe/xgo-1.21:latest", "alpine:3.19"];

  it("matches across registry prefix and implicit tag", () => {
    expect(imageListed(listing, "karalabe/xgo-1.21")).toBe(true);
    expect(imageListed(listing, "alpine:3.19")).toBe(true);
  });

  it("does not match other releases or tags", () => {
    expect(imageListed(listing, "karalabe/xgo-1.20")).toBe(false);
    expect(imageListed(listing, "alpine")).toBe(false);
  });
});
