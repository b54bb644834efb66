import { CrossBuildError } from "../errors.js";
import type { LoggerFn } from "../logger.js";
import type { ContainerEngine } from "./cliRuntime.js";
import { imageListed } from "./imageRef.js";

export async function checkEngine(engine: ContainerEngine, log: LoggerFn): Promise<void> {
  log(`checking ${engine.cli} installation`);
  try {
    await engine.assertAvailable();
  } catch (err) {
    throw new CrossBuildError("environment", `failed to check ${engine.cli} installation`, err);
  }
}

/** Makes sure `image` exists locally, pulling it when the listing does not show it. */
export async function ensureImage(
  engine: ContainerEngine,
  image: string,
  log: LoggerFn,
): Promise<"found" | "pulled"> {
  log("checking for required image", { image });

  let listing: string[];
  try {
    listing = await engine.listImages();
  } catch (err) {
    throw new CrossBuildError("image", "failed to check image availability", err);
  }
  if (imageListed(listing, image)) {
    log("image found", { image });
    return "found";
  }

  log("image not found, pulling from registry", { image });
  let code: number | null;
  try {
    code = await engine.pullImage(image);
  } catch (err) {
    throw new CrossBuildError("image", `failed to pull image ${image}`, err);
  }
  if (code !== 0) {
    throw new CrossBuildError("image", `failed to pull image ${image}: ${engine.cli} pull exited with ${code ?? "signal"}`);
  }
  return "pulled";
}
