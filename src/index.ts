#!/usr/bin/env node
import { isCrossBuildError } from "./errors.js";
import { runCrossCli, USAGE } from "./runCrossCli.js";

runCrossCli().catch((err: unknown) => {
  if (isCrossBuildError(err)) {
    console.error(`[crossgo] ${err.message}`);
    if (err.stage === "usage") console.error(USAGE);
  } else {
    console.error("[crossgo] fatal", err);
  }
  process.exitCode = 1;
});
