import { mkdir } from "node:fs/promises";
import path from "node:path";

import { findDefaultConfigPath, loadConfig } from "./config.js";
import { DependencyCache } from "./deps/dependencyCache.js";
import { CrossBuildError } from "./errors.js";
import { toRunArgs } from "./invocation/assemble.js";
import { planInvocation } from "./invocation/planInvocation.js";
import { createLogger, toLoggerFn, type LoggerFn } from "./logger.js";
import { checkEngine, ensureImage } from "./runtime/availability.js";
import { CliRuntime, type ContainerEngine } from "./runtime/cliRuntime.js";
import { hasFlag, parseArgs, pickArg, type CliFlagSpec } from "./utils/args.js";
import { createImportPathResolver, type ImportPathResolver } from "./workspace/importPath.js";

export const CLI_FLAGS: CliFlagSpec = {
  values: ["go", "pkg", "out", "dest", "remote", "branch", "deps", "targets", "image", "config", "profile"],
  booleans: ["v", "x", "race", "h", "help"],
};

export const USAGE = `Usage: crossgo [options] <go import path | ./local/dir>

Options:
  --go <release>       Go release to use for cross compilation (default from config, "latest")
  --pkg <path>         Sub-package to build if not root import
  --out <prefix>       Prefix to use for output naming (empty = package name)
  --dest <dir>         Destination folder to put binaries in (empty = current)
  --remote <url>       Version control remote repository to build
  --branch <name>      Version control branch to build
  --deps "<url> ..."   CGO dependencies (configure/make based archives)
  --targets <list>     Comma separated targets to build for (default "*/*")
  --image <ref>        Use a custom image instead of the official distribution
  -v                   Print the names of packages as they are compiled
  -x                   Print the commands as executing the builds
  --race               Enable data race detection (supported only on amd64)
  --config <path>      Config file (default ./crossgo.toml or ./crossgo.json)
  --profile <name>     Config profile to apply
`;

export type RunCrossCliOpts = {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  engine?: ContainerEngine;
  resolver?: ImportPathResolver;
  log?: LoggerFn;
  stdout?: (text: string) => void;
};

export async function runCrossCli(opts?: RunCrossCliOpts): Promise<void> {
  const argv = opts?.argv ?? process.argv.slice(2);
  const env = opts?.env ?? process.env;
  const cwd = opts?.cwd ?? process.cwd();

  const args = parseArgs(argv, CLI_FLAGS);
  if (hasFlag(args, "h") || hasFlag(args, "help")) {
    (opts?.stdout ?? ((text: string) => process.stdout.write(text)))(USAGE);
    return;
  }
  if (args.positionals.length !== 1) {
    throw new CrossBuildError("usage", `expected exactly one package argument, got ${args.positionals.length}`);
  }
  const packageRef = args.positionals[0];

  const configPath = pickArg(args, "config") ?? findDefaultConfigPath(cwd);
  const cfg = await loadConfig(configPath, { profile: pickArg(args, "profile"), env, cwd });

  const log = opts?.log ?? toLoggerFn(createLogger({ env }));
  const engine = opts?.engine ?? new CliRuntime(cfg.runtime);

  await checkEngine(engine, log);

  const image = pickArg(args, "image")?.trim() || `${cfg.image_prefix}${pickArg(args, "go") ?? cfg.go_version}`;
  await ensureImage(engine, image, log);

  // 依赖先落到本地缓存，容器里只读挂载 /deps-cache
  const deps = pickArg(args, "deps") ?? "";
  if (deps.trim()) {
    const cache = new DependencyCache({
      dir: cfg.cacheDir,
      log,
      timeoutMs: cfg.download.timeout_seconds * 1000,
      maxBytes: cfg.download.max_bytes,
    });
    await cache.ensurePresent(deps);
  }

  const dest = pickArg(args, "dest");
  const outputDir = dest ? path.resolve(cwd, dest) : cwd;
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new CrossBuildError("invocation", `failed to create destination folder ${outputDir}`, err);
  }

  const spec = await planInvocation({
    packageRef,
    image,
    remote: pickArg(args, "remote") ?? "",
    branch: pickArg(args, "branch") ?? "",
    pack: pickArg(args, "pkg") ?? "",
    deps,
    outputDir,
    outPrefix: pickArg(args, "out") ?? "",
    flags: { verbose: hasFlag(args, "v"), steps: hasFlag(args, "x"), race: hasFlag(args, "race") },
    targets: pickArg(args, "targets") ?? cfg.targets,
    cacheDir: cfg.cacheDir,
    cwd,
    workspaceRoots: cfg.workspaceRoots,
    resolver: opts?.resolver ?? createImportPathResolver(cfg.import_resolver, cfg.workspaceRoots),
    log,
  });

  log("cross compiling", { package: spec.packageRef, image: spec.image });

  let code: number | null;
  try {
    code = await engine.run(toRunArgs(spec));
  } catch (err) {
    throw new CrossBuildError("invocation", "failed to cross compile package", err);
  }
  if (code !== 0) {
    throw new CrossBuildError(
      "invocation",
      `failed to cross compile package: ${engine.cli} run exited with ${code ?? "signal"}`,
    );
  }
}
