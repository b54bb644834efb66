import type { MountPoint } from "../workspace/mountPlanner.js";

export const SANDBOX_BUILD_DIR = "/build";
export const SANDBOX_DEPS_CACHE_DIR = "/deps-cache";

export type BindMount = {
  hostPath: string;
  sandboxPath: string;
  readOnly: boolean;
};

export type InvocationSpec = {
  mounts: BindMount[];
  env: Array<[string, string]>;
  image: string;
  packageRef: string;
};

export type BuildFlags = {
  verbose: boolean;
  steps: boolean;
  race: boolean;
};

export type InvocationInput = {
  packageRef: string;
  image: string;
  remote: string;
  branch: string;
  pack: string;
  deps: string;
  outputDir: string;
  outPrefix: string;
  flags: BuildFlags;
  targets: string;
  cacheDir: string;
  /** Only present for local builds. */
  workspaceMounts?: MountPoint[];
};

// "*/*,linux/arm" -> "./. linux/arm"
export function normalizeTargets(targets: string): string {
  return targets
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean)
    .join(" ")
    .replaceAll("*", ".");
}

export function buildInvocationSpec(input: InvocationInput): InvocationSpec {
  const mounts: BindMount[] = [
    { hostPath: input.outputDir, sandboxPath: SANDBOX_BUILD_DIR, readOnly: false },
    { hostPath: input.cacheDir, sandboxPath: SANDBOX_DEPS_CACHE_DIR, readOnly: true },
  ];
  const env: Array<[string, string]> = [
    ["REPO_REMOTE", input.remote],
    ["REPO_BRANCH", input.branch],
    ["PACK", input.pack],
    ["DEPS", input.deps],
    ["OUT", input.outPrefix],
    ["FLAG_V", String(input.flags.verbose)],
    ["FLAG_X", String(input.flags.steps)],
    ["FLAG_RACE", String(input.flags.race)],
    ["TARGETS", normalizeTargets(input.targets)],
  ];

  if (input.workspaceMounts) {
    for (const m of input.workspaceMounts) {
      mounts.push({ hostPath: m.hostPath, sandboxPath: m.sandboxPath, readOnly: true });
    }
    // 沙箱里是 Linux，固定用 ":" 分隔
    env.push(["EXT_GOPATH", input.workspaceMounts.map((m) => m.sandboxPrefix).join(":")]);
  }

  return { mounts, env, image: input.image, packageRef: input.packageRef };
}

/** Arguments following `<cli> run`. */
export function toRunArgs(spec: InvocationSpec): string[] {
  const args: string[] = ["--rm"];
  for (const m of spec.mounts) {
    args.push("-v", `${m.hostPath}:${m.sandboxPath}${m.readOnly ? ":ro" : ""}`);
  }
  for (const [key, value] of spec.env) {
    args.push("-e", `${key}=${value}`);
  }
  args.push(spec.image, spec.packageRef);
  return args;
}
