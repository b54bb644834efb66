import type { LoggerFn } from "../logger.js";
import type { ImportPathResolver } from "../workspace/importPath.js";
import { isLocalPackageRef, planWorkspaceMounts, resolveLocalPackage } from "../workspace/mountPlanner.js";
import { buildInvocationSpec, type InvocationInput, type InvocationSpec } from "./assemble.js";

export type PlanInvocationOpts = Omit<InvocationInput, "workspaceMounts"> & {
  cwd: string;
  workspaceRoots: string[];
  resolver: ImportPathResolver;
  log: LoggerFn;
};

/**
 * 本地路径：解析出 import path 替换原始引用，并把所有 workspace 源码树挂进去。
 * 远程 import path 原样透传。不触碰容器引擎。
 */
export async function planInvocation(opts: PlanInvocationOpts): Promise<InvocationSpec> {
  const { cwd, workspaceRoots, resolver, log, ...input } = opts;

  if (!isLocalPackageRef(input.packageRef)) {
    return buildInvocationSpec(input);
  }

  const local = await resolveLocalPackage(input.packageRef, resolver, cwd);
  log("resolved local package", { dir: local.dir, importPath: local.importPath });

  const plan = await planWorkspaceMounts(workspaceRoots, log);
  return buildInvocationSpec({ ...input, packageRef: local.importPath, workspaceMounts: plan.mounts });
}
