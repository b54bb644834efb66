import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import path from "node:path";

import { CrossBuildError } from "../errors.js";
import type { LoggerFn } from "../logger.js";
import { isWithin, realpathOrSelf, toPosixRelative } from "../utils/fsPaths.js";
import type { ImportPathResolver } from "./importPath.js";

export const EXT_MOUNT_ROOT = "/ext-go";

export type MountPoint = {
  /** Absolute host directory (symlink-resolved for link mounts). */
  hostPath: string;
  /** /ext-go/<n>/src[/<suffix>] */
  sandboxPath: string;
  /** /ext-go/<n> */
  sandboxPrefix: string;
};

export type ForeignLink = {
  linkPath: string;
  target: string;
  /** Link location below the source tree, "/" separated. */
  suffix: string;
};

export type WorkspaceMountPlan = {
  mounts: MountPoint[];
  prefixes: string[];
};

export type LocalPackage = {
  dir: string;
  importPath: string;
};

export function isLocalPackageRef(ref: string): boolean {
  return path.isAbsolute(ref) || ref.startsWith(".");
}

const SKIPPABLE_DIR_ERRORS = new Set(["ENOENT", "ENOTDIR", "EACCES", "EPERM"]);

function errorCode(err: unknown): string | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return null;
}

async function resolveDirTarget(linkPath: string): Promise<string | null> {
  const target = await realpath(linkPath).catch(() => null);
  if (!target) return null;
  const s = await stat(target).catch(() => null);
  return s?.isDirectory() ? target : null;
}

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    const code = errorCode(err);
    if (code && SKIPPABLE_DIR_ERRORS.has(code)) return [];
    throw new CrossBuildError("workspace", `failed to walk ${dir}`, err);
  }
}

/**
 * Walks `sources` depth-first in name order (links are inspected, never followed)
 * and returns every symlink whose resolved target is a directory outside the tree.
 * Dangling links, links to files and unreadable directories are skipped.
 */
export async function discoverForeignLinks(sources: string): Promise<ForeignLink[]> {
  const bases = [...new Set([sources, await realpathOrSelf(sources)])];
  const out: ForeignLink[] = [];

  const visit = async (dir: string): Promise<void> => {
    for (const ent of await listDir(dir)) {
      const entPath = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        await visit(entPath);
        continue;
      }
      if (!ent.isSymbolicLink()) continue;

      const target = await resolveDirTarget(entPath);
      if (!target) continue;
      if (bases.some((base) => isWithin(target, base))) continue;

      out.push({ linkPath: entPath, target, suffix: toPosixRelative(sources, entPath) });
    }
  };

  await visit(sources);
  return out;
}

function mountAt(index: number, hostPath: string, suffix: string): MountPoint {
  const sandboxPrefix = path.posix.join(EXT_MOUNT_ROOT, String(index));
  const sandboxPath = suffix
    ? path.posix.join(sandboxPrefix, "src", suffix)
    : path.posix.join(sandboxPrefix, "src");
  return { hostPath, sandboxPath, sandboxPrefix };
}

/**
 * Hoists every foreign symlink of every `<root>/src` into its own mount, followed
 * by the source tree itself. One counter numbers all mounts of the run.
 */
export async function planWorkspaceMounts(roots: string[], log?: LoggerFn): Promise<WorkspaceMountPlan> {
  const mounts: MountPoint[] = [];

  for (const root of roots) {
    const sources = path.join(root, "src");
    for (const link of await discoverForeignLinks(sources)) {
      const mount = mountAt(mounts.length + 1, link.target, link.suffix);
      log?.("mounting symlinked directory", { link: link.linkPath, target: link.target, sandboxPath: mount.sandboxPath });
      mounts.push(mount);
    }
    mounts.push(mountAt(mounts.length + 1, sources, ""));
  }

  return { mounts, prefixes: mounts.map((m) => m.sandboxPrefix) };
}

export async function resolveLocalPackage(ref: string, resolver: ImportPathResolver, cwd: string): Promise<LocalPackage> {
  const dir = path.resolve(cwd, ref);

  const s = await stat(dir).catch(() => null);
  if (!s || !s.isDirectory()) {
    throw new CrossBuildError("workspace", `requested path invalid: ${dir} is not a directory`);
  }

  let importPath: string;
  try {
    importPath = await resolver.resolveImportPath(dir);
  } catch (err) {
    throw new CrossBuildError("workspace", "failed to resolve import path", err);
  }
  return { dir, importPath };
}
