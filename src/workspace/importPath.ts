import { readFile } from "node:fs/promises";
import path from "node:path";

import type { ImportResolverKind } from "../config.js";
import { spawnCapture } from "../runtime/cliRuntime.js";
import { isWithin, realpathOrSelf, toPosixRelative } from "../utils/fsPaths.js";

export interface ImportPathResolver {
  resolveImportPath(dir: string): Promise<string>;
}

const MODULE_LINE = /^\s*module\s+(?:"([^"]+)"|(\S+))/m;

export function parseModulePath(goMod: string): string | null {
  const withoutComments = goMod.replace(/\/\/.*$/gm, "");
  const m = MODULE_LINE.exec(withoutComments);
  const modulePath = (m?.[1] ?? m?.[2] ?? "").trim();
  return modulePath || null;
}

async function findGoMod(dir: string): Promise<{ moduleRoot: string; modulePath: string } | null> {
  let current = dir;
  while (true) {
    const raw = await readFile(path.join(current, "go.mod"), "utf8").catch(() => null);
    if (raw !== null) {
      const modulePath = parseModulePath(raw);
      if (!modulePath) throw new Error(`go.mod in ${current} has no module directive`);
      return { moduleRoot: current, modulePath };
    }
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * 不依赖 Go 工具链的解析：先找 go.mod（module 模式），
 * 找不到再看目录是否落在某个 <root>/src 下面（GOPATH 模式）。
 */
export class BuiltinImportPathResolver implements ImportPathResolver {
  constructor(private readonly workspaceRoots: string[]) {}

  async resolveImportPath(dir: string): Promise<string> {
    const real = await realpathOrSelf(dir);

    const mod = await findGoMod(real);
    if (mod) {
      const rel = toPosixRelative(mod.moduleRoot, real);
      return rel ? `${mod.modulePath}/${rel}` : mod.modulePath;
    }

    for (const root of this.workspaceRoots) {
      const sources = path.join(root, "src");
      for (const base of new Set([sources, await realpathOrSelf(sources)])) {
        for (const candidate of new Set([dir, real])) {
          if (!isWithin(candidate, base)) continue;
          const rel = toPosixRelative(base, candidate);
          if (!rel) throw new Error(`${dir} is the workspace source root itself, not a package`);
          return rel;
        }
      }
    }

    throw new Error(`${dir} has no go.mod and is outside every workspace root (${this.workspaceRoots.join(path.delimiter)})`);
  }
}

export class GoListImportPathResolver implements ImportPathResolver {
  constructor(private readonly goBinary = "go") {}

  async resolveImportPath(dir: string): Promise<string> {
    const r = await spawnCapture(this.goBinary, ["list", "-f", "{{.ImportPath}}"], { cwd: dir });
    const importPath = r.stdout.trim().split(/\r?\n/g)[0]?.trim() ?? "";
    if (r.code !== 0 || !importPath) {
      throw new Error(`go list exited with ${r.code ?? "signal"}: ${r.stderr.trim() || "no import path"}`);
    }
    return importPath;
  }
}

export function createImportPathResolver(kind: ImportResolverKind, workspaceRoots: string[]): ImportPathResolver {
  return kind === "go_list"
    ? new GoListImportPathResolver()
    : new BuiltinImportPathResolver(workspaceRoots);
}
