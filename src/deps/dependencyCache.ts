import { access, mkdir } from "node:fs/promises";
import path from "node:path";

import { CrossBuildError } from "../errors.js";
import type { LoggerFn } from "../logger.js";
import { downloadToFile } from "./httpDownload.js";

export type CacheStatus = "cached" | "downloaded";

export type CacheEntry = {
  ref: string;
  path: string;
  status: CacheStatus;
};

export type DependencyCacheOpts = {
  dir: string;
  log: LoggerFn;
  timeoutMs?: number;
  maxBytes?: number;
};

/** Splits a space separated dependency list, dropping blank entries. */
export function splitDependencyRefs(raw: string): string[] {
  return raw
    .split(/\s+/g)
    .map((r) => r.trim())
    .filter(Boolean);
}

/**
 * 缓存文件名 = 引用的最后一段（和容器镜像里查找 /deps-cache/<name> 的规则一致）。
 */
export function cacheFileName(ref: string): string {
  const name = path.posix.basename(ref.trim());
  if (!name || name === "." || name === ".." || name.includes("\\")) {
    throw new CrossBuildError("dependency", `cannot derive a cache file name from dependency ${ref}`);
  }
  return name;
}

async function exists(p: string): Promise<boolean> {
  return await access(p).then(
    () => true,
    () => false,
  );
}

/**
 * Append-only on-disk cache of dependency archives, keyed by file name.
 * Never evicts; a name that is already present is never fetched again.
 */
export class DependencyCache {
  private readonly opts: DependencyCacheOpts;

  constructor(opts: DependencyCacheOpts) {
    this.opts = opts;
  }

  get dir(): string {
    return this.opts.dir;
  }

  async ensurePresent(rawRefs: string): Promise<CacheEntry[]> {
    const refs = splitDependencyRefs(rawRefs);
    if (!refs.length) return [];

    try {
      await mkdir(this.opts.dir, { recursive: true, mode: 0o751 });
    } catch (err) {
      throw new CrossBuildError("dependency", `failed to create dependency cache ${this.opts.dir}`, err);
    }

    const out: CacheEntry[] = [];
    for (const ref of refs) {
      out.push(await this.ensureOne(ref));
    }
    return out;
  }

  private async ensureOne(ref: string): Promise<CacheEntry> {
    const file = path.join(this.opts.dir, cacheFileName(ref));

    if (await exists(file)) {
      this.opts.log("dependency already cached", { ref, path: file });
      return { ref, path: file, status: "cached" };
    }

    this.opts.log("downloading new dependency", { ref });
    try {
      const { bytes } = await downloadToFile({
        url: ref,
        destFile: file,
        timeoutMs: this.opts.timeoutMs,
        maxBytes: this.opts.maxBytes,
      });
      this.opts.log("new dependency cached", { ref, path: file, bytes });
    } catch (err) {
      throw new CrossBuildError("dependency", `failed to cache dependency ${ref}`, err);
    }
    return { ref, path: file, status: "downloaded" };
  }
}
