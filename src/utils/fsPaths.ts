import { realpath } from "node:fs/promises";
import path from "node:path";

/** True when `target` equals `base` or sits below it (segment boundary, not string prefix). */
export function isWithin(target: string, base: string): boolean {
  const rel = path.relative(base, target);
  if (!rel) return true;
  if (path.isAbsolute(rel)) return false;
  return rel.split(path.sep)[0] !== "..";
}

export async function realpathOrSelf(p: string): Promise<string> {
  return await realpath(p).catch(() => p);
}

export function toPosixRelative(from: string, to: string): string {
  return path.relative(from, to).split(path.sep).join("/");
}
