import path from "node:path";

/**
 * GOPATH 风格的 root 列表：按宿主机 path-list 分隔符切分，丢弃空项。
 * 为空时回落到 Go 的默认值 <home>/go。
 */
export function parseWorkspaceRoots(
  raw: string | undefined,
  opts: { home: string; delimiter?: string },
): string[] {
  const delimiter = opts.delimiter ?? path.delimiter;
  const roots = String(raw ?? "")
    .split(delimiter)
    .map((r) => r.trim())
    .filter(Boolean);
  if (roots.length) return roots;
  return [path.join(opts.home, "go")];
}
