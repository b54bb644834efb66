const DEFAULT_REGISTRY_PREFIXES = ["docker.io/library/", "index.docker.io/library/", "docker.io/", "index.docker.io/"];

/**
 * 统一镜像引用：缺省 tag 视为 latest，去掉 Docker Hub 默认 registry 前缀。
 * podman 列出来的是 docker.io/xxx，docker 列出来的是 xxx，两边要能对上。
 */
export function normalizeImageRef(ref: string): string {
  let out = ref.trim();
  for (const prefix of DEFAULT_REGISTRY_PREFIXES) {
    if (out.startsWith(prefix)) {
      out = out.slice(prefix.length);
      break;
    }
  }
  if (out.includes("@")) return out;
  const lastSegment = out.slice(out.lastIndexOf("/") + 1);
  if (!lastSegment.includes(":")) out = `${out}:latest`;
  return out;
}

export function imageListed(listing: string[], image: string): boolean {
  const wanted = normalizeImageRef(image);
  return listing.some((line) => !line.includes("<none>") && normalizeImageRef(line) === wanted);
}
