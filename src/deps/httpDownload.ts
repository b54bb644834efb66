import fsp from "node:fs/promises";
import path from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";

import { describeCause } from "../errors.js";

export type DownloadPhase = "create" | "request" | "copy";

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly phase: DownloadPhase,
    cause?: unknown,
  ) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = "DownloadError";
  }
}

/**
 * GET `url` into `destFile`. The body goes to a temp sibling first and is renamed
 * into place only after the copy finished, so `destFile` is either absent or complete.
 * `timeoutMs` / `maxBytes` of 0 mean unlimited.
 */
export async function downloadToFile(opts: {
  url: string;
  destFile: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxBytes?: number;
}): Promise<{ bytes: number }> {
  const destFile = path.resolve(opts.destFile);
  const tmp = `${destFile}.tmp-${Math.random().toString(16).slice(2)}`;

  let handle: fsp.FileHandle;
  try {
    handle = await fsp.open(tmp, "w");
  } catch (err) {
    throw new DownloadError(`failed to create file ${tmp}`, "create", err);
  }

  const ctrl = new AbortController();
  const timeoutMs = Math.max(0, Math.floor(Number(opts.timeoutMs ?? 0)) || 0);
  const timer = timeoutMs > 0 ? setTimeout(() => ctrl.abort(), timeoutMs) : null;
  timer?.unref();

  try {
    const maxBytesRaw = Number(opts.maxBytes ?? 0);
    const maxBytes = Number.isFinite(maxBytesRaw) ? Math.max(0, Math.floor(maxBytesRaw)) : 0;

    let res: Response;
    try {
      res = await fetch(opts.url, { headers: opts.headers, signal: ctrl.signal });
    } catch (err) {
      throw new DownloadError(`request failed for ${opts.url}`, "request", err);
    }
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new DownloadError(`request failed for ${opts.url}: ${res.status} ${text}`.trim(), "request");
    }

    const contentLengthRaw = res.headers.get("content-length")?.trim() ?? "";
    const contentLength = contentLengthRaw ? Number(contentLengthRaw) : NaN;
    if (maxBytes > 0 && Number.isFinite(contentLength) && contentLength > maxBytes) {
      throw new DownloadError(
        `download too large: contentLength=${contentLength} maxBytes=${maxBytes}`,
        "request",
      );
    }

    let downloaded = 0;
    const limiter = new Transform({
      transform(chunk: Buffer, _enc, cb) {
        downloaded += chunk.length;
        if (maxBytes > 0 && downloaded > maxBytes) {
          cb(new Error(`download too large: maxBytes=${maxBytes}`));
          return;
        }
        cb(null, chunk);
      },
    });

    try {
      await pipeline(
        // 204 之类没有 body 的响应按空文件缓存
        res.body ? Readable.fromWeb(res.body) : Readable.from([]),
        limiter,
        handle.createWriteStream(),
      );
    } catch (err) {
      throw new DownloadError(`failed to copy body of ${opts.url}`, "copy", err);
    }

    await fsp.rename(tmp, destFile);
    return { bytes: downloaded };
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fsp.unlink(tmp).catch(() => undefined);
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
  }
}
