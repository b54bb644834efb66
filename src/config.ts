import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseToml } from "@iarna/toml";
import { z } from "zod";

import { CrossBuildError } from "./errors.js";
import { parseWorkspaceRoots } from "./workspace/workspaceRoots.js";

export const DEFAULT_IMAGE_PREFIX = "karalabe/xgo-";
export const DEFAULT_CACHE_DIRNAME = "crossgo-cache";

const runtimeSchema = z.enum(["docker", "podman", "nerdctl"]);
const importResolverSchema = z.enum(["builtin", "go_list"]);

const downloadSchema = z.object({
  timeout_seconds: z.coerce.number().int().nonnegative().default(0),
  max_bytes: z.coerce.number().int().nonnegative().default(0),
});

const configCoreSchema = z.object({
  runtime: runtimeSchema.default("docker"),
  image_prefix: z.string().min(1).default(DEFAULT_IMAGE_PREFIX),
  go_version: z.string().min(1).default("latest"),
  targets: z.string().min(1).default("*/*"),
  cache_dir: z.string().min(1).optional(),
  workspace_roots: z.array(z.string().min(1)).optional(),
  import_resolver: importResolverSchema.default("builtin"),
  download: downloadSchema.default({}),
});

const configOverrideSchema = z.object({
  runtime: runtimeSchema.optional(),
  image_prefix: z.string().min(1).optional(),
  go_version: z.string().min(1).optional(),
  targets: z.string().min(1).optional(),
  cache_dir: z.string().min(1).optional(),
  workspace_roots: z.array(z.string().min(1)).optional(),
  import_resolver: importResolverSchema.optional(),
  download: downloadSchema.partial().optional(),
});

const configFileSchema = configOverrideSchema.extend({
  profiles: z.record(z.string().min(1), configOverrideSchema).optional(),
});

export type ContainerRuntimeName = z.infer<typeof runtimeSchema>;
export type ImportResolverKind = z.infer<typeof importResolverSchema>;

type CrossConfig = z.infer<typeof configCoreSchema>;
type CrossConfigOverride = z.infer<typeof configOverrideSchema>;

export type LoadedCrossConfig = Omit<CrossConfig, "cache_dir" | "workspace_roots"> & {
  cacheDir: string;
  workspaceRoots: string[];
  configPath: string | null;
};

function mergeConfig(base: CrossConfigOverride, override: CrossConfigOverride): CrossConfigOverride {
  const merged: CrossConfigOverride = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined || key === "download") continue;
    Object.assign(merged, { [key]: value });
  }
  if (override.download) merged.download = { ...base.download, ...override.download };
  return merged;
}

function formatZodError(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

function parseWith<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.infer<T> {
  const res = schema.safeParse(data);
  if (!res.success) {
    throw new CrossBuildError("config", `invalid configuration (${label}): ${formatZodError(res.error)}`);
  }
  return res.data;
}

export function findDefaultConfigPath(cwd: string): string | null {
  for (const name of ["crossgo.toml", "crossgo.json"]) {
    const p = path.join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
}

async function readConfigFile(abs: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (err) {
    throw new CrossBuildError("config", `failed to read config file ${abs}`, err);
  }
  try {
    return path.extname(abs).toLowerCase() === ".toml" ? parseToml(raw) : JSON.parse(raw);
  } catch (err) {
    throw new CrossBuildError("config", `failed to parse config file ${abs}`, err);
  }
}

function envOverride(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.CROSSGO_RUNTIME?.trim()) out.runtime = env.CROSSGO_RUNTIME.trim();
  if (env.CROSSGO_IMAGE_PREFIX?.trim()) out.image_prefix = env.CROSSGO_IMAGE_PREFIX.trim();
  if (env.CROSSGO_CACHE_DIR?.trim()) out.cache_dir = env.CROSSGO_CACHE_DIR.trim();
  if (env.CROSSGO_IMPORT_RESOLVER?.trim()) out.import_resolver = env.CROSSGO_IMPORT_RESOLVER.trim();
  return out;
}

export async function loadConfig(
  configPath: string | null,
  opts?: { profile?: string | null; env?: NodeJS.ProcessEnv; cwd?: string },
): Promise<LoadedCrossConfig> {
  const env = opts?.env ?? process.env;
  const cwd = opts?.cwd ?? process.cwd();

  const abs = configPath ? path.resolve(cwd, configPath) : null;
  const raw = abs ? await readConfigFile(abs) : {};
  const { profiles, ...base } = parseWith(configFileSchema, raw, abs ?? "defaults");

  const profile = opts?.profile?.trim() ? opts.profile.trim() : null;
  const override = profile ? (profiles?.[profile] ?? null) : null;
  if (profile && !override) {
    throw new CrossBuildError("config", `config profile not found: ${profile}`);
  }

  const merged = override ? mergeConfig(base, override) : base;
  const fromEnv = parseWith(configOverrideSchema, envOverride(env), "environment");
  const effective = parseWith(configCoreSchema, mergeConfig(merged, fromEnv), abs ?? "defaults");

  const cacheDir = effective.cache_dir
    ? path.resolve(cwd, effective.cache_dir)
    : path.join(os.tmpdir(), DEFAULT_CACHE_DIRNAME);

  const workspaceRoots = effective.workspace_roots?.length
    ? effective.workspace_roots.map((r) => path.resolve(cwd, r))
    : parseWorkspaceRoots(env.GOPATH, { home: os.homedir() });

  const { cache_dir: _cacheDir, workspace_roots: _roots, ...rest } = effective;
  return { ...rest, cacheDir, workspaceRoots, configPath: abs };
}
