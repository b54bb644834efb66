// src/runtime/cliRuntime.ts
import { spawn, type ChildProcess } from "node:child_process";

import type { ContainerRuntimeName } from "../config.js";

export type ContainerCli = ContainerRuntimeName;

export type CaptureResult = { code: number | null; stdout: string; stderr: string };

/**
 * 容器引擎边界。CliRuntime 是唯一的真实实现，测试里用 fake 替换。
 */
export interface ContainerEngine {
  readonly cli: string;
  assertAvailable(): Promise<void>;
  listImages(): Promise<string[]>;
  pullImage(image: string): Promise<number | null>;
  run(args: string[]): Promise<number | null>;
}

async function waitSpawned(proc: ChildProcess, cmd: string): Promise<void> {
  const spawned = await new Promise<boolean>((resolve) => {
    proc.once("spawn", () => resolve(true));
    proc.once("error", () => resolve(false));
  });
  if (!spawned) {
    proc.kill();
    throw new Error(`command not found or not executable: ${cmd}`);
  }
}

export async function spawnCapture(
  cmd: string,
  args: string[],
  opts?: { cwd?: string },
): Promise<CaptureResult> {
  const proc = spawn(cmd, args, {
    cwd: opts?.cwd,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

  let stdout = "";
  let stderr = "";
  proc.stdout?.setEncoding("utf8");
  proc.stderr?.setEncoding("utf8");
  proc.stdout?.on("data", (d) => (stdout += String(d ?? "")));
  proc.stderr?.on("data", (d) => (stderr += String(d ?? "")));

  await waitSpawned(proc, cmd);

  const code = await new Promise<number | null>((resolve) => {
    proc.once("close", (c) => resolve(c ?? null));
  });

  return { code, stdout, stderr };
}

/** Runs a command with inherited stdio; resolves to its exit code (null when killed by a signal). */
export async function spawnInherit(cmd: string, args: string[]): Promise<number | null> {
  const proc = spawn(cmd, args, { stdio: "inherit", windowsHide: true });

  await waitSpawned(proc, cmd);

  return await new Promise<number | null>((resolve) => {
    proc.once("exit", (c) => resolve(c ?? null));
  });
}

export class CliRuntime implements ContainerEngine {
  readonly cli: ContainerCli;

  constructor(cli: ContainerCli) {
    this.cli = cli;
  }

  async assertAvailable(): Promise<void> {
    // docker/podman/nerdctl 都支持 version
    const r = await spawnCapture(this.cli, ["version"]);
    if (r.code !== 0) {
      const out = `${r.stdout}\n${r.stderr}`.trim();
      throw new Error(`${this.cli} version exited with ${r.code ?? "signal"}${out ? `: ${out}` : ""}`);
    }
  }

  async listImages(): Promise<string[]> {
    const r = await spawnCapture(this.cli, [
      "images",
      "--no-trunc",
      "--format",
      "{{.Repository}}:{{.Tag}}",
    ]);
    if (r.code !== 0) {
      throw new Error(`${this.cli} images exited with ${r.code ?? "signal"}: ${r.stderr.trim()}`);
    }
    return r.stdout
      .split(/\r?\n/g)
      .map((l) => l.trim())
      .filter(Boolean);
  }

  async pullImage(image: string): Promise<number | null> {
    return await spawnInherit(this.cli, ["pull", image]);
  }

  async run(args: string[]): Promise<number | null> {
    return await spawnInherit(this.cli, ["run", ...args]);
  }
}
