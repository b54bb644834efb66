export type CrossBuildStage =
  | "usage"
  | "config"
  | "environment"
  | "image"
  | "dependency"
  | "workspace"
  | "invocation";

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause ?? "unknown error");
}

/**
 * 所有致命错误都走这里：message 一行，包含失败步骤和底层原因。
 * stage 只用于日志，不影响退出码。
 */
export class CrossBuildError extends Error {
  readonly stage: CrossBuildStage;

  constructor(stage: CrossBuildStage, message: string, cause?: unknown) {
    if (cause === undefined) {
      super(message);
    } else {
      super(`${message}: ${describeCause(cause)}`, { cause });
    }
    this.name = "CrossBuildError";
    this.stage = stage;
  }
}

export function isCrossBuildError(err: unknown): err is CrossBuildError {
  return err instanceof CrossBuildError;
}
