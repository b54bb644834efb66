import pino, { type Logger } from "pino";

export type LoggerFn = (msg: string, extra?: Record<string, unknown>) => void;

/**
 * 日志走 stderr：stdout 留给 usage 输出，容器构建输出直接继承终端。
 */
export function createLogger(opts?: { env?: NodeJS.ProcessEnv }): Logger {
  const env = opts?.env ?? process.env;
  const level = env.LOG_LEVEL?.trim() ? env.LOG_LEVEL.trim() : "info";

  const pretty = env.LOG_PRETTY === "1" || (env.NODE_ENV !== "production" && process.stderr.isTTY);

  const options = { name: "crossgo", level, timestamp: pino.stdTimeFunctions.isoTime };
  if (!pretty) return pino(options, pino.destination({ dest: 2, sync: true }));

  return pino(
    options,
    pino.transport({
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        translateTime: "SYS:HH:MM:ss",
        ignore: "pid,hostname,name",
        messageFormat: "{msg}",
      },
    }),
  );
}

export function toLoggerFn(logger: Logger): LoggerFn {
  return (msg, extra) => {
    if (extra) logger.info(extra, msg);
    else logger.info(msg);
  };
}
