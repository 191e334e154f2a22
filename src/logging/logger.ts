import pino from "pino";

export type SirenLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

const isDev = () => process.env.NODE_ENV !== "production";

const resolveLevel = () => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === "test") return "silent";
  return isDev() ? "debug" : "info";
};

export function createLogger(bindings: Record<string, unknown> = {}) {
  const log = pino({
    level: resolveLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev() && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
  return Object.keys(bindings).length > 0 ? log.child(bindings) : log;
}
