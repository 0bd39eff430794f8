import pino from "pino";

export function createLogger(name: string, level: string = process.env.LOG_LEVEL || "info"): pino.Logger {
  return pino({
    name,
    level,
    base: { service: "userhub" },
  });
}
