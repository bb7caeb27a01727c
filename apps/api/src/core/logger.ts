import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string, name = "backhaul"): Logger {
  return pino({
    name,
    level,
    redact: {
      paths: ["password", "*.password", "options.*", "*.secretAccessKey", "*.applicationKey", "*.token"],
      censor: "[redacted]"
    }
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
