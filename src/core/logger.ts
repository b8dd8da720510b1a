export type LogLevel = "error" | "warn" | "info" | "debug";

export interface Logger {
  info: (...a: unknown[]) => void;
  warn: (...a: unknown[]) => void;
  error: (...a: unknown[]) => void;
  debug: (...a: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function createConsoleLogger(prefix: string, level: LogLevel = "info"): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] <= LEVEL_ORDER[level];
  const tag = () => `[${new Date().toISOString()}] [${prefix}]`;

  return {
    info: (...a: unknown[]) => {
      if (enabled("info")) console.log(tag(), ...a);
    },
    warn: (...a: unknown[]) => {
      if (enabled("warn")) console.warn(tag(), ...a);
    },
    error: (...a: unknown[]) => {
      if (enabled("error")) console.error(tag(), ...a);
    },
    debug: (...a: unknown[]) => {
      if (enabled("debug")) console.log(tag(), "[debug]", ...a);
    },
  };
}
