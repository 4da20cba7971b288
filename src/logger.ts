import { LoggerImpl, type Logger } from "@adviser/cement";

// Scopes the caller's logger (or a fresh default one) to a module name so every
// line from a pipeline carries where it came from.
export function moduleLogger(module: string, logger?: Logger): Logger {
  return (logger ?? new LoggerImpl()).With().Module(module).Logger();
}

export type { Logger };
