import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function parseLogLevel(value?: string): number | undefined {
  if (!value) return undefined;

  const normalized = value.trim().toLowerCase();
  if (normalized === "") return undefined;

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

export interface LoggerOptions {
  /**
   * 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal.
   * Falls back to `FS_SANDBOX_LOG_LEVEL`, then 4.
   */
  minLevel?: number;
  type?: "pretty" | "json" | "hidden";
  name?: string;
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ type: "json", minLevel: 2 });
 * const silent = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.FS_SANDBOX_LOG_LEVEL);
  const type = options.type ?? "pretty";

  return new Logger<ILogObj>({
    name: options.name ?? "fs-sandbox",
    minLevel: options.minLevel ?? envMinLevel ?? 4,
    type,
    hideLogPositionForProduction: type !== "pretty",
    prettyLogTemplate:
      type === "pretty"
        ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}} {{logLevelName}} [{{name}}] "
        : undefined,
  });
}

export const defaultLogger = createLogger();
