import pc from "picocolors";

export type Colors = ReturnType<typeof pc.createColors>;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly meta?: Record<string, unknown>;
}

export type Logger = (e: LogEntry) => void;

/**
 * Leveled console logger: `[LEVEL] message {meta}`. Writes to stderr so that
 * command output on stdout stays pipeable; debug lines need `verbose`.
 */
export function consoleLogger(
  init?: {
    verbose?: boolean;
    colors?: Colors;
    sink?: (line: string) => void;
  },
): Logger {
  const colors = init?.colors ?? pc;
  const sink = init?.sink ?? ((line: string) => console.error(line));
  const tint: Record<LogLevel, (s: string) => string> = {
    debug: colors.gray,
    info: colors.cyan,
    warn: colors.yellow,
    error: colors.red,
  };

  return (e) => {
    if (e.level === "debug" && !init?.verbose) return;
    const tag = e.level.toUpperCase().padEnd(5);
    const meta = e.meta ? ` ${colors.gray(JSON.stringify(e.meta))}` : "";
    sink(`${colors.bold(tint[e.level](`[${tag}]`))} ${e.msg}${meta}`);
  };
}
