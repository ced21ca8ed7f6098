// ---------------------------------------------------------------------------
// Subsystem loggers
// ---------------------------------------------------------------------------
// Each module logs under its own subsystem tag. Lines go to stderr so stdout
// stays reserved for the module's single JSON result line.
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type SubsystemLogger = {
  subsystem: string;
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  child: (name: string) => SubsystemLogger;
};

export type SubsystemLoggerOptions = {
  level?: LogLevel;
  write?: (line: string) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/** The more verbose of `level` and the level implied by a `-v` count. */
export function levelForVerbosity(level: LogLevel, verbosity: number): LogLevel {
  const implied: LogLevel = verbosity >= 3 ? "debug" : verbosity >= 1 ? "info" : level;
  return LEVEL_RANK[implied] > LEVEL_RANK[level] ? implied : level;
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

export function createSubsystemLogger(
  subsystem: string,
  opts: SubsystemLoggerOptions = {},
): SubsystemLogger {
  const threshold = LEVEL_RANK[opts.level ?? "warn"];
  const write = opts.write ?? writeStderr;

  const emit = (level: Exclude<LogLevel, "silent">, msg: string) => {
    if (LEVEL_RANK[level] > threshold) {
      return;
    }
    write(`[${subsystem}] ${level} ${msg}`);
  };

  return {
    subsystem,
    debug: (msg) => emit("debug", msg),
    info: (msg) => emit("info", msg),
    warn: (msg) => emit("warn", msg),
    error: (msg) => emit("error", msg),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`, opts),
  };
}

/** Logger that drops everything; the default when a caller injects none. */
export const silentLogger: SubsystemLogger = createSubsystemLogger("silent", { level: "silent" });
