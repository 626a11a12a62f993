/* ------------------------------------------------------------------
   Dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = per-round trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl <= level) sink(`${lvl}| ${msg}`);
    },
  };
}

/** Drops everything; the default for the bare encrypt/decrypt helpers. */
export const silentLogger: Logger = createLogger(0, () => undefined);
