/* ------------------------------------------------------------------
   Range-access diagnostics: five verbosity levels, from incomplete
   ranges (1) through access starts (3) to every physical read (4)
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

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

/** Clamp an arbitrary counter (e.g. repeated `-v` flags) to a Verbosity. */
export function toVerbosity(n: number): Verbosity {
  if (n <= 0) return 0;
  if (n === 1) return 1;
  if (n === 2) return 2;
  if (n === 3) return 3;
  return 4;
}
