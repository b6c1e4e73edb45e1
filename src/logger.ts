/**
 * Console logging for ghreq.
 *
 * All ghreq output goes through `log`; modules never call console directly.
 * Secrets must be passed through maskSecret() before they reach a log call.
 * The installer's own output is inherited and not affected by the level.
 */

import pc from "picocolors";

/** Minimum severity that is printed. SILENT prints nothing. */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

let threshold = LogLevel.INFO;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/**
 * `--quiet`: nothing from ghreq is printed, not even errors.
 * Only the exit code reports the outcome.
 */
export function enableQuietMode(): void {
  threshold = LogLevel.SILENT;
}

type Paint = (text: string) => string;

const plain: Paint = (text) => text;

function emitter(level: LogLevel, stream: "out" | "warn" | "err", paint: Paint) {
  return (message: string): void => {
    if (threshold > level) {return;}
    const line = paint(message);
    if (stream === "err") {
      console.error(line);
    } else if (stream === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
}

/**
 * Level-aware logger.
 *
 * debug/dim print dimmed; warn (yellow) and error (red) go to stderr.
 */
export const log = {
  debug: emitter(LogLevel.DEBUG, "out", pc.dim),
  info: emitter(LogLevel.INFO, "out", plain),
  dim: emitter(LogLevel.INFO, "out", pc.dim),
  success: emitter(LogLevel.INFO, "out", pc.green),
  warn: emitter(LogLevel.WARN, "warn", pc.yellow),
  error: emitter(LogLevel.ERROR, "err", pc.red),
  newline(): void {
    emitter(LogLevel.INFO, "out", plain)("");
  },
};

/** Inline styling for parts of a raw line. */
export const style = {
  cyan: (text: string) => pc.cyan(text),
};
