// Filename: utils/log.ts

/**
 * Levelled console logger.
 * Lower numbers are more severe; a message is printed when its level is at or
 * below the active threshold (LOG_LEVEL, by name or number).
 */

export const ERR = 1;
export const WARN = 3;
export const LOG = 5;
export const INFO = 7;
export const TMI = 9;

export type LogLevel = typeof ERR | typeof WARN | typeof LOG | typeof INFO | typeof TMI;

const LEVEL_NAMES: Record<string, LogLevel> = {
  ERR,
  ERROR: ERR,
  WARN,
  LOG,
  INFO,
  TMI,
  DEBUG: TMI,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  [ERR]: 'ERR',
  [WARN]: 'WARN',
  [LOG]: 'LOG',
  [INFO]: 'INFO',
  [TMI]: 'TMI',
};

/**
 * Parses a LOG_LEVEL value. Unknown values fall back to LOG.
 */
export function parseLogLevel(value: string | undefined): number {
  if (!value) return LOG;
  const named = LEVEL_NAMES[value.trim().toUpperCase()];
  if (named !== undefined) return named;
  const numeric = Number.parseInt(value, 10);
  return Number.isNaN(numeric) ? LOG : numeric;
}

let threshold = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: number): void {
  threshold = level;
}

/**
 * Writes a message if `level` passes the current threshold.
 * @param message - Text to print (modules prefix their own emoji)
 * @param level - Severity, defaults to LOG
 */
export function log(message: string, level: LogLevel = LOG): void {
  if (level > threshold) return;

  const line = `${new Date().toISOString()} [${LEVEL_LABELS[level]}] ${message}`;
  if (level === ERR) {
    console.error(line);
  } else if (level === WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}
