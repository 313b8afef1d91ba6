/**
 * Line logger.
 *
 * Messages carry their own `[Tag]` prefix, e.g. log('[Decommission] n3: cordoned').
 * LOG_LEVEL=debug|info|warn|error|silent (default: info).
 */

type Level = 'debug' | 'info' | 'warn' | 'error';

const RANK: Record<Level | 'silent', number> = {
  debug:  10,
  info:   20,
  warn:   30,
  error:  40,
  silent: 100,
};

function isLevelName(value: string): value is keyof typeof RANK {
  return Object.hasOwn(RANK, value);
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevelName(raw) ? RANK[raw] : RANK.info;
}

function write(level: Level, message: string): void {
  if (RANK[level] < threshold()) return;
  const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}\n`;
  if (level === 'warn' || level === 'error') {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
}

export function log(message: string): void {
  write('info', message);
}

export function debug(message: string): void {
  write('debug', message);
}

export function warn(message: string): void {
  write('warn', message);
}

export function error(message: string): void {
  write('error', message);
}
