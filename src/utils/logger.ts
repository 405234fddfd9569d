const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
} as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

function enabled(level: Exclude<LogLevel, 'silent'>) {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function timestamp() {
  return new Date().toISOString().slice(11, 19);
}

function line(color: string, tag: string, message: string) {
  return `${COLORS.cyan}[${timestamp()}]${COLORS.reset} ${color}[${tag}]${COLORS.reset} ${message}`;
}

export const logger = {
  debug(tag: string, message: string) {
    if (enabled('debug')) console.log(line(COLORS.gray, tag, message));
  },
  info(tag: string, message: string) {
    if (enabled('info')) console.log(line(COLORS.blue, tag, message));
  },
  success(tag: string, message: string) {
    if (enabled('info')) console.log(line(COLORS.green, tag, message));
  },
  warn(tag: string, message: string) {
    if (enabled('warn')) console.warn(line(COLORS.yellow, tag, message));
  },
  error(tag: string, message: string, err?: unknown) {
    if (!enabled('error')) return;
    console.error(line(COLORS.red, tag, message));
    if (err instanceof Error) console.error(`  ${err.stack ?? err.message}`);
  },
};
