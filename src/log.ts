import log from 'loglevel';
import chalk from 'chalk';
import * as prefix from 'loglevel-plugin-prefix';

import { LogService } from 'matrix-bot-sdk';

export type LogLevelName = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const colors: Record<string, chalk.Chalk> = {
  TRACE: chalk.magenta,
  DEBUG: chalk.cyan,
  INFO: chalk.blue,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};
prefix.reg(log);
function setupLoggerPrefix(logger: log.Logger): void {
  prefix.apply(logger, {
    format(level, name, timestamp) {
      const color = colors[level.toUpperCase()] ?? chalk.white;
      return `${chalk.gray(`[${timestamp}]`)} ${color(level)} ${chalk.green(`${name ?? 'root'}:`)}`;
    },
  });
}
setupLoggerPrefix(log);

export { log };

const setup_loggers = new WeakSet<log.Logger>();
export function getLogger(name: string): log.Logger {
  const lg = log.getLogger(name);
  if (!setup_loggers.has(lg)) {
    setupLoggerPrefix(lg);
    setup_loggers.add(lg);
  }
  return lg;
}

/**
 * Applies a level to the root logger and to every logger created so far.
 * Loggers created later inherit it from the root.
 */
export function setLogLevel(level: LogLevelName): void {
  const lv = level.toLowerCase();
  if (lv === 'trace' || lv === 'debug' || lv === 'info' || lv === 'warn' || lv === 'error') {
    log.setLevel(lv);
    for (const lg of Object.values(log.getLoggers())) {
      lg.setLevel(lv);
    }
  }
}

LogService.setLogger({
  info(module: string, ...args: unknown[]) {
    getLogger(`matrix-bot-sdk/${module}`).info(...args);
  },
  warn(module: string, ...args: unknown[]) {
    getLogger(`matrix-bot-sdk/${module}`).warn(...args);
  },
  error(module: string, ...args: unknown[]) {
    getLogger(`matrix-bot-sdk/${module}`).error(...args);
  },
  debug(module: string, ...args: unknown[]) {
    getLogger(`matrix-bot-sdk/${module}`).debug(...args);
  },
  trace(module: string, ...args: unknown[]) {
    getLogger(`matrix-bot-sdk/${module}`).trace(...args);
  },
});
