import { LOG_LEVELS, resolveConfig, type LogLevel } from './config';

let currentLevel: LogLevel = resolveConfig().logLevel;

const enabled = (level: Exclude<LogLevel, 'silent'>) => LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);

export const setLogLevel = (level: LogLevel) => {
  currentLevel = level;
};

export const getLogLevel = () => currentLevel;

export const log = {
  debug: (message: string, ...details: unknown[]) => {
    if (enabled('debug')) console.debug(`[dogdog] ${message}`, ...details);
  },
  info: (message: string, ...details: unknown[]) => {
    if (enabled('info')) console.info(`[dogdog] ${message}`, ...details);
  },
  warn: (message: string, ...details: unknown[]) => {
    if (enabled('warn')) console.warn(`[dogdog] ${message}`, ...details);
  },
  error: (message: string, ...details: unknown[]) => {
    if (enabled('error')) console.error(`[dogdog] ${message}`, ...details);
  }
};
