import { isLocale, type Locale } from './types';

export const GAME_RULES = {
  maxLives: 3,
  bonusAccuracyThreshold: 0.8,
  questionsPerLevel: 10,
  maxDifficultyLevel: 5,
  extraTimeSeconds: 10,
  fiftyFiftyRemovals: 2,
  recentResultsWindow: 5,
  defaultBatchSize: 10,
  autoSaveIntervalMs: 30_000,
  // Per difficulty level, level 1 first; 0 means untimed.
  questionTimeLimits: [0, 20, 15, 12, 10],
  scoreMultiplierStreak: 5,
  scoreMultiplier: 2
} as const;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface DogDogConfig {
  dataDir: string;
  questionsPath: string;
  locale: Locale;
  logLevel: LogLevel;
}

export const defaultConfig: DogDogConfig = {
  dataDir: '.dogdog',
  questionsPath: 'data/questions.json',
  locale: 'en',
  logLevel: 'info'
};

const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && LOG_LEVELS.some((level) => level === value);

const nonEmpty = (value: string | undefined) => (value && value.trim() ? value.trim() : undefined);

export function resolveConfig(env: Record<string, string | undefined> = process.env): DogDogConfig {
  const locale = nonEmpty(env.DOGDOG_LOCALE)?.toLowerCase();
  const logLevel = nonEmpty(env.DOGDOG_LOG_LEVEL)?.toLowerCase();
  return {
    dataDir: nonEmpty(env.DOGDOG_DATA_DIR) ?? defaultConfig.dataDir,
    questionsPath: nonEmpty(env.DOGDOG_QUESTIONS_PATH) ?? defaultConfig.questionsPath,
    locale: isLocale(locale) ? locale : defaultConfig.locale,
    logLevel: isLogLevel(logLevel) ? logLevel : defaultConfig.logLevel
  };
}
