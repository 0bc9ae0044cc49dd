export * from './lib/types';
export * from './lib/config';
export * from './lib/errors';
export { log, setLogLevel, getLogLevel } from './lib/log';
export * from './lib/difficulty';
export * from './lib/checkpoints';
export * from './lib/rewards';
export * from './lib/questions';
export * from './lib/question-pool';
export * from './lib/fallback';
export * from './lib/progress';
export * from './lib/session';
export * from './lib/streaks';
export * from './lib/power-ups';
export * from './lib/kv-store';
export * from './lib/storage';
export * from './lib/game-controller';
export { createGameController } from './lib/bootstrap';
export { useGameSession } from './hooks/use-game-session';
