export type Difficulty = 'easy' | 'medium' | 'hard' | 'expert';

export type PowerUpType = 'fiftyFifty' | 'hint' | 'extraTime' | 'skip' | 'secondChance';

export type PathType = 'dogBreeds' | 'dogTraining' | 'dogBehavior' | 'dogHealth' | 'dogHistory';

export type Checkpoint = 'chihuahua' | 'pug' | 'cockerSpaniel' | 'germanShepherd' | 'greatDane' | 'deutscheDogge';

export type Locale = 'en' | 'de' | 'es';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard', 'expert'];
export const POWER_UP_TYPES: readonly PowerUpType[] = ['fiftyFifty', 'hint', 'extraTime', 'skip', 'secondChance'];
export const PATH_TYPES: readonly PathType[] = ['dogBreeds', 'dogTraining', 'dogBehavior', 'dogHealth', 'dogHistory'];
export const CHECKPOINTS: readonly Checkpoint[] = [
  'chihuahua',
  'pug',
  'cockerSpaniel',
  'germanShepherd',
  'greatDane',
  'deutscheDogge'
];
export const LOCALES: readonly Locale[] = ['en', 'de', 'es'];

export type LocalizedText = Partial<Record<Locale, string>>;
export type LocalizedList = Partial<Record<Locale, string[]>>;

export interface Question {
  id: string;
  category: PathType;
  difficulty: Difficulty;
  text: LocalizedText;
  answers: LocalizedList;
  correctAnswerIndex: number;
  hint: LocalizedText;
  funFact: LocalizedText;
  points: number;
  tags: string[];
}

export type DifficultyWeights = Record<Difficulty, number>;

export type RewardBundle = Record<PowerUpType, number>;

export interface PathProgress {
  pathType: PathType;
  currentCheckpoint: Checkpoint | null;
  completedCheckpoints: Checkpoint[];
  answeredQuestionIds: string[];
  powerUpInventory: RewardBundle;
  correctAnswers: number;
  totalQuestions: number;
  trackCorrect: number;
  segmentCorrect: number;
  segmentTotal: number;
  bestAccuracy: number;
  totalTimeSpent: number;
  fallbackCount: number;
  lastPlayed: string;
  isCompleted: boolean;
}

export interface GameSession {
  pathType: PathType;
  livesRemaining: number;
  currentQuestionId: string | null;
  sessionQuestionIds: string[];
  powerUpsUsed: RewardBundle;
  currentStreak: number;
  bestStreak: number;
  recentResults: boolean[];
  isPaused: boolean;
  sessionTimeSpent: number;
  sessionStart: string;
  score: number;
  // Seconds left on the current question; 0 when it has no time limit.
  timeRemaining: number;
}

export type FallbackResult =
  | {
      kind: 'resetToCheckpoint';
      checkpoint: Checkpoint;
      restoredLives: number;
      awardedPowerUps: RewardBundle;
      message: string;
    }
  | {
      kind: 'restartFromBeginning';
      restoredLives: number;
      awardedPowerUps: RewardBundle;
      message: string;
    }
  | {
      kind: 'error';
      reason: 'no_active_path' | 'unknown_path' | 'lives_remaining';
      message: string;
    };

export interface GlobalStats {
  totalQuestionsAnswered: number;
  totalCorrectAnswers: number;
  totalTimeSpent: number;
  totalGameSessions: number;
  pathsCompleted: number;
  bestOverallAccuracy: number;
  longestStreak: number;
  pathPlayCounts: Record<PathType, number>;
  favoritePath: PathType | null;
  lastPlayDate: string | null;
  dailyStreak: number;
  longestDailyStreak: number;
}

export interface SessionSummary {
  pathType: PathType;
  questionsAnswered: number;
  correctAnswers: number;
  timeSpent: number;
  bestStreak: number;
  score: number;
  pathCompleted: boolean;
}

const isOneOf = <T extends string>(values: readonly T[]) => {
  const allowed: readonly string[] = values;
  return (value: unknown): value is T => typeof value === 'string' && allowed.includes(value);
};

export const isDifficulty = isOneOf(DIFFICULTIES);
export const isPowerUpType = isOneOf(POWER_UP_TYPES);
export const isPathType = isOneOf(PATH_TYPES);
export const isCheckpoint = isOneOf(CHECKPOINTS);
export const isLocale = isOneOf(LOCALES);
