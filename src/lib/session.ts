import { GAME_RULES } from './config';
import { emptyBundle } from './rewards';
import { updateAnswerStreak } from './streaks';
import type { GameSession, PathProgress, PathType, PowerUpType, SessionSummary } from './types';

const clampLives = (lives: number) => Math.min(GAME_RULES.maxLives, Math.max(0, Math.floor(lives)));

export const startGameSession = (pathType: PathType, now = new Date()): GameSession => ({
  pathType,
  livesRemaining: GAME_RULES.maxLives,
  currentQuestionId: null,
  sessionQuestionIds: [],
  powerUpsUsed: emptyBundle(),
  currentStreak: 0,
  bestStreak: 0,
  recentResults: [],
  isPaused: false,
  sessionTimeSpent: 0,
  sessionStart: now.toISOString(),
  score: 0,
  timeRemaining: 0
});

export const timeLimitForLevel = (level: number): number => {
  const limits = GAME_RULES.questionTimeLimits;
  return limits[Math.min(limits.length, Math.max(1, Math.floor(level))) - 1];
};

export const scoreMultiplier = (streak: number) =>
  streak >= GAME_RULES.scoreMultiplierStreak ? GAME_RULES.scoreMultiplier : 1;

export const presentQuestion = (session: GameSession, questionId: string | null, timeLimit = 0): GameSession => ({
  ...session,
  currentQuestionId: questionId,
  timeRemaining: questionId ? Math.max(0, Math.floor(timeLimit)) : 0
});

export const addScore = (session: GameSession, points: number): GameSession => ({
  ...session,
  score: session.score + Math.max(0, Math.floor(points))
});

/** Runs the question clock down; untimed questions and paused sessions are left alone. */
export const countDown = (session: GameSession, seconds: number): GameSession => {
  if (session.isPaused || session.timeRemaining <= 0 || !Number.isFinite(seconds) || seconds < 1) return session;
  return { ...session, timeRemaining: Math.max(0, session.timeRemaining - Math.floor(seconds)) };
};

export const addQuestionTime = (session: GameSession, seconds: number): GameSession => ({
  ...session,
  timeRemaining: session.timeRemaining + Math.max(0, Math.floor(seconds))
});

export const trimRecentResults = (results: boolean[], max: number = GAME_RULES.recentResultsWindow) => results.slice(-max);

export function recordOutcome(session: GameSession, questionId: string, correct: boolean): GameSession {
  return {
    ...updateAnswerStreak(session, correct),
    sessionQuestionIds: session.sessionQuestionIds.includes(questionId)
      ? session.sessionQuestionIds
      : [...session.sessionQuestionIds, questionId],
    recentResults: trimRecentResults([...session.recentResults, correct])
  };
}

export const recentMistakes = (session: GameSession) => session.recentResults.filter((result) => !result).length;

export const loseLife = (session: GameSession): GameSession => ({
  ...session,
  livesRemaining: clampLives(session.livesRemaining - 1)
});

export const gainLife = (session: GameSession): GameSession => ({
  ...session,
  livesRemaining: clampLives(session.livesRemaining + 1)
});

export const restoreLives = (session: GameSession, lives: number): GameSession => ({
  ...session,
  livesRemaining: clampLives(lives),
  currentStreak: 0,
  recentResults: []
});

export const markPowerUpUsed = (session: GameSession, type: PowerUpType): GameSession => ({
  ...session,
  powerUpsUsed: { ...session.powerUpsUsed, [type]: session.powerUpsUsed[type] + 1 }
});

export const setPaused = (session: GameSession, isPaused: boolean): GameSession => ({ ...session, isPaused });

export const addSessionTime = (session: GameSession, seconds: number): GameSession => {
  if (session.isPaused || !Number.isFinite(seconds) || seconds <= 0) return session;
  return { ...session, sessionTimeSpent: session.sessionTimeSpent + Math.floor(seconds) };
};

export const isGameOver = (session: GameSession) => session.livesRemaining <= 0;

export const sessionSummary = (session: GameSession, progressBefore: PathProgress | null, progressAfter: PathProgress): SessionSummary => ({
  pathType: session.pathType,
  questionsAnswered: progressAfter.totalQuestions - (progressBefore?.totalQuestions ?? 0),
  correctAnswers: progressAfter.correctAnswers - (progressBefore?.correctAnswers ?? 0),
  timeSpent: session.sessionTimeSpent,
  bestStreak: session.bestStreak,
  score: session.score,
  pathCompleted: progressAfter.isCompleted && !(progressBefore?.isCompleted ?? false)
});
