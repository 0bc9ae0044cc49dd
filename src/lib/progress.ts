import { CheckpointTrack } from './checkpoints';
import { emptyBundle, mergeBundles } from './rewards';
import { updateDailyStreak } from './streaks';
import {
  PATH_TYPES,
  type Checkpoint,
  type FallbackResult,
  type GlobalStats,
  type PathProgress,
  type PathType,
  type PowerUpType,
  type RewardBundle,
  type SessionSummary
} from './types';

export const createPathProgress = (pathType: PathType, now = new Date()): PathProgress => ({
  pathType,
  currentCheckpoint: null,
  completedCheckpoints: [],
  answeredQuestionIds: [],
  powerUpInventory: emptyBundle(),
  correctAnswers: 0,
  totalQuestions: 0,
  trackCorrect: 0,
  segmentCorrect: 0,
  segmentTotal: 0,
  bestAccuracy: 0,
  totalTimeSpent: 0,
  fallbackCount: 0,
  lastPlayed: now.toISOString(),
  isCompleted: false
});

export const currentAccuracy = (progress: PathProgress) =>
  progress.totalQuestions === 0 ? 0 : progress.correctAnswers / progress.totalQuestions;

export const segmentAccuracy = (progress: PathProgress) =>
  progress.segmentTotal === 0 ? 0 : progress.segmentCorrect / progress.segmentTotal;

export const trackFor = (progress: PathProgress) =>
  CheckpointTrack.forPath(progress.pathType, progress.completedCheckpoints);

export const exclusionSet = (progress: PathProgress): Set<string> => new Set(progress.answeredQuestionIds);

export type AnswerRecord = {
  questionId: string;
  correct: boolean;
  timeSpent?: number;
};

export function recordAnswer(progress: PathProgress, answer: AnswerRecord, now = new Date()): PathProgress {
  const answeredQuestionIds = progress.answeredQuestionIds.includes(answer.questionId)
    ? progress.answeredQuestionIds
    : [...progress.answeredQuestionIds, answer.questionId];
  const correctAnswers = progress.correctAnswers + (answer.correct ? 1 : 0);
  const totalQuestions = progress.totalQuestions + 1;
  return {
    ...progress,
    answeredQuestionIds,
    correctAnswers,
    totalQuestions,
    trackCorrect: progress.trackCorrect + (answer.correct ? 1 : 0),
    segmentCorrect: progress.segmentCorrect + (answer.correct ? 1 : 0),
    segmentTotal: progress.segmentTotal + 1,
    bestAccuracy: Math.max(progress.bestAccuracy, correctAnswers / totalQuestions),
    totalTimeSpent: progress.totalTimeSpent + Math.max(0, Math.floor(answer.timeSpent ?? 0)),
    lastPlayed: now.toISOString()
  };
}

export function completeCheckpointOnProgress(progress: PathProgress, checkpoint: Checkpoint, now = new Date()): PathProgress {
  const track = trackFor(progress);
  if (!track.completeCheckpoint(checkpoint)) return progress;
  return {
    ...progress,
    currentCheckpoint: track.currentCheckpoint,
    completedCheckpoints: track.completed,
    segmentCorrect: 0,
    segmentTotal: 0,
    isCompleted: track.isComplete,
    lastPlayed: now.toISOString()
  };
}

export const addPowerUps = (progress: PathProgress, rewards: Partial<RewardBundle>): PathProgress => ({
  ...progress,
  powerUpInventory: mergeBundles(progress.powerUpInventory, rewards)
});

export function consumePowerUp(progress: PathProgress, type: PowerUpType): { progress: PathProgress; used: boolean } {
  if (progress.powerUpInventory[type] <= 0) return { progress, used: false };
  return {
    progress: { ...progress, powerUpInventory: { ...progress.powerUpInventory, [type]: progress.powerUpInventory[type] - 1 } },
    used: true
  };
}

export function applyFallback(progress: PathProgress, result: FallbackResult, now = new Date()): PathProgress {
  if (result.kind === 'error') return progress;
  const track = trackFor(progress);
  const trackCorrect = result.kind === 'resetToCheckpoint' ? track.thresholdOf(result.checkpoint) ?? 0 : 0;
  return {
    ...addPowerUps(progress, result.awardedPowerUps),
    trackCorrect,
    segmentCorrect: 0,
    segmentTotal: 0,
    fallbackCount: progress.fallbackCount + 1,
    lastPlayed: now.toISOString()
  };
}

export const defaultGlobalStats = (): GlobalStats => ({
  totalQuestionsAnswered: 0,
  totalCorrectAnswers: 0,
  totalTimeSpent: 0,
  totalGameSessions: 0,
  pathsCompleted: 0,
  bestOverallAccuracy: 0,
  longestStreak: 0,
  pathPlayCounts: { dogBreeds: 0, dogTraining: 0, dogBehavior: 0, dogHealth: 0, dogHistory: 0 },
  favoritePath: null,
  lastPlayDate: null,
  dailyStreak: 0,
  longestDailyStreak: 0
});

const favoriteOf = (counts: Record<PathType, number>): PathType | null => {
  let favorite: PathType | null = null;
  let best = 0;
  for (const path of PATH_TYPES) {
    if (counts[path] > best) {
      best = counts[path];
      favorite = path;
    }
  }
  return favorite;
};

export function updateGlobalStats(stats: GlobalStats, summary: SessionSummary, now = new Date()): GlobalStats {
  const totalQuestionsAnswered = stats.totalQuestionsAnswered + summary.questionsAnswered;
  const totalCorrectAnswers = stats.totalCorrectAnswers + summary.correctAnswers;
  const pathPlayCounts = { ...stats.pathPlayCounts, [summary.pathType]: stats.pathPlayCounts[summary.pathType] + 1 };
  const overall = totalQuestionsAnswered > 0 ? totalCorrectAnswers / totalQuestionsAnswered : 0;
  return updateDailyStreak(
    {
      ...stats,
      totalQuestionsAnswered,
      totalCorrectAnswers,
      totalTimeSpent: stats.totalTimeSpent + summary.timeSpent,
      totalGameSessions: stats.totalGameSessions + 1,
      pathsCompleted: stats.pathsCompleted + (summary.pathCompleted ? 1 : 0),
      bestOverallAccuracy: Math.max(stats.bestOverallAccuracy, overall),
      longestStreak: Math.max(stats.longestStreak, summary.bestStreak),
      pathPlayCounts,
      favoritePath: favoriteOf(pathPlayCounts)
    },
    now
  );
}
