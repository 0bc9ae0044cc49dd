import { describe, expect, it } from 'vitest';
import { consolationRewardsFor } from '../lib/fallback';
import {
  addPowerUps,
  applyFallback,
  completeCheckpointOnProgress,
  consumePowerUp,
  createPathProgress,
  currentAccuracy,
  defaultGlobalStats,
  recordAnswer,
  segmentAccuracy,
  updateGlobalStats
} from '../lib/progress';
import { emptyBundle } from '../lib/rewards';
import type { FallbackResult } from '../lib/types';

const now = new Date('2026-03-01T10:00:00Z');

describe('path progress', () => {
  it('records answers once per id while counting every attempt', () => {
    let progress = createPathProgress('dogBreeds', now);
    progress = recordAnswer(progress, { questionId: 'q1', correct: true, timeSpent: 5 }, now);
    progress = recordAnswer(progress, { questionId: 'q2', correct: false }, now);
    progress = recordAnswer(progress, { questionId: 'q1', correct: true }, now);

    expect(progress.answeredQuestionIds).toEqual(['q1', 'q2']);
    expect(progress.correctAnswers).toBe(2);
    expect(progress.totalQuestions).toBe(3);
    expect(progress.trackCorrect).toBe(2);
    expect(progress.bestAccuracy).toBe(1);
    expect(progress.totalTimeSpent).toBe(5);
    expect(currentAccuracy(progress)).toBeCloseTo(2 / 3, 10);
    expect(segmentAccuracy(progress)).toBeCloseTo(2 / 3, 10);
  });

  it('starts a new accuracy segment at each checkpoint', () => {
    let progress = createPathProgress('dogBreeds', now);
    for (let i = 0; i < 10; i += 1) progress = recordAnswer(progress, { questionId: `q${i}`, correct: true }, now);
    const completed = completeCheckpointOnProgress(progress, 'chihuahua', now);
    expect(completed.currentCheckpoint).toBe('chihuahua');
    expect(completed.completedCheckpoints).toEqual(['chihuahua']);
    expect(completed.segmentTotal).toBe(0);
    expect(completed.trackCorrect).toBe(10);
    expect(completeCheckpointOnProgress(completed, 'chihuahua', now)).toBe(completed);
  });

  it('marks the path complete after the last stop', () => {
    let progress = createPathProgress('dogBreeds', now);
    for (const checkpoint of ['chihuahua', 'pug', 'cockerSpaniel', 'germanShepherd'] as const) {
      progress = completeCheckpointOnProgress(progress, checkpoint, now);
    }
    expect(progress.isCompleted).toBe(false);
    progress = completeCheckpointOnProgress(progress, 'greatDane', now);
    expect(progress.isCompleted).toBe(true);
  });

  it('only spends power-ups that are in stock', () => {
    const empty = createPathProgress('dogHealth', now);
    expect(consumePowerUp(empty, 'hint')).toEqual({ progress: empty, used: false });
    const stocked = addPowerUps(empty, { hint: 1 });
    const { progress, used } = consumePowerUp(stocked, 'hint');
    expect(used).toBe(true);
    expect(progress.powerUpInventory.hint).toBe(0);
  });
});

describe('applyFallback', () => {
  const atPug = () => {
    let progress = createPathProgress('dogBreeds', now);
    progress = completeCheckpointOnProgress(progress, 'chihuahua', now);
    progress = completeCheckpointOnProgress(progress, 'pug', now);
    return { ...progress, trackCorrect: 31, segmentCorrect: 4, segmentTotal: 6 };
  };

  it('moves the track back to the checkpoint threshold and keeps completions', () => {
    const result: FallbackResult = {
      kind: 'resetToCheckpoint',
      checkpoint: 'pug',
      restoredLives: 3,
      awardedPowerUps: consolationRewardsFor('pug'),
      message: 'back to pug'
    };
    const progress = applyFallback(atPug(), result, now);
    expect(progress.trackCorrect).toBe(25);
    expect(progress.completedCheckpoints).toEqual(['chihuahua', 'pug']);
    expect(progress.segmentTotal).toBe(0);
    expect(progress.fallbackCount).toBe(1);
    expect(progress.powerUpInventory).toEqual({ fiftyFifty: 1, hint: 1, extraTime: 1, skip: 1, secondChance: 1 });
  });

  it('restarts the track from zero', () => {
    const result: FallbackResult = {
      kind: 'restartFromBeginning',
      restoredLives: 3,
      awardedPowerUps: emptyBundle(),
      message: 'again'
    };
    expect(applyFallback(atPug(), result, now).trackCorrect).toBe(0);
  });

  it('leaves progress untouched on an error decision', () => {
    const progress = atPug();
    expect(applyFallback(progress, { kind: 'error', reason: 'no_active_path', message: 'none' }, now)).toBe(progress);
  });
});

describe('global stats', () => {
  it('accumulates sessions and tracks the favourite path', () => {
    let stats = updateGlobalStats(
      defaultGlobalStats(),
      { pathType: 'dogHealth', questionsAnswered: 10, correctAnswers: 8, timeSpent: 120, bestStreak: 5, score: 150, pathCompleted: false },
      now
    );
    expect(stats.totalGameSessions).toBe(1);
    expect(stats.bestOverallAccuracy).toBeCloseTo(0.8, 10);
    expect(stats.favoritePath).toBe('dogHealth');
    expect(stats.dailyStreak).toBe(1);
    expect(stats.lastPlayDate).toBe('2026-03-01T10:00:00.000Z');

    stats = updateGlobalStats(
      stats,
      { pathType: 'dogBreeds', questionsAnswered: 10, correctAnswers: 4, timeSpent: 60, bestStreak: 2, score: 40, pathCompleted: true },
      new Date('2026-03-02T10:00:00Z')
    );
    expect(stats.totalQuestionsAnswered).toBe(20);
    expect(stats.totalCorrectAnswers).toBe(12);
    expect(stats.totalTimeSpent).toBe(180);
    expect(stats.pathsCompleted).toBe(1);
    expect(stats.bestOverallAccuracy).toBeCloseTo(0.8, 10);
    expect(stats.longestStreak).toBe(5);
    expect(stats.favoritePath).toBe('dogBreeds');
    expect(stats.dailyStreak).toBe(2);
  });
});
