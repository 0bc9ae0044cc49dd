import { describe, expect, it } from 'vitest';
import { createPathProgress, recordAnswer } from '../lib/progress';
import {
  addQuestionTime,
  addScore,
  addSessionTime,
  countDown,
  gainLife,
  isGameOver,
  loseLife,
  markPowerUpUsed,
  presentQuestion,
  recentMistakes,
  recordOutcome,
  restoreLives,
  scoreMultiplier,
  sessionSummary,
  setPaused,
  startGameSession,
  timeLimitForLevel
} from '../lib/session';

const now = new Date('2026-02-10T09:00:00Z');

describe('game session', () => {
  it('starts with full lives and nothing used', () => {
    const session = startGameSession('dogHistory', now);
    expect(session.livesRemaining).toBe(3);
    expect(session.sessionStart).toBe('2026-02-10T09:00:00.000Z');
    expect(session.powerUpsUsed).toEqual({ fiftyFifty: 0, hint: 0, extraTime: 0, skip: 0, secondChance: 0 });
    expect(session.score).toBe(0);
    expect(session.timeRemaining).toBe(0);
  });

  it('tracks streaks and keeps only the last five results', () => {
    let session = startGameSession('dogHistory', now);
    const results = [true, true, true, false, false, true];
    results.forEach((correct, index) => {
      session = recordOutcome(session, `q${index}`, correct);
    });
    expect(session.currentStreak).toBe(1);
    expect(session.bestStreak).toBe(3);
    expect(session.recentResults).toEqual([true, true, false, false, true]);
    expect(recentMistakes(session)).toBe(2);
    expect(session.sessionQuestionIds).toHaveLength(6);
  });

  it('clamps lives between zero and three', () => {
    let session = startGameSession('dogHistory', now);
    session = gainLife(session);
    expect(session.livesRemaining).toBe(3);
    session = loseLife(loseLife(loseLife(loseLife(session))));
    expect(session.livesRemaining).toBe(0);
    expect(isGameOver(session)).toBe(true);
  });

  it('restores lives with a fresh streak window', () => {
    let session = startGameSession('dogHistory', now);
    session = recordOutcome(recordOutcome(session, 'a', true), 'b', false);
    session = restoreLives(loseLife(session), 3);
    expect(session.livesRemaining).toBe(3);
    expect(session.currentStreak).toBe(0);
    expect(session.bestStreak).toBe(1);
    expect(session.recentResults).toEqual([]);
  });

  it('only counts time while running', () => {
    let session = startGameSession('dogHistory', now);
    session = addSessionTime(session, 2.9);
    session = addSessionTime(session, -4);
    session = addSessionTime(setPaused(session, true), 30);
    expect(session.sessionTimeSpent).toBe(2);
  });

  it('summarizes what changed during the session', () => {
    let session = startGameSession('dogHistory', now);
    session = markPowerUpUsed(session, 'hint');
    session = addScore(recordOutcome(recordOutcome(session, 'a', true), 'b', true), 25);
    const before = createPathProgress('dogHistory', now);
    const after = recordAnswer(recordAnswer(recordAnswer(before, { questionId: 'a', correct: true }), { questionId: 'b', correct: true }), {
      questionId: 'c',
      correct: false
    });
    expect(session.powerUpsUsed.hint).toBe(1);
    expect(sessionSummary(session, before, after)).toEqual({
      pathType: 'dogHistory',
      questionsAnswered: 3,
      correctAnswers: 2,
      timeSpent: 0,
      bestStreak: 2,
      score: 25,
      pathCompleted: false
    });
  });
});

describe('question clock', () => {
  it('has no limit on level one and tightens after', () => {
    expect([1, 2, 3, 4, 5, 9].map(timeLimitForLevel)).toEqual([0, 20, 15, 12, 10, 10]);
    expect(timeLimitForLevel(0)).toBe(0);
  });

  it('starts with each question and stops when none is shown', () => {
    const session = presentQuestion(startGameSession('dogHistory', now), 'q1', 15);
    expect(session.timeRemaining).toBe(15);
    expect(presentQuestion(session, null, 15).timeRemaining).toBe(0);
  });

  it('counts down whole seconds while running', () => {
    let session = presentQuestion(startGameSession('dogHistory', now), 'q1', 12);
    session = countDown(session, 4.7);
    expect(session.timeRemaining).toBe(8);
    expect(countDown(setPaused(session, true), 5).timeRemaining).toBe(8);
    expect(countDown(session, 0.5)).toBe(session);
    expect(countDown(session, 30).timeRemaining).toBe(0);
  });

  it('leaves untimed questions alone and adds extra seconds', () => {
    const untimed = presentQuestion(startGameSession('dogHistory', now), 'q1');
    expect(countDown(untimed, 10)).toBe(untimed);
    const timed = presentQuestion(untimed, 'q2', 10);
    expect(addQuestionTime(timed, 10).timeRemaining).toBe(20);
  });
});

describe('score', () => {
  it('doubles points from a streak of five', () => {
    expect([0, 4, 5, 12].map(scoreMultiplier)).toEqual([1, 1, 2, 2]);
  });

  it('adds whole non-negative points', () => {
    const session = addScore(addScore(startGameSession('dogHistory', now), 20), -5);
    expect(session.score).toBe(20);
  });
});
