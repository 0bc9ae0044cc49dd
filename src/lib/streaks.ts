export interface AnswerStreak {
  currentStreak: number;
  bestStreak: number;
}

export interface DailyStreak {
  dailyStreak: number;
  longestDailyStreak: number;
  lastPlayDate: string | null;
}

const dayKey = (date: Date) => date.toISOString().slice(0, 10);

export function updateAnswerStreak<T extends AnswerStreak>(streak: T, correct: boolean): T {
  const next = correct ? streak.currentStreak + 1 : 0;
  return {
    ...streak,
    currentStreak: next,
    bestStreak: Math.max(streak.bestStreak, next)
  };
}

export function updateDailyStreak<T extends DailyStreak>(streak: T, now = new Date()): T {
  const today = dayKey(now);
  if (!streak.lastPlayDate) {
    return { ...streak, dailyStreak: 1, longestDailyStreak: Math.max(streak.longestDailyStreak, 1), lastPlayDate: now.toISOString() };
  }
  const prev = new Date(streak.lastPlayDate);
  if (Number.isNaN(prev.getTime())) {
    return { ...streak, dailyStreak: 1, longestDailyStreak: Math.max(streak.longestDailyStreak, 1), lastPlayDate: now.toISOString() };
  }
  if (dayKey(prev) === today) return { ...streak, lastPlayDate: now.toISOString() };

  const diffDays = Math.floor(
    (Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()) -
      Date.UTC(prev.getUTCFullYear(), prev.getUTCMonth(), prev.getUTCDate())) /
      (1000 * 60 * 60 * 24)
  );
  const nextStreak = diffDays === 1 ? streak.dailyStreak + 1 : 1;
  return {
    ...streak,
    dailyStreak: nextStreak,
    longestDailyStreak: Math.max(streak.longestDailyStreak, nextStreak),
    lastPlayDate: now.toISOString()
  };
}
