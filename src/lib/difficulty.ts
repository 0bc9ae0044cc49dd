import { GAME_RULES } from './config';
import { DIFFICULTIES, type Checkpoint, type Difficulty, type DifficultyWeights } from './types';

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export const DIFFICULTY_POINTS: Record<Difficulty, number> = {
  easy: 10,
  medium: 15,
  hard: 20,
  expert: 25
};

export const pointsFor = (difficulty: Difficulty) => DIFFICULTY_POINTS[difficulty];

export const difficultyRank = (difficulty: Difficulty) => DIFFICULTIES.indexOf(difficulty);

export const compareDifficulty = (a: Difficulty, b: Difficulty) => difficultyRank(a) - difficultyRank(b);

// Rows are indexed by level - 1.
export const LEVEL_DISTRIBUTIONS: readonly DifficultyWeights[] = [
  { easy: 0.8, medium: 0.2, hard: 0, expert: 0 },
  { easy: 0.6, medium: 0.3, hard: 0.1, expert: 0 },
  { easy: 0.4, medium: 0.4, hard: 0.15, expert: 0.05 },
  { easy: 0.3, medium: 0.35, hard: 0.25, expert: 0.1 },
  { easy: 0.2, medium: 0.3, hard: 0.35, expert: 0.15 }
];

export const PERFORMANCE_SHIFT = {
  mistakes: { trigger: 2, step: 0.1, max: 0.3 },
  streak: { trigger: 3, step: 0.05, max: 0.3 }
} as const;

const CHECKPOINT_LEVELS: Record<Checkpoint, number> = {
  chihuahua: 1,
  pug: 2,
  cockerSpaniel: 3,
  germanShepherd: 4,
  greatDane: 5,
  deutscheDogge: 6
};

export const checkpointDifficultyLevel = (checkpoint: Checkpoint) => CHECKPOINT_LEVELS[checkpoint];

export function levelForQuestionCount(questionCount: number): number {
  const level = Math.ceil(Math.max(0, questionCount) / GAME_RULES.questionsPerLevel);
  return clamp(level, 1, GAME_RULES.maxDifficultyLevel);
}

export function baseDistribution(level: number): DifficultyWeights {
  const index = clamp(Math.floor(level), 1, LEVEL_DISTRIBUTIONS.length) - 1;
  return { ...LEVEL_DISTRIBUTIONS[index] };
}

const normalize = (weights: DifficultyWeights): DifficultyWeights => {
  const total = DIFFICULTIES.reduce((sum, difficulty) => sum + Math.max(0, weights[difficulty]), 0);
  if (total <= 0) return { easy: 1, medium: 0, hard: 0, expert: 0 };
  return {
    easy: Math.max(0, weights.easy) / total,
    medium: Math.max(0, weights.medium) / total,
    hard: Math.max(0, weights.hard) / total,
    expert: Math.max(0, weights.expert) / total
  };
};

export function performanceShift(streak: number, recentMistakes: number): number {
  const { mistakes, streak: streakShift } = PERFORMANCE_SHIFT;
  const easing =
    recentMistakes >= mistakes.trigger ? Math.min(mistakes.max, mistakes.step * (recentMistakes - 1)) : 0;
  const boost =
    streak >= streakShift.trigger ? Math.min(streakShift.max, streakShift.step * (streak - 2)) : 0;
  return boost - easing;
}

// Positive shifts move mass one tier harder, negative ones one tier easier.
export function shiftDistribution(weights: DifficultyWeights, shift: number): DifficultyWeights {
  const amount = clamp(Math.abs(shift), 0, 1);
  if (amount === 0) return normalize(weights);
  const values = DIFFICULTIES.map((difficulty) => Math.max(0, weights[difficulty]));
  const next = [...values];
  const direction = shift > 0 ? 1 : -1;
  values.forEach((value, index) => {
    const target = index + direction;
    if (target < 0 || target >= values.length) return;
    const moved = value * amount;
    next[index] -= moved;
    next[target] += moved;
  });
  return normalize({ easy: next[0], medium: next[1], hard: next[2], expert: next[3] });
}

export function targetDistribution(level: number, streak = 0, recentMistakes = 0): DifficultyWeights {
  return shiftDistribution(baseDistribution(level), performanceShift(streak, recentMistakes));
}

export const pickDifficulty = (weights: DifficultyWeights, random: () => number = Math.random): Difficulty => {
  const normalized = normalize(weights);
  const roll = random();
  let cumulative = 0;
  for (const difficulty of DIFFICULTIES) {
    cumulative += normalized[difficulty];
    if (roll < cumulative) return difficulty;
  }
  return [...DIFFICULTIES].reverse().find((difficulty) => normalized[difficulty] > 0) ?? 'easy';
};
