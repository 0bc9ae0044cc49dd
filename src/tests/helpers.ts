import { pointsFor } from '../lib/difficulty';
import { DIFFICULTIES, type Difficulty, type PathType, type Question } from '../lib/types';

export const mkQuestion = (id: string, category: PathType, difficulty: Difficulty, correctAnswerIndex = 0): Question => ({
  id,
  category,
  difficulty,
  text: { en: `Question ${id}`, de: `Frage ${id}` },
  answers: { en: ['A', 'B', 'C', 'D'], de: ['A', 'B', 'C', 'D'] },
  correctAnswerIndex,
  hint: { en: `Hint ${id}`, de: `Tipp ${id}` },
  funFact: { en: `Fact ${id}` },
  points: pointsFor(difficulty),
  tags: []
});

export type TierCounts = Record<Difficulty, number>;

export const mkPathQuestions = (
  path: PathType,
  counts: TierCounts = { easy: 3, medium: 3, hard: 2, expert: 2 }
): Question[] =>
  DIFFICULTIES.flatMap((difficulty) =>
    Array.from({ length: counts[difficulty] }, (_, index) => mkQuestion(`${path}-${difficulty}-${index + 1}`, path, difficulty))
  );

/** Deterministic stand-in for Math.random. */
export const seededRandom = (seed = 42) => {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
};
