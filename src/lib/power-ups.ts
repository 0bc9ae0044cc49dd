import { GAME_RULES } from './config';
import { questionAnswers, questionHint } from './questions';
import type { Locale, PowerUpType, Question } from './types';

export type PowerUpEffect =
  | { type: 'fiftyFifty'; removedIndices: number[] }
  | { type: 'hint'; hint: string | null }
  | { type: 'extraTime'; seconds: number; timeRemaining: number }
  | { type: 'skip'; skippedQuestionId: string }
  | { type: 'secondChance'; livesRemaining: number };

export const POWER_UP_LABELS: Record<PowerUpType, string> = {
  fiftyFifty: '50/50',
  hint: 'Hint',
  extraTime: 'Extra Time',
  skip: 'Skip',
  secondChance: 'Second Chance'
};

/** Wrong answer indices to hide, in random order. Never includes the correct one. */
export function fiftyFiftyRemovals(question: Question, locale: Locale, random: () => number = Math.random): number[] {
  const wrong = questionAnswers(question, locale)
    .map((_, index) => index)
    .filter((index) => index !== question.correctAnswerIndex);
  for (let i = wrong.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [wrong[i], wrong[j]] = [wrong[j], wrong[i]];
  }
  return wrong.slice(0, GAME_RULES.fiftyFiftyRemovals);
}

export const hintFor = (question: Question, locale: Locale) => questionHint(question, locale);

export const extraTimeSeconds = () => GAME_RULES.extraTimeSeconds;
