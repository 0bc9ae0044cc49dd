import { readFile } from 'node:fs/promises';
import { pointsFor } from './difficulty';
import { log } from './log';
import {
  LOCALES,
  isDifficulty,
  isPathType,
  type Locale,
  type LocalizedList,
  type LocalizedText,
  type Question
} from './types';

export const QUESTION_DATASET_VERSION = 2;

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toLocalizedText = (value: unknown): LocalizedText => {
  if (typeof value === 'string') return { en: value };
  if (!isRecord(value)) return {};
  const text: LocalizedText = {};
  for (const locale of LOCALES) {
    const entry = value[locale];
    if (typeof entry === 'string' && entry.trim()) text[locale] = entry;
  }
  return text;
};

const toLocalizedList = (value: unknown): LocalizedList => {
  if (Array.isArray(value)) return value.every((item) => typeof item === 'string') ? { en: value } : {};
  if (!isRecord(value)) return {};
  const lists: LocalizedList = {};
  for (const locale of LOCALES) {
    const entry = value[locale];
    if (Array.isArray(entry) && entry.length > 0 && entry.every((item) => typeof item === 'string')) {
      lists[locale] = entry;
    }
  }
  return lists;
};

/** Returns null when the entry cannot be played. */
export function parseQuestion(raw: unknown): Question | null {
  if (!isRecord(raw)) return null;
  const { id, category, difficulty, correctAnswerIndex } = raw;
  if (typeof id !== 'string' || !id.trim()) return null;
  if (!isPathType(category) || !isDifficulty(difficulty)) return null;
  const text = toLocalizedText(raw.text);
  const answers = toLocalizedList(raw.answers);
  const answerLists = Object.values(answers);
  if (Object.keys(text).length === 0 || answerLists.length === 0) return null;
  if (typeof correctAnswerIndex !== 'number' || !Number.isInteger(correctAnswerIndex) || correctAnswerIndex < 0) {
    return null;
  }
  if (answerLists.some((list) => correctAnswerIndex >= list.length)) return null;
  const tags = Array.isArray(raw.tags) ? raw.tags.filter((tag): tag is string => typeof tag === 'string') : [];

  return {
    id: id.trim(),
    category,
    difficulty,
    text,
    answers,
    correctAnswerIndex,
    hint: toLocalizedText(raw.hint),
    funFact: toLocalizedText(raw.funFact),
    points: pointsFor(difficulty),
    tags
  };
}

export function parseQuestionDataset(raw: unknown): Question[] {
  const entries = isRecord(raw) && Array.isArray(raw.questions) ? raw.questions : Array.isArray(raw) ? raw : null;
  if (!entries) {
    log.warn('question dataset has no questions array');
    return [];
  }
  if (isRecord(raw) && typeof raw.version === 'number' && raw.version > QUESTION_DATASET_VERSION) {
    log.warn(`question dataset version ${raw.version} is newer than supported ${QUESTION_DATASET_VERSION}`);
  }

  const seen = new Set<string>();
  const questions: Question[] = [];
  entries.forEach((entry, index) => {
    const question = parseQuestion(entry);
    if (!question) {
      log.warn(`skipping malformed question at index ${index}`);
      return;
    }
    if (seen.has(question.id)) {
      log.warn(`skipping duplicate question id ${question.id}`);
      return;
    }
    seen.add(question.id);
    questions.push(question);
  });
  return questions;
}

export async function loadQuestionDataset(filePath: string): Promise<Question[]> {
  const raw = await readFile(filePath, 'utf8');
  return parseQuestionDataset(JSON.parse(raw));
}

const pickLocalized = <T>(values: Partial<Record<Locale, T>>, locale: Locale): T | undefined =>
  values[locale] ?? values.en ?? Object.values(values).find((value): value is T => value !== undefined);

export const questionText = (question: Question, locale: Locale) => pickLocalized(question.text, locale) ?? '';

export const questionAnswers = (question: Question, locale: Locale) => pickLocalized(question.answers, locale) ?? [];

export const questionHint = (question: Question, locale: Locale) => pickLocalized(question.hint, locale) ?? null;

export const questionFunFact = (question: Question, locale: Locale) => pickLocalized(question.funFact, locale) ?? null;
