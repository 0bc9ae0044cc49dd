import { describe, expect, it } from 'vitest';
import { NotInitializedError } from '../lib/errors';
import { QuestionPool, fallbackOrder } from '../lib/question-pool';
import { mkPathQuestions, mkQuestion, seededRandom } from './helpers';

const questions = [...mkPathQuestions('dogBreeds'), ...mkPathQuestions('dogHealth')];

describe('QuestionPool', () => {
  it('fails fast before initialize', () => {
    const pool = new QuestionPool();
    expect(pool.isInitialized).toBe(false);
    expect(() => pool.sample('dogBreeds', [], 1, 1)).toThrow(NotInitializedError);
    expect(() => pool.size).toThrow('QuestionPool used before initialize() completed');
  });

  it('groups questions by path and drops duplicate ids', () => {
    const pool = QuestionPool.from([...questions, mkQuestion('dogBreeds-easy-1', 'dogHealth', 'hard')]);
    expect(pool.size).toBe(20);
    expect(pool.questionsFor('dogBreeds')).toHaveLength(10);
    expect(pool.getById('dogBreeds-easy-1')?.category).toBe('dogBreeds');
    expect(pool.questionsFor('dogHistory')).toEqual([]);
  });

  it('samples disjoint batches that never repeat excluded ids', () => {
    const pool = QuestionPool.from(questions, { random: seededRandom(7) });
    const exclude = ['dogBreeds-easy-1', 'dogBreeds-hard-2'];
    const first = pool.sample('dogBreeds', exclude, 4, 3);
    expect(first).toHaveLength(4);
    expect(first.every((question) => question.category === 'dogBreeds')).toBe(true);
    expect(first.some((question) => exclude.includes(question.id))).toBe(false);

    const second = pool.sample('dogBreeds', [...exclude, ...first.map((question) => question.id)], 4, 3);
    expect(second).toHaveLength(4);
    const firstIds = new Set(first.map((question) => question.id));
    expect(second.some((question) => firstIds.has(question.id) || exclude.includes(question.id))).toBe(false);
    expect(new Set(second.map((question) => question.id)).size).toBe(4);
  });

  it('favours the level tier and falls back to the nearest one when it runs dry', () => {
    const pool = QuestionPool.from(questions, { random: () => 0 });
    const batch = pool.sample('dogBreeds', [], 4, 1);
    expect(batch.map((question) => question.difficulty)).toEqual(['easy', 'easy', 'easy', 'medium']);
    expect(batch.map((question) => question.id)).toEqual([
      'dogBreeds-easy-1',
      'dogBreeds-easy-2',
      'dogBreeds-easy-3',
      'dogBreeds-medium-1'
    ]);
  });

  it('rolls the tier with the shared difficulty picker', () => {
    const pool = QuestionPool.from(questions, { random: () => 0.9 });
    expect(pool.sample('dogBreeds', [], 1, 1).map((question) => question.id)).toEqual(['dogBreeds-medium-3']);
  });

  it('prefers the easier neighbour on ties', () => {
    expect(fallbackOrder('medium')).toEqual(['medium', 'easy', 'hard', 'expert']);
    expect(fallbackOrder('expert')).toEqual(['expert', 'hard', 'medium', 'easy']);
    const pool = QuestionPool.from(
      [mkQuestion('e1', 'dogHealth', 'easy'), mkQuestion('h1', 'dogHealth', 'hard')],
      { random: () => 0 }
    );
    expect(pool.sample('dogHealth', [], 1, { easy: 0, medium: 1, hard: 0, expert: 0 })[0].id).toBe('e1');
    expect(pool.sample('dogHealth', [], 1, { easy: 0, medium: 0, hard: 0, expert: 1 })[0].id).toBe('h1');
  });

  it('under-fills instead of throwing', () => {
    const pool = QuestionPool.from(questions, { random: seededRandom(3) });
    const all = pool.questionsFor('dogHealth').map((question) => question.id);
    expect(pool.sample('dogHealth', all.slice(0, 8), 5, 2)).toHaveLength(2);
    expect(pool.sample('dogHealth', all, 5, 2)).toEqual([]);
    expect(pool.sample('dogTraining', [], 5, 2)).toEqual([]);
    expect(pool.sample('dogHealth', [], 0, 2)).toEqual([]);
  });

  it('counts what is still available', () => {
    const pool = QuestionPool.from(questions);
    expect(pool.availableCount('dogBreeds', new Set(['dogBreeds-easy-1']))).toBe(9);
    expect(pool.hasEnough('dogBreeds', [], 10)).toBe(true);
    expect(pool.hasEnough('dogBreeds', ['dogBreeds-easy-1'], 10)).toBe(false);
  });

  it('tops a restart batch up with repeats when fresh questions run out', () => {
    const pool = QuestionPool.from(questions, { random: seededRandom(11) });
    const all = pool.questionsFor('dogBreeds').map((question) => question.id);
    const batch = pool.questionsForCheckpointRestart('dogBreeds', all.slice(0, 7), 6, 2);
    expect(batch).toHaveLength(6);
    expect(new Set(batch.map((question) => question.id)).size).toBe(6);
    const fresh = batch.filter((question) => !all.slice(0, 7).includes(question.id));
    expect(fresh).toHaveLength(3);
  });
});
