import { baseDistribution, pickDifficulty } from './difficulty';
import { NotInitializedError } from './errors';
import { DIFFICULTIES, type Difficulty, type DifficultyWeights, type PathType, type Question } from './types';

export type DifficultyTarget = number | DifficultyWeights;

export interface QuestionPoolOptions {
  random?: () => number;
}

type Tiers = Record<Difficulty, Question[]>;

const emptyTiers = (): Tiers => ({ easy: [], medium: [], hard: [], expert: [] });

// Nearest tier first; the easier neighbour wins ties.
export const fallbackOrder = (preferred: Difficulty): Difficulty[] => {
  const origin = DIFFICULTIES.indexOf(preferred);
  return [...DIFFICULTIES].sort((a, b) => {
    const distance = Math.abs(DIFFICULTIES.indexOf(a) - origin) - Math.abs(DIFFICULTIES.indexOf(b) - origin);
    if (distance !== 0) return distance;
    return DIFFICULTIES.indexOf(a) - DIFFICULTIES.indexOf(b);
  });
};

export class QuestionPool {
  private readonly random: () => number;
  private byPath: Map<PathType, Question[]> | null = null;
  private byId = new Map<string, Question>();

  constructor(options: QuestionPoolOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  static from(questions: readonly Question[], options: QuestionPoolOptions = {}): QuestionPool {
    const pool = new QuestionPool(options);
    pool.initialize(questions);
    return pool;
  }

  get isInitialized(): boolean {
    return this.byPath !== null;
  }

  initialize(questions: readonly Question[]): void {
    const byPath = new Map<PathType, Question[]>();
    const byId = new Map<string, Question>();
    for (const question of questions) {
      if (byId.has(question.id)) continue;
      byId.set(question.id, question);
      const list = byPath.get(question.category) ?? [];
      list.push(question);
      byPath.set(question.category, list);
    }
    this.byId = byId;
    this.byPath = byPath;
  }

  private requirePaths(): Map<PathType, Question[]> {
    if (!this.byPath) throw new NotInitializedError('QuestionPool');
    return this.byPath;
  }

  get size(): number {
    this.requirePaths();
    return this.byId.size;
  }

  getById(id: string): Question | undefined {
    this.requirePaths();
    return this.byId.get(id);
  }

  questionsFor(path: PathType): Question[] {
    return [...(this.requirePaths().get(path) ?? [])];
  }

  availableCount(path: PathType, excludeIds: ReadonlySet<string> | readonly string[]): number {
    const exclude = toSet(excludeIds);
    return this.questionsFor(path).filter((question) => !exclude.has(question.id)).length;
  }

  hasEnough(path: PathType, excludeIds: ReadonlySet<string> | readonly string[], requiredCount: number): boolean {
    return this.availableCount(path, excludeIds) >= requiredCount;
  }

  sample(
    path: PathType,
    excludeIds: ReadonlySet<string> | readonly string[],
    count: number,
    target: DifficultyTarget
  ): Question[] {
    const exclude = toSet(excludeIds);
    const available = this.questionsFor(path).filter((question) => !exclude.has(question.id));
    return this.drawWeighted(available, Math.max(0, Math.floor(count)), toWeights(target));
  }

  // Tops up with excluded questions of the path when fresh ones run short.
  questionsForCheckpointRestart(
    path: PathType,
    excludeIds: ReadonlySet<string> | readonly string[],
    count: number,
    level: number
  ): Question[] {
    const wanted = Math.max(0, Math.floor(count));
    const fresh = this.sample(path, excludeIds, wanted, level);
    if (fresh.length < wanted) {
      const taken = new Set(fresh.map((question) => question.id));
      const repeats = this.questionsFor(path).filter((question) => !taken.has(question.id));
      fresh.push(...this.drawWeighted(repeats, wanted - fresh.length, toWeights(level)));
    }
    return this.shuffle(fresh);
  }

  private drawWeighted(candidates: Question[], count: number, weights: DifficultyWeights): Question[] {
    const tiers = emptyTiers();
    for (const question of candidates) tiers[question.difficulty].push(question);

    const picked: Question[] = [];
    while (picked.length < count) {
      const preferred = pickDifficulty(weights, this.random);
      const tier = fallbackOrder(preferred).find((difficulty) => tiers[difficulty].length > 0);
      if (!tier) break;
      const bucket = tiers[tier];
      const index = Math.floor(this.random() * bucket.length);
      picked.push(...bucket.splice(Math.min(index, bucket.length - 1), 1));
    }
    return picked;
  }

  private shuffle<T>(items: T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i -= 1) {
      const j = Math.floor(this.random() * (i + 1));
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}

const toSet = (ids: ReadonlySet<string> | readonly string[]): ReadonlySet<string> =>
  ids instanceof Set ? ids : new Set(ids);

const toWeights = (target: DifficultyTarget): DifficultyWeights =>
  typeof target === 'number' ? baseDistribution(target) : target;
