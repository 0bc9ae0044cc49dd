import { CHECKPOINT_INFO } from './checkpoints';
import { GAME_RULES } from './config';
import { levelForQuestionCount, targetDistribution } from './difficulty';
import { NotInitializedError, describeError } from './errors';
import { FallbackPolicy, type FallbackStatistics } from './fallback';
import { log } from './log';
import { extraTimeSeconds, fiftyFiftyRemovals, hintFor, type PowerUpEffect } from './power-ups';
import {
  addPowerUps,
  applyFallback,
  completeCheckpointOnProgress,
  consumePowerUp,
  createPathProgress,
  defaultGlobalStats,
  exclusionSet,
  recordAnswer,
  segmentAccuracy,
  trackFor,
  updateGlobalStats
} from './progress';
import type { QuestionPool } from './question-pool';
import { questionAnswers, questionFunFact } from './questions';
import { rewardsFor } from './rewards';
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
} from './session';
import type { ProgressStore } from './storage';
import type {
  Checkpoint,
  FallbackResult,
  GameSession,
  GlobalStats,
  Locale,
  PathProgress,
  PathType,
  PowerUpType,
  Question,
  RewardBundle,
  SessionSummary
} from './types';

export interface GameControllerOptions {
  pool: QuestionPool;
  store: ProgressStore;
  fallback?: FallbackPolicy;
  random?: () => number;
  now?: () => Date;
  batchSize?: number;
  locale?: Locale;
}

export type TrackView = {
  currentCheckpoint: Checkpoint | null;
  nextCheckpoint: Checkpoint | null;
  questionsRemaining: number;
  progressToNext: number;
  label: string;
};

export interface GameSnapshot {
  initialized: boolean;
  session: GameSession | null;
  progress: PathProgress | null;
  question: Question | null;
  removedAnswers: number[];
  track: TrackView | null;
  globalStats: GlobalStats;
}

export type AnswerRejection = 'no_session' | 'paused' | 'game_over' | 'not_current_question' | 'invalid_answer';

export type AnsweredOutcome = {
  kind: 'answered';
  correct: boolean;
  timedOut: boolean;
  correctAnswerIndex: number;
  pointsEarned: number;
  score: number;
  funFact: string | null;
  livesRemaining: number;
  streak: number;
  checkpointReached: Checkpoint | null;
  rewards: RewardBundle | null;
  pathCompleted: boolean;
  livesExhausted: boolean;
  nextQuestionId: string | null;
};

export type AnswerOutcome = { kind: 'rejected'; reason: AnswerRejection } | AnsweredOutcome;

export type PowerUpRejection =
  | 'no_session'
  | 'paused'
  | 'game_over'
  | 'no_question'
  | 'lives_full'
  | 'no_timer'
  | 'unavailable';

export type PowerUpOutcome =
  | { kind: 'rejected'; reason: PowerUpRejection }
  | { kind: 'applied'; effect: PowerUpEffect; remaining: number };

export type FallbackOutcome = {
  result: FallbackResult;
  statistics: FallbackStatistics;
  nextQuestionId: string | null;
};

type Listener = () => void;

// One session at a time; saves are queued and surfaced through flush().
export class GameController {
  private readonly pool: QuestionPool;
  private readonly store: ProgressStore;
  private readonly fallback: FallbackPolicy;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly batchSize: number;
  readonly locale: Locale;

  private initialized = false;
  private progressByPath: Partial<Record<PathType, PathProgress>> = {};
  private globalStats: GlobalStats = defaultGlobalStats();
  private session: GameSession | null = null;
  private progressAtStart: PathProgress | null = null;
  private queue: Question[] = [];
  private removedAnswers: number[] = [];
  private saving: Promise<void> = Promise.resolve();
  private listeners: Listener[] = [];
  private snapshot: GameSnapshot;

  constructor(options: GameControllerOptions) {
    this.pool = options.pool;
    this.store = options.store;
    this.fallback = options.fallback ?? new FallbackPolicy(options.pool);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? GAME_RULES.defaultBatchSize));
    this.locale = options.locale ?? 'en';
    this.snapshot = this.buildSnapshot();
  }

  async initialize(): Promise<void> {
    if (!this.pool.isInitialized) throw new NotInitializedError('QuestionPool');
    await this.store.migrate();
    this.progressByPath = await this.store.loadAll();
    this.globalStats = await this.store.loadGlobalStats();
    this.initialized = true;
    this.emit();
  }

  private requireInitialized() {
    if (!this.initialized) throw new NotInitializedError('GameController');
  }

  progressFor(path: PathType): PathProgress {
    this.requireInitialized();
    return this.progressByPath[path] ?? createPathProgress(path, this.now());
  }

  get stats(): GlobalStats {
    return this.globalStats;
  }

  startSession(path: PathType): GameSnapshot {
    this.requireInitialized();
    const progress = this.progressFor(path);
    this.progressByPath[path] = progress;
    this.progressAtStart = progress;
    this.session = startGameSession(path, this.now());
    this.queue = [];
    this.advance();
    log.info(`session started on ${path}`);
    this.persist();
    this.emit();
    return this.snapshot;
  }

  async resumeSession(): Promise<GameSnapshot | null> {
    this.requireInitialized();
    const saved = await this.store.loadSession();
    if (!saved) return null;
    const progress = this.progressFor(saved.pathType);
    this.progressByPath[saved.pathType] = progress;
    this.progressAtStart = progress;
    this.session = saved;
    this.queue = [];
    this.removedAnswers = [];
    const current = saved.currentQuestionId ? this.pool.getById(saved.currentQuestionId) : undefined;
    if (!current && !isGameOver(saved)) this.advance();
    this.emit();
    return this.snapshot;
  }

  currentQuestion(): Question | null {
    this.requireInitialized();
    const id = this.session?.currentQuestionId;
    return id ? this.pool.getById(id) ?? null : null;
  }

  submitAnswer(questionId: string, selectedIndex: number): AnswerOutcome {
    this.requireInitialized();
    const session = this.session;
    if (!session) return { kind: 'rejected', reason: 'no_session' };
    if (session.isPaused) return { kind: 'rejected', reason: 'paused' };
    if (isGameOver(session)) return { kind: 'rejected', reason: 'game_over' };
    const question = this.currentQuestion();
    if (!question || question.id !== questionId) return { kind: 'rejected', reason: 'not_current_question' };
    const answerCount = questionAnswers(question, this.locale).length;
    if (!Number.isInteger(selectedIndex) || selectedIndex < 0 || selectedIndex >= answerCount) {
      return { kind: 'rejected', reason: 'invalid_answer' };
    }

    return this.resolveAnswer(session, question, selectedIndex === question.correctAnswerIndex, false);
  }

  private resolveAnswer(session: GameSession, question: Question, correct: boolean, timedOut: boolean): AnsweredOutcome {
    const now = this.now();
    const pointsEarned = correct ? question.points * scoreMultiplier(session.currentStreak) : 0;
    let progress = recordAnswer(this.activeProgress(session), { questionId: question.id, correct }, now);
    let next = recordOutcome(session, question.id, correct);
    next = correct ? addScore(next, pointsEarned) : loseLife(next);

    const reached = trackFor(progress).pendingCheckpoint(progress.trackCorrect);
    let rewards: RewardBundle | null = null;
    if (reached) {
      rewards = rewardsFor(reached, segmentAccuracy(progress));
      progress = addPowerUps(completeCheckpointOnProgress(progress, reached, now), rewards);
      log.info(`checkpoint ${CHECKPOINT_INFO[reached].displayName} reached on ${session.pathType}`);
    }
    const pathCompleted = progress.isCompleted && !this.activeProgress(session).isCompleted;

    this.progressByPath[session.pathType] = progress;
    this.session = next;
    const livesExhausted = isGameOver(next);
    if (livesExhausted) {
      this.session = presentQuestion(next, null);
      this.removedAnswers = [];
    } else {
      this.advance();
    }
    this.persist();
    this.emit();

    return {
      kind: 'answered',
      correct,
      timedOut,
      correctAnswerIndex: question.correctAnswerIndex,
      pointsEarned,
      score: next.score,
      funFact: questionFunFact(question, this.locale),
      livesRemaining: next.livesRemaining,
      streak: next.currentStreak,
      checkpointReached: reached,
      rewards,
      pathCompleted,
      livesExhausted,
      nextQuestionId: this.session?.currentQuestionId ?? null
    };
  }

  usePowerUp(type: PowerUpType): PowerUpOutcome {
    this.requireInitialized();
    const session = this.session;
    if (!session) return { kind: 'rejected', reason: 'no_session' };
    if (session.isPaused) return { kind: 'rejected', reason: 'paused' };
    if (isGameOver(session)) return { kind: 'rejected', reason: 'game_over' };
    const question = this.currentQuestion();
    if (type !== 'secondChance' && !question) return { kind: 'rejected', reason: 'no_question' };
    if (type === 'secondChance' && session.livesRemaining >= GAME_RULES.maxLives) {
      return { kind: 'rejected', reason: 'lives_full' };
    }
    if (type === 'extraTime' && session.timeRemaining <= 0) return { kind: 'rejected', reason: 'no_timer' };

    const { progress, used } = consumePowerUp(this.activeProgress(session), type);
    if (!used) return { kind: 'rejected', reason: 'unavailable' };
    this.progressByPath[session.pathType] = progress;
    this.session = markPowerUpUsed(session, type);

    const effect = this.applyEffect(type, question);
    this.persist();
    this.emit();
    return { kind: 'applied', effect, remaining: progress.powerUpInventory[type] };
  }

  private applyEffect(type: PowerUpType, question: Question | null): PowerUpEffect {
    const session = this.requireSession();
    switch (type) {
      case 'fiftyFifty':
        this.removedAnswers = question ? fiftyFiftyRemovals(question, this.locale, this.random) : [];
        return { type, removedIndices: [...this.removedAnswers] };
      case 'hint':
        return { type, hint: question ? hintFor(question, this.locale) : null };
      case 'extraTime': {
        const seconds = extraTimeSeconds();
        this.session = addQuestionTime(session, seconds);
        return { type, seconds, timeRemaining: this.session.timeRemaining };
      }
      case 'skip': {
        const skippedQuestionId = question?.id ?? '';
        if (question && !session.sessionQuestionIds.includes(question.id)) {
          this.session = { ...session, sessionQuestionIds: [...session.sessionQuestionIds, question.id] };
        }
        this.advance();
        return { type, skippedQuestionId };
      }
      case 'secondChance':
        this.session = gainLife(session);
        return { type, livesRemaining: this.session.livesRemaining };
    }
  }

  onLivesExhausted(): FallbackOutcome {
    this.requireInitialized();
    const session = this.session;
    const progress = session ? this.activeProgress(session) : null;
    const track = progress ? trackFor(progress) : null;
    const result = this.fallback.handleGameOver({ path: session?.pathType, track, livesRemaining: session?.livesRemaining });

    if (result.kind === 'error' || !session || !progress) {
      log.warn(`fallback not applied: ${result.message}`);
      return { result, statistics: this.fallback.describe(result, track, 0), nextQuestionId: session?.currentQuestionId ?? null };
    }

    const now = this.now();
    const restored = applyFallback(progress, result, now);
    this.progressByPath[session.pathType] = restored;
    this.session = restoreLives(session, result.restoredLives);
    const exclude = exclusionSet(restored);
    if (!this.fallback.hasEnoughQuestionsForRestart(session.pathType, exclude, this.batchSize)) {
      log.debug(`restart batch on ${session.pathType} will include repeats`);
    }
    this.queue = this.fallback.questionsForRestart(result, session.pathType, exclude, this.batchSize);
    this.advance();

    const statistics = this.fallback.describe(result, trackFor(restored), session.sessionQuestionIds.length);
    log.info(`fallback ${result.kind} on ${session.pathType}`, statistics);
    this.persist();
    this.emit();
    return { result, statistics, nextQuestionId: this.session.currentQuestionId };
  }

  pause(): void {
    this.requireInitialized();
    if (!this.session || this.session.isPaused) return;
    this.session = setPaused(this.session, true);
    this.persist();
    this.emit();
  }

  resume(): void {
    this.requireInitialized();
    if (!this.session || !this.session.isPaused) return;
    this.session = setPaused(this.session, false);
    this.emit();
  }

  // A question whose clock runs out is answered wrong; that outcome is returned.
  tick(seconds: number): AnswerOutcome | null {
    this.requireInitialized();
    const session = this.session;
    if (!session) return null;
    const next = countDown(addSessionTime(session, seconds), seconds);
    if (next === session) return null;
    const progress = this.activeProgress(session);
    this.progressByPath[session.pathType] = {
      ...progress,
      totalTimeSpent: progress.totalTimeSpent + (next.sessionTimeSpent - session.sessionTimeSpent)
    };
    this.session = next;

    const question = this.currentQuestion();
    if (question && session.timeRemaining > 0 && next.timeRemaining === 0 && !isGameOver(next)) {
      log.info(`time ran out on ${question.id}`);
      return this.resolveAnswer(next, question, false, true);
    }
    this.emit();
    return null;
  }

  endSession(): SessionSummary | null {
    this.requireInitialized();
    const session = this.session;
    if (!session) return null;
    const progress = this.activeProgress(session);
    const summary = sessionSummary(session, this.progressAtStart, progress);
    this.globalStats = updateGlobalStats(this.globalStats, summary, this.now());
    this.session = null;
    this.progressAtStart = null;
    this.queue = [];
    this.removedAnswers = [];

    const stats = this.globalStats;
    this.track(Promise.all([this.store.save(progress), this.store.saveGlobalStats(stats), this.store.clearSession()]));
    log.info(`session ended on ${session.pathType}: ${summary.correctAnswers}/${summary.questionsAnswered} correct`);
    this.emit();
    return summary;
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((entry) => entry !== listener);
    };
  };

  getSnapshot = (): GameSnapshot => this.snapshot;

  async flush(): Promise<void> {
    await this.saving;
    await this.store.flush();
  }

  startAutoSave(intervalMs: number = GAME_RULES.autoSaveIntervalMs): () => void {
    const timer = setInterval(() => this.persist(), Math.max(1, intervalMs));
    return () => clearInterval(timer);
  }

  private requireSession(): GameSession {
    if (!this.session) throw new Error('no active session');
    return this.session;
  }

  private activeProgress(session: GameSession): PathProgress {
    return this.progressByPath[session.pathType] ?? createPathProgress(session.pathType, this.now());
  }

  // Restart batch first, then a fresh draw; repeats once the path runs dry.
  private advance() {
    const session = this.requireSession();
    this.removedAnswers = [];
    const progress = this.activeProgress(session);
    const exclude = new Set([...progress.answeredQuestionIds, ...session.sessionQuestionIds]);
    const previous = session.currentQuestionId;
    if (previous) exclude.add(previous);

    const level = levelForQuestionCount(progress.trackCorrect);
    let next = this.queue.shift();
    if (!next) {
      const weights = targetDistribution(level, session.currentStreak, recentMistakes(session));
      next = this.pool.sample(session.pathType, exclude, 1, weights)[0];
    }
    if (!next) {
      next = this.pool.questionsForCheckpointRestart(session.pathType, previous ? [previous] : [], 1, level)[0];
      if (next) log.debug(`no unseen questions left on ${session.pathType}, repeating`);
    }
    if (!next) log.warn(`no questions available for ${session.pathType}`);
    this.session = presentQuestion(session, next?.id ?? null, timeLimitForLevel(level));
  }

  private persist() {
    const session = this.session;
    if (!session) return;
    const progress = this.activeProgress(session);
    this.track(Promise.all([this.store.save(progress), this.store.saveSession(session)]));
  }

  private track(writes: Promise<unknown>) {
    const task = writes.then(
      () => undefined,
      (error: unknown) => log.error(`saving progress failed: ${describeError(error)}`)
    );
    this.saving = Promise.all([this.saving, task]).then(() => undefined);
  }

  private buildSnapshot(): GameSnapshot {
    const session = this.session;
    const progress = session ? this.activeProgress(session) : null;
    const track = progress ? trackFor(progress) : null;
    const id = session?.currentQuestionId;
    return {
      initialized: this.initialized,
      session,
      progress,
      question: id && this.initialized ? this.pool.getById(id) ?? null : null,
      removedAnswers: [...this.removedAnswers],
      track:
        track && progress
          ? {
              currentCheckpoint: progress.currentCheckpoint,
              nextCheckpoint: track.nextCheckpoint(progress.trackCorrect),
              questionsRemaining: track.questionsRemaining(progress.trackCorrect),
              progressToNext: track.progressToNext(progress.trackCorrect),
              label: track.segmentLabel(progress.trackCorrect)
            }
          : null,
      globalStats: this.globalStats
    };
  }

  private emit() {
    this.snapshot = this.buildSnapshot();
    this.listeners.forEach((listener) => listener());
  }
}
