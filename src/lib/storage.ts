import { CheckpointTrack, PATH_TRACKS } from './checkpoints';
import { GAME_RULES } from './config';
import { describeError } from './errors';
import type { KeyValueStore } from './kv-store';
import { log } from './log';
import { createPathProgress, defaultGlobalStats } from './progress';
import { emptyBundle } from './rewards';
import { trimRecentResults } from './session';
import {
  PATH_TYPES,
  POWER_UP_TYPES,
  isCheckpoint,
  isPathType,
  type Checkpoint,
  type GameSession,
  type GlobalStats,
  type PathProgress,
  type PathType,
  type RewardBundle
} from './types';

export const STORAGE_KEYS = {
  progressPrefix: 'dogdog:progress:',
  session: 'dogdog:session',
  globalStats: 'dogdog:global-stats',
  migrationFlag: 'dogdog:migration:v2'
} as const;

export const LEGACY_KEYS = {
  progressPrefix: 'path_progress_',
  session: 'current_session',
  globalStats: 'global_stats'
} as const;

const progressKey = (path: PathType) => `${STORAGE_KEYS.progressPrefix}${path}`;

type RawRecord = Record<string, unknown>;

const asRecord = (raw: unknown): RawRecord | null => {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return null;
  return Object.fromEntries(Object.entries(raw));
};

const unique = (values: string[]) => [...new Set(values)];
const toSafeInt = (value: unknown, fallback = 0) => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) return fallback;
  return Math.max(0, Math.floor(numeric));
};
const toRatio = (value: unknown) => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) return 0;
  return Math.min(1, Math.max(0, numeric));
};
const toStringList = (value: unknown) =>
  unique(Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : []);
const toTimestamp = (value: unknown, fallback: string) => {
  if (typeof value !== 'string' && typeof value !== 'number') return fallback;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return fallback;
  return typeof value === 'string' ? value : date.toISOString();
};

// Legacy saves wrote enum values with their type name, e.g. "PathType.dogBreeds".
const stripEnum = (value: unknown, prefix: string) =>
  typeof value === 'string' && value.startsWith(`${prefix}.`) ? value.slice(prefix.length + 1) : value;

const EPOCH = new Date(0).toISOString();

const toBundle = (raw: unknown): RewardBundle => {
  const record = asRecord(raw) ?? {};
  const bundle = emptyBundle();
  for (const type of POWER_UP_TYPES) {
    bundle[type] = toSafeInt(record[type] ?? record[`PowerUpType.${type}`]);
  }
  return bundle;
};

export function normalizePathProgress(raw: unknown): PathProgress | null {
  const record = asRecord(raw);
  if (!record || !isPathType(record.pathType)) return null;
  const pathType = record.pathType;
  const track = CheckpointTrack.forPath(
    pathType,
    (Array.isArray(record.completedCheckpoints) ? record.completedCheckpoints : []).filter(isCheckpoint)
  );
  const currentCheckpoint: Checkpoint | null =
    record.currentCheckpoint === null
      ? null
      : isCheckpoint(record.currentCheckpoint) && track.includes(record.currentCheckpoint)
        ? record.currentCheckpoint
        : track.lastCompleted;
  const correctAnswers = toSafeInt(record.correctAnswers);
  const totalQuestions = Math.max(toSafeInt(record.totalQuestions), correctAnswers);
  const segmentTotal = toSafeInt(record.segmentTotal);

  return {
    pathType,
    currentCheckpoint,
    completedCheckpoints: track.completed,
    answeredQuestionIds: toStringList(record.answeredQuestionIds),
    powerUpInventory: toBundle(record.powerUpInventory),
    correctAnswers,
    totalQuestions,
    trackCorrect: toSafeInt(record.trackCorrect),
    segmentCorrect: Math.min(toSafeInt(record.segmentCorrect), segmentTotal),
    segmentTotal,
    bestAccuracy: toRatio(record.bestAccuracy),
    totalTimeSpent: toSafeInt(record.totalTimeSpent),
    fallbackCount: toSafeInt(record.fallbackCount),
    lastPlayed: toTimestamp(record.lastPlayed, EPOCH),
    isCompleted: typeof record.isCompleted === 'boolean' ? record.isCompleted : track.isComplete
  };
}

export function normalizeSession(raw: unknown): GameSession | null {
  const record = asRecord(raw);
  if (!record || !isPathType(record.pathType)) return null;
  const currentStreak = toSafeInt(record.currentStreak);
  return {
    pathType: record.pathType,
    livesRemaining: Math.min(GAME_RULES.maxLives, toSafeInt(record.livesRemaining, GAME_RULES.maxLives)),
    currentQuestionId: typeof record.currentQuestionId === 'string' ? record.currentQuestionId : null,
    sessionQuestionIds: toStringList(record.sessionQuestionIds),
    powerUpsUsed: toBundle(record.powerUpsUsed),
    currentStreak,
    bestStreak: Math.max(toSafeInt(record.bestStreak), currentStreak),
    recentResults: trimRecentResults(
      Array.isArray(record.recentResults) ? record.recentResults.filter((entry): entry is boolean => typeof entry === 'boolean') : []
    ),
    isPaused: record.isPaused === true,
    sessionTimeSpent: toSafeInt(record.sessionTimeSpent),
    sessionStart: toTimestamp(record.sessionStart, EPOCH),
    score: toSafeInt(record.score),
    timeRemaining: toSafeInt(record.timeRemaining)
  };
}

export function normalizeGlobalStats(raw: unknown): GlobalStats {
  const defaults = defaultGlobalStats();
  const record = asRecord(raw);
  if (!record) return defaults;
  const counts = asRecord(record.pathPlayCounts) ?? {};
  const pathPlayCounts = { ...defaults.pathPlayCounts };
  for (const path of PATH_TYPES) pathPlayCounts[path] = toSafeInt(counts[path]);
  const totalQuestionsAnswered = toSafeInt(record.totalQuestionsAnswered);
  const dailyStreak = toSafeInt(record.dailyStreak);

  return {
    totalQuestionsAnswered,
    totalCorrectAnswers: Math.min(toSafeInt(record.totalCorrectAnswers), totalQuestionsAnswered),
    totalTimeSpent: toSafeInt(record.totalTimeSpent),
    totalGameSessions: toSafeInt(record.totalGameSessions),
    pathsCompleted: toSafeInt(record.pathsCompleted),
    bestOverallAccuracy: toRatio(record.bestOverallAccuracy),
    longestStreak: toSafeInt(record.longestStreak),
    pathPlayCounts,
    favoritePath: isPathType(record.favoritePath) ? record.favoritePath : null,
    lastPlayDate: typeof record.lastPlayDate === 'string' ? toTimestamp(record.lastPlayDate, EPOCH) : null,
    dailyStreak,
    longestDailyStreak: Math.max(toSafeInt(record.longestDailyStreak), dailyStreak)
  };
}

const percentToRatio = (value: unknown) => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) return 0;
  return toRatio(numeric > 1 ? numeric / 100 : numeric);
};

// Legacy saves have no completed list; it is rebuilt from the lifetime correct count.
export function upgradeLegacyProgress(raw: unknown): PathProgress | null {
  const record = asRecord(raw);
  if (!record) return null;
  const pathType = stripEnum(record.pathType, 'PathType');
  if (!isPathType(pathType)) return null;
  const correctAnswers = toSafeInt(record.correctAnswers);
  const reached = PATH_TRACKS[pathType].filter((stop) => correctAnswers >= stop.threshold).map((stop) => stop.checkpoint);
  const track = CheckpointTrack.forPath(pathType, reached);

  return normalizePathProgress({
    pathType,
    currentCheckpoint: track.lastCompleted,
    completedCheckpoints: track.completed,
    answeredQuestionIds: record.answeredQuestionIds,
    powerUpInventory: toBundle(record.powerUpInventory),
    correctAnswers,
    totalQuestions: record.totalQuestions,
    trackCorrect: correctAnswers,
    segmentCorrect: 0,
    segmentTotal: 0,
    bestAccuracy: percentToRatio(record.bestAccuracy),
    totalTimeSpent: record.totalTimeSpent,
    fallbackCount: record.fallbackCount,
    lastPlayed: toTimestamp(record.lastPlayed, EPOCH),
    isCompleted: record.isCompleted === true || track.isComplete
  });
}

export function upgradeLegacySession(raw: unknown): GameSession | null {
  const record = asRecord(raw);
  if (!record) return null;
  return normalizeSession({
    ...record,
    pathType: stripEnum(record.currentPath, 'PathType'),
    sessionStart: toTimestamp(record.sessionStart, EPOCH)
  });
}

export function upgradeLegacyGlobalStats(raw: unknown): GlobalStats {
  const record = asRecord(raw) ?? {};
  const pathPlayCounts: Partial<Record<PathType, number>> = {};
  for (const path of PATH_TYPES) pathPlayCounts[path] = toSafeInt(record[`pathPlayCount_PathType.${path}`]);
  return normalizeGlobalStats({
    ...record,
    bestOverallAccuracy: percentToRatio(record.bestOverallAccuracy),
    pathPlayCounts,
    favoritePath: stripEnum(record.favoritePathType, 'PathType'),
    lastPlayDate: record.lastPlayDate == null ? null : toTimestamp(record.lastPlayDate, EPOCH)
  });
}

const parseJson = (raw: string | null, key: string): unknown => {
  if (raw === null) return null;
  try {
    return JSON.parse(raw);
  } catch (error) {
    log.warn(`stored value for ${key} is not valid JSON: ${describeError(error)}`);
    return null;
  }
};

export type StorageInfo = {
  pathProgressCount: number;
  totalKeys: number;
  estimatedSizeBytes: number;
};

export class ProgressStore {
  private readonly pending = new Map<string, Promise<void>>();

  constructor(private readonly kv: KeyValueStore) {}

  private write(key: string, operation: () => Promise<void>): Promise<void> {
    const previous = this.pending.get(key) ?? Promise.resolve();
    const next = previous.then(operation, operation);
    this.pending.set(key, next);
    return next;
  }

  private async read(key: string): Promise<unknown> {
    await this.pending.get(key)?.catch(() => undefined);
    return parseJson(await this.kv.getItem(key), key);
  }

  save(progress: PathProgress): Promise<void> {
    const json = JSON.stringify(progress);
    return this.write(progressKey(progress.pathType), () => this.kv.setItem(progressKey(progress.pathType), json));
  }

  async load(path: PathType): Promise<PathProgress | null> {
    const raw = await this.read(progressKey(path));
    if (raw === null) return null;
    const progress = normalizePathProgress(raw);
    if (!progress || progress.pathType !== path) {
      log.warn(`discarding malformed progress for ${path}`);
      return null;
    }
    return progress;
  }

  async loadAll(): Promise<Partial<Record<PathType, PathProgress>>> {
    const all: Partial<Record<PathType, PathProgress>> = {};
    for (const path of PATH_TYPES) {
      const progress = await this.load(path);
      if (progress) all[path] = progress;
    }
    return all;
  }

  async getOrCreate(path: PathType, now = new Date()): Promise<PathProgress> {
    return (await this.load(path)) ?? createPathProgress(path, now);
  }

  saveSession(session: GameSession): Promise<void> {
    const json = JSON.stringify(session);
    return this.write(STORAGE_KEYS.session, () => this.kv.setItem(STORAGE_KEYS.session, json));
  }

  async loadSession(): Promise<GameSession | null> {
    const raw = await this.read(STORAGE_KEYS.session);
    if (raw === null) return null;
    const session = normalizeSession(raw);
    if (!session) log.warn('discarding malformed saved session');
    return session;
  }

  clearSession(): Promise<void> {
    return this.write(STORAGE_KEYS.session, () => this.kv.removeItem(STORAGE_KEYS.session));
  }

  saveGlobalStats(stats: GlobalStats): Promise<void> {
    const json = JSON.stringify(stats);
    return this.write(STORAGE_KEYS.globalStats, () => this.kv.setItem(STORAGE_KEYS.globalStats, json));
  }

  async loadGlobalStats(): Promise<GlobalStats> {
    const raw = await this.read(STORAGE_KEYS.globalStats);
    if (raw !== null && !asRecord(raw)) log.warn('discarding malformed global stats');
    return normalizeGlobalStats(raw);
  }

  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending.values()]);
  }

  async clearAll(): Promise<void> {
    await this.flush();
    await this.kv.clear();
    this.pending.clear();
  }

  async storageInfo(): Promise<StorageInfo> {
    const keys = await this.kv.keys();
    let estimatedSizeBytes = 0;
    for (const key of keys) estimatedSizeBytes += (await this.kv.getItem(key))?.length ?? 0;
    return {
      pathProgressCount: keys.filter((key) => key.startsWith(STORAGE_KEYS.progressPrefix)).length,
      totalKeys: keys.length,
      estimatedSizeBytes
    };
  }

  // Returns false when the flag was already set.
  async migrate(): Promise<boolean> {
    if ((await this.kv.getItem(STORAGE_KEYS.migrationFlag)) === 'true') return false;

    const keys = await this.kv.keys();
    let upgraded = 0;
    for (const key of keys.filter((entry) => entry.startsWith(LEGACY_KEYS.progressPrefix))) {
      const progress = upgradeLegacyProgress(parseJson(await this.kv.getItem(key), key));
      if (!progress) {
        log.warn(`skipping unreadable legacy progress at ${key}`);
      } else if ((await this.kv.getItem(progressKey(progress.pathType))) === null) {
        await this.save(progress);
        upgraded += 1;
      }
      await this.kv.removeItem(key);
    }

    if (keys.includes(LEGACY_KEYS.session)) {
      const session = upgradeLegacySession(parseJson(await this.kv.getItem(LEGACY_KEYS.session), LEGACY_KEYS.session));
      if (session && (await this.kv.getItem(STORAGE_KEYS.session)) === null) await this.saveSession(session);
      await this.kv.removeItem(LEGACY_KEYS.session);
    }

    if (keys.includes(LEGACY_KEYS.globalStats)) {
      const raw = parseJson(await this.kv.getItem(LEGACY_KEYS.globalStats), LEGACY_KEYS.globalStats);
      if (asRecord(raw) && (await this.kv.getItem(STORAGE_KEYS.globalStats)) === null) {
        await this.saveGlobalStats(upgradeLegacyGlobalStats(raw));
      }
      await this.kv.removeItem(LEGACY_KEYS.globalStats);
    }

    await this.kv.setItem(STORAGE_KEYS.migrationFlag, 'true');
    if (upgraded > 0) log.info(`migrated ${upgraded} legacy path record(s)`);
    return true;
  }
}
