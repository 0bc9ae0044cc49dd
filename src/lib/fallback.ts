import { CHECKPOINT_INFO, PATH_DISPLAY_NAMES, type CheckpointTrack } from './checkpoints';
import { GAME_RULES } from './config';
import { checkpointDifficultyLevel } from './difficulty';
import type { QuestionPool } from './question-pool';
import { bundleTotal, emptyBundle } from './rewards';
import { isPathType, type Checkpoint, type FallbackResult, type PathType, type Question, type RewardBundle } from './types';

// Independent of BASE_REWARDS in rewards.ts; neither table is derived from the other.
export const CONSOLATION_REWARDS: Record<Checkpoint, RewardBundle> = {
  chihuahua: { fiftyFifty: 1, hint: 1, extraTime: 1, skip: 1, secondChance: 1 },
  pug: { fiftyFifty: 1, hint: 1, extraTime: 1, skip: 1, secondChance: 1 },
  cockerSpaniel: { fiftyFifty: 1, hint: 1, extraTime: 1, skip: 1, secondChance: 1 },
  germanShepherd: { fiftyFifty: 2, hint: 2, extraTime: 1, skip: 1, secondChance: 1 },
  greatDane: { fiftyFifty: 2, hint: 2, extraTime: 1, skip: 1, secondChance: 1 },
  deutscheDogge: { fiftyFifty: 2, hint: 2, extraTime: 1, skip: 1, secondChance: 1 }
};

const CHECKPOINT_MESSAGES: Record<Checkpoint, string> = {
  chihuahua:
    "Don't worry! You're back at the Chihuahua checkpoint with full lives and a few power-ups. Keep going!",
  pug: "You're back at the Pug checkpoint. Your lives are full again. Keep pushing forward!",
  cockerSpaniel: "You're back at the Cocker Spaniel checkpoint with fresh power-ups. Try again!",
  germanShepherd: 'Back to the German Shepherd checkpoint! You kept everything you earned. You can do this!',
  greatDane: "Back at the Great Dane checkpoint. You're so close to the end! Use your power-ups wisely.",
  deutscheDogge: 'Back at the Deutsche Dogge checkpoint. Your lives are restored. One more push!'
};

export const consolationRewardsFor = (checkpoint: Checkpoint): RewardBundle => ({ ...CONSOLATION_REWARDS[checkpoint] });

export const checkpointFallbackMessage = (checkpoint: Checkpoint) => CHECKPOINT_MESSAGES[checkpoint];

export const pathRestartMessage = (path: PathType) =>
  `Starting fresh on the ${PATH_DISPLAY_NAMES[path]} path. You haven't reached a checkpoint yet, but every expert started here. Good luck!`;

export type GameOverInput = {
  path: PathType | null | undefined;
  track: CheckpointTrack | null | undefined;
  livesRemaining?: number;
};

export type FallbackStatistics = {
  action: FallbackResult['kind'];
  checkpoint: string | null;
  path: string | null;
  completedCheckpoints: number;
  questionsAnswered: number;
  restoredLives: number;
  awardedPowerUps: number;
  message: string;
};

export class FallbackPolicy {
  constructor(private readonly pool: QuestionPool) {}

  handleGameOver({ path, track, livesRemaining = 0 }: GameOverInput): FallbackResult {
    if (!path || !track) {
      return { kind: 'error', reason: 'no_active_path', message: 'No path is active. Please pick a path to start playing.' };
    }
    if (!isPathType(path) || track.path !== path) {
      return { kind: 'error', reason: 'unknown_path', message: 'Something went wrong with this path. Please restart the game.' };
    }
    if (livesRemaining > 0) {
      return { kind: 'error', reason: 'lives_remaining', message: 'You still have lives left. Keep playing!' };
    }

    const lastCompleted = track.lastCompleted;
    if (lastCompleted) {
      return {
        kind: 'resetToCheckpoint',
        checkpoint: lastCompleted,
        restoredLives: GAME_RULES.maxLives,
        awardedPowerUps: consolationRewardsFor(lastCompleted),
        message: checkpointFallbackMessage(lastCompleted)
      };
    }
    return {
      kind: 'restartFromBeginning',
      restoredLives: GAME_RULES.maxLives,
      awardedPowerUps: emptyBundle(),
      message: pathRestartMessage(path)
    };
  }

  canResetToCheckpoint(track: CheckpointTrack): boolean {
    return track.lastCompleted !== null;
  }

  hasEnoughQuestionsForRestart(path: PathType, excludeIds: ReadonlySet<string> | readonly string[], requiredCount: number) {
    return this.pool.hasEnough(path, excludeIds, requiredCount);
  }

  questionsForRestart(
    result: FallbackResult,
    path: PathType,
    excludeIds: ReadonlySet<string> | readonly string[],
    count: number
  ): Question[] {
    if (result.kind === 'error') return [];
    const level = result.kind === 'resetToCheckpoint' ? checkpointDifficultyLevel(result.checkpoint) : 1;
    return this.pool.questionsForCheckpointRestart(path, excludeIds, count, level);
  }

  describe(result: FallbackResult, track: CheckpointTrack | null, questionsAnswered: number): FallbackStatistics {
    return {
      action: result.kind,
      checkpoint: result.kind === 'resetToCheckpoint' ? CHECKPOINT_INFO[result.checkpoint].displayName : null,
      path: track ? PATH_DISPLAY_NAMES[track.path] : null,
      completedCheckpoints: track?.completed.length ?? 0,
      questionsAnswered,
      restoredLives: result.kind === 'error' ? 0 : result.restoredLives,
      awardedPowerUps: result.kind === 'error' ? 0 : bundleTotal(result.awardedPowerUps),
      message: result.message
    };
  }
}
