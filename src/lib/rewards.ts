import { GAME_RULES } from './config';
import { CHECKPOINTS, POWER_UP_TYPES, type Checkpoint, type PowerUpType, type RewardBundle } from './types';

const bundle = (fiftyFifty: number, hint: number, extraTime: number, skip: number, secondChance: number): RewardBundle => ({
  fiftyFifty,
  hint,
  extraTime,
  skip,
  secondChance
});

export const BASE_REWARDS: Record<Checkpoint, RewardBundle> = {
  chihuahua: bundle(2, 2, 1, 0, 0),
  pug: bundle(2, 2, 1, 1, 0),
  cockerSpaniel: bundle(2, 2, 2, 1, 0),
  germanShepherd: bundle(2, 2, 2, 2, 1),
  greatDane: bundle(3, 3, 3, 3, 3),
  deutscheDogge: bundle(4, 4, 4, 4, 4)
};

export const ACCURACY_BONUS: RewardBundle = bundle(1, 1, 1, 1, 1);

export const emptyBundle = (): RewardBundle => bundle(0, 0, 0, 0, 0);

export const mergeBundles = (a: RewardBundle, b: Partial<RewardBundle>): RewardBundle => {
  const merged = emptyBundle();
  for (const type of POWER_UP_TYPES) merged[type] = Math.max(0, (a[type] ?? 0) + (b[type] ?? 0));
  return merged;
};

export const bundleTotal = (rewards: Partial<RewardBundle>) =>
  POWER_UP_TYPES.reduce((sum, type) => sum + (rewards[type] ?? 0), 0);

export const baseRewardsFor = (checkpoint: Checkpoint): RewardBundle => ({ ...BASE_REWARDS[checkpoint] });

export const bonusRewardsFor = (accuracy: number): RewardBundle =>
  accuracy >= GAME_RULES.bonusAccuracyThreshold ? { ...ACCURACY_BONUS } : emptyBundle();

export function rewardsFor(checkpoint: Checkpoint, accuracy: number): RewardBundle {
  return mergeBundles(baseRewardsFor(checkpoint), bonusRewardsFor(accuracy));
}

export const totalRewardCount = (checkpoint: Checkpoint, accuracy: number) => bundleTotal(rewardsFor(checkpoint, accuracy));

export const previewBundles = (checkpoint: Checkpoint) => ({
  base: baseRewardsFor(checkpoint),
  bonus: bonusRewardsFor(GAME_RULES.bonusAccuracyThreshold)
});

export function validateDistribution(checkpoints: readonly Checkpoint[] = CHECKPOINTS): boolean {
  if (checkpoints.length === 0) return false;
  const final = BASE_REWARDS[checkpoints[checkpoints.length - 1]];
  if (POWER_UP_TYPES.some((type) => final[type] <= 0)) return false;
  for (let i = 1; i < checkpoints.length; i += 1) {
    const previous = BASE_REWARDS[checkpoints[i - 1]];
    const current = BASE_REWARDS[checkpoints[i]];
    const regressed = POWER_UP_TYPES.some((type: PowerUpType) => current[type] < previous[type]);
    if (regressed) return false;
  }
  return true;
}
