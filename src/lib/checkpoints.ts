import { CHECKPOINTS, type Checkpoint, type PathType } from './types';

export interface CheckpointInfo {
  displayName: string;
  badgeKey: string;
}

export interface TrackStop {
  checkpoint: Checkpoint;
  threshold: number;
}

export const CHECKPOINT_INFO: Record<Checkpoint, CheckpointInfo> = {
  chihuahua: { displayName: 'Chihuahua', badgeKey: 'badge_chihuahua' },
  pug: { displayName: 'Pug', badgeKey: 'badge_pug' },
  cockerSpaniel: { displayName: 'Cocker Spaniel', badgeKey: 'badge_cocker_spaniel' },
  germanShepherd: { displayName: 'German Shepherd', badgeKey: 'badge_german_shepherd' },
  greatDane: { displayName: 'Great Dane', badgeKey: 'badge_great_dane' },
  deutscheDogge: { displayName: 'Deutsche Dogge', badgeKey: 'badge_deutsche_dogge' }
};

export const PATH_DISPLAY_NAMES: Record<PathType, string> = {
  dogBreeds: 'Dog Breeds',
  dogTraining: 'Dog Training',
  dogBehavior: 'Dog Behavior',
  dogHealth: 'Dog Health',
  dogHistory: 'Dog History'
};

const BREED_LADDER: readonly TrackStop[] = [
  { checkpoint: 'chihuahua', threshold: 10 },
  { checkpoint: 'pug', threshold: 25 },
  { checkpoint: 'cockerSpaniel', threshold: 50 },
  { checkpoint: 'germanShepherd', threshold: 75 },
  { checkpoint: 'greatDane', threshold: 100 }
];

const TREASURE_TRAIL: readonly TrackStop[] = [
  { checkpoint: 'chihuahua', threshold: 10 },
  { checkpoint: 'pug', threshold: 15 },
  { checkpoint: 'cockerSpaniel', threshold: 25 },
  { checkpoint: 'germanShepherd', threshold: 35 },
  { checkpoint: 'greatDane', threshold: 45 },
  { checkpoint: 'deutscheDogge', threshold: 60 }
];

export const PATH_TRACKS: Record<PathType, readonly TrackStop[]> = {
  dogBreeds: BREED_LADDER,
  dogTraining: TREASURE_TRAIL,
  dogBehavior: TREASURE_TRAIL,
  dogHealth: TREASURE_TRAIL,
  dogHistory: TREASURE_TRAIL
};

export const checkpointOrder = (checkpoint: Checkpoint) => CHECKPOINTS.indexOf(checkpoint);

export const finalCheckpointFor = (path: PathType): Checkpoint => {
  const stops = PATH_TRACKS[path];
  return stops[stops.length - 1].checkpoint;
};

// Completion only counts when every stop was recorded in track order.
export class CheckpointTrack {
  readonly path: PathType;
  readonly stops: readonly TrackStop[];
  private readonly completedSet = new Set<Checkpoint>();
  private current: Checkpoint | null = null;
  // Index of the last stop reached in order; -1 before the first.
  private inOrder = -1;

  constructor(path: PathType, stops: readonly TrackStop[] = PATH_TRACKS[path]) {
    this.path = path;
    this.stops = stops;
  }

  static forPath(path: PathType, completed: readonly Checkpoint[] = []): CheckpointTrack {
    const track = new CheckpointTrack(path);
    for (const checkpoint of completed) track.completeCheckpoint(checkpoint);
    return track;
  }

  get checkpoints(): Checkpoint[] {
    return this.stops.map((stop) => stop.checkpoint);
  }

  get currentCheckpoint(): Checkpoint | null {
    return this.current;
  }

  get completed(): Checkpoint[] {
    return this.checkpoints.filter((checkpoint) => this.completedSet.has(checkpoint));
  }

  get lastCompleted(): Checkpoint | null {
    const done = this.completed;
    return done.length ? done[done.length - 1] : null;
  }

  get isComplete(): boolean {
    return this.inOrder === this.stops.length - 1;
  }

  includes(checkpoint: Checkpoint): boolean {
    return this.stops.some((stop) => stop.checkpoint === checkpoint);
  }

  isCompleted(checkpoint: Checkpoint): boolean {
    return this.completedSet.has(checkpoint);
  }

  thresholdOf(checkpoint: Checkpoint): number | null {
    return this.stops.find((stop) => stop.checkpoint === checkpoint)?.threshold ?? null;
  }

  private indexOf(checkpoint: Checkpoint) {
    return this.stops.findIndex((stop) => stop.checkpoint === checkpoint);
  }

  /** Returns false when the checkpoint is not on this path or was already recorded. */
  completeCheckpoint(checkpoint: Checkpoint): boolean {
    const index = this.indexOf(checkpoint);
    if (index === -1 || this.completedSet.has(checkpoint)) return false;
    this.completedSet.add(checkpoint);
    if (index === this.inOrder + 1) this.inOrder = index;
    if (this.current === null || index >= this.indexOf(this.current)) {
      this.current = checkpoint;
    }
    return true;
  }

  nextCheckpoint(answeredCount: number): Checkpoint | null {
    return this.stops.find((stop) => stop.threshold > answeredCount)?.checkpoint ?? null;
  }

  questionsRemaining(answeredCount: number): number {
    const next = this.nextCheckpoint(answeredCount);
    if (next === null) return 0;
    return Math.max(0, (this.thresholdOf(next) ?? 0) - answeredCount);
  }

  /** First not-yet-recorded checkpoint the count has reached; one at a time. */
  pendingCheckpoint(answeredCount: number): Checkpoint | null {
    return (
      this.stops.find((stop) => stop.threshold <= answeredCount && !this.completedSet.has(stop.checkpoint))
        ?.checkpoint ?? null
    );
  }

  progressToNext(answeredCount: number): number {
    const next = this.nextCheckpoint(answeredCount);
    if (next === null) return 1;
    const index = this.indexOf(next);
    const floor = index > 0 ? this.stops[index - 1].threshold : 0;
    const span = this.stops[index].threshold - floor;
    if (span <= 0) return 1;
    return Math.min(1, Math.max(0, (answeredCount - floor) / span));
  }

  segmentLabel(answeredCount: number): string {
    const next = this.nextCheckpoint(answeredCount);
    if (next === null) return 'Path completed!';
    const index = this.indexOf(next);
    const floor = index > 0 ? this.stops[index - 1].threshold : 0;
    const done = Math.max(0, answeredCount - floor);
    return `${done}/${this.stops[index].threshold - floor} questions to ${CHECKPOINT_INFO[next].displayName}`;
  }
}
