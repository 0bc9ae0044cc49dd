import { describe, expect, it } from 'vitest';
import { CheckpointTrack, PATH_TRACKS, finalCheckpointFor } from '../lib/checkpoints';
import { CHECKPOINTS, PATH_TYPES } from '../lib/types';

describe('CheckpointTrack', () => {
  it('walks the breed ladder from 9 to 10 correct answers', () => {
    const track = CheckpointTrack.forPath('dogBreeds');
    expect(track.nextCheckpoint(9)).toBe('chihuahua');
    expect(track.questionsRemaining(9)).toBe(1);

    expect(track.completeCheckpoint('chihuahua')).toBe(true);
    expect(track.nextCheckpoint(10)).toBe('pug');
    expect(track.thresholdOf('pug')).toBe(25);
    expect(track.currentCheckpoint).toBe('chihuahua');
  });

  it('returns null for the next checkpoint exactly when every threshold is reached', () => {
    for (const path of PATH_TYPES) {
      const track = CheckpointTrack.forPath(path);
      const stops = PATH_TRACKS[path];
      const last = stops[stops.length - 1].threshold;
      let previousIndex = -1;
      for (let n = 0; n <= last + 5; n += 1) {
        const next = track.nextCheckpoint(n);
        expect(next === null).toBe(n >= last);
        const index = next === null ? stops.length : stops.findIndex((stop) => stop.checkpoint === next);
        expect(index).toBeGreaterThanOrEqual(previousIndex);
        previousIndex = index;
      }
    }
  });

  it('uses the six-stop trail outside of breeds', () => {
    const track = CheckpointTrack.forPath('dogTraining');
    expect(track.checkpoints).toEqual(CHECKPOINTS);
    expect(track.nextCheckpoint(59)).toBe('deutscheDogge');
    expect(track.questionsRemaining(59)).toBe(1);
    expect(finalCheckpointFor('dogTraining')).toBe('deutscheDogge');
    expect(finalCheckpointFor('dogBreeds')).toBe('greatDane');
  });

  it('records out-of-order completion without moving the current checkpoint back', () => {
    const track = CheckpointTrack.forPath('dogBreeds');
    track.completeCheckpoint('pug');
    track.completeCheckpoint('chihuahua');
    expect(track.currentCheckpoint).toBe('pug');
    expect(track.completed).toEqual(['chihuahua', 'pug']);
    expect(track.lastCompleted).toBe('pug');
  });

  it('rejects repeats and checkpoints that are not on the path', () => {
    const track = CheckpointTrack.forPath('dogBreeds', ['chihuahua']);
    expect(track.completeCheckpoint('chihuahua')).toBe(false);
    expect(track.completeCheckpoint('deutscheDogge')).toBe(false);
    expect(track.completed).toEqual(['chihuahua']);
  });

  it('is complete only once every stop is recorded', () => {
    const track = CheckpointTrack.forPath('dogBreeds');
    const stops = PATH_TRACKS.dogBreeds.map((stop) => stop.checkpoint);
    stops.slice(0, -1).forEach((checkpoint) => track.completeCheckpoint(checkpoint));
    expect(track.isComplete).toBe(false);
    track.completeCheckpoint('greatDane');
    expect(track.isComplete).toBe(true);
    expect(track.nextCheckpoint(100)).toBeNull();
  });

  it('is not complete when the stops were recorded in reverse', () => {
    const track = CheckpointTrack.forPath('dogBreeds');
    const stops = PATH_TRACKS.dogBreeds.map((stop) => stop.checkpoint);
    [...stops].reverse().forEach((checkpoint) => track.completeCheckpoint(checkpoint));
    expect(track.completed).toEqual(stops);
    expect(track.currentCheckpoint).toBe('greatDane');
    expect(track.isComplete).toBe(false);
  });

  it('stays complete when reloaded from the saved completion list', () => {
    const stops = PATH_TRACKS.dogTraining.map((stop) => stop.checkpoint);
    expect(CheckpointTrack.forPath('dogTraining', stops).isComplete).toBe(true);
    expect(CheckpointTrack.forPath('dogTraining', stops.slice(1)).isComplete).toBe(false);
  });

  it('reports the first reached checkpoint that is still pending', () => {
    const track = CheckpointTrack.forPath('dogBreeds');
    expect(track.pendingCheckpoint(9)).toBeNull();
    expect(track.pendingCheckpoint(12)).toBe('chihuahua');
    track.completeCheckpoint('chihuahua');
    expect(track.pendingCheckpoint(12)).toBeNull();
    expect(track.pendingCheckpoint(30)).toBe('pug');
  });

  it('describes progress inside the current segment', () => {
    const track = CheckpointTrack.forPath('dogBreeds');
    expect(track.segmentLabel(9)).toBe('9/10 questions to Chihuahua');
    expect(track.segmentLabel(30)).toBe('5/25 questions to Cocker Spaniel');
    expect(track.progressToNext(30)).toBeCloseTo(0.2, 10);
    expect(track.segmentLabel(100)).toBe('Path completed!');
    expect(track.progressToNext(100)).toBe(1);
  });
});
