import { useCallback, useSyncExternalStore } from 'react';
import type { GameController } from '../lib/game-controller';
import type { PathType, PowerUpType } from '../lib/types';

export function useGameSession(controller: GameController) {
  const snapshot = useSyncExternalStore(controller.subscribe, controller.getSnapshot);

  const startSession = useCallback((path: PathType) => controller.startSession(path), [controller]);
  const submitAnswer = useCallback(
    (questionId: string, selectedIndex: number) => controller.submitAnswer(questionId, selectedIndex),
    [controller]
  );
  const usePowerUp = useCallback((type: PowerUpType) => controller.usePowerUp(type), [controller]);
  const onLivesExhausted = useCallback(() => controller.onLivesExhausted(), [controller]);

  return { snapshot, startSession, submitAnswer, usePowerUp, onLivesExhausted };
}
