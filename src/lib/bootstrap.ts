import { resolveConfig, type DogDogConfig } from './config';
import { GameController } from './game-controller';
import { FileKeyValueStore } from './kv-store';
import { log, setLogLevel } from './log';
import { QuestionPool } from './question-pool';
import { loadQuestionDataset } from './questions';
import { ProgressStore } from './storage';

export async function createGameController(config: DogDogConfig = resolveConfig()): Promise<GameController> {
  setLogLevel(config.logLevel);
  const questions = await loadQuestionDataset(config.questionsPath);
  log.info(`loaded ${questions.length} questions from ${config.questionsPath}`);
  const controller = new GameController({
    pool: QuestionPool.from(questions),
    store: new ProgressStore(new FileKeyValueStore(config.dataDir)),
    locale: config.locale
  });
  await controller.initialize();
  return controller;
}
