import { PATH_TRACKS } from '../src/lib/checkpoints';
import { resolveConfig } from '../src/lib/config';
import { GameController } from '../src/lib/game-controller';
import { MemoryKeyValueStore } from '../src/lib/kv-store';
import { setLogLevel } from '../src/lib/log';
import { QuestionPool } from '../src/lib/question-pool';
import { loadQuestionDataset } from '../src/lib/questions';
import { ProgressStore } from '../src/lib/storage';
import { DIFFICULTIES, PATH_TYPES, type Difficulty, type PathType, type Question } from '../src/lib/types';

const PLAYERS = [
  { name: 'Puppy', accuracy: 0.55 },
  { name: 'Good boy', accuracy: 0.75 },
  { name: 'Top dog', accuracy: 0.92 }
];
const MAX_ANSWERS = 600;

// Small deterministic generator so runs are comparable.
const seeded = (seed: number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

async function runPlayer(questions: Question[], path: PathType, accuracy: number, seed: number) {
  const random = seeded(seed);
  const controller = new GameController({
    pool: QuestionPool.from(questions, { random }),
    store: new ProgressStore(new MemoryKeyValueStore()),
    random
  });
  await controller.initialize();
  controller.startSession(path);

  const served: Record<Difficulty, number> = { easy: 0, medium: 0, hard: 0, expert: 0 };
  let answers = 0;
  let fallbacks = 0;
  while (answers < MAX_ANSWERS) {
    const question = controller.currentQuestion();
    if (!question) break;
    served[question.difficulty] += 1;
    const pick = random() < accuracy ? question.correctAnswerIndex : (question.correctAnswerIndex + 1) % 3;
    const outcome = controller.submitAnswer(question.id, pick);
    if (outcome.kind === 'rejected') throw new Error(`answer rejected: ${outcome.reason}`);
    answers += 1;
    if (outcome.pathCompleted) break;
    if (outcome.livesExhausted) {
      controller.onLivesExhausted();
      fallbacks += 1;
    }
  }
  await controller.flush();
  return { progress: controller.progressFor(path), served, answers, fallbacks };
}

async function main() {
  setLogLevel('warn');
  const questions = await loadQuestionDataset(resolveConfig().questionsPath);
  let failures = 0;

  for (const player of PLAYERS) {
    console.log(`\n=== ${player.name} (accuracy ${(player.accuracy * 100).toFixed(0)}%) ===`);
    for (const [index, path] of PATH_TYPES.entries()) {
      const run = await runPlayer(questions, path, player.accuracy, 1000 + index);
      const stops = PATH_TRACKS[path].length;
      const mix = DIFFICULTIES.map((difficulty) => `${difficulty} ${((run.served[difficulty] / Math.max(1, run.answers)) * 100).toFixed(0)}%`);
      console.log(
        `${path.padEnd(12)} ${run.progress.completedCheckpoints.length}/${stops} checkpoints, ${run.answers} answers, ${run.fallbacks} fallbacks | ${mix.join(', ')}`
      );
      if (run.progress.completedCheckpoints.length !== new Set(run.progress.completedCheckpoints).size) {
        console.error(`  duplicate checkpoint recorded on ${path}`);
        failures += 1;
      }
    }
  }

  if (failures) process.exitCode = 1;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
