import { resolveConfig } from '../src/lib/config';
import { PATH_TRACKS } from '../src/lib/checkpoints';
import { loadQuestionDataset } from '../src/lib/questions';
import { validateDistribution } from '../src/lib/rewards';
import { DIFFICULTIES, PATH_TYPES, type Question } from '../src/lib/types';

const MIN_PER_PATH = 8;

function answerListProblems(question: Question): string[] {
  const problems: string[] = [];
  const lengths = Object.entries(question.answers).map(([locale, list]) => [locale, list?.length ?? 0] as const);
  const expected = lengths[0]?.[1] ?? 0;
  for (const [locale, length] of lengths) {
    if (length !== expected) problems.push(`${question.id}: ${locale} has ${length} answers, expected ${expected}`);
  }
  if (expected < 3) problems.push(`${question.id}: only ${expected} answers, 50/50 needs at least 3`);
  if (!question.hint.en) problems.push(`${question.id}: missing English hint`);
  return problems;
}

async function main() {
  const { questionsPath } = resolveConfig();
  const questions = await loadQuestionDataset(questionsPath);
  console.log(`Loaded ${questions.length} questions from ${questionsPath}`);

  const problems: string[] = [];
  for (const path of PATH_TYPES) {
    const onPath = questions.filter((question) => question.category === path);
    const counts = DIFFICULTIES.map((difficulty) => `${difficulty} ${onPath.filter((q) => q.difficulty === difficulty).length}`);
    console.log(`${path.padEnd(12)} ${String(onPath.length).padStart(3)} | ${counts.join(', ')}`);
    if (onPath.length < MIN_PER_PATH) problems.push(`${path}: only ${onPath.length} questions`);
    for (const difficulty of DIFFICULTIES) {
      if (!onPath.some((question) => question.difficulty === difficulty)) problems.push(`${path}: no ${difficulty} questions`);
    }
    const finalThreshold = PATH_TRACKS[path][PATH_TRACKS[path].length - 1].threshold;
    if (onPath.length < finalThreshold) {
      console.log(`  note: ${finalThreshold} correct answers needed to finish, repeats will be served`);
    }
  }

  for (const question of questions) problems.push(...answerListProblems(question));
  if (!validateDistribution()) problems.push('checkpoint reward table is not monotonic');

  if (problems.length) {
    console.error(`Found ${problems.length} problem(s):\n${problems.join('\n')}`);
    process.exitCode = 1;
  } else {
    console.log('Dataset OK');
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
