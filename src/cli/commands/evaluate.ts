/**
 * Evaluate Command Handler
 *
 * One-shot evaluation of a writing sample read from a file, or from stdin
 * when the path is '-'. Prints the score headline and feedback, or the full
 * evaluation as JSON with --json.
 *
 * ```bash
 * npm run cli -- evaluate my-diary.txt --grade "Grades 1-2" --type Diary
 * cat letter.txt | npm run cli -- evaluate - --type Letter --json
 * ```
 */

import { readFile } from 'node:fs/promises';
import type { WritingEvaluator } from '../../core/evaluation';
import type { WritingContext } from '../../core/models';
import { describeScore } from '../../core/scoring';
import { dim, formatScoreHeadline, formatSeparator, formatSettings, printBlankLine } from '../utils/terminal';

export interface EvaluateCommandOptions {
  json?: boolean;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function readWritingSample(source: string): Promise<string> {
  return source === '-' ? readStdin() : readFile(source, 'utf8');
}

export async function runEvaluateCommand(
  evaluator: Pick<WritingEvaluator, 'evaluate'>,
  source: string,
  context: WritingContext,
  options: EvaluateCommandOptions = {}
): Promise<void> {
  const text = await readWritingSample(source);
  const evaluation = await evaluator.evaluate(text, context);

  if (options.json) {
    console.log(JSON.stringify({ ...evaluation, band: describeScore(evaluation.score) }, null, 2));
    return;
  }

  printBlankLine();
  console.log(dim(formatSettings(context)));
  console.log(formatSeparator(60));
  console.log(formatScoreHeadline(evaluation.score));
  printBlankLine();
  console.log(evaluation.feedback);
  console.log(formatSeparator(60));
  if (evaluation.status === 'fallback') {
    console.log(dim(`(fallback: ${evaluation.fallbackReason}, ${evaluation.attempts} attempt(s))`));
  }
  printBlankLine();
}
