/**
 * CLI Entry Point for the Writing Tutor
 *
 * Commands:
 * - `chat` - Interactive session: evaluate writing or chat with the teacher
 * - `evaluate <file>` - Score one writing sample ('-' reads stdin)
 * - `options` - List grades, subjects and writing types
 *
 * Usage:
 * ```bash
 * npm run cli -- chat
 * npm run cli -- chat --mode chat --grade 3 --subject Science
 * npm run cli -- evaluate essay.txt --type "Persuasive essay" --json
 * npm run cli -- options
 * ```
 *
 * ANTHROPIC_API_KEY is read from the environment or a .env file.
 */

import 'dotenv/config';
import { Command, Option } from 'commander';
import { config } from '../config';
import { WritingEvaluator } from '../core/evaluation';
import { WritingTutor } from '../core/conversation';
import type { WritingContext } from '../core/models';
import { TutorSessionEngine, WritingSession, isTutorMode } from '../core/session';
import {
  DEFAULT_WRITING_CONTEXT,
  GRADE_OPTIONS,
  SUBJECT_OPTIONS,
  WRITING_TYPE_OPTIONS,
} from '../core/settings';
import { AnthropicClient, LLMError } from '../llm';
import { runChatCommand } from './commands/chat';
import { runEvaluateCommand } from './commands/evaluate';
import { runOptionsCommand } from './commands/options';
import { resolveOption } from './commands/slash-commands';
import { dim, red } from './utils/terminal';

interface SettingsCliOptions {
  grade?: string;
  subject?: string;
  type?: string;
}

interface ChatCliOptions extends SettingsCliOptions {
  mode: string;
}

interface EvaluateCliOptions extends SettingsCliOptions {
  json?: boolean;
}

function settingsFromOptions(options: SettingsCliOptions): WritingContext {
  return {
    grade: options.grade ? resolveOption(options.grade, GRADE_OPTIONS) : DEFAULT_WRITING_CONTEXT.grade,
    subject: options.subject
      ? resolveOption(options.subject, SUBJECT_OPTIONS)
      : DEFAULT_WRITING_CONTEXT.subject,
    writingType: options.type
      ? resolveOption(options.type, WRITING_TYPE_OPTIONS)
      : DEFAULT_WRITING_CONTEXT.writingType,
  };
}

/**
 * Creates the model client, exiting with instructions if no key is set.
 * Delayed until a command needs it so `options` works without a key.
 */
function createClient(): AnthropicClient {
  try {
    return new AnthropicClient({ model: config.anthropic.model });
  } catch (error) {
    if (error instanceof LLMError && error.type === 'authentication') {
      console.log(red('Error: ANTHROPIC_API_KEY environment variable is not set.'));
      console.log(dim('Set it in your shell or in a .env file, then try again.'));
      process.exit(1);
    }
    throw error;
  }
}

function addSettingsOptions(command: Command): Command {
  return command
    .option('-g, --grade <grade>', 'Grade band (name or number from `options`)')
    .option('-s, --subject <subject>', 'Subject (name or number)')
    .option('-t, --type <writingType>', 'Writing type (name or number)');
}

function createProgram(): Command {
  const program = new Command('writing-tutor')
    .description('AI writing tutor: rubric feedback and friendly chat for young writers')
    .version('0.1.0');

  addSettingsOptions(
    program
      .command('chat')
      .description('Start an interactive tutoring session')
      .addOption(
        new Option('-m, --mode <mode>', 'Starting mode').choices(['evaluate', 'chat']).default('evaluate')
      )
  ).action(async (options: ChatCliOptions) => {
    const client = createClient();
    const requestTimeoutMs = config.anthropic.requestTimeoutMs;
    const engine = new TutorSessionEngine({
      evaluator: new WritingEvaluator(client, { requestTimeoutMs }),
      tutor: new WritingTutor(client, { requestTimeoutMs }),
    });
    const session = new WritingSession({
      mode: isTutorMode(options.mode) ? options.mode : 'evaluate',
      settings: settingsFromOptions(options),
    });

    await runChatCommand(engine, session);
  });

  addSettingsOptions(
    program
      .command('evaluate')
      .description("Score a writing sample ('-' reads from stdin)")
      .argument('<file>', 'Text file with the writing')
      .option('--json', 'Print the evaluation as JSON')
  ).action(async (file: string, options: EvaluateCliOptions) => {
    const evaluator = new WritingEvaluator(createClient(), {
      requestTimeoutMs: config.anthropic.requestTimeoutMs,
    });
    await runEvaluateCommand(evaluator, file, settingsFromOptions(options), {
      json: options.json,
    });
  });

  program
    .command('options')
    .description('List grades, subjects and writing types')
    .action(() => {
      runOptionsCommand();
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(red('\nFatal error:'));
    console.error(dim(error instanceof Error ? error.message : String(error)));

    if (process.env.DEBUG && error instanceof Error) {
      console.error(dim(error.stack || ''));
    }

    process.exit(1);
  });
