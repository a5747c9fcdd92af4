/**
 * Chat Command Handler
 *
 * Interactive tutoring session in the terminal. The loop mirrors the web
 * tutor: in evaluate mode the student writes (possibly over several lines)
 * and submits with an empty line; in chat mode every line goes to the
 * teacher. Slash commands switch mode, change settings and reset. Lines
 * typed while the teacher is answering are handled once the answer is shown.
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- chat --grade "Grades 5-6" --mode chat
 * ```
 */

import * as readline from 'node:readline';
import type { WritingContext } from '../../core/models';
import type { TutorSessionEngine, WritingSession } from '../../core/session';
import { GRADE_OPTIONS, SUBJECT_OPTIONS, WRITING_TYPE_OPTIONS } from '../../core/settings';
import {
  bold,
  dim,
  red,
  yellow,
  formatMode,
  formatScoreHeadline,
  formatSettings,
  formatTutorMessage,
  printBlankLine,
  printChatBanner,
  printCommandsHelp,
} from '../utils/terminal';
import { createLineQueue } from '../utils/line-queue';
import { isSlashCommand, parseSlashCommand, resolveOption, type SettingKey } from './slash-commands';

const SETTING_OPTIONS: Record<SettingKey, readonly string[]> = {
  grade: GRADE_OPTIONS,
  subject: SUBJECT_OPTIONS,
  writingType: WRITING_TYPE_OPTIONS,
};

const SETTING_KEYS: readonly SettingKey[] = ['grade', 'subject', 'writingType'];

const SETTING_LABELS: Record<SettingKey, string> = {
  grade: 'Grade',
  subject: 'Subject',
  writingType: 'Writing type',
};

/**
 * Runs the interactive loop until the student quits or input closes.
 */
export async function runChatCommand(
  engine: TutorSessionEngine,
  session: WritingSession
): Promise<void> {
  printChatBanner(session.mode, session.settings);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: bold('You: '),
  });

  /** Lines of writing collected in evaluate mode, not yet submitted */
  let draft: string[] = [];
  let ended = false;

  const promptAgain = () => {
    if (!ended) {
      rl.setPrompt(bold(draft.length > 0 ? '...  ' : 'You: '));
      rl.prompt();
    }
  };

  const submit = async (text: string) => {
    console.log(dim(session.mode === 'evaluate' ? 'Reading your writing...' : 'Thinking...'));

    const result = await engine.submit(session, text);

    printBlankLine();
    if (result.evaluation) {
      console.log(formatScoreHeadline(result.evaluation.score));
    }
    console.log(formatTutorMessage(result.tutorTurn.content));
    printBlankLine();
  };

  const handleLine = async (input: string) => {
    if (ended) {
      return;
    }
    const line = input.trimEnd();

    if (isSlashCommand(line)) {
      const command = parseSlashCommand(line);

      switch (command.type) {
        case 'quit':
          ended = true;
          rl.close();
          return;
        case 'help':
          printCommandsHelp();
          return;
        case 'status':
          printStatus(session, draft.length);
          return;
        case 'mode':
          engine.setMode(session, command.mode);
          draft = [];
          console.log(`Mode: ${formatMode(command.mode)}`);
          return;
        case 'settings_show':
          printSettings(session.settings);
          return;
        case 'settings_set': {
          const value = resolveOption(command.value, SETTING_OPTIONS[command.key]);
          const update: Partial<WritingContext> = {};
          update[command.key] = value;
          const settings = engine.updateSettings(session, update);
          console.log(`Settings: ${formatSettings(settings)}`);
          return;
        }
        case 'submit': {
          const text = draft.join('\n');
          draft = [];
          if (!text.trim()) {
            console.log(yellow('Nothing to submit yet.'));
            return;
          }
          await submit(text);
          return;
        }
        case 'reset':
          engine.reset(session);
          draft = [];
          console.log(dim('Started over. Mode is back to evaluate.'));
          return;
        case 'invalid':
          console.log(yellow(command.message));
          return;
        case 'unknown':
          console.log(yellow(`Unknown command: ${command.command}. Type /help for commands.`));
          return;
      }
    }

    if (session.mode === 'chat') {
      if (line.trim()) {
        await submit(line.trim());
      }
      return;
    }

    // Evaluate mode: collect lines, an empty line submits
    if (line.trim()) {
      draft.push(line);
      return;
    }
    if (draft.length > 0) {
      const text = draft.join('\n');
      draft = [];
      await submit(text);
    }
  };

  let toldToWait = false;

  const lines = createLineQueue({
    handle: handleLine,
    onQueued: () => {
      if (session.isProcessing && !toldToWait) {
        toldToWait = true;
        console.log(dim('Got it. I will read what you typed after this reply.'));
      }
    },
    onError: (error) => {
      console.log(red('\nSomething went wrong:'));
      console.log(dim(error instanceof Error ? error.message : String(error)));
      printBlankLine();
    },
    onIdle: () => {
      toldToWait = false;
      promptAgain();
    },
  });

  rl.on('line', (input: string) => lines.push(input));

  rl.on('SIGINT', () => {
    ended = true;
    rl.close();
  });

  promptAgain();

  await new Promise<void>((resolve) => {
    rl.on('close', () => {
      console.log(dim('\nGoodbye! Keep writing.'));
      resolve();
    });
  });
}

function printStatus(session: WritingSession, draftLines: number): void {
  printBlankLine();
  console.log(`  Mode: ${formatMode(session.mode)}`);
  console.log(`  Settings: ${formatSettings(session.settings)}`);
  console.log(`  Messages so far: ${session.turnCount}`);
  if (draftLines > 0) {
    console.log(`  Unsent lines: ${draftLines}`);
  }
  printBlankLine();
}

function printSettings(settings: WritingContext): void {
  printBlankLine();
  for (const key of SETTING_KEYS) {
    const choices = SETTING_OPTIONS[key]
      .map((option, index) => (option === settings[key] ? bold(`${index + 1}. ${option}`) : `${index + 1}. ${option}`))
      .join('  ');
    console.log(`  ${SETTING_LABELS[key]}: ${settings[key]}`);
    console.log(`    ${dim(choices)}`);
  }
  printBlankLine();
  console.log(dim('  Change with /settings grade 3, /settings subject Science, /settings type Letter'));
  printBlankLine();
}
