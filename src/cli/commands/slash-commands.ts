/**
 * Slash Commands
 *
 * Parses the control commands a student can type in the chat loop. Parsing
 * is kept apart from the readline loop so it can be tested on its own.
 */

import type { WritingContext } from '../../core/models';
import type { TutorMode } from '../../core/session';

export type SettingKey = keyof WritingContext;

export type SlashCommand =
  | { type: 'mode'; mode: TutorMode }
  | { type: 'settings_show' }
  | { type: 'settings_set'; key: SettingKey; value: string }
  | { type: 'submit' }
  | { type: 'reset' }
  | { type: 'status' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; message: string }
  | { type: 'unknown'; command: string };

const SETTING_ALIASES = new Map<string, SettingKey>([
  ['grade', 'grade'],
  ['subject', 'subject'],
  ['type', 'writingType'],
  ['writingtype', 'writingType'],
  ['genre', 'writingType'],
]);

export function isSlashCommand(input: string): boolean {
  return input.trim().startsWith('/');
}

/**
 * @example
 * ```typescript
 * parseSlashCommand('/settings grade Grades 5-6');
 * // { type: 'settings_set', key: 'grade', value: 'Grades 5-6' }
 * ```
 */
export function parseSlashCommand(input: string): SlashCommand {
  const [head = '', ...args] = input.trim().split(/\s+/);
  const command = head.toLowerCase();

  switch (command) {
    case '/evaluate':
    case '/eval':
    case '/e':
      return { type: 'mode', mode: 'evaluate' };
    case '/chat':
    case '/c':
      return { type: 'mode', mode: 'chat' };
    case '/settings':
    case '/set':
      return parseSettingsArgs(args);
    case '/submit':
    case '/send':
      return { type: 'submit' };
    case '/reset':
      return { type: 'reset' };
    case '/status':
      return { type: 'status' };
    case '/help':
    case '/h':
    case '/?':
      return { type: 'help' };
    case '/quit':
    case '/exit':
    case '/q':
      return { type: 'quit' };
    default:
      return { type: 'unknown', command: head };
  }
}

function parseSettingsArgs(args: string[]): SlashCommand {
  if (args.length === 0) {
    return { type: 'settings_show' };
  }

  const [rawKey = '', ...valueParts] = args;
  const key = SETTING_ALIASES.get(rawKey.toLowerCase());
  if (!key) {
    return {
      type: 'invalid',
      message: `Unknown setting '${rawKey}'. Use grade, subject or type.`,
    };
  }

  const value = valueParts.join(' ').trim();
  if (!value) {
    return { type: 'invalid', message: `Usage: /settings ${rawKey.toLowerCase()} <value>` };
  }

  return { type: 'settings_set', key, value };
}

/**
 * Maps a typed value onto one of the listed options: a 1-based number picks
 * by position, otherwise a case-insensitive match returns the canonical label.
 * Anything else is kept as typed, since custom labels are allowed.
 *
 * @example
 * resolveOption('2', ['Grades 1-2', 'Grades 3-4']);       // 'Grades 3-4'
 * resolveOption('diary', ['Letter', 'Diary']);             // 'Diary'
 * resolveOption('Poem', ['Letter', 'Diary']);              // 'Poem'
 */
export function resolveOption(value: string, options: readonly string[]): string {
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    const index = parseInt(trimmed, 10) - 1;
    const option = options[index];
    if (option !== undefined) {
      return option;
    }
  }

  const lower = trimmed.toLowerCase();
  return options.find((option) => option.toLowerCase() === lower) ?? trimmed;
}
