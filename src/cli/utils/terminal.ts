/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers and the formatters the chat and evaluate
 * commands print with. In non-TTY output the codes pass through harmlessly.
 *
 * Usage:
 * ```typescript
 * import { bold, formatScoreHeadline, formatTutorMessage } from './terminal';
 *
 * console.log(formatScoreHeadline(85));
 * console.log(formatTutorMessage('What happened after you planted the beans?'));
 * ```
 */

import type { TutorMode } from '../../core/session';
import type { WritingContext } from '../../core/models';
import { describeScore, type ScoreBandLevel } from '../../core/scoring';

// =============================================================================
// Text Style Modifiers
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/**
 * Secondary information such as hints and ids.
 */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const blue = (s: string): string => `\x1b[34m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/** The tutor's voice */
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

export const magenta = (s: string): string => `\x1b[35m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

export function formatTutorMessage(message: string): string {
  return cyan(`Teacher: ${message}`);
}

const BAND_COLORS: Record<ScoreBandLevel, (s: string) => string> = {
  excellent: green,
  good: blue,
  developing: yellow,
  needs_work: magenta,
  error: red,
};

/**
 * Headline above evaluation feedback, colored by score band.
 *
 * @example
 * formatScoreHeadline(85); // "Excellent! Total: 85 / 100" in bold green
 */
export function formatScoreHeadline(score: number): string {
  const band = describeScore(score);
  return bold(BAND_COLORS[band.level](band.summary));
}

export function formatSettings(settings: WritingContext): string {
  return `${settings.grade} | ${settings.subject} | ${settings.writingType}`;
}

export function formatMode(mode: TutorMode): string {
  return mode === 'evaluate' ? green('evaluate') : blue('chat');
}

export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * One help line with the command highlighted.
 *
 * @example
 * formatCommandHelp('/quit', 'Exit'); // "  /quit          - Exit"
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(14))} - ${dim(description)}`;
}

export function printBlankLine(): void {
  console.log();
}

// =============================================================================
// Screens
// =============================================================================

export function printChatBanner(mode: TutorMode, settings: WritingContext): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Writing Tutor'));
  console.log(formatSeparator(60));
  console.log(`  Mode: ${formatMode(mode)}`);
  console.log(`  Settings: ${formatSettings(settings)}`);
  console.log(formatSeparator(60));
  printBlankLine();
  console.log(dim('  In evaluate mode, type or paste your writing and press Enter on an'));
  console.log(dim('  empty line to submit it. In chat mode every line is a question.'));
  console.log(dim('  Commands: /evaluate | /chat | /settings | /reset | /status | /help | /quit'));
  printBlankLine();
}

export function printCommandsHelp(): void {
  printBlankLine();
  console.log(bold('Available Commands:'));
  console.log(formatCommandHelp('/evaluate', 'Switch to evaluate mode (score your writing)'));
  console.log(formatCommandHelp('/chat', 'Switch to chat mode (ask the teacher questions)'));
  console.log(formatCommandHelp('/settings', 'Show settings and choices'));
  console.log(formatCommandHelp('/settings grade <value>', 'Change grade (name or number)'));
  console.log(formatCommandHelp('/settings subject <value>', 'Change subject'));
  console.log(formatCommandHelp('/settings type <value>', 'Change writing type'));
  console.log(formatCommandHelp('/submit', 'Submit the writing typed so far'));
  console.log(formatCommandHelp('/reset', 'Start over (clears the conversation)'));
  console.log(formatCommandHelp('/status', 'Show mode, settings and turn count'));
  console.log(formatCommandHelp('/help', 'Show this help message'));
  console.log(formatCommandHelp('/quit', 'Exit'));
  printBlankLine();
}
