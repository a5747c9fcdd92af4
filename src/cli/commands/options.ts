/**
 * Options Command Handler
 *
 * Lists the grade bands, subjects and writing types, marking the defaults.
 */

import { getWritingOptions } from '../../core/settings';
import { bold, dim, green, printBlankLine } from '../utils/terminal';

function printList(title: string, options: readonly string[], defaultValue: string): void {
  console.log(bold(`${title}:`));
  options.forEach((option, index) => {
    const marker = option === defaultValue ? green(' (default)') : '';
    console.log(`  ${index + 1}. ${option}${marker}`);
  });
  printBlankLine();
}

export function runOptionsCommand(): void {
  const { grades, subjects, writingTypes, defaults } = getWritingOptions();

  printBlankLine();
  printList('Grades', grades, defaults.grade);
  printList('Subjects', subjects, defaults.subject);
  printList('Writing types', writingTypes, defaults.writingType);
  console.log(dim('Any other label is accepted too, e.g. --type "Poem".'));
  printBlankLine();
}
