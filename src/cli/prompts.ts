/**
 * Terminal prompts
 * The wizard talks to the user only through the Prompter interface
 */

import * as readline from 'node:readline';
import { theme } from './output.js';

export interface ChoiceOption<T extends string> {
  label: string;
  value: T;
}

export interface Prompter {
  yesNo(question: string, defaultYes?: boolean): Promise<boolean>;
  choice<T extends string>(question: string, options: ChoiceOption<T>[], defaultValue: T): Promise<T>;
  /** Empty answers return the default, or '' without one */
  input(question: string, defaultValue?: string): Promise<string>;
}

/**
 * Input ended (Ctrl+D or a closed pipe) before an answer arrived
 */
export class PromptCancelledError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptCancelledError';
  }
}

/**
 * Read one line from stdin.
 * Uses terminal: false so nested CLI processes that inherit stdio don't fight over echo.
 */
function readLine(prompt: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: false,
    });
    let answered = false;

    // Print prompt manually since terminal: false disables it
    process.stdout.write(prompt);

    rl.once('line', (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });

    rl.once('close', () => {
      if (!answered) {
        reject(new PromptCancelledError());
      }
    });
  });
}

/**
 * Prompter backed by node:readline on stdin/stdout
 */
export function createReadlinePrompter(): Prompter {
  return {
    async yesNo(question, defaultYes = true) {
      const hint = defaultYes ? '[Y/n]' : '[y/N]';
      const answer = (await readLine(`  ${theme.warning('?')} ${question} ${theme.dim(hint)} `))
        .trim()
        .toLowerCase();
      if (!answer) {
        return defaultYes;
      }
      return answer === 'y' || answer === 'yes';
    },

    async choice(question, options, defaultValue) {
      console.log();
      console.log(theme.primary(`  ${question}`));
      options.forEach((opt, i) => {
        const isDefault = opt.value === defaultValue;
        console.log(`    ${theme.dim(`${i + 1}.`)} ${opt.label}${isDefault ? theme.dim(' (default)') : ''}`);
      });
      console.log();

      const answer = (
        await readLine(`  Enter choice [1-${options.length}] or press Enter for default: `)
      ).trim();
      const num = parseInt(answer, 10);
      if (num >= 1 && num <= options.length) {
        return options[num - 1].value;
      }
      return defaultValue;
    },

    async input(question, defaultValue) {
      const hint = defaultValue ? theme.dim(` [${defaultValue}]`) : '';
      const answer = (await readLine(`  ${theme.warning('?')} ${question}${hint}: `)).trim();
      return answer || defaultValue || '';
    },
  };
}
