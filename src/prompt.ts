/**
 * Terminal I/O behind injectable interfaces
 */

import * as readline from 'readline';
import chalk from 'chalk';

/**
 * Interactive input. Commands only talk to the terminal through this.
 */
export interface Prompter {
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  ask(message: string): Promise<string>;
}

/**
 * User-facing command output
 */
export interface Output {
  print(message: string): void;
  warn(message: string): void;
  highlight(message: string): void;
  success(message: string): void;
  error(message: string): void;
  diagnostic(message: string): void; // Warning kept off stdout
  json(value: unknown): void;
}

export function formatConfirmPrompt(message: string, defaultValue: boolean): string {
  return `${message} [y/n] (${defaultValue ? 'y' : 'n'}): `;
}

/**
 * Interpret a confirmation answer; undefined means the answer was not understood
 */
export function parseConfirmAnswer(answer: string, defaultValue: boolean): boolean | undefined {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') {
    return defaultValue;
  }
  if (normalized === 'y' || normalized === 'yes') {
    return true;
  }
  if (normalized === 'n' || normalized === 'no') {
    return false;
  }
  return undefined;
}

export class TerminalPrompter implements Prompter {
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;
  private rl: readline.Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stderr
  ) {
    this.input = input;
    this.output = output;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    for (;;) {
      const answer = await this.question(formatConfirmPrompt(message, defaultValue));
      if (answer === null) {
        return defaultValue;
      }
      const parsed = parseConfirmAnswer(answer, defaultValue);
      if (parsed !== undefined) {
        return parsed;
      }
      this.output.write(`${chalk.red('Please enter Y or N')}\n`);
    }
  }

  async ask(message: string): Promise<string> {
    const answer = await this.question(`${message}: `);
    return answer === null ? '' : answer.trim();
  }

  /**
   * Release the input so the process can exit
   */
  close(): void {
    this.rl?.close();
  }

  /**
   * Next input line; null once input has ended
   */
  private async question(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.reader().next();
    return next.done ? null : next.value;
  }

  // One interface for the prompter's lifetime, so lines that arrive together are all kept
  private reader(): AsyncIterator<string> {
    if (this.lines === null) {
      const rl = readline.createInterface({ input: this.input, terminal: false });
      this.rl = rl;
      this.lines = rl[Symbol.asyncIterator]();
    }
    return this.lines;
  }
}

export class TerminalOutput implements Output {
  private stdout: NodeJS.WritableStream;
  private stderr: NodeJS.WritableStream;

  constructor(
    stdout: NodeJS.WritableStream = process.stdout,
    stderr: NodeJS.WritableStream = process.stderr
  ) {
    this.stdout = stdout;
    this.stderr = stderr;
  }

  print(message: string): void {
    this.stdout.write(`${message}\n`);
  }

  warn(message: string): void {
    this.stdout.write(`${chalk.yellow(message)}\n`);
  }

  highlight(message: string): void {
    this.stdout.write(`${chalk.bold.green(message)}\n`);
  }

  success(message: string): void {
    this.stdout.write(`${chalk.green(message)}\n`);
  }

  error(message: string): void {
    this.stderr.write(`${chalk.red(message)}\n`);
  }

  diagnostic(message: string): void {
    this.stderr.write(`${chalk.yellow(message)}\n`);
  }

  json(value: unknown): void {
    this.stdout.write(`${JSON.stringify(value)}\n`);
  }
}
