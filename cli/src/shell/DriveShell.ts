/**
 * Interactive shell over one DriveSession.
 *
 * Each typed line becomes a DriveCommand; results and activity lines are
 * printed as they arrive. Errors are printed and the loop continues.
 */
import * as readline from 'readline';
import chalk from 'chalk';
import { describeError, executeDriveCommand, logger, type DriveSession } from '@minidrive/shared';

import { parseShellLine, SHELL_VERBS } from './parseShellLine.js';
import { renderResult, type RenderedLine, type Tone } from './render.js';

const TONE_COLORS: Record<Tone, (text: string) => string> = {
  normal: (text) => text,
  muted: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  folder: chalk.blue.bold,
};

export interface DriveShellOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function helpLines(): RenderedLine[] {
  const width = Math.max(...SHELL_VERBS.map((verb) => verb.usage.length));
  return [
    { text: 'Commands:', tone: 'muted' },
    ...SHELL_VERBS.map((verb) => ({
      text: `  ${verb.usage.padEnd(width)}  ${verb.description}`,
      tone: 'normal' as const,
    })),
  ];
}

export class DriveShell {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(
    private readonly session: DriveSession,
    options: DriveShellOptions = {}
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async run(): Promise<void> {
    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });

    this.write([
      { text: `Signed in as ${this.session.username}`, tone: 'success' },
      { text: "Type 'help' for a list of commands.", tone: 'muted' },
    ]);

    const unsubscribe = this.session.activityLog.subscribe((line) => {
      this.write([{ text: `* ${line}`, tone: 'muted' }]);
    });

    try {
      this.prompt();
      for await (const input of rl) {
        const keepGoing = await this.handleLine(input);
        if (!keepGoing) break;
        this.prompt();
      }
    } finally {
      unsubscribe();
      rl.close();
    }
  }

  /**
   * @returns false once the user asked to leave
   */
  async handleLine(input: string): Promise<boolean> {
    const action = parseShellLine(input);

    switch (action.kind) {
      case 'empty':
        return true;
      case 'exit':
        return false;
      case 'help':
        this.write(helpLines());
        return true;
      case 'log': {
        const lines = this.session.activityLog.getLines();
        this.write(
          lines.length === 0
            ? [{ text: '(no activity yet)', tone: 'muted' }]
            : lines.map((text) => ({ text, tone: 'normal' as const }))
        );
        return true;
      }
      case 'invalid':
        this.write([{ text: action.message, tone: 'error' }]);
        return true;
      case 'command':
        try {
          const result = await executeDriveCommand(this.session, action.command);
          this.write(renderResult(result));
        } catch (error) {
          logger.error('Shell command failed', error, { component: 'DriveShell', command: action.command.type });
          this.write([{ text: describeError(error), tone: 'error' }]);
        }
        return true;
    }
  }

  private prompt(): void {
    this.output.write(chalk.cyan(`${this.session.username}:${this.session.tree.displayPath}> `));
  }

  private write(lines: readonly RenderedLine[]): void {
    for (const line of lines) {
      this.output.write(`${TONE_COLORS[line.tone](line.text)}\n`);
    }
  }
}
