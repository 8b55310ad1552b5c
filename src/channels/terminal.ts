/**
 * Terminal Channel
 *
 * Shows the proposed action in the terminal and waits for y/N.
 * An empty answer, anything but y/yes, or a non-interactive stdin declines.
 */

import readline from 'node:readline';
import { formatArgv } from '../core/command-line.js';
import type { Confirm } from '../core/gate.js';
import type { ActionRequest } from '../core/types.js';

export interface TerminalConfirmOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Treat the input as interactive even when it is not a TTY. */
  assumeInteractive?: boolean;
}

export function describeAction(request: ActionRequest): string {
  switch (request.kind) {
    case 'command':
      return `Run command: ${formatArgv(request.argv)}${request.cwd ? ` (in ${request.cwd})` : ''}`;
    case 'read_file':
      return `Read file: ${request.path}`;
    case 'write_file':
      return `Write file: ${request.path} (${Buffer.byteLength(request.content, 'utf-8')} bytes)`;
    case 'plan':
      return [
        `Run plan with ${request.steps.length} step(s):`,
        ...request.steps.map((step, i) => `      ${i + 1}. ${describeAction(step)}`),
      ].join('\n');
  }
}

export function createTerminalConfirm(options: TerminalConfirmOptions = {}): Confirm {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;

  return async (request: ActionRequest): Promise<boolean> => {
    const interactive = options.assumeInteractive ?? Boolean(process.stdin.isTTY);
    if (!interactive) {
      output.write('  [confirm] stdin is not interactive; declining\n');
      return false;
    }

    output.write('\n');
    output.write('  ════════════════════════════════════════════════════\n');
    output.write(`    ${describeAction(request)}\n`);
    output.write('  ════════════════════════════════════════════════════\n');

    const answer = await prompt('  Proceed? [y/N] ', input, output);
    const choice = answer.toLowerCase().trim();
    return choice === 'y' || choice === 'yes';
  };
}

function prompt(question: string, input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<string> {
  const rl = readline.createInterface({ input, output });
  return new Promise((resolve) => {
    let answered = false;
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
    // Closed input (EOF) counts as no answer.
    rl.on('close', () => {
      if (!answered) resolve('');
    });
  });
}
