/**
 * Terminal Prompts
 * 
 * Line input, hidden password input and y/N confirmation on stdin.
 */

import { createInterface } from 'node:readline';

/**
 * Prompt for a line of input
 */
export async function prompt(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Prompt without echoing what is typed. Falls back to a plain prompt when
 * stdin is not a terminal.
 */
export async function promptHidden(question: string): Promise<string> {
  const { stdin, stdout } = process;

  if (!stdin.isTTY) {
    return prompt(question);
  }

  return new Promise((resolve) => {
    stdout.write(question);
    let input = '';

    const onData = (chunk: Buffer): void => {
      for (const c of chunk.toString('utf8')) {
        if (c === '\n' || c === '\r' || c === '\u0004') {
          finish();
          resolve(input);
          return;
        }
        if (c === '\u0003') {
          finish();
          process.exit(130);
        }
        if (c === '\u007F' || c === '\b') {
          input = input.slice(0, -1);
        } else {
          input += c;
        }
      }
    };

    const finish = (): void => {
      stdin.removeListener('data', onData);
      stdin.setRawMode(false);
      stdin.pause();
      stdout.write('\n');
    };

    stdin.setRawMode(true);
    stdin.resume();
    stdin.on('data', onData);
  });
}

/**
 * Ask a yes/no question; anything but y/yes is no
 */
export async function confirm(question: string): Promise<boolean> {
  const answer = (await prompt(`${question} (y/N): `)).trim().toLowerCase();
  return answer === 'y' || answer === 'yes';
}
