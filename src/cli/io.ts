/**
 * Terminal input and output for CLI commands.
 */

import * as readline from 'node:readline';
import type { InputReader, OutputWriter } from './types.js';

/**
 * Creates a readline-based input reader.
 *
 * @returns An InputReader using Node's readline.
 */
export function createInputReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): InputReader {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  let pending: ((error: Error) => void) | undefined;

  rl.on('close', () => {
    closed = true;
    pending?.(new Error('Input ended before an answer was given'));
    pending = undefined;
  });

  return {
    readLine(prompt: string): Promise<string> {
      if (closed) {
        return Promise.reject(new Error('Input ended before an answer was given'));
      }
      return new Promise((resolve, reject) => {
        pending = reject;
        rl.question(prompt, (answer) => {
          pending = undefined;
          resolve(answer);
        });
      });
    },
    close(): void {
      rl.close();
    },
  };
}

/**
 * Creates a console-based output writer.
 */
export function createOutputWriter(): OutputWriter {
  return {
    line(text = ''): void {
      console.log(text);
    },
    error(text = ''): void {
      console.error(text);
    },
  };
}
