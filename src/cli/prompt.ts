/**
 * Interactive prompts
 */

import { createInterface, type Interface } from 'readline/promises';
import type { InputResult } from './input.js';

export type Ask = (question: string) => Promise<string>;

/**
 * Ask until `parse` accepts the answer, reporting each rejection
 */
export async function promptUntilValid<T>(
  ask: Ask,
  question: string,
  parse: (raw: string) => InputResult<T>,
  report: (message: string) => void
): Promise<T> {
  for (;;) {
    const result = parse(await ask(question));
    if (result.ok) {
      return result.value;
    }
    report(result.message);
  }
}

export interface Prompter {
  ask: Ask;
  close(): void;
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl: Interface = createInterface({ input, output });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}
