/**
 * prompt.ts — Ask the operator a single question on the terminal.
 */

import { createInterface } from 'readline/promises';

export type Prompt = (question: string) => Promise<string>;

export async function promptOnConsole(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}
