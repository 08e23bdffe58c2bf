import readline from 'node:readline/promises';
import { InvalidArgsError } from './errors.js';

async function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

/** `y`/`yes` (any case) is yes; everything else, including an empty answer, is no. */
export function parseYesNo(answer: string): boolean {
  return /^(y|yes)$/i.test(answer.trim());
}

export async function confirm(question: string): Promise<boolean> {
  return parseYesNo(await prompt(`${question} [y/N] `));
}

/** Ask for a line of text; an empty answer takes `fallback`. */
export async function ask(question: string, fallback?: string): Promise<string> {
  const suffix = fallback ? ` [${fallback}]` : '';
  const answer = (await prompt(`${question}${suffix}: `)).trim();
  return answer || fallback || '';
}

/** Index into `count` choices for a 1-based answer, or undefined when it is not one. */
export function parsePickAnswer(answer: string, count: number): number | undefined {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return n >= 1 && n <= count ? n - 1 : undefined;
}

/** Numbered menu. Returns the chosen item; an invalid answer is an error. */
export async function pick<T>(title: string, items: readonly T[], describe: (item: T) => string): Promise<T> {
  if (items.length === 0) throw new InvalidArgsError(`Nothing to choose from: ${title}`);

  console.log(title);
  items.forEach((item, i) => console.log(`  ${i + 1}. ${describe(item)}`));

  const answer = await prompt(`Choose [1-${items.length}]: `);
  const index = parsePickAnswer(answer, items.length);
  const chosen = index === undefined ? undefined : items[index];
  if (chosen === undefined) throw new InvalidArgsError(`Invalid choice: ${answer.trim() || '(empty)'}`);
  return chosen;
}
