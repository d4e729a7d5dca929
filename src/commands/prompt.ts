/**
 * Interactive prompts for `momentum init`.
 *
 * Answers are parsed as they are read: a prompt repeats until its parser
 * accepts the answer, so callers receive typed values rather than raw text.
 */

import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

/** The part of a readline interface the prompts use. */
export interface LineReader {
  question(query: string): Promise<string>;
  close(): void;
}

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

export function createPrompt(): LineReader {
  return createInterface({ input: stdin, output: stdout });
}

/**
 * Re-asks until `parse` accepts the answer. An empty answer is replaced by
 * `fallback` when one is given.
 */
export async function askUntil<T>(
  rl: LineReader,
  question: string,
  parse: (answer: string) => Parsed<T>,
  fallback?: string
): Promise<T> {
  const hint = fallback ? ` [${fallback}]` : '';
  for (;;) {
    const answer = (await rl.question(`${question}${hint}: `)).trim() || fallback || '';
    const parsed = parse(answer);
    if (parsed.ok) return parsed.value;
    note('warn', parsed.message);
  }
}

/** Picks one of `choices`, case-insensitively. */
export function askChoice<T extends string>(
  rl: LineReader,
  question: string,
  choices: readonly T[],
  fallback: T
): Promise<T> {
  return askUntil(
    rl,
    `${question} (${choices.join('/')})`,
    (answer): Parsed<T> => {
      const picked = choices.find((c) => c === answer.toLowerCase());
      return picked === undefined
        ? { ok: false, message: `Choose one of: ${choices.join(', ')}.` }
        : { ok: true, value: picked };
    },
    fallback
  );
}

export async function confirm(rl: LineReader, question: string, defaultYes: boolean): Promise<boolean> {
  const answer = (await rl.question(`${question} ${defaultYes ? '[Y/n]' : '[y/N]'}: `))
    .trim()
    .toLowerCase();
  if (!answer) return defaultYes;
  return answer === 'y' || answer === 'yes';
}

// ─── Output ──────────────────────────────────────────────────

const TAGS = {
  ok: '\x1b[32m[ok]\x1b[0m',
  warn: '\x1b[33m[!]\x1b[0m',
  info: '\x1b[2m[i]\x1b[0m',
} as const;

export function banner(title: string): void {
  console.log(`\n\x1b[1m${title}\x1b[0m`);
}

export function note(kind: keyof typeof TAGS, text: string): void {
  console.log(`${TAGS[kind]} ${text}`);
}
