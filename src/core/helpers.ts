// SPDX-License-Identifier: Apache-2.0

import {type Duration} from './time/duration.js';

export function sleep(duration: Duration) {
  return new Promise<void>(resolve => {
    setTimeout(resolve, duration.toMillis());
  });
}

/**
 * Resolves with the result of `promise`, or with `onTimeout()` if `duration` elapses first. The timer never keeps the
 * process alive and is cleared as soon as either side settles.
 */
export async function withTimeout<T>(promise: Promise<T>, duration: Duration, onTimeout: () => T): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>(resolve => {
    timer = setTimeout(() => resolve(onTimeout()), duration.toMillis());
    timer.unref();
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Splits a line into words, honouring single quotes, double quotes and backslash escapes.
 */
export function splitWords(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let quote: '"' | "'" | undefined;
  let inWord = false;

  for (let index = 0; index < line.length; index++) {
    const ch = line[index];
    if (quote) {
      if (ch === quote) {
        quote = undefined;
      } else if (ch === '\\' && quote === '"' && index + 1 < line.length) {
        current += line[++index];
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && index + 1 < line.length) {
      current += line[++index];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new SyntaxError(`unterminated ${quote} quote`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
