import { DEFAULT_WINDOW_LENGTH } from './const.js';

const DIGIT = /^\p{Nd}$/u;
const LETTER = /^\p{L}$/u;

function windows(chars: string[], length: number): string[][] {
  const out: string[][] = [];
  for (let i = 0; i + length <= chars.length; i++) {
    out.push(chars.slice(i, i + length));
  }
  return out;
}

function isAscending(window: string[], value: (c: string) => number): boolean {
  for (let j = 1; j < window.length; j++) {
    if (value(window[j]) !== value(window[j - 1]) + 1) return false;
  }
  return true;
}

const codePoint = (c: string): number => c.codePointAt(0) ?? 0;

/**
 * Value of a decimal digit in any script. Nd digits are laid out in contiguous
 * 0-9 blocks, so the offset from the start of the run of Nd code points, mod 10,
 * is the digit's value.
 */
export function digitValue(c: string): number {
  const cp = codePoint(c);
  let start = cp;
  while (start > 0 && DIGIT.test(String.fromCodePoint(start - 1))) start--;
  return (cp - start) % 10;
}

/**
 * Detects ascending runs such as "123", "١٢٣" or "abc" (case-insensitive).
 * Digits compare by value, so mixed-script runs like "1٢3" count.
 * Descending runs ("321", "cba") are not reported.
 */
export function detectSequences(password: string, length: number = DEFAULT_WINDOW_LENGTH): boolean {
  if (length < 1 || Array.from(password).length < length) return false;
  const folded = Array.from(password.toLowerCase());

  return windows(folded, length).some(window => {
    if (window.every(c => DIGIT.test(c)) && isAscending(window, digitValue)) return true;
    return window.every(c => LETTER.test(c)) && isAscending(window, codePoint);
  });
}

/** Detects runs of one repeated character such as "aaa" or "111". Case-sensitive. */
export function detectRepetitions(password: string, length: number = DEFAULT_WINDOW_LENGTH): boolean {
  const chars = Array.from(password);
  if (length < 1 || chars.length < length) return false;
  return windows(chars, length).some(window => window.every(c => c === window[0]));
}
