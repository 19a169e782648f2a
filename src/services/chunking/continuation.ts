/**
 * Continuation Detector
 *
 * Decides whether content runs on across a page boundary by looking at the
 * last characters of page N and the first characters of page N+1.
 * Any single signal is enough.
 *
 * @module services/chunking/continuation
 */

import {
  BULLET_LIST_START_REGEX,
  CONTINUATION_WORDS,
  HEADER_LINE_END_REGEX,
  NUMBERED_LIST_START_REGEX,
  TABLE_ROW_END_REGEX,
  TABLE_ROW_START_REGEX,
  TERMINAL_PUNCTUATION_REGEX,
} from './patterns.js';

/** Characters inspected on each side of the boundary */
export const BOUNDARY_WINDOW = 200;

export const CONTINUATION_SIGNALS = [
  'conjunction',
  'no_punctuation',
  'numbered_list',
  'bullet_list',
  'table',
  'header',
] as const;

export type ContinuationSignal = (typeof CONTINUATION_SIGNALS)[number];

export interface ContinuationResult {
  continues: boolean;
  /** Signals that fired, in CONTINUATION_SIGNALS order */
  signals: ContinuationSignal[];
  /** Stripped tail of the previous page */
  tail: string;
  /** Stripped head of the next page */
  head: string;
}

export function pageTail(text: string): string {
  return text.slice(-BOUNDARY_WINDOW).trim();
}

export function pageHead(text: string): string {
  return text.slice(0, BOUNDARY_WINDOW).trim();
}

function endsWithContinuationWord(tail: string): boolean {
  const tokens = tail.split(/\s+/);
  const last = tokens[tokens.length - 1].toLowerCase();
  return CONTINUATION_WORDS.has(last);
}

const SIGNAL_CHECKS: Record<ContinuationSignal, (tail: string, head: string) => boolean> = {
  conjunction: (tail) => endsWithContinuationWord(tail),
  no_punctuation: (tail) => !TERMINAL_PUNCTUATION_REGEX.test(tail),
  numbered_list: (_tail, head) => NUMBERED_LIST_START_REGEX.test(head),
  bullet_list: (_tail, head) => BULLET_LIST_START_REGEX.test(head),
  table: (tail, head) => TABLE_ROW_END_REGEX.test(tail) && TABLE_ROW_START_REGEX.test(head),
  header: (tail) => HEADER_LINE_END_REGEX.test(tail),
};

/**
 * Evaluate every continuation signal for the boundary between two pages.
 *
 * When either page is blank nothing can continue and no signal is reported.
 *
 * @param previousText - Full markdown of page N
 * @param nextText - Full markdown of page N+1
 */
export function detectContinuation(previousText: string, nextText: string): ContinuationResult {
  const tail = pageTail(previousText);
  const head = pageHead(nextText);

  if (tail.length === 0 || head.length === 0) {
    return { continues: false, signals: [], tail, head };
  }

  const signals = CONTINUATION_SIGNALS.filter((signal) => SIGNAL_CHECKS[signal](tail, head));
  return { continues: signals.length > 0, signals, tail, head };
}
