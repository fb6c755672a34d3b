/**
 * datetime.ts
 *
 * Normalizes free-form date/time text into the one format the assignment form
 * accepts without reformatting it: `YYYY-MM-DD HH:MM` (24h).
 *
 * Accepted inputs (after trimming):
 * - YYYY-MM-DD HH:MM
 * - YYYY/MM/DD HH:MM
 * - YYYY-MM-DDTHH:MM
 */

import { format, isValid, parse } from 'date-fns';
import type { NormalizeResult } from './types';

// `uuuu` is the plain calendar year, so year 0 stays 0 (`yyyy` is the era year)
const ACCEPTED_FORMATS: readonly string[] = ['uuuu-MM-dd HH:mm', 'uuuu/MM/dd HH:mm', "uuuu-MM-dd'T'HH:mm"];
const OUTPUT_FORMAT = 'uuuu-MM-dd HH:mm';

// the year token also parses shorter years; the form wants all four digits
const FOUR_DIGIT_YEAR = /^\d{4}[-/]/;

export function normalizeDateTime(text: string): NormalizeResult {
  const trimmed = text.trim();
  if (!FOUR_DIGIT_YEAR.test(trimmed)) return { ok: false, error: 'NotParseable' };

  for (const layout of ACCEPTED_FORMATS) {
    const date = parse(trimmed, layout, new Date());
    if (isValid(date)) return { ok: true, value: format(date, OUTPUT_FORMAT) };
  }

  return { ok: false, error: 'NotParseable' };
}
