// src/generation/tools/date-normalizer.tool.ts
import { Injectable } from '@nestjs/common';
import type { ExtractionTool } from './extraction-tool';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const MONTH =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

type DateMatch = { index: number; year: number; month: number; day: number };

const PATTERNS: Array<{ re: RegExp; read: (m: RegExpExecArray) => Omit<DateMatch, 'index'> }> = [
  {
    // 2025-03-01
    re: /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/g,
    read: (m) => ({ year: +m[1], month: +m[2], day: +m[3] }),
  },
  {
    // March 1, 2025
    re: new RegExp(`\\b${MONTH}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`, 'gi'),
    read: (m) => ({ year: +m[3], month: monthNumber(m[1]), day: +m[2] }),
  },
  {
    // 1st (day of) March 2025
    re: new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:day\\s+of\\s+)?${MONTH}\\.?,?\\s+(\\d{4})\\b`, 'gi'),
    read: (m) => ({ year: +m[3], month: monthNumber(m[2]), day: +m[1] }),
  },
  {
    // 03/01/2025 is month-first unless the first number cannot be a month
    re: /\b(\d{1,2})[/.](\d{1,2})[/.](\d{4})\b/g,
    read: (m) =>
      +m[1] > 12
        ? { year: +m[3], month: +m[2], day: +m[1] }
        : { year: +m[3], month: +m[1], day: +m[2] },
  },
];

function monthNumber(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

export function isCalendarDate({ year, month, day }: Omit<DateMatch, 'index'>): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function toIsoDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** First calendar date mentioned in the text, as YYYY-MM-DD. */
export function normalizeDate(text: string): string | null {
  let best: DateMatch | null = null;

  for (const { re, read } of PATTERNS) {
    const pattern = new RegExp(re.source, re.flags);
    let m: RegExpExecArray | null;
    while ((m = pattern.exec(text)) !== null) {
      const parts = read(m);
      if (isCalendarDate(parts) && (!best || m.index < best.index)) {
        best = { index: m.index, ...parts };
      }
    }
  }

  return best ? toIsoDate(best.year, best.month, best.day) : null;
}

@Injectable()
export class DateNormalizerTool implements ExtractionTool<string> {
  readonly name = 'normalize_date';
  readonly description =
    'Returns the first calendar date mentioned in the text as YYYY-MM-DD, or null when there is none.';

  async run(text: string): Promise<string | null> {
    return normalizeDate(text);
  }
}
