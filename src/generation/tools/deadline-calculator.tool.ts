// src/generation/tools/deadline-calculator.tool.ts
import { Injectable } from '@nestjs/common';
import { isCalendarDate, toIsoDate } from './date-normalizer.tool';
import type { DeadlineInput, ExtractionTool } from './extraction-tool';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MAX_DAYS = 36_500;

/** `startDate` plus `days` calendar days, as YYYY-MM-DD; null for a bad date or day count. */
export function calculateDeadline(startDate: string, days: number): string | null {
  const m = ISO_DATE.exec(startDate.trim());
  if (!m || !Number.isInteger(days) || Math.abs(days) > MAX_DAYS) return null;

  const start = { year: +m[1], month: +m[2], day: +m[3] };
  if (!isCalendarDate(start)) return null;

  const d = new Date(Date.UTC(start.year, start.month - 1, start.day + days));
  return toIsoDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
}

/** Arguments as the model sends them: `{ start_date, days }`. */
export function readDeadlineInput(args: Record<string, unknown>): DeadlineInput | null {
  const { start_date: startDate, days } = args;
  return typeof startDate === 'string' && typeof days === 'number' ? { startDate, days } : null;
}

@Injectable()
export class DeadlineCalculatorTool implements ExtractionTool<string, DeadlineInput> {
  readonly name = 'calculate_deadline';
  readonly description =
    'Adds a number of calendar days to a YYYY-MM-DD start date and returns the deadline as YYYY-MM-DD, or null.';

  async run({ startDate, days }: DeadlineInput): Promise<string | null> {
    return calculateDeadline(startDate, days);
  }
}
