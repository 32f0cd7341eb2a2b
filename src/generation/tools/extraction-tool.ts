// src/generation/tools/extraction-tool.ts

export type ToolName =
  | 'normalize_date'
  | 'extract_amount'
  | 'classify_clause'
  | 'calculate_deadline';

export type Currency = 'USD' | 'EUR' | 'GBP';

export interface MonetaryAmount {
  value: number;
  currency: Currency;
}

export type ClauseCategory =
  | 'payment'
  | 'penalty'
  | 'termination'
  | 'confidentiality'
  | 'liability'
  | 'obligation'
  | 'unknown';

export interface DeadlineInput {
  /** YYYY-MM-DD */
  startDate: string;
  days: number;
}

/**
 * An `(input) → structured | null` capability the generator can apply; the
 * input is the clause text unless stated otherwise. Implementations may
 * throw; callers go through ExtractionToolbox, which turns any failure into
 * null.
 */
export interface ExtractionTool<T, I = string> {
  readonly name: ToolName;
  readonly description: string;
  run(input: I, signal?: AbortSignal): Promise<T | null>;
}

export interface ToolFindings {
  date: string | null;
  amount: MonetaryAmount | null;
  category: ClauseCategory;
}

export const DATE_TOOL = 'DATE_TOOL';
export const AMOUNT_TOOL = 'AMOUNT_TOOL';
export const CLASSIFIER_TOOL = 'CLASSIFIER_TOOL';
export const DEADLINE_TOOL = 'DEADLINE_TOOL';
