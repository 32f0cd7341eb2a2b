import { extractAmount } from './amount-extractor.tool';
import { classifyClause } from './clause-classifier.tool';
import { DateNormalizerTool, normalizeDate } from './date-normalizer.tool';
import { DeadlineCalculatorTool, calculateDeadline } from './deadline-calculator.tool';

describe('normalizeDate', () => {
  it.each([
    ['Payment due on 2025-03-01.', '2025-03-01'],
    ['Effective March 5, 2024 until renewal.', '2024-03-05'],
    ['Signed on the 1st day of February 2023.', '2023-02-01'],
    ['Deliver by 03/04/2025.', '2025-03-04'],
    ['Deliver by 31/12/2025.', '2025-12-31'],
  ])('normalises %p', (text, expected) => {
    expect(normalizeDate(text)).toBe(expected);
  });

  it('returns the earliest date in the text', () => {
    expect(normalizeDate('Runs from 12/01/2024 to 2025-06-30.')).toBe('2024-12-01');
  });

  it('ignores impossible dates and text without dates', () => {
    expect(normalizeDate('Due 2025-02-30.')).toBeNull();
    expect(normalizeDate('Payment is due within 30 days.')).toBeNull();
  });

  it('is exposed as the normalize_date tool', async () => {
    const tool = new DateNormalizerTool();

    expect(tool.name).toBe('normalize_date');
    await expect(tool.run('Starts 2026-01-15')).resolves.toBe('2026-01-15');
  });
});

describe('extractAmount', () => {
  it.each([
    ['a fee of $1,500.00 per month', { value: 1500, currency: 'USD' }],
    ['a deposit of EUR 200', { value: 200, currency: 'EUR' }],
    ['a surcharge of €40', { value: 40, currency: 'EUR' }],
    ['a fine of 250 pounds', { value: 250, currency: 'GBP' }],
    ['capped at 1,000 USD', { value: 1000, currency: 'USD' }],
    ['priced at US$ 99.5', { value: 99.5, currency: 'USD' }],
  ])('extracts %p', (text, expected) => {
    expect(extractAmount(text)).toEqual(expected);
  });

  it('takes the first amount mentioned', () => {
    expect(extractAmount('either 200 euros or $300')).toEqual({ value: 200, currency: 'EUR' });
  });

  it('returns null when no currency is attached', () => {
    expect(extractAmount('interest of 1.5% per month')).toBeNull();
  });
});

describe('classifyClause', () => {
  it.each([
    ['Payment due within 30 days', 'payment'],
    ['1.5% monthly penalty after due date', 'penalty'],
    ['Confidentiality survives termination', 'confidentiality'],
    ['Either party may terminate this agreement on notice.', 'termination'],
    ['The Supplier is liable for direct damages.', 'liability'],
    ['The Supplier shall deliver the goods.', 'obligation'],
    ['This page is intentionally left blank.', 'unknown'],
  ])('classifies %p as %p', (text, expected) => {
    expect(classifyClause(text)).toBe(expected);
  });
});

describe('calculateDeadline', () => {
  it.each([
    ['2025-01-15', 30, '2025-02-14'],
    ['2024-02-20', 10, '2024-03-01'],
    ['2025-12-20', 15, '2026-01-04'],
    ['2025-03-01', -1, '2025-02-28'],
    ['2025-03-01', 0, '2025-03-01'],
  ])('adds to %p %p days', (start, days, expected) => {
    expect(calculateDeadline(start, days)).toBe(expected);
  });

  it('rejects malformed dates and day counts', () => {
    expect(calculateDeadline('15/01/2025', 30)).toBeNull();
    expect(calculateDeadline('2025-02-30', 30)).toBeNull();
    expect(calculateDeadline('2025-01-15', 1.5)).toBeNull();
    expect(calculateDeadline('2025-01-15', 100_000)).toBeNull();
  });

  it('is exposed as the calculate_deadline tool', async () => {
    const tool = new DeadlineCalculatorTool();

    expect(tool.name).toBe('calculate_deadline');
    await expect(tool.run({ startDate: '2025-01-15', days: 30 })).resolves.toBe('2025-02-14');
  });
});
