import { ClauseTextCleaner } from '../cleaning/cleaners/clause-text-cleaner';
import { EmptyDocumentError } from '../../shared/errors/pipeline.errors';
import { THREE_CLAUSE_CONTRACT, testConfig } from '../../testing/fakes';
import { ClauseSegmenter, clauseId } from './clause-segmenter';

describe('ClauseSegmenter', () => {
  const segmenter = (maxUnitChars = 1000) =>
    new ClauseSegmenter(new ClauseTextCleaner(), testConfig({ maxUnitChars }));

  it('splits numbered clauses separated by blank lines', () => {
    const units = segmenter().segment({ id: 'doc', text: THREE_CLAUSE_CONTRACT });

    expect(units.map((u) => u.id)).toEqual(['doc:clause_1', 'doc:clause_2', 'doc:clause_3']);
    expect(units.map((u) => u.text)).toEqual([
      '1. Payment is due within 30 days of invoice.',
      '2. A late payment penalty of 1.5% per month applies to overdue amounts.',
      '3. Confidentiality obligations survive termination of this agreement.',
    ]);
    expect(units[0].sourceSpan).toEqual({ start: 0, end: THREE_CLAUSE_CONTRACT.indexOf('2.') });
  });

  it('produces spans that partition the original text', () => {
    const text = '\n\nPreamble.\n\n1. First clause.\n2. Second clause.\n\n\n   (a) Sub item.  ';
    const units = segmenter().segment({ id: 'doc', text });

    expect(units[0].sourceSpan.start).toBe(0);
    expect(units[units.length - 1].sourceSpan.end).toBe(text.length);
    for (let i = 1; i < units.length; i++) {
      expect(units[i].sourceSpan.start).toBe(units[i - 1].sourceSpan.end);
    }
    expect(units.map((u) => u.text)).toEqual([
      'Preamble.',
      '1. First clause.',
      '2. Second clause.',
      '(a) Sub item.',
    ]);
  });

  it('hard-splits long text without cutting through a surrogate pair', () => {
    const text = 'abcd\u{1F600}efgh';
    const units = segmenter(5).segment({ id: 'doc', text });

    expect(units.map((u) => u.text)).toEqual(['abcd', '\u{1F600}efg', 'h']);
    expect(units.map((u) => u.sourceSpan)).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 9 },
      { start: 9, end: 10 },
    ]);
  });

  it('folds leading whitespace into the first unit', () => {
    const units = segmenter().segment({ id: 'doc', text: '\n\nFees are due.' });

    expect(units).toHaveLength(1);
    expect(units[0].text).toBe('Fees are due.');
    expect(units[0].sourceSpan).toEqual({ start: 0, end: 15 });
  });

  it('cuts long clauses after whitespace so no unit exceeds maxUnitChars', () => {
    const text = 'word '.repeat(30).trim();
    const units = segmenter(50).segment({ id: 'doc', text });

    const tenWords = Array(10).fill('word').join(' ');
    expect(units.map((u) => u.text)).toEqual([tenWords, tenWords, tenWords]);
    expect(units.map((u) => u.sourceSpan)).toEqual([
      { start: 0, end: 50 },
      { start: 50, end: 100 },
      { start: 100, end: 149 },
    ]);
  });

  it('hard-cuts a clause without whitespace', () => {
    const units = segmenter(50).segment({ id: 'doc', text: 'x'.repeat(120) });

    expect(units.map((u) => u.text.length)).toEqual([50, 50, 20]);
  });

  it('starts a unit at each heading line', () => {
    const text =
      'Section 1 Payment\nFees are due monthly.\nSection 2 Termination\nEither party may terminate.';
    const units = segmenter().segment({ id: 'msa', text });

    expect(units.map((u) => u.text)).toEqual([
      'Section 1 Payment\nFees are due monthly.',
      'Section 2 Termination\nEither party may terminate.',
    ]);
  });

  it('normalises non-breaking and zero-width characters', () => {
    const units = segmenter().segment({ id: 'doc', text: 'Fees\u00A0are\u200B due.' });

    expect(units[0].text).toBe('Fees are due.');
  });

  it('rejects an empty or whitespace-only document', () => {
    expect(() => segmenter().segment({ id: 'doc', text: '' })).toThrow(EmptyDocumentError);
    expect(() => segmenter().segment({ id: 'doc', text: ' \n \n ' })).toThrow(
      'Document "doc" contains no extractable text',
    );
  });

  it('is deterministic', () => {
    const a = segmenter().segment({ id: 'doc', text: THREE_CLAUSE_CONTRACT });
    const b = segmenter().segment({ id: 'doc', text: THREE_CLAUSE_CONTRACT });

    expect(a).toEqual(b);
    expect(clauseId('doc', 2)).toBe('doc:clause_2');
  });
});
