// src/ingestion/segmentation/clause-segmenter.ts
import { Inject, Injectable } from '@nestjs/common';
import { CLEANER } from '../cleaning/cleaning.module';
import type { Cleaner } from '../cleaning/cleaner';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import { EmptyDocumentError } from '../../shared/errors/pipeline.errors';
import type { ContractDocument } from '../../pipeline/pipeline.types';

export interface SourceSpan {
  /** inclusive */
  start: number;
  /** exclusive */
  end: number;
}

export interface ClauseUnit {
  readonly id: string;
  readonly ordinal: number;
  readonly text: string;
  readonly sourceSpan: Readonly<SourceSpan>;
}

// blank line(s); the boundary sits where the next paragraph starts
const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;

// numbered clauses ("1.", "4.2", "(a)", "IV."), keyword and markdown headings
const HEADING_LINE =
  /^[ \t]*(?:#{1,6}[ \t]|§|(?:section|article|clause|schedule|annex|exhibit)\b|(?:\d+(?:\.\d+)*[.)]|\d+(?:\.\d+)+|\([a-z0-9]{1,4}\)|[IVXLC]+\.)[ \t]+\S)/gim;

export function clauseId(documentId: string, ordinal: number): string {
  return `${documentId}:clause_${ordinal}`;
}

function boundaryOffsets(pattern: RegExp, text: string, atEnd: boolean): number[] {
  const re = new RegExp(pattern.source, pattern.flags);
  const out: number[] = [];

  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    out.push(atEnd ? m.index + m[0].length : m.index);
    if (m[0].length === 0) re.lastIndex++;
  }
  return out;
}

function structuralSpans(text: string): SourceSpan[] {
  const cuts = new Set<number>([0, text.length]);
  for (const at of boundaryOffsets(PARAGRAPH_BREAK, text, true)) cuts.add(at);
  for (const at of boundaryOffsets(HEADING_LINE, text, false)) cuts.add(at);

  const sorted = Array.from(cuts).sort((a, b) => a - b);
  const spans: SourceSpan[] = [];
  for (let i = 1; i < sorted.length; i++) {
    spans.push({ start: sorted[i - 1], end: sorted[i] });
  }
  return spans;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Splits [start, end) into windows of at most `maxChars`, preferring to cut after whitespace. */
function splitSpan(text: string, span: SourceSpan, maxChars: number): SourceSpan[] {
  const out: SourceSpan[] = [];
  let pos = span.start;

  while (span.end - pos > maxChars) {
    const windowEnd = pos + maxChars;
    let cut = windowEnd;
    for (let i = windowEnd; i > pos + 1; i--) {
      if (/\s/.test(text[i - 1])) {
        cut = i;
        break;
      }
    }
    // never separate the halves of a surrogate pair
    if (cut - 1 > pos && isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;
    out.push({ start: pos, end: cut });
    pos = cut;
  }

  out.push({ start: pos, end: span.end });
  return out;
}

/**
 * Splits contract text into clause units on structural boundaries.
 *
 * Spans partition the input: concatenating every unit's span gives back the
 * original text. Unit text is the cleaned span and is never empty nor longer
 * than `maxUnitChars`. Output depends only on the document id and text.
 */
@Injectable()
export class ClauseSegmenter {
  constructor(
    @Inject(CLEANER) private readonly cleaner: Cleaner,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  segment(document: ContractDocument): ClauseUnit[] {
    const { id: documentId, text } = document;
    const maxChars = this.config.maxUnitChars;
    const clean = (span: SourceSpan) =>
      this.cleaner.clean({ documentId, rawText: text.slice(span.start, span.end) });

    if (!text || !clean({ start: 0, end: text.length })) {
      throw new EmptyDocumentError(documentId);
    }

    const pieces: SourceSpan[] = [];
    for (const span of structuralSpans(text)) {
      if (clean(span).length <= maxChars) {
        pieces.push(span);
      } else {
        pieces.push(...splitSpan(text, span, maxChars));
      }
    }

    // fold whitespace-only pieces into a neighbour so every unit has content
    const merged: SourceSpan[] = [];
    let pendingStart: number | null = null;
    for (const piece of pieces) {
      if (!clean(piece)) {
        const prev = merged[merged.length - 1];
        if (prev) prev.end = piece.end;
        else pendingStart ??= piece.start;
        continue;
      }
      merged.push({ start: pendingStart ?? piece.start, end: piece.end });
      pendingStart = null;
    }

    return merged.map((span, i) =>
      Object.freeze({
        id: clauseId(documentId, i + 1),
        ordinal: i + 1,
        text: clean(span),
        sourceSpan: Object.freeze({ ...span }),
      }),
    );
  }
}
