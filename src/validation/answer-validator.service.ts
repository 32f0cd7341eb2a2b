// src/validation/answer-validator.service.ts
import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import type { EvidenceItem } from '../indexing/evidence-index';
import type { CandidateAnswer, SupportingClause, ValidationResult } from './answer.types';
import { CandidateAnswerDto } from './dto/candidate-answer.dto';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flatten(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((err) => {
    const path = parent ? `${parent}.${err.property}` : err.property;
    const own = Object.values(err.constraints ?? {}).map((msg) => `${path}: ${msg}`);
    return [...own, ...flatten(err.children ?? [], path)];
  });
}

function citedIds(candidate: Record<string, unknown>): string[] {
  const clauses = candidate.supporting_clauses;
  if (!Array.isArray(clauses)) return [];
  return clauses.flatMap((c: unknown) => (isRecord(c) && typeof c.id === 'string' ? [c.id] : []));
}

function nonEmptyList(value: unknown): boolean {
  return Array.isArray(value) && value.length > 0;
}

/**
 * Structural and citation checks for a generated answer. Pure: the same
 * candidate and evidence always give the same violations, in the same order.
 */
@Injectable()
export class AnswerValidator {
  validate(candidate: unknown, evidence: readonly EvidenceItem[]): ValidationResult {
    if (!isRecord(candidate)) {
      return { valid: false, violations: ['answer must be a JSON object'] };
    }

    const dto = plainToInstance(CandidateAnswerDto, candidate);
    const violations = flatten(
      validateSync(dto, { whitelist: true, forbidNonWhitelisted: true }),
    );

    const ids = citedIds(candidate);
    if (
      ids.length === 0 &&
      (nonEmptyList(candidate.obligations) || nonEmptyList(candidate.penalties))
    ) {
      violations.push('supporting_clauses must not be empty when obligations or penalties are listed');
    }

    const retrieved = new Set(evidence.map((e) => e.unitId));
    const seen = new Set<string>();
    for (const id of ids) {
      if (!retrieved.has(id)) {
        violations.push(`supporting_clauses cites "${id}", which is not in the retrieved evidence`);
      } else if (seen.has(id)) {
        violations.push(`supporting_clauses cites "${id}" more than once`);
      }
      seen.add(id);
    }

    if (violations.length > 0) {
      return { valid: false, violations };
    }

    return { valid: true, violations: [], answer: toAnswer(dto) };
  }
}

function toAnswer(dto: CandidateAnswerDto): CandidateAnswer {
  return {
    summary: dto.summary,
    obligations: [...dto.obligations],
    penalties: [...dto.penalties],
    risks: [...dto.risks],
    supporting_clauses: dto.supporting_clauses.map(
      (c): SupportingClause => ({ id: c.id, text: c.text }),
    ),
  };
}
