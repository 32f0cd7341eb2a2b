// src/validation/answer.types.ts

export interface SupportingClause {
  id: string;
  text: string;
}

/** The answer object returned to callers once it has passed validation. */
export interface CandidateAnswer {
  summary: string;
  obligations: string[];
  penalties: string[];
  risks: string[];
  supporting_clauses: SupportingClause[];
}

export type ValidationResult =
  | { valid: true; violations: []; answer: CandidateAnswer }
  | { valid: false; violations: string[] };
