// src/generation/tools/clause-classifier.tool.ts
import { Injectable } from '@nestjs/common';
import type { ClauseCategory, ExtractionTool } from './extraction-tool';

// first matching rule wins
const RULES: ReadonlyArray<[Exclude<ClauseCategory, 'unknown'>, RegExp]> = [
  ['penalty', /\b(penalt(?:y|ies)|late (?:fee|charge)s?|liquidated damages|default interest)\b/i],
  ['confidentiality', /\b(confidential(?:ity)?|non-disclosure|proprietary information)\b/i],
  ['liability', /\b(liabilit(?:y|ies)|liable|indemnif(?:y|ies|ication)|warrant(?:y|ies))\b/i],
  ['payment', /\b(pay(?:s|able|ment|ments)?|invoices?|fees?|price|remit(?:tance)?)\b/i],
  ['termination', /\b(terminat(?:e|es|ed|ion)|expir(?:y|es|ation)|cancel(?:s|led|lation)?)\b/i],
  ['obligation', /\b(shall|must|agrees? to|is required to|undertakes? to)\b/i],
];

export function classifyClause(text: string): ClauseCategory {
  for (const [category, re] of RULES) {
    if (re.test(text)) return category;
  }
  return 'unknown';
}

@Injectable()
export class ClauseClassifierTool implements ExtractionTool<ClauseCategory> {
  readonly name = 'classify_clause';
  readonly description =
    'Labels a clause as payment, penalty, termination, confidentiality, liability, obligation or unknown.';

  async run(text: string): Promise<ClauseCategory> {
    return classifyClause(text);
  }
}
