// src/generation/answer-prompt.ts
import type { EvidenceItem } from '../indexing/evidence-index';
import type { ContractQuery } from '../pipeline/pipeline.types';
import type { ToolFindings } from './tools/extraction-tool';

export const ANSWER_SYSTEM_PROMPT = `
You are a contract analysis assistant.

Rules:
- Use ONLY the contract clauses provided in the context. Never invent terms, amounts or dates.
- Every obligation or penalty you list must be backed by at least one entry in "supporting_clauses".
- "supporting_clauses" may only cite clause ids that appear in the context, each id at most once.
- If the clauses do not answer the question, say so in "summary" and leave the lists empty.
- You may call the provided tools to normalize dates, extract amounts or classify a clause.
- When a deadline is relative ("within 30 days of invoice"), call calculate_deadline with the start date and the number of days instead of computing it yourself.
- Reply with a single JSON object with exactly these keys and nothing else:
  {
    "summary": string,
    "obligations": string[],
    "penalties": string[],
    "risks": string[],
    "supporting_clauses": [{ "id": string, "text": string }]
  }
`.trim();

function describeFindings(f: ToolFindings | undefined): string {
  if (!f) return 'none';
  const parts = [`category=${f.category}`];
  if (f.date) parts.push(`date=${f.date}`);
  if (f.amount) parts.push(`amount=${f.amount.value} ${f.amount.currency}`);
  return parts.join(', ');
}

export function buildAnswerPrompt(
  query: ContractQuery,
  evidence: readonly EvidenceItem[],
  findings: Readonly<Record<string, ToolFindings>>,
  feedback: readonly string[] = [],
): string {
  const contextText = evidence
    .map(
      (e) =>
        `[${e.unitId}] (score ${e.score.toFixed(3)})\n` +
        `Tool findings: ${describeFindings(findings[e.unitId])}\n` +
        `Text:\n${e.text}`,
    )
    .join('\n\n');

  const feedbackText = feedback.length
    ? `\n\nYour previous answer was rejected for these reasons. Fix all of them:\n${feedback
        .map((v) => `- ${v}`)
        .join('\n')}`
    : '';

  return `
Question:
${query.text}

Contract clauses (cite them by the id in brackets):

${contextText}${feedbackText}
`.trim();
}
