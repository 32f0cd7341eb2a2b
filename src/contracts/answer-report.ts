// src/contracts/answer-report.ts
import type { QueryResult } from '../pipeline/pipeline.types';

function section(title: string, items: readonly string[]): string {
  return items.length ? `### ${title}\n${items.map((i) => `- ${i}`).join('\n')}\n\n` : '';
}

/** Human-readable rendering of a query result, for the CLI. */
export function renderAnswerReport(result: QueryResult): string {
  const { answer } = result;
  let out = `### Summary\n${answer.summary}\n\n`;
  out += section('Obligations', answer.obligations);
  out += section('Penalties', answer.penalties);
  out += section('Risks', answer.risks);

  if (answer.supporting_clauses.length) {
    out +=
      '### Supporting clauses\n' +
      answer.supporting_clauses.map((c) => `**${c.id}**: *${c.text}*`).join('\n\n') +
      '\n';
  }

  return out.trimEnd() + '\n';
}
