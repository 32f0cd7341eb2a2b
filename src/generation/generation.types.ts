// src/generation/generation.types.ts
import type { ToolFindings } from './tools/extraction-tool';

/** Untrusted generator output; only the validator decides whether it is an answer. */
export interface GeneratedDraft {
  candidate: unknown;
  raw: string;
  findings: Record<string, ToolFindings>;
}
