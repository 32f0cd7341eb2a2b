// src/pipeline/pipeline.types.ts
import type { CandidateAnswer } from '../validation/answer.types';
import type { EvidenceItem } from '../indexing/evidence-index';

export type BuildStage = 'Idle' | 'Ingesting' | 'Segmenting' | 'Indexing' | 'Indexed' | 'Failed';

export type QueryStage = 'Idle' | 'Retrieving' | 'Generating' | 'Validating' | 'Done' | 'Failed';

export type PipelineStage = BuildStage | QueryStage;

export type RunKind = 'build' | 'query';

export interface RunState {
  runId: string;
  kind: RunKind;
  documentId: string;
  stage: PipelineStage;
  /** Generator invocations so far (repair-loop counter). */
  attemptCount: number;
  /** Transient-failure retries across all external calls of the run. */
  transientRetries: number;
  lastError?: string;
  history: PipelineStage[];
  startedAt: string;
}

export type RunStateSnapshot = Readonly<
  Omit<RunState, 'history'> & { history: readonly PipelineStage[] }
>;

export interface ContractDocument {
  id: string;
  text: string;
}

export interface ContractQuery {
  text: string;
  topK: number;
}

export interface IndexSummary {
  documentId: string;
  contentHash: string;
  unitCount: number;
  dimensions: number;
  builtAt: string;
  /** False when the published snapshot was reused as-is. */
  rebuilt: boolean;
}

export interface QueryResult {
  answer: CandidateAnswer;
  evidence: EvidenceItem[];
  run: RunStateSnapshot;
}

export const BUILD_TRANSITIONS = {
  Idle: ['Ingesting', 'Failed'],
  Ingesting: ['Segmenting', 'Indexed', 'Failed'],
  Segmenting: ['Indexing', 'Failed'],
  Indexing: ['Indexed', 'Failed'],
  Indexed: [],
  Failed: [],
} satisfies Record<BuildStage, readonly BuildStage[]>;

export const QUERY_TRANSITIONS = {
  Idle: ['Retrieving', 'Failed'],
  Retrieving: ['Generating', 'Done', 'Failed'],
  Generating: ['Validating', 'Failed'],
  Validating: ['Done', 'Generating', 'Failed'],
  Done: [],
  Failed: [],
} satisfies Record<QueryStage, readonly QueryStage[]>;

export const RUN_TRANSITIONS: Readonly<
  Record<RunKind, Partial<Record<PipelineStage, readonly PipelineStage[]>>>
> = {
  build: BUILD_TRANSITIONS,
  query: QUERY_TRANSITIONS,
};

export const TERMINAL_STAGES: readonly PipelineStage[] = ['Indexed', 'Done', 'Failed'];
