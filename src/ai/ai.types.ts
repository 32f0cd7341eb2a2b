export interface ToolDescriptor {
  name: string;
  description: string;
  /** JSON schema of the arguments object the model must send. */
  parameters: Record<string, unknown>;
  /** Never rejects: failures resolve to null. */
  invoke(args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
}

export interface CompletionRequest {
  system: string;
  user: string;
  tools?: ToolDescriptor[];
  signal?: AbortSignal;
}

/** Language model boundary. Rejects only when no output could be produced at all. */
export interface GenerationService {
  complete(request: CompletionRequest): Promise<string>;
}

/** Embedding model boundary. */
export interface EmbeddingService {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export const GENERATION_SERVICE = 'GENERATION_SERVICE';
export const EMBEDDING_SERVICE = 'EMBEDDING_SERVICE';

export type AiUsageKind = 'completion' | 'tool_round' | 'embedding' | 'embedding_error' | 'completion_error';

export interface AiUsageLogInput {
  kind: AiUsageKind;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number | null;
  extra?: Record<string, unknown>;
}
