// src/config/pipeline.config.ts
import { registerAs } from '@nestjs/config';

export type SimilarityMetric = 'cosine' | 'dot' | 'euclidean';

export interface PipelineConfig {
  maxUnitChars: number;
  defaultTopK: number;
  similarityMetric: SimilarityMetric;
  maxRepairAttempts: number;
  maxTransientAttempts: number;
  retryBaseDelayMs: number;
  embeddingTimeoutMs: number;
  generationTimeoutMs: number;
  toolTimeoutMs: number;
  maxToolRounds: number;
  chatModel: string;
  embeddingModel: string;
}

export const PIPELINE_CONFIG = 'PIPELINE_CONFIG';

const METRICS: readonly SimilarityMetric[] = ['cosine', 'dot', 'euclidean'];

function intFromEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function metricFromEnv(env: NodeJS.ProcessEnv): SimilarityMetric {
  const raw = (env.SIMILARITY_METRIC ?? 'cosine').trim().toLowerCase();
  const metric = METRICS.find((m) => m === raw);
  if (!metric) {
    throw new Error(`SIMILARITY_METRIC must be one of ${METRICS.join(', ')}, got "${raw}"`);
  }
  return metric;
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    maxUnitChars: intFromEnv(env, 'MAX_UNIT_CHARS', 1000, 50),
    defaultTopK: intFromEnv(env, 'DEFAULT_TOP_K', 5, 1),
    similarityMetric: metricFromEnv(env),
    maxRepairAttempts: intFromEnv(env, 'MAX_REPAIR_ATTEMPTS', 3, 1),
    maxTransientAttempts: intFromEnv(env, 'MAX_TRANSIENT_ATTEMPTS', 3, 1),
    retryBaseDelayMs: intFromEnv(env, 'RETRY_BASE_DELAY_MS', 800, 0),
    embeddingTimeoutMs: intFromEnv(env, 'EMBEDDING_TIMEOUT_MS', 15_000, 1),
    generationTimeoutMs: intFromEnv(env, 'GENERATION_TIMEOUT_MS', 60_000, 1),
    toolTimeoutMs: intFromEnv(env, 'TOOL_TIMEOUT_MS', 2_000, 1),
    maxToolRounds: intFromEnv(env, 'MAX_TOOL_ROUNDS', 3, 0),
    chatModel: env.OPENAI_MODEL || 'gpt-4.1-mini',
    embeddingModel: env.EMBEDDING_MODEL || 'text-embedding-3-small',
  };
}

export default registerAs('pipeline', () => loadPipelineConfig());
