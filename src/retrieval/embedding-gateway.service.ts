// src/retrieval/embedding-gateway.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { EMBEDDING_SERVICE, type EmbeddingService } from '../ai/ai.types';
import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config';
import { callWithTimeout } from '../shared/lib/timeouts/call-with-timeout';
import {
  EmbeddingServiceError,
  errorMessage,
  isPipelineError,
} from '../shared/errors/pipeline.errors';

/**
 * Single entry point to the embedding service for both index builds and
 * queries: bounds every call by `embeddingTimeoutMs` and reports anything
 * that is not already a pipeline error as EmbeddingServiceError.
 */
@Injectable()
export class EmbeddingGateway {
  constructor(
    @Inject(EMBEDDING_SERVICE) private readonly service: EmbeddingService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      return await callWithTimeout(
        'embedding call',
        this.config.embeddingTimeoutMs,
        (s) => this.service.embed(text, s),
        signal,
      );
    } catch (e: unknown) {
      if (isPipelineError(e)) throw e;
      throw new EmbeddingServiceError(`Embedding failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
