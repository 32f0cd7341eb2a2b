// src/ai/openai-embeddings.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { OpenAI } from 'openai';
import { AiUsageService } from './ai-usage.service';
import { EmbeddingService } from './ai.types';
import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config';
import { EmbeddingServiceError, errorMessage } from '../shared/errors/pipeline.errors';

@Injectable()
export class OpenAiEmbeddingsService implements EmbeddingService {
  private readonly logger = new Logger(OpenAiEmbeddingsService.name);

  constructor(
    private readonly openai: OpenAI,
    private readonly aiUsage: AiUsageService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const input = text.trim();
    const model = this.config.embeddingModel;

    if (!process.env.OPENAI_API_KEY) {
      throw new EmbeddingServiceError('OPENAI_API_KEY is not set');
    }

    try {
      const resp = await this.openai.embeddings.create({ model, input }, { signal });

      const inputTokens = resp.usage?.prompt_tokens ?? 0;
      this.aiUsage.record({
        kind: 'embedding',
        model,
        inputTokens,
        outputTokens: 0,
        totalTokens: resp.usage?.total_tokens ?? inputTokens,
        costUsd: this.aiUsage.computeCostUsd(model, inputTokens, 0),
        extra: { chars: input.length },
      });

      const embedding = resp.data?.[0]?.embedding;
      if (!embedding?.length) {
        throw new EmbeddingServiceError('No embedding returned');
      }
      return embedding;
    } catch (e: unknown) {
      if (e instanceof EmbeddingServiceError) throw e;

      this.aiUsage.record({
        kind: 'embedding_error',
        model,
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        costUsd: null,
        extra: { message: errorMessage(e).slice(0, 500) },
      });
      this.logger.warn(`embed failed: ${errorMessage(e)}`);

      throw new EmbeddingServiceError(`Embedding service call failed: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }
}
