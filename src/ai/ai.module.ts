// src/ai/ai.module.ts
import { Module } from '@nestjs/common';
import { OpenAI } from 'openai';
import { AiService } from './ai.service';
import { AiUsageService } from './ai-usage.service';
import { OpenAiEmbeddingsService } from './openai-embeddings.service';
import { EMBEDDING_SERVICE, GENERATION_SERVICE } from './ai.types';

@Module({
  providers: [
    {
      provide: OpenAI,
      useFactory: () => {
        const apiKey = process.env.OPENAI_API_KEY;
        if (!apiKey) {
          // The app still starts; AiService and OpenAiEmbeddingsService refuse calls.
          console.warn(
            '[AiModule] WARNING: OPENAI_API_KEY is not set. Generation and embedding calls will fail.',
          );
        }

        return new OpenAI({
          apiKey: apiKey || 'not-configured',
          // retries are decided by the pipeline orchestrator
          maxRetries: 0,
        });
      },
    },
    AiService,
    AiUsageService,
    OpenAiEmbeddingsService,
    { provide: GENERATION_SERVICE, useExisting: AiService },
    { provide: EMBEDDING_SERVICE, useExisting: OpenAiEmbeddingsService },
  ],
  exports: [GENERATION_SERVICE, EMBEDDING_SERVICE, AiUsageService],
})
export class AiModule {}
