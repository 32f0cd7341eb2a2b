// src/retrieval/retrieval.module.ts
import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { EmbeddingGateway } from './embedding-gateway.service';
import { RetrieverService } from './retriever.service';

@Module({
  imports: [AiModule],
  providers: [EmbeddingGateway, RetrieverService],
  exports: [EmbeddingGateway, RetrieverService],
})
export class RetrievalModule {}
