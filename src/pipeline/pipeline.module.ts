// src/pipeline/pipeline.module.ts
import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { GenerationModule } from '../generation/generation.module';
import { IndexingModule } from '../indexing/indexing.module';
import { IngestionModule } from '../ingestion/ingestion.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { ValidationModule } from '../validation/validation.module';
import { PipelineController } from './pipeline.controller';
import { PipelineOrchestrator } from './pipeline-orchestrator.service';
import { RunRegistry } from './run-registry';

@Module({
  imports: [
    AiModule,
    IngestionModule,
    IndexingModule,
    RetrievalModule,
    GenerationModule,
    ValidationModule,
  ],
  controllers: [PipelineController],
  providers: [RunRegistry, PipelineOrchestrator],
  exports: [PipelineOrchestrator],
})
export class PipelineModule {}
