// src/indexing/indexing.module.ts
import { Module } from '@nestjs/common';
import { EvidenceIndexRegistry } from './evidence-index.registry';

@Module({
  providers: [EvidenceIndexRegistry],
  exports: [EvidenceIndexRegistry],
})
export class IndexingModule {}
