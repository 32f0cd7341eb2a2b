// src/ingestion/ingestion.module.ts
import { Module } from '@nestjs/common';
import { CleaningModule } from './cleaning/cleaning.module';
import { ClauseSegmenter } from './segmentation/clause-segmenter';

@Module({
  imports: [CleaningModule],
  providers: [ClauseSegmenter],
  exports: [ClauseSegmenter],
})
export class IngestionModule {}
