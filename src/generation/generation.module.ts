// src/generation/generation.module.ts
import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { EvidenceGeneratorService } from './evidence-generator.service';
import { AmountExtractorTool } from './tools/amount-extractor.tool';
import { ClauseClassifierTool } from './tools/clause-classifier.tool';
import { DateNormalizerTool } from './tools/date-normalizer.tool';
import { DeadlineCalculatorTool } from './tools/deadline-calculator.tool';
import { AMOUNT_TOOL, CLASSIFIER_TOOL, DATE_TOOL, DEADLINE_TOOL } from './tools/extraction-tool';
import { ExtractionToolbox } from './tools/extraction-toolbox';

@Module({
  imports: [AiModule],
  providers: [
    { provide: DATE_TOOL, useClass: DateNormalizerTool },
    { provide: AMOUNT_TOOL, useClass: AmountExtractorTool },
    { provide: CLASSIFIER_TOOL, useClass: ClauseClassifierTool },
    { provide: DEADLINE_TOOL, useClass: DeadlineCalculatorTool },
    ExtractionToolbox,
    EvidenceGeneratorService,
  ],
  exports: [EvidenceGeneratorService, ExtractionToolbox],
})
export class GenerationModule {}
