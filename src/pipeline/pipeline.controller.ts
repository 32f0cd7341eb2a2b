// src/pipeline/pipeline.controller.ts
import { Controller, Delete, Get, NotFoundException, Param } from '@nestjs/common';
import { AiUsageService } from '../ai/ai-usage.service';
import { PipelineOrchestrator } from './pipeline-orchestrator.service';

@Controller('pipeline')
export class PipelineController {
  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly aiUsageService: AiUsageService,
  ) {}

  @Get('runs')
  listRuns() {
    return this.orchestrator.listRuns();
  }

  @Get('runs/:runId')
  getRun(@Param('runId') runId: string) {
    const run = this.orchestrator.getRun(runId);
    if (!run) throw new NotFoundException(`Run ${runId} not found`);
    return run;
  }

  @Delete('runs/:runId')
  cancel(@Param('runId') runId: string) {
    if (!this.orchestrator.getRun(runId)) {
      throw new NotFoundException(`Run ${runId} not found`);
    }
    return { runId, cancelled: this.orchestrator.cancel(runId) };
  }

  @Get('usage')
  getUsage() {
    return this.aiUsageService.getOverview();
  }
}
