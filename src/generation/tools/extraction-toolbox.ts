// src/generation/tools/extraction-toolbox.ts
import { Inject, Injectable } from '@nestjs/common';
import type { ToolDescriptor } from '../../ai/ai.types';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import type { EvidenceItem } from '../../indexing/evidence-index';
import { errorMessage } from '../../shared/errors/pipeline.errors';
import { callWithTimeout } from '../../shared/lib/timeouts/call-with-timeout';
import { LOGGER_SERVICE, type LoggerService } from '../../shared/types';
import { readDeadlineInput } from './deadline-calculator.tool';
import {
  AMOUNT_TOOL,
  CLASSIFIER_TOOL,
  type ClauseCategory,
  DATE_TOOL,
  DEADLINE_TOOL,
  type DeadlineInput,
  type ExtractionTool,
  type MonetaryAmount,
  type ToolFindings,
} from './extraction-tool';

const TEXT_PARAMETERS = {
  type: 'object',
  properties: {
    text: { type: 'string', description: 'Clause text to inspect' },
  },
  required: ['text'],
  additionalProperties: false,
};

const DEADLINE_PARAMETERS = {
  type: 'object',
  properties: {
    start_date: { type: 'string', description: 'Start date as YYYY-MM-DD' },
    days: { type: 'integer', description: 'Calendar days to add' },
  },
  required: ['start_date', 'days'],
  additionalProperties: false,
};

/**
 * Runs the extraction tools with a per-call time limit. A tool that throws
 * or times out yields null for that tool only; generation goes on with
 * whatever the other tools found.
 */
@Injectable()
export class ExtractionToolbox {
  constructor(
    @Inject(DATE_TOOL) private readonly dateTool: ExtractionTool<string>,
    @Inject(AMOUNT_TOOL) private readonly amountTool: ExtractionTool<MonetaryAmount>,
    @Inject(CLASSIFIER_TOOL) private readonly classifier: ExtractionTool<ClauseCategory>,
    @Inject(DEADLINE_TOOL) private readonly deadlineTool: ExtractionTool<string, DeadlineInput>,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  async apply<T, I>(tool: ExtractionTool<T, I>, input: I, signal?: AbortSignal): Promise<T | null> {
    if (signal?.aborted) return null;
    try {
      const result = await callWithTimeout(
        `tool ${tool.name}`,
        this.config.toolTimeoutMs,
        (s) => tool.run(input, s),
        signal,
      );
      return result ?? null;
    } catch (e: unknown) {
      await this.logger.warn(`Tool ${tool.name} failed, continuing without it: ${errorMessage(e)}`);
      return null;
    }
  }

  async findings(text: string, signal?: AbortSignal): Promise<ToolFindings> {
    const [date, amount, category] = await Promise.all([
      this.apply(this.dateTool, text, signal),
      this.apply(this.amountTool, text, signal),
      this.apply(this.classifier, text, signal),
    ]);
    return { date, amount, category: category ?? 'unknown' };
  }

  /** Findings for every evidence item, keyed by unit id. */
  async annotate(
    evidence: readonly EvidenceItem[],
    signal?: AbortSignal,
  ): Promise<Record<string, ToolFindings>> {
    const results = await Promise.all(
      evidence.map(async (item) => [item.unitId, await this.findings(item.text, signal)] as const),
    );
    return Object.fromEntries(results);
  }

  /** The clause tools plus the deadline calculator, exposed to the model for function calling. */
  descriptors(): ToolDescriptor[] {
    const textTools: ExtractionTool<unknown>[] = [this.dateTool, this.amountTool, this.classifier];
    const deadline: ToolDescriptor = {
      name: this.deadlineTool.name,
      description: this.deadlineTool.description,
      parameters: DEADLINE_PARAMETERS,
      invoke: async (args, signal) => {
        const input = readDeadlineInput(args);
        return input ? this.apply(this.deadlineTool, input, signal) : null;
      },
    };

    return [
      ...textTools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        parameters: TEXT_PARAMETERS,
        invoke: (args: Record<string, unknown>, signal?: AbortSignal) => {
          const text = typeof args.text === 'string' ? args.text : '';
          return this.apply(tool, text, signal);
        },
      })),
      deadline,
    ];
  }
}
