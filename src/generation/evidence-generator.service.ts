// src/generation/evidence-generator.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { GENERATION_SERVICE, type GenerationService } from '../ai/ai.types';
import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config';
import type { EvidenceItem } from '../indexing/evidence-index';
import type { ContractQuery } from '../pipeline/pipeline.types';
import {
  GenerationServiceError,
  errorMessage,
  isPipelineError,
} from '../shared/errors/pipeline.errors';
import { callWithTimeout } from '../shared/lib/timeouts/call-with-timeout';
import { ANSWER_SYSTEM_PROMPT, buildAnswerPrompt } from './answer-prompt';
import type { GeneratedDraft } from './generation.types';
import { ExtractionToolbox } from './tools/extraction-toolbox';

/** Parses model output, tolerating a ```json fence. Returns undefined when it is not JSON. */
export function parseCandidate(raw: string): unknown {
  const fenced = raw.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  const body = fenced ? fenced[1] : raw.trim();
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

@Injectable()
export class EvidenceGeneratorService {
  constructor(
    @Inject(GENERATION_SERVICE) private readonly llm: GenerationService,
    private readonly toolbox: ExtractionToolbox,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async generate(
    query: ContractQuery,
    evidence: readonly EvidenceItem[],
    feedback: readonly string[] = [],
    signal?: AbortSignal,
  ): Promise<GeneratedDraft> {
    const findings = await this.toolbox.annotate(evidence, signal);

    let raw: string;
    try {
      raw = await callWithTimeout(
        'generation call',
        this.config.generationTimeoutMs,
        (s) =>
          this.llm.complete({
            system: ANSWER_SYSTEM_PROMPT,
            user: buildAnswerPrompt(query, evidence, findings, feedback),
            tools: this.toolbox.descriptors(),
            signal: s,
          }),
        signal,
      );
    } catch (e: unknown) {
      if (isPipelineError(e)) throw e;
      throw new GenerationServiceError(`Generation failed: ${errorMessage(e)}`, { cause: e });
    }

    if (!raw.trim()) {
      throw new GenerationServiceError('Generation service returned no output');
    }

    return { candidate: parseCandidate(raw), raw, findings };
  }
}
