// src/testing/fakes.ts
import type { CompletionRequest, EmbeddingService, GenerationService } from '../ai/ai.types';
import { loadPipelineConfig, type PipelineConfig } from '../config/pipeline.config';
import type { LoggerService } from '../shared/types';

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return { ...loadPipelineConfig({}), retryBaseDelayMs: 0, ...overrides };
}

export function silentLogger(): jest.Mocked<LoggerService> {
  return {
    app: 'test-app',
    log: jest.fn().mockResolvedValue(undefined),
    warn: jest.fn().mockResolvedValue(undefined),
    debug: jest.fn().mockResolvedValue(undefined),
    error: jest.fn().mockResolvedValue(undefined),
  };
}

/** One dimension per concept; a component counts keyword occurrences. */
export const CONCEPTS: readonly (readonly string[])[] = [
  ['pay', 'invoice'],
  ['penalt', 'late', 'overdue'],
  ['confidential'],
  ['terminat'],
  ['days', 'month'],
];

function occurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

export class KeywordEmbedder implements EmbeddingService {
  calls: string[] = [];

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const lower = text.toLowerCase();
    return CONCEPTS.map((words) => words.reduce((n, w) => n + occurrences(lower, w), 0));
  }
}

/** Never resolves on its own; rejects only when its signal aborts. */
export class HangingEmbedder implements EmbeddingService {
  calls = 0;
  aborted = 0;

  embed(_text: string, signal?: AbortSignal): Promise<number[]> {
    this.calls += 1;
    return new Promise<number[]>((_resolve, reject) => {
      signal?.addEventListener(
        'abort',
        () => {
          this.aborted += 1;
          reject(new Error('aborted'));
        },
        { once: true },
      );
    });
  }
}

/** Replays scripted completions in order; records every request it receives. */
export class ScriptedGenerator implements GenerationService {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    return next;
  }
}

export const THREE_CLAUSE_CONTRACT = [
  '1. Payment is due within 30 days of invoice.',
  '2. A late payment penalty of 1.5% per month applies to overdue amounts.',
  '3. Confidentiality obligations survive termination of this agreement.',
].join('\n\n');
