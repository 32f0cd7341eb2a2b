// src/pipeline/pipeline-orchestrator.service.ts
import { Inject, Injectable } from '@nestjs/common';
import crypto from 'crypto';
import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config';
import { EvidenceGeneratorService } from '../generation/evidence-generator.service';
import {
  buildEvidenceIndex,
  type EvidenceIndexSnapshot,
  type EvidenceSet,
} from '../indexing/evidence-index';
import { EvidenceIndexRegistry } from '../indexing/evidence-index.registry';
import { ClauseSegmenter } from '../ingestion/segmentation/clause-segmenter';
import { EmbeddingGateway } from '../retrieval/embedding-gateway.service';
import { RetrieverService } from '../retrieval/retriever.service';
import {
  CancelledError,
  DocumentNotIndexedError,
  EmbeddingServiceError,
  EmptyDocumentError,
  GenerationServiceError,
  IndexBuildError,
  PipelineError,
  SchemaValidationExhausted,
  errorMessage,
  isPipelineError,
} from '../shared/errors/pipeline.errors';
import { untilAborted } from '../shared/lib/timeouts/call-with-timeout';
import { LOGGER_SERVICE, type LoggerService } from '../shared/types';
import type { CandidateAnswer } from '../validation/answer.types';
import { AnswerValidator } from '../validation/answer-validator.service';
import type {
  ContractDocument,
  ContractQuery,
  IndexSummary,
  PipelineStage,
  QueryResult,
  RunStateSnapshot,
} from './pipeline.types';
import { PipelineRun, RunRegistry } from './run-registry';
import { withTransientRetry } from './transient-retry';

export const NO_EVIDENCE_SUMMARY =
  'No relevant clauses were found in the contract for this question.';

function sha1(s: string): string {
  return crypto.createHash('sha1').update(s).digest('hex');
}

function toSummary(snapshot: EvidenceIndexSnapshot, rebuilt: boolean): IndexSummary {
  return {
    documentId: snapshot.documentId,
    contentHash: snapshot.contentHash,
    unitCount: snapshot.entries.length,
    dimensions: snapshot.dimensions,
    builtAt: snapshot.builtAt,
    rebuilt,
  };
}

// a joining run gets its own error; the owner's stays untouched
function joinedBuildError(documentId: string, e: unknown): PipelineError {
  if (e instanceof EmptyDocumentError) return new EmptyDocumentError(documentId, { cause: e });
  return new IndexBuildError(`Joined build of "${documentId}" failed: ${errorMessage(e)}`, {
    cause: e,
  });
}

function noEvidenceAnswer(): CandidateAnswer {
  return {
    summary: NO_EVIDENCE_SUMMARY,
    obligations: [],
    penalties: [],
    risks: [],
    supporting_clauses: [],
  };
}

/**
 * Drives index builds and queries through their state machines.
 *
 * The only place that decides whether a failure is retried: transient errors
 * of an external call are retried with linear back-off, generator output that
 * fails validation is regenerated with the violations as feedback, and
 * everything else ends the run in `Failed`.
 */
@Injectable()
export class PipelineOrchestrator {
  constructor(
    private readonly segmenter: ClauseSegmenter,
    private readonly embeddings: EmbeddingGateway,
    private readonly indexes: EvidenceIndexRegistry,
    private readonly retriever: RetrieverService,
    private readonly generator: EvidenceGeneratorService,
    private readonly validator: AnswerValidator,
    private readonly runs: RunRegistry,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  async ingestDocument(
    document: ContractDocument,
    opts: { force?: boolean; signal?: AbortSignal } = {},
  ): Promise<IndexSummary> {
    const run = this.runs.open('build', document.id, opts.signal);
    await this.logger.log(`[pipeline] build ${run.runId} started for "${document.id}"`);

    try {
      this.enter(run, 'Ingesting');
      const contentHash = sha1(document.text);

      const published = this.indexes.get(document.id);
      if (published && published.contentHash === contentHash && !opts.force) {
        run.transition('Indexed');
        await this.logger.log(`[pipeline] "${document.id}" unchanged, reusing published index`);
        return toSummary(published, false);
      }

      const pending = this.indexes.inFlight(document.id);
      if (pending && pending.contentHash === contentHash) {
        await this.logger.log(`[pipeline] build ${run.runId} joins the in-flight build of "${document.id}"`);
        const joined = await untilAborted(
          pending.promise.catch((e: unknown) => {
            throw joinedBuildError(document.id, e);
          }),
          'build run',
          run.signal,
        );
        run.transition('Indexed');
        return toSummary(joined, true);
      }

      const snapshot = await this.indexes.exclusive(document.id, contentHash, async () => {
        this.enter(run, 'Segmenting');
        const units = this.segmenter.segment(document);

        this.enter(run, 'Indexing');
        const vectors: number[][] = [];
        for (const [i, unit] of units.entries()) {
          vectors.push(
            await this.callExternal(run, () => this.embeddings.embed(unit.text, run.signal)),
          );
          if ((i + 1) % 25 === 0) {
            await this.logger.debug(`[pipeline] embedded ${i + 1}/${units.length} clauses`);
          }
        }

        return buildEvidenceIndex({
          documentId: document.id,
          contentHash,
          metric: this.config.similarityMetric,
          units,
          vectors,
        });
      });

      run.transition('Indexed');
      await this.logger.log(
        `[pipeline] build ${run.runId} indexed ${snapshot.entries.length} clauses for "${document.id}"`,
      );
      return toSummary(snapshot, true);
    } catch (e: unknown) {
      throw await this.fail(run, e);
    } finally {
      this.runs.close(run);
    }
  }

  async answerQuery(
    documentId: string,
    query: { text: string; topK?: number },
    opts: { signal?: AbortSignal } = {},
  ): Promise<QueryResult> {
    const topK = query.topK ?? this.config.defaultTopK;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RangeError(`topK must be a positive integer, got ${topK}`);
    }
    if (!query.text.trim()) {
      throw new RangeError('question must not be empty');
    }
    const q: ContractQuery = { text: query.text, topK };

    const run = this.runs.open('query', documentId, opts.signal);
    try {
      const snapshot = this.indexes.get(documentId);
      if (!snapshot) throw new DocumentNotIndexedError(documentId);

      this.enter(run, 'Retrieving');
      const evidence: EvidenceSet = await this.callExternal(run, () =>
        this.retriever.retrieve(snapshot, q, run.signal),
      );

      if (evidence.length === 0) {
        run.transition('Done');
        await this.logger.log(`[pipeline] query ${run.runId}: no evidence, generator skipped`);
        return { answer: noEvidenceAnswer(), evidence, run: run.snapshot() };
      }

      let feedback: string[] = [];
      for (;;) {
        this.enter(run, 'Generating');
        run.state.attemptCount += 1;
        const draft = await this.callExternal(run, () =>
          this.generator.generate(q, evidence, feedback, run.signal),
        );

        this.enter(run, 'Validating');
        const result = this.validator.validate(draft.candidate, evidence);
        if (result.valid) {
          run.transition('Done');
          await this.logger.log(
            `[pipeline] query ${run.runId} answered after ${run.state.attemptCount} attempt(s)`,
          );
          return { answer: result.answer, evidence, run: run.snapshot() };
        }

        feedback = result.violations;
        await this.logger.warn(
          `[pipeline] query ${run.runId} attempt ${run.state.attemptCount} rejected: ${feedback.join('; ')}`,
        );
        if (run.state.attemptCount >= this.config.maxRepairAttempts) {
          throw new SchemaValidationExhausted(run.state.attemptCount, feedback);
        }
      }
    } catch (e: unknown) {
      throw await this.fail(run, e);
    } finally {
      this.runs.close(run);
    }
  }

  getRun(runId: string): RunStateSnapshot | undefined {
    return this.runs.get(runId);
  }

  listRuns(): RunStateSnapshot[] {
    return this.runs.list();
  }

  cancel(runId: string): boolean {
    return this.runs.cancel(runId);
  }

  getIndex(documentId: string): IndexSummary | undefined {
    const snapshot = this.indexes.get(documentId);
    return snapshot ? toSummary(snapshot, false) : undefined;
  }

  listIndexes(): IndexSummary[] {
    return this.indexes.list().map((s) => toSummary(s, false));
  }

  evictIndex(documentId: string): boolean {
    return this.indexes.evict(documentId);
  }

  private enter(run: PipelineRun, stage: PipelineStage): void {
    if (run.signal.aborted) throw new CancelledError(`${run.state.kind} run`);
    run.transition(stage);
  }

  private callExternal<T>(run: PipelineRun, op: () => Promise<T>): Promise<T> {
    return withTransientRetry(op, {
      maxAttempts: this.config.maxTransientAttempts,
      baseDelayMs: this.config.retryBaseDelayMs,
      signal: run.signal,
      onRetry: async (error, attempt) => {
        run.state.transientRetries += 1;
        await this.logger.warn(
          `[pipeline] ${run.state.stage} attempt ${attempt} of run ${run.runId} failed, retrying: ${errorMessage(error)}`,
        );
      },
    });
  }

  private async fail(run: PipelineRun, e: unknown): Promise<PipelineError> {
    const stage = run.state.stage;
    let error: PipelineError;
    if (run.signal.aborted && !(isPipelineError(e) && e.kind === 'Cancelled')) {
      error = new CancelledError(`${run.state.kind} run`);
    } else if (isPipelineError(e)) {
      error = e;
    } else if (run.state.kind === 'build') {
      error = new IndexBuildError(`Index build failed: ${errorMessage(e)}`, { cause: e });
    } else if (stage === 'Retrieving') {
      error = new EmbeddingServiceError(`Retrieval failed: ${errorMessage(e)}`, { cause: e });
    } else {
      error = new GenerationServiceError(`Query failed: ${errorMessage(e)}`, { cause: e });
    }

    error.stage ??= stage;
    run.state.lastError = `${error.kind}: ${error.message}`;
    if (!run.finished) run.transition('Failed');
    error.run = run.snapshot();

    await this.logger.error(
      `[pipeline] ${run.state.kind} ${run.runId} for "${run.state.documentId}" failed at ${stage}: ${error.message}`,
      error.stack,
    );
    return error;
  }
}
