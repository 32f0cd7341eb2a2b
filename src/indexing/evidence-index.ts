// src/indexing/evidence-index.ts
import type { ClauseUnit } from '../ingestion/segmentation/clause-segmenter';
import type { SimilarityMetric } from '../config/pipeline.config';
import { EmbeddingServiceError, IndexBuildError } from '../shared/errors/pipeline.errors';

export interface IndexEntry {
  readonly unit: ClauseUnit;
  readonly vector: readonly number[];
  readonly norm: number;
}

/** Immutable, published once complete; rebuilds produce a new snapshot. */
export interface EvidenceIndexSnapshot {
  readonly documentId: string;
  readonly contentHash: string;
  readonly metric: SimilarityMetric;
  readonly dimensions: number;
  readonly entries: readonly IndexEntry[];
  readonly builtAt: string;
}

export interface EvidenceItem {
  unitId: string;
  ordinal: number;
  text: string;
  score: number;
}

/** Descending by score, ties by ascending ordinal. */
export type EvidenceSet = EvidenceItem[];

function norm(v: readonly number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

function score(metric: SimilarityMetric, entry: IndexEntry, q: readonly number[], qNorm: number): number {
  switch (metric) {
    case 'dot':
      return dot(entry.vector, q);
    case 'euclidean': {
      let sum = 0;
      for (let i = 0; i < q.length; i++) {
        const d = entry.vector[i] - q[i];
        sum += d * d;
      }
      return -Math.sqrt(sum);
    }
    case 'cosine':
      return entry.norm === 0 || qNorm === 0 ? 0 : dot(entry.vector, q) / (entry.norm * qNorm);
  }
}

export function buildEvidenceIndex(input: {
  documentId: string;
  contentHash: string;
  metric: SimilarityMetric;
  units: readonly ClauseUnit[];
  vectors: readonly (readonly number[])[];
}): EvidenceIndexSnapshot {
  const { units, vectors } = input;

  if (units.length !== vectors.length) {
    throw new IndexBuildError(
      `Expected ${units.length} embeddings for "${input.documentId}", got ${vectors.length}`,
    );
  }

  const dimensions = vectors[0]?.length ?? 0;
  const entries = units.map((unit, i): IndexEntry => {
    const vector = vectors[i];
    if (vector.length === 0 || vector.length !== dimensions) {
      throw new IndexBuildError(
        `Embedding of ${unit.id} has ${vector.length} dimensions, expected ${dimensions}`,
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new IndexBuildError(`Embedding of ${unit.id} contains non-finite values`);
    }
    const copy = Object.freeze([...vector]);
    return Object.freeze({ unit, vector: copy, norm: norm(copy) });
  });

  return Object.freeze({
    documentId: input.documentId,
    contentHash: input.contentHash,
    metric: input.metric,
    dimensions,
    entries: Object.freeze(entries),
    builtAt: new Date().toISOString(),
  });
}

/**
 * Exhaustive nearest-neighbour lookup. Read-only: safe for any number of
 * concurrent callers on the same snapshot.
 */
export function queryEvidenceIndex(
  snapshot: EvidenceIndexSnapshot,
  queryVector: readonly number[],
  topK: number,
): EvidenceSet {
  if (snapshot.entries.length === 0) return [];

  if (queryVector.length !== snapshot.dimensions || !queryVector.every(Number.isFinite)) {
    throw new EmbeddingServiceError(
      `Query embedding has ${queryVector.length} dimensions, index "${snapshot.documentId}" expects ${snapshot.dimensions}`,
    );
  }

  const qNorm = norm(queryVector);
  return snapshot.entries
    .map((entry) => ({
      unitId: entry.unit.id,
      ordinal: entry.unit.ordinal,
      text: entry.unit.text,
      score: score(snapshot.metric, entry, queryVector, qNorm),
    }))
    .sort((a, b) => b.score - a.score || a.ordinal - b.ordinal)
    .slice(0, Math.max(0, topK));
}
