// src/retrieval/retriever.service.ts
import { Injectable } from '@nestjs/common';
import { EmbeddingGateway } from './embedding-gateway.service';
import {
  EvidenceIndexSnapshot,
  EvidenceSet,
  queryEvidenceIndex,
} from '../indexing/evidence-index';
import type { ContractQuery } from '../pipeline/pipeline.types';

@Injectable()
export class RetrieverService {
  constructor(private readonly embeddings: EmbeddingGateway) {}

  /**
   * Embeds the question and ranks the snapshot's clauses against it.
   * An empty index yields an empty evidence set; embedding failures
   * propagate untouched (no retry here).
   */
  async retrieve(
    snapshot: EvidenceIndexSnapshot,
    query: ContractQuery,
    signal?: AbortSignal,
  ): Promise<EvidenceSet> {
    if (snapshot.entries.length === 0) return [];

    const vector = await this.embeddings.embed(query.text, signal);
    return queryEvidenceIndex(snapshot, vector, query.topK);
  }
}
