// src/indexing/evidence-index.registry.ts
import { Injectable } from '@nestjs/common';
import type { EvidenceIndexSnapshot } from './evidence-index';
import { IndexBuildError } from '../shared/errors/pipeline.errors';

interface InFlightBuild {
  contentHash: string;
  promise: Promise<EvidenceIndexSnapshot>;
}

/**
 * Holds the published snapshot of every indexed document.
 *
 * One build per document at a time; a snapshot becomes visible to readers
 * only when its build resolves, replacing the previous one in a single
 * assignment. A failed build leaves the previous snapshot in place.
 */
@Injectable()
export class EvidenceIndexRegistry {
  private readonly snapshots = new Map<string, EvidenceIndexSnapshot>();
  private readonly builds = new Map<string, InFlightBuild>();

  get(documentId: string): EvidenceIndexSnapshot | undefined {
    return this.snapshots.get(documentId);
  }

  list(): EvidenceIndexSnapshot[] {
    return Array.from(this.snapshots.values()).sort((a, b) =>
      a.documentId.localeCompare(b.documentId),
    );
  }

  evict(documentId: string): boolean {
    return this.snapshots.delete(documentId);
  }

  inFlight(documentId: string): Readonly<InFlightBuild> | undefined {
    return this.builds.get(documentId);
  }

  exclusive(
    documentId: string,
    contentHash: string,
    build: () => Promise<EvidenceIndexSnapshot>,
  ): Promise<EvidenceIndexSnapshot> {
    if (this.builds.has(documentId)) {
      return Promise.reject(
        new IndexBuildError(`An index build for "${documentId}" is already in progress`, {
          conflict: true,
        }),
      );
    }

    // build starts on the next microtask, after the slot below is taken
    const promise: Promise<EvidenceIndexSnapshot> = Promise.resolve()
      .then(build)
      .then((snapshot) => {
        if (snapshot.documentId !== documentId || snapshot.contentHash !== contentHash) {
          throw new IndexBuildError(
            `Build of "${documentId}" produced a snapshot for another document version`,
          );
        }
        this.snapshots.set(documentId, snapshot);
        return snapshot;
      })
      .finally(() => {
        this.builds.delete(documentId);
      });

    this.builds.set(documentId, { contentHash, promise });
    return promise;
  }
}
