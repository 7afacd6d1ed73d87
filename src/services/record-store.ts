import { DATA_CONFIG, type DuplicateKeyPolicy } from '../constants.js';
import { Errors } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import type { DatasetSnapshot, LoanRecord } from '../types.js';

export interface RecordStoreOptions {
  duplicateKeys?: DuplicateKeyPolicy;
}

/**
 * Owns the published dataset snapshot.
 *
 * A build assembles a complete snapshot before publishing it with one
 * reference assignment, so readers holding the previous snapshot keep a
 * consistent view and never see indices from another batch.
 */
export class RecordStore {
  private current: DatasetSnapshot | null = null;
  private version = 0;
  private reloadChain: Promise<unknown> = Promise.resolve();
  private readonly duplicateKeys: DuplicateKeyPolicy;

  constructor(options: RecordStoreOptions = {}) {
    this.duplicateKeys = options.duplicateKeys ?? DATA_CONFIG.DUPLICATE_KEYS;
  }

  /**
   * Build a snapshot from a batch and publish it.
   * With the reject policy a duplicate loan ID throws and the previous
   * snapshot stays published.
   */
  build(records: readonly LoanRecord[]): DatasetSnapshot {
    const timer = metrics.startTimer(MetricNames.BUILD_DURATION_MS);
    const batch = Object.freeze([...records]);
    const byKey = new Map<string, LoanRecord>();
    const mismatches: LoanRecord[] = [];
    let duplicateKeys = 0;

    for (const record of batch) {
      if (byKey.has(record.loanId)) {
        if (this.duplicateKeys === 'reject') {
          throw Errors.duplicateLoanId(record.loanId);
        }
        duplicateKeys++;
      }
      byKey.set(record.loanId, record);

      if (record.hasMismatch) {
        mismatches.push(record);
      }
    }

    const snapshot: DatasetSnapshot = Object.freeze({
      version: this.version + 1,
      records: batch,
      byKey,
      mismatches: Object.freeze(mismatches),
      builtAt: new Date(),
      duplicateKeys
    });

    this.current = snapshot;
    this.version = snapshot.version;

    metrics.increment(MetricNames.SNAPSHOT_BUILDS);
    metrics.gauge(MetricNames.RECORDS_LOADED, batch.length);
    metrics.gauge(MetricNames.MISMATCHES_LOADED, mismatches.length);

    if (duplicateKeys > 0) {
      logger.warn('Duplicate loan IDs found; the last row for each ID is indexed', {
        duplicateKeys,
        version: snapshot.version
      });
    }
    logger.snapshotPublished(snapshot.version, {
      records: batch.length,
      mismatches: mismatches.length,
      buildMs: timer.stop()
    });

    return snapshot;
  }

  /**
   * Load a new batch and publish it once loading completes.
   * Reloads run one after another; readers are never blocked while a
   * batch loads.
   */
  reload(load: () => Promise<readonly LoanRecord[]>): Promise<DatasetSnapshot> {
    const next = this.reloadChain.then(async () => this.build(await load()));
    this.reloadChain = next.catch(() => undefined);
    return next;
  }

  /**
   * The published snapshot. Capture it once per read so every lookup in
   * that read sees the same batch.
   */
  snapshot(): DatasetSnapshot {
    if (!this.current) {
      throw Errors.notLoaded();
    }
    return this.current;
  }

  isLoaded(): boolean {
    return this.current !== null;
  }

  getByKey(loanId: string): LoanRecord | undefined {
    return this.current?.byKey.get(loanId);
  }

  mismatchSet(): readonly LoanRecord[] {
    return this.current?.mismatches ?? [];
  }

  count(): number {
    return this.current?.records.length ?? 0;
  }

  lastBuildTime(): Date | null {
    return this.current?.builtAt ?? null;
  }
}

export const recordStore = new RecordStore();
