import crypto from 'node:crypto';
import type { StepRecord } from '@zbx-provision/shared';

export type StepEntry = Omit<StepRecord, 'prevHash'>;

export function hashRecord(record: StepRecord): string {
  return crypto.createHash('sha256').update(JSON.stringify(record)).digest('hex');
}

/**
 * Ordered record of step outcomes. Each record carries the hash of its
 * predecessor, so an edited evidence trail fails `verifyChain`.
 */
export class StepJournal {
  private records: StepRecord[] = [];

  record(entry: StepEntry): StepRecord {
    const last = this.records[this.records.length - 1];
    const record: StepRecord = { ...entry, prevHash: last ? hashRecord(last) : '' };
    this.records.push(record);
    return record;
  }

  /** Hash of the newest record; empty while the journal is empty */
  headHash(): string {
    const last = this.records[this.records.length - 1];
    return last ? hashRecord(last) : '';
  }

  getRecords(): StepRecord[] {
    return [...this.records];
  }

  verifyChain(records: readonly StepRecord[] = this.records): { valid: boolean; brokenAt?: number } {
    const first = records[0];
    if (!first) return { valid: true };
    if (first.prevHash !== '') return { valid: false, brokenAt: 0 };

    for (let i = 1; i < records.length; i++) {
      const prev = records[i - 1];
      const curr = records[i];
      if (!prev || !curr || curr.prevHash !== hashRecord(prev)) {
        return { valid: false, brokenAt: i };
      }
    }
    return { valid: true };
  }
}
