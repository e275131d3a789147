import { describe, expect, it } from 'vitest';
import { type StepEntry, StepJournal } from './journal.js';

function entry(step: string, status: StepEntry['status'] = 'ok'): StepEntry {
  return {
    step,
    title: step,
    status,
    startedAt: '2026-10-19T10:15:00.000Z',
    durationMs: 12,
  };
}

describe('StepJournal', () => {
  it('starts the chain with an empty hash', () => {
    const journal = new StepJournal();
    expect(journal.record(entry('identity')).prevHash).toBe('');
  });

  it('links each record to the previous one', () => {
    const journal = new StepJournal();
    journal.record(entry('identity'));
    const second = journal.record(entry('os-release', 'warn'));
    expect(second.prevHash).toMatch(/^[0-9a-f]{64}$/);
    expect(journal.verifyChain()).toEqual({ valid: true });
  });

  it('detects an edited record', () => {
    const journal = new StepJournal();
    journal.record(entry('identity'));
    journal.record(entry('connectivity', 'warn'));
    journal.record(entry('versions'));

    const records = journal.getRecords();
    const tampered = records.map((r) => (r.step === 'connectivity' ? { ...r, status: 'ok' as const } : r));

    expect(journal.verifyChain(tampered)).toEqual({ valid: false, brokenAt: 2 });
  });

  it('treats an empty journal as valid', () => {
    expect(new StepJournal().verifyChain()).toEqual({ valid: true });
  });
});
