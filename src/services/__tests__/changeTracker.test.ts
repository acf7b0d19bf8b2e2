import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ChangeTracker, mergeDocuments, normalizeValue } from '../changeTracker';
import { SnapshotStore } from '../snapshotStore';
import { tender } from '../../__tests__/factories';
import type { TenderRecord } from '../../core/types';

const FIXED_NOW = new Date('2026-03-01T06:00:00.000Z');

/** A record carrying only identity, status and title, as a bare listing row would. */
function bare(tenderNo: string, status: string, title: string): TenderRecord {
  return tender({
    tenderNo,
    status,
    title,
    issuingUnit: '',
    workArea: '',
    dueDateTime: '',
    dueDays: '',
    navigationHint: '',
  });
}

const docA = { fileName: 'a.pdf', fileUrl: 'https://portal.test/a.pdf', description: 'Drawings' };
const docB = { fileName: 'b.pdf', fileUrl: 'https://portal.test/b.pdf', description: 'BOQ' };
const docC = { fileName: 'c.pdf', fileUrl: 'https://portal.test/c.pdf', description: 'Annexure' };

describe('ChangeTracker', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'tracker-'));
    file = path.join(dir, 'tenders_memory.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function openWith(snapshot?: unknown): Promise<ChangeTracker> {
    if (snapshot !== undefined) await writeFile(file, JSON.stringify(snapshot), 'utf-8');
    return ChangeTracker.open(new SnapshotStore(file), () => FIXED_NOW);
  }

  async function readSnapshot(): Promise<Record<string, Record<string, unknown>>> {
    return JSON.parse(await readFile(file, 'utf-8'));
  }

  it('classifies the status change and the new record of a typical run', async () => {
    const tracker = await openWith({ 'T-1': { status: 'Active', title: 'X' } });

    const report = tracker.detect([bare('T-1', 'Closed', 'X'), bare('T-2', 'Active', 'Y')]);

    expect(report.statusChanged.map((c) => c.record.tenderNo)).toEqual(['T-1']);
    expect(report.statusChanged[0].previousStatus).toBe('Active');
    expect(report.statusChanged[0].changes).toEqual([
      { field: 'status', previous: 'Active', current: 'Closed' },
    ]);
    expect(report.new.map((c) => c.record.tenderNo)).toEqual(['T-2']);
    expect(report.summary).toEqual({
      total: 2,
      new: 1,
      updated: 0,
      statusChanged: 1,
      unchanged: 0,
      timestamp: '2026-03-01T06:00:00.000Z',
    });
  });

  it('classifies a record absent from the snapshot as NEW', async () => {
    const tracker = await openWith();

    const report = tracker.detect([tender()]);

    expect(report.all.map((c) => c.changeType)).toEqual(['NEW']);
    expect(report.new[0].changes).toEqual([]);
  });

  it('reports UNCHANGED once the same record has been committed', async () => {
    const tracker = await openWith();
    await tracker.commit([tender({ attachedDocuments: [docA] })]);

    const report = tracker.detect([tender({ attachedDocuments: [docA] })]);

    expect(report.all.map((c) => c.changeType)).toEqual(['UNCHANGED']);
  });

  it('ignores surrounding whitespace when comparing', async () => {
    const tracker = await openWith({ 'T-1': { status: ' Active ', title: 'X  ' } });

    const report = tracker.detect([bare('T-1', 'Active', 'X')]);

    expect(report.all[0].changeType).toBe('UNCHANGED');
  });

  it('reports exactly the changed fields for UPDATED', async () => {
    const tracker = await openWith();
    await tracker.commit([tender({ estimatedValue: '1,00,000' })]);

    const report = tracker.detect([
      tender({ title: 'Platform resurfacing phase 2', estimatedValue: '1,20,000' }),
    ]);

    expect(report.updated).toHaveLength(1);
    expect(report.updated[0].changes).toEqual([
      { field: 'title', previous: 'Platform resurfacing', current: 'Platform resurfacing phase 2' },
      { field: 'estimated_value', previous: '1,00,000', current: '1,20,000' },
    ]);
  });

  it('prefers STATUS_CHANGED and still reports the other differences', async () => {
    const tracker = await openWith({ 'T-1': { status: 'Active', title: 'X' } });

    const report = tracker.detect([bare('T-1', 'Closed', 'X revised')]);

    expect(report.statusChanged).toHaveLength(1);
    expect(report.updated).toHaveLength(0);
    expect(report.statusChanged[0].changes).toEqual([
      { field: 'title', previous: 'X', current: 'X revised' },
      { field: 'status', previous: 'Active', current: 'Closed' },
    ]);
  });

  it('does not report a change when enrichment came back without documents', async () => {
    const tracker = await openWith();
    await tracker.commit([
      tender({ attachedDocuments: [docA], primaryDocumentUrl: 'https://portal.test/main.pdf' }),
    ]);

    const report = tracker.detect([tender()]);

    expect(report.all[0].changeType).toBe('UNCHANGED');
  });

  it('skips records without an identity', async () => {
    const tracker = await openWith();

    const report = tracker.detect([tender({ tenderNo: '   ' }), tender()]);

    expect(report.summary.total).toBe(1);
  });

  describe('commit', () => {
    it('unions attached documents by URL, oldest first', async () => {
      const tracker = await openWith();

      await tracker.commit([tender({ attachedDocuments: [docA, docB] })]);
      await tracker.commit([tender({ attachedDocuments: [docB, docC] })]);
      await tracker.commit([tender({ attachedDocuments: [docB, docC] })]);

      const stored = await readSnapshot();
      expect(stored['T-1'].attached_documents).toEqual([
        { file_name: 'a.pdf', file_url: 'https://portal.test/a.pdf', description: 'Drawings' },
        { file_name: 'b.pdf', file_url: 'https://portal.test/b.pdf', description: 'BOQ' },
        { file_name: 'c.pdf', file_url: 'https://portal.test/c.pdf', description: 'Annexure' },
      ]);
    });

    it('replaces the document list when asked to overwrite', async () => {
      const tracker = await openWith();

      await tracker.commit([tender({ attachedDocuments: [docA, docB] })]);
      await tracker.commit([tender({ attachedDocuments: [docC] })], { overwriteDocuments: true });

      const stored = await readSnapshot();
      expect(stored['T-1'].attached_documents).toEqual([
        { file_name: 'c.pdf', file_url: 'https://portal.test/c.pdf', description: 'Annexure' },
      ]);
    });

    it('keeps the prior primary document when the new one is empty', async () => {
      const tracker = await openWith();

      await tracker.commit([tender({ primaryDocumentUrl: 'https://portal.test/main.pdf' })]);
      await tracker.commit([tender({ primaryDocumentUrl: null })]);

      expect(tracker.entry('T-1')?.primary_document_url).toBe('https://portal.test/main.pdf');
    });

    it('writes snake_case entries stamped with the last-seen time', async () => {
      const tracker = await openWith();

      await tracker.commit([tender()]);

      const stored = await readSnapshot();
      expect(Object.keys(stored)).toEqual(['T-1']);
      expect(stored['T-1']).toMatchObject({
        tender_no: 'T-1',
        issuing_unit: 'North Division',
        work_area: 'Works',
        due_date_time: '12/03/2026 15:00',
        primary_document_url: null,
        _last_seen: '2026-03-01T06:00:00.000Z',
      });
      expect(stored['T-1']).not.toHaveProperty('navigation_hint');
      expect(stored['T-1']).not.toHaveProperty('navigationHint');
      expect(await readFile(file, 'utf-8')).toContain('\n  "T-1": {\n    "tender_no": "T-1",');
    });

    it('keeps non-ASCII text unescaped on disk', async () => {
      const tracker = await openWith();

      await tracker.commit([tender({ title: 'पुल मरम्मत' })]);

      expect(await readFile(file, 'utf-8')).toContain('"title": "पुल मरम्मत"');
    });

    it('persists across tracker instances', async () => {
      const first = await openWith();
      await first.commit([tender()]);

      const second = await ChangeTracker.open(new SnapshotStore(file));

      expect(second.size).toBe(1);
      expect(second.detect([tender()]).unchanged).toHaveLength(1);
    });
  });
});

describe('normalizeValue', () => {
  it('treats absent values and empty lists as empty strings', () => {
    expect(normalizeValue(undefined)).toBe('');
    expect(normalizeValue(null)).toBe('');
    expect(normalizeValue([])).toBe('');
    expect(normalizeValue('  7 days ')).toBe('7 days');
  });
});

describe('mergeDocuments', () => {
  it('adds nothing when the incoming list is already known', () => {
    const known = [
      { file_name: 'a.pdf', file_url: 'u1', description: '' },
      { file_name: 'b.pdf', file_url: 'u2', description: '' },
    ];

    expect(mergeDocuments(known, [...known].reverse())).toEqual(known);
  });
});
