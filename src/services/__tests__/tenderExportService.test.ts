import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ChangeReport, ClassifiedRecord, TenderRecord } from '../../core/types';
import { ExportError } from '../../core/errors';
import { tender } from '../../__tests__/factories';
import { ChangeTracker, recordToEntry } from '../changeTracker';
import { SnapshotStore } from '../snapshotStore';
import { TenderExportService } from '../tenderExportService';

const supabase = vi.hoisted(() => {
  const upsert = vi.fn();
  const insert = vi.fn();
  const from = vi.fn((_table: string) => ({ upsert, insert }));
  const createClient = vi.fn((_url: string, _key: string, _options?: unknown) => ({ from }));
  return { upsert, insert, from, createClient };
});

vi.mock('@supabase/supabase-js', () => ({ createClient: supabase.createClient }));

const DETECTED_AT = '2026-03-01T10:00:00.000Z';

function report(parts: Partial<Pick<ChangeReport, 'new' | 'updated' | 'statusChanged' | 'unchanged'>>): ChangeReport {
  const buckets = {
    new: parts.new ?? [],
    updated: parts.updated ?? [],
    statusChanged: parts.statusChanged ?? [],
    unchanged: parts.unchanged ?? [],
  };
  const all = [...buckets.new, ...buckets.updated, ...buckets.statusChanged, ...buckets.unchanged];
  return {
    ...buckets,
    all,
    summary: {
      total: all.length,
      new: buckets.new.length,
      updated: buckets.updated.length,
      statusChanged: buckets.statusChanged.length,
      unchanged: buckets.unchanged.length,
      timestamp: DETECTED_AT,
    },
  };
}

function classified(
  changeType: ClassifiedRecord['changeType'],
  record: TenderRecord,
  extra: Partial<ClassifiedRecord> = {},
): ClassifiedRecord {
  return { record, entry: recordToEntry(record), changeType, changes: [], ...extra };
}

const created = classified('NEW', tender({ tenderNo: 'T-1' }));
const closed = classified('STATUS_CHANGED', tender({ tenderNo: 'T-2', status: 'Closed' }), {
  changes: [{ field: 'status', previous: 'Active', current: 'Closed' }],
  previousStatus: 'Active',
});
const untouched = classified('UNCHANGED', tender({ tenderNo: 'T-3' }));

function service() {
  return TenderExportService.fromConfig({ url: 'https://db.test', serviceRoleKey: 'test-secret' });
}

describe('TenderExportService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    supabase.upsert.mockResolvedValue({ error: null });
    supabase.insert.mockResolvedValue({ error: null });
  });

  it('creates a client that does not persist auth sessions', () => {
    service();

    expect(supabase.createClient).toHaveBeenCalledWith('https://db.test', 'test-secret', {
      auth: { persistSession: false },
    });
  });

  it('upserts changed tenders and records one row per change', async () => {
    const summary = await service().exportChanges(report({ new: [created], statusChanged: [closed], unchanged: [untouched] }));

    expect(summary).toEqual({ tenders: 2, changes: 2 });
    expect(supabase.from.mock.calls).toEqual([['tenders'], ['tender_changes']]);

    const [rows, options] = supabase.upsert.mock.calls[0];
    expect(options).toEqual({ onConflict: 'tender_no', ignoreDuplicates: false });
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({ tender_no: 'T-1', change_type: 'NEW', updated_at: DETECTED_AT });
    expect(rows[1]).toMatchObject({ tender_no: 'T-2', status: 'Closed', change_type: 'STATUS_CHANGED' });

    expect(supabase.insert).toHaveBeenCalledWith([
      { tender_no: 'T-1', change_type: 'NEW', detected_at: DETECTED_AT, field: null, previous_value: null, current_value: null },
      {
        tender_no: 'T-2',
        change_type: 'STATUS_CHANGED',
        detected_at: DETECTED_AT,
        field: 'status',
        previous_value: 'Active',
        current_value: 'Closed',
      },
    ]);
  });

  it('exports the documents the snapshot keeps when enrichment found none', async () => {
    const documents = [
      { fileName: 'a.pdf', fileUrl: 'https://portal.test/pdfdocs/a.pdf', description: 'Tender document' },
    ];
    const known = tender({
      tenderNo: 'T-1',
      attachedDocuments: documents,
      primaryDocumentUrl: 'https://portal.test/pdfdocs/main.pdf',
    });
    const tracker = new ChangeTracker(
      new SnapshotStore('/not/written/tenders_memory.json'),
      { 'T-1': recordToEntry(known) },
      () => new Date(DETECTED_AT),
    );

    const changes = tracker.detect([tender({ tenderNo: 'T-1', status: 'Closed' })]);
    await service().exportChanges(changes);

    const [rows] = supabase.upsert.mock.calls[0];
    expect(rows[0]).toMatchObject({
      tender_no: 'T-1',
      status: 'Closed',
      change_type: 'STATUS_CHANGED',
      primary_document_url: 'https://portal.test/pdfdocs/main.pdf',
      attached_documents: [
        { file_name: 'a.pdf', file_url: 'https://portal.test/pdfdocs/a.pdf', description: 'Tender document' },
      ],
    });
  });

  it('skips the round trip when nothing changed', async () => {
    await expect(service().exportChanges(report({ unchanged: [untouched] }))).resolves.toEqual({ tenders: 0, changes: 0 });

    expect(supabase.from).not.toHaveBeenCalled();
  });

  it('raises ExportError when the upsert fails and writes no change rows', async () => {
    supabase.upsert.mockResolvedValue({ error: { message: 'permission denied' } });

    const attempt = service().exportChanges(report({ new: [created] }));

    await expect(attempt).rejects.toBeInstanceOf(ExportError);
    await expect(attempt).rejects.toThrow('Upserting tenders failed: permission denied');
    expect(supabase.insert).not.toHaveBeenCalled();
  });

  it('raises ExportError when the change rows are refused', async () => {
    supabase.insert.mockResolvedValue({ error: { message: 'timeout' } });

    await expect(service().exportChanges(report({ new: [created] }))).rejects.toThrow(
      'Inserting tender changes failed: timeout',
    );
  });
});
