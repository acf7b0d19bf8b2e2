import { access, mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SessionOutcome } from '../agents/sessionManager';
import type { ChangeReport, HarvestedRecord } from '../core/types';
import { withEmptyEnrichment } from '../core/types';
import { ExportError, RunFatalError } from '../core/errors';
import type { EnrichmentOutcome } from '../scrapers/detailEnricher';
import { recordToEntry } from '../services/changeTracker';
import type { HealthStatus } from '../services/healthNotifier';
import { SnapshotStore } from '../services/snapshotStore';
import type { ExportSummary } from '../services/tenderExportService';
import { TenderPipeline, type PipelineComponents } from '../tenderPipeline';
import { harvested, tender } from './factories';

const NOW = new Date('2026-03-01T10:00:00.000Z');

function completed(records: HarvestedRecord[]): EnrichmentOutcome {
  return {
    kind: 'completed',
    records: records.map((record) => ({ ...withEmptyEnrichment(record), tenderType: 'Open' })),
    enriched: records.length,
    failed: 0,
    skipped: 0,
  };
}

describe('TenderPipeline', () => {
  let dir: string;
  let store: SnapshotStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
    store = new SnapshotStore(path.join(dir, 'tenders_memory.json'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function components(overrides: {
    session?: SessionOutcome;
    records?: HarvestedRecord[];
    enrich?: (records: HarvestedRecord[]) => Promise<EnrichmentOutcome>;
    exportChanges?: (report: ChangeReport) => Promise<ExportSummary>;
  } = {}) {
    const records = overrides.records ?? [harvested({ tenderNo: 'T-1' }), harvested({ tenderNo: 'T-2' })];
    const parts = {
      session: {
        ensureValidSession: vi.fn(async (): Promise<SessionOutcome> => overrides.session ?? { kind: 'reused', ageMs: 60_000 }),
        login: vi.fn(async (): Promise<SessionOutcome> => ({ kind: 'renewed', attempts: 1 })),
      },
      harvester: { harvestAll: vi.fn(async () => records) },
      enricher: {
        enrich: vi.fn(overrides.enrich ?? (async (input: HarvestedRecord[]) => completed(input))),
      },
      notifier: { notify: vi.fn(async (_status: HealthStatus, _message: string) => true) },
    };
    const wired: PipelineComponents = {
      ...parts,
      detailSource: { open: () => Promise.reject(new Error('not used by the fake enricher')) },
      snapshots: store,
      exporter: overrides.exportChanges ? { exportChanges: overrides.exportChanges } : undefined,
    };
    return { parts, pipeline: new TenderPipeline(wired, { now: () => NOW }) };
  }

  it('tracks a first run end to end and reports success', async () => {
    const { parts, pipeline } = components();

    const summary = await pipeline.run();

    expect(summary).toEqual({
      session: 'reused',
      harvested: 2,
      enrichment: 'completed',
      enriched: 2,
      changes: { total: 2, new: 2, updated: 0, statusChanged: 0, unchanged: 0, timestamp: NOW.toISOString() },
      exported: null,
      elapsedMs: 0,
    });
    expect(parts.notifier.notify).toHaveBeenCalledWith(
      'success',
      'Run complete: 2 tender(s), 2 new, 0 status changed, 0 updated (2/2 enriched)',
    );

    const saved = await store.load();
    expect(Object.keys(saved)).toEqual(['T-1', 'T-2']);
    expect(saved['T-1']).toMatchObject({ tender_type: 'Open', _last_seen: NOW.toISOString() });
  });

  it('reads the snapshot once, before the session and harvest stages', async () => {
    const load = vi.spyOn(store, 'load');
    const { parts, pipeline } = components();

    await pipeline.run();

    expect(load).toHaveBeenCalledTimes(1);
    expect(load.mock.invocationCallOrder[0]).toBeLessThan(
      parts.session.ensureValidSession.mock.invocationCallOrder[0],
    );
    expect(load.mock.invocationCallOrder[0]).toBeLessThan(parts.harvester.harvestAll.mock.invocationCallOrder[0]);
  });

  it('exports the changes before the snapshot moves forward', async () => {
    await store.save({ 'T-1': recordToEntry(tender({ tenderNo: 'T-1', tenderType: 'Open' })) });
    let statusOnDiskDuringExport: string | undefined;
    const exportChanges = vi.fn(async (report: ChangeReport): Promise<ExportSummary> => {
      statusOnDiskDuringExport = (await store.load())['T-1']?.status;
      return { tenders: report.statusChanged.length, changes: 1 };
    });
    const { pipeline } = components({
      records: [harvested({ tenderNo: 'T-1', status: 'Closed' })],
      exportChanges,
    });

    const summary = await pipeline.run();

    expect(summary.changes).toMatchObject({ statusChanged: 1, new: 0 });
    expect(summary.exported).toEqual({ tenders: 1, changes: 1 });
    expect(statusOnDiskDuringExport).toBe('Active');
    expect((await store.load())['T-1']?.status).toBe('Closed');
  });

  it('leaves the snapshot untouched when the export fails', async () => {
    const { parts, pipeline } = components({
      exportChanges: () => Promise.reject(new ExportError('Upserting tenders failed: boom')),
    });

    await expect(pipeline.run()).rejects.toBeInstanceOf(ExportError);

    await expect(access(store.filePath)).rejects.toThrow();
    expect(parts.notifier.notify).toHaveBeenCalledWith('failure', 'Run failed: Upserting tenders failed: boom');
  });

  it('stops with a fatal error when no session can be established', async () => {
    const { parts, pipeline } = components({
      session: { kind: 'failed', reason: 'exhausted', attempts: 2 },
    });

    await expect(pipeline.run()).rejects.toBeInstanceOf(RunFatalError);

    expect(parts.harvester.harvestAll).not.toHaveBeenCalled();
    expect(parts.notifier.notify).toHaveBeenCalledWith(
      'failure',
      'Run failed: Could not establish a portal session: all 2 login attempt(s) failed',
    );
  });

  it('names the OTP timeout in the failure', async () => {
    const { parts, pipeline } = components({
      session: { kind: 'failed', reason: 'otp-timeout', attempts: 1 },
    });

    await expect(pipeline.run()).rejects.toThrow('no OTP arrived (attempt 1)');
    expect(parts.notifier.notify).toHaveBeenCalledTimes(1);
  });

  it('skips enrichment and the commit when nothing was harvested', async () => {
    const { parts, pipeline } = components({ records: [] });

    const summary = await pipeline.run();

    expect(summary).toMatchObject({ harvested: 0, enrichment: 'skipped', changes: null });
    expect(parts.enricher.enrich).not.toHaveBeenCalled();
    expect(parts.notifier.notify).toHaveBeenCalledWith('success', 'Run complete: no tenders harvested');
    await expect(access(store.filePath)).rejects.toThrow();
  });

  it('continues with unenriched records when phase 2 crashes', async () => {
    const { pipeline } = components({
      enrich: () => Promise.reject(new Error('browser vanished')),
    });

    const summary = await pipeline.run();

    expect(summary).toMatchObject({ enrichment: 'crashed', enriched: 0, harvested: 2 });
    expect(summary.changes?.new).toBe(2);
    expect((await store.load())['T-2']).toMatchObject({ tender_no: 'T-2', tender_type: '' });
  });

  it('carries a partial enrichment through to detection', async () => {
    const { parts, pipeline } = components({
      enrich: async (input) => ({
        kind: 'circuit-open',
        consecutiveFailures: 3,
        records: input.map((record, index) =>
          index === 0 ? { ...withEmptyEnrichment(record), tenderType: 'Open' } : withEmptyEnrichment(record),
        ),
        enriched: 1,
        failed: 3,
        skipped: 0,
      }),
    });

    const summary = await pipeline.run();

    expect(summary).toMatchObject({ enrichment: 'circuit-open', enriched: 1 });
    expect(summary.changes?.total).toBe(2);
    expect(parts.notifier.notify).toHaveBeenCalledWith(
      'success',
      'Run complete: 2 tender(s), 2 new, 0 status changed, 0 updated (1/2 enriched)',
    );
  });

  it('runs the login diagnostic without scraping', async () => {
    const { parts, pipeline } = components();

    await expect(pipeline.testLogin()).resolves.toEqual({ kind: 'renewed', attempts: 1 });

    expect(parts.session.login).toHaveBeenCalledTimes(1);
    expect(parts.harvester.harvestAll).not.toHaveBeenCalled();
  });
});
