/**
 * tenderExportService.ts — Mirror each run's changes into Supabase.
 *
 * Two batch writes per run, one HTTP request each:
 *   - `tenders`        upsert of every NEW / UPDATED / STATUS_CHANGED record,
 *                      keyed by `tender_no` so reruns update in place;
 *   - `tender_changes` one row per differing field (one row for a NEW tender).
 *
 * Any error raises ExportError.  The pipeline exports before committing the
 * snapshot, so a failed export leaves the changes to be detected again.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { ChangeReport, ClassifiedRecord } from '../core/types';
import { ExportError } from '../core/errors';
import { Logger } from '../core/logger';

const logger = new Logger('TenderExport');

export interface ExportSummary {
  tenders: number;
  changes: number;
}

interface ChangeRow {
  tender_no: string;
  change_type: string;
  field: string | null;
  previous_value: string | null;
  current_value: string | null;
  detected_at: string;
}

function changeRows(classified: ClassifiedRecord, detectedAt: string): ChangeRow[] {
  const base = { tender_no: classified.record.tenderNo, change_type: classified.changeType, detected_at: detectedAt };
  if (classified.changes.length === 0) {
    return [{ ...base, field: null, previous_value: null, current_value: null }];
  }
  return classified.changes.map((change) => ({
    ...base,
    field: change.field,
    previous_value: change.previous,
    current_value: change.current,
  }));
}

export class TenderExportService {
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  /** The service-role key bypasses row-level security; the tracker is the only writer. */
  static fromConfig(config: { url: string; serviceRoleKey: string }): TenderExportService {
    return new TenderExportService(
      createClient(config.url, config.serviceRoleKey, { auth: { persistSession: false } }),
    );
  }

  async exportChanges(report: ChangeReport): Promise<ExportSummary> {
    const changed = [...report.new, ...report.updated, ...report.statusChanged];
    if (changed.length === 0) {
      logger.info('No changes to export');
      return { tenders: 0, changes: 0 };
    }

    const detectedAt = report.summary.timestamp;

    // The merged entry keeps documents a failed enrichment did not see again.
    const tenderRows = changed.map((classified) => ({
      ...classified.entry,
      change_type: classified.changeType,
      updated_at: detectedAt,
    }));
    const { error: tendersError } = await this.client
      .from('tenders')
      .upsert(tenderRows, { onConflict: 'tender_no', ignoreDuplicates: false });
    if (tendersError) {
      throw new ExportError(`Upserting tenders failed: ${tendersError.message}`);
    }

    const rows = changed.flatMap((classified) => changeRows(classified, detectedAt));
    const { error: changesError } = await this.client.from('tender_changes').insert(rows);
    if (changesError) {
      throw new ExportError(`Inserting tender changes failed: ${changesError.message}`);
    }

    logger.info(`Exported ${tenderRows.length} tender(s) and ${rows.length} change row(s)`);
    return { tenders: tenderRows.length, changes: rows.length };
  }
}
