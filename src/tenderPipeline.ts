/**
 * tenderPipeline.ts — The orchestrator that ties every layer together.
 *
 * ARCHITECTURE OVERVIEW
 * ─────────────────────
 * One run is a straight sequence:
 *
 *   1. SESSION  → reuse the saved session or log in (OTP state machine)
 *   2. HARVEST  → walk the public listing (phase 1)
 *   3. ENRICH   → visit each detail page behind the login (phase 2)
 *   4. DETECT   → classify records against the last snapshot
 *   5. EXPORT   → mirror the changes into Supabase, when configured
 *   6. COMMIT   → write the new snapshot atomically
 *   7. NOTIFY   → report success or failure to the health webhook
 *
 * Failure policy per stage: a failed session is run-fatal (RunFatalError,
 * failure notification, rethrow).  A crashed enrichment stage degrades to
 * the unenriched records.  An export failure aborts before the commit so the
 * next run sees the same changes again.
 *
 * `TenderPipeline` only sees capability interfaces; `withPortalRuntime()`
 * assembles the real browser, webhook and stores around it.
 */

import type { ChangeSummary, HarvestedRecord, TenderRecord } from './core/types';
import { withEmptyEnrichment } from './core/types';
import type { TrackerConfig } from './core/config';
import { RunFatalError } from './core/errors';
import { Logger, describeError } from './core/logger';
import { BrowserManager } from './core/browserManager';
import {
  LoginFlow,
  OtpCache,
  OtpCoordinator,
  SessionManager,
  SessionStore,
  type SessionOutcome,
} from './agents';
import { RequestPacer } from './middleware';
import { PortalDetailSource } from './portal/detailSource';
import { PortalListingSource } from './portal/listingSource';
import { PortalSession } from './portal/loginDriver';
import { DetailEnricher, ListingHarvester, type DetailSource, type EnrichmentOutcome } from './scrapers';
import { createChallengeSolver } from './services/captchaSolver';
import { ChangeTracker } from './services/changeTracker';
import { HealthNotifier } from './services/healthNotifier';
import {
  HttpTicketReader,
  createOtpWebhookApp,
  startOtpWebhookServer,
  stopOtpWebhookServer,
} from './services/otpWebhookServer';
import { SnapshotStore } from './services/snapshotStore';
import { TenderExportService, type ExportSummary } from './services/tenderExportService';

const logger = new Logger('TenderPipeline');

// ─── Components ────────────────────────────────────────────

export interface PipelineComponents {
  session: Pick<SessionManager, 'ensureValidSession' | 'login'>;
  harvester: Pick<ListingHarvester, 'harvestAll'>;
  enricher: Pick<DetailEnricher, 'enrich'>;
  detailSource: DetailSource;
  snapshots: SnapshotStore;
  exporter?: Pick<TenderExportService, 'exportChanges'>;
  notifier: Pick<HealthNotifier, 'notify'>;
}

export interface RunSummary {
  session: SessionOutcome['kind'];
  harvested: number;
  /** How phase 2 ended; `crashed` when the stage threw. */
  enrichment: EnrichmentOutcome['kind'] | 'crashed' | 'skipped';
  enriched: number;
  changes: ChangeSummary | null;
  exported: ExportSummary | null;
  elapsedMs: number;
}

function describeSessionFailure(outcome: Extract<SessionOutcome, { kind: 'failed' }>): string {
  return outcome.reason === 'otp-timeout'
    ? `no OTP arrived (attempt ${outcome.attempts})`
    : `all ${outcome.attempts} login attempt(s) failed`;
}

// ─── Pipeline ──────────────────────────────────────────────

export class TenderPipeline {
  private readonly components: PipelineComponents;
  private readonly now: () => Date;

  constructor(components: PipelineComponents, options: { now?: () => Date } = {}) {
    this.components = components;
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<RunSummary> {
    const startedAt = this.now().getTime();
    const { notifier } = this.components;
    logger.info('═══ Tender tracking run started ═══');

    try {
      const summary = await this.execute(startedAt);
      await notifier.notify('success', this.successMessage(summary));
      return summary;
    } catch (err) {
      logger.error(`Run failed: ${describeError(err)}`, err);
      await notifier.notify('failure', `Run failed: ${describeError(err)}`);
      throw err;
    }
  }

  /** Log in unconditionally and report the outcome.  Nothing is scraped. */
  async testLogin(): Promise<SessionOutcome> {
    logger.info('═══ Login diagnostic ═══');
    const outcome = await this.components.session.login();
    if (outcome.kind === 'failed') {
      logger.error(`Login diagnostic failed: ${describeSessionFailure(outcome)}`);
    } else {
      logger.info(`Login diagnostic succeeded (${outcome.kind})`);
    }
    return outcome;
  }

  // ── Stages ─────────────────────────────────────────────

  private async execute(startedAt: number): Promise<RunSummary> {
    const { session, harvester, snapshots, exporter } = this.components;

    // The snapshot is read once per run, before any browser work.
    const tracker = await ChangeTracker.open(snapshots, this.now);

    // 1. Session
    const sessionOutcome = await session.ensureValidSession();
    if (sessionOutcome.kind === 'failed') {
      throw new RunFatalError(`Could not establish a portal session: ${describeSessionFailure(sessionOutcome)}`);
    }

    // 2. Harvest
    const harvested = await harvester.harvestAll();
    if (harvested.length === 0) {
      logger.warn('No tenders harvested — nothing to track, snapshot left untouched');
      return {
        session: sessionOutcome.kind,
        harvested: 0,
        enrichment: 'skipped',
        enriched: 0,
        changes: null,
        exported: null,
        elapsedMs: this.now().getTime() - startedAt,
      };
    }

    // 3. Enrich
    const enrichment = await this.enrich(harvested);

    // 4. Detect
    const report = tracker.detect(enrichment.records);

    // 5. Export
    const exported = exporter ? await exporter.exportChanges(report) : null;

    // 6. Commit
    await tracker.commit(enrichment.records);

    const summary: RunSummary = {
      session: sessionOutcome.kind,
      harvested: harvested.length,
      enrichment: enrichment.kind,
      enriched: enrichment.enriched,
      changes: report.summary,
      exported,
      elapsedMs: this.now().getTime() - startedAt,
    };
    this.logSummary(summary);
    return summary;
  }

  private async enrich(
    harvested: HarvestedRecord[],
  ): Promise<{ kind: RunSummary['enrichment']; records: TenderRecord[]; enriched: number }> {
    try {
      const outcome = await this.components.enricher.enrich(harvested, this.components.detailSource);
      if (outcome.kind !== 'completed') {
        logger.warn(`Phase 2 ended early (${outcome.kind}) — ${outcome.enriched} of ${harvested.length} enriched`);
      }
      return { kind: outcome.kind, records: outcome.records, enriched: outcome.enriched };
    } catch (err) {
      logger.error(`Phase 2 crashed — continuing with unenriched records: ${describeError(err)}`, err);
      return { kind: 'crashed', records: harvested.map(withEmptyEnrichment), enriched: 0 };
    }
  }

  // ── Reporting ──────────────────────────────────────────

  private logSummary(summary: RunSummary): void {
    const seconds = Math.round(summary.elapsedMs / 1000);
    logger.info('═══ Run summary ═══');
    logger.info(`Session: ${summary.session}`);
    logger.info(`Harvested: ${summary.harvested}, enriched: ${summary.enriched} (${summary.enrichment})`);
    if (summary.changes) {
      const c = summary.changes;
      logger.info(
        `Changes: ${c.new} new, ${c.statusChanged} status changed, ${c.updated} updated, ${c.unchanged} unchanged`,
      );
    }
    if (summary.exported) {
      logger.info(`Exported: ${summary.exported.tenders} tender(s), ${summary.exported.changes} change row(s)`);
    }
    logger.info(`Elapsed: ${seconds}s`);
  }

  private successMessage(summary: RunSummary): string {
    if (!summary.changes) return 'Run complete: no tenders harvested';
    const c = summary.changes;
    return (
      `Run complete: ${c.total} tender(s), ${c.new} new, ${c.statusChanged} status changed, ` +
      `${c.updated} updated (${summary.enriched}/${summary.harvested} enriched)`
    );
  }
}

// ─── Runtime assembly ──────────────────────────────────────

/**
 * Build every real component around one browser and one webhook listener,
 * hand them to `fn`, and tear both down afterwards.
 */
export async function withPortalRuntime<T>(
  config: TrackerConfig,
  fn: (components: PipelineComponents) => Promise<T>,
): Promise<T> {
  const coordinator = new OtpCoordinator({
    interactive: config.interactive,
    pollIntervalMs: config.otp.pollIntervalMs,
  });

  const webhook = await startOtpWebhookServer(createOtpWebhookApp(coordinator), config.otp.webhookPort);
  if (webhook.kind === 'port-in-use') {
    coordinator.useRemoteReader(new HttpTicketReader(`http://127.0.0.1:${webhook.port}`));
  }

  const browser = new BrowserManager(config.browser);
  try {
    const page = await browser.newPage();
    const portal = new PortalSession(page, config.portal);

    const loginFlow = new LoginFlow(
      portal,
      createChallengeSolver({ captchaApiKey: config.captchaApiKey, interactive: config.interactive }),
      coordinator,
      new OtpCache(config.paths.otpCacheFile, config.otp.cacheMaxAgeHours),
      {
        mobile: config.portal.mobile,
        maxAttempts: config.session.maxLoginAttempts,
        challengeAttempts: config.session.challengeAttempts,
        challengeRetryDelayMs: 1_000,
        otpTimeoutMs: config.otp.timeoutMs,
        freshOtpTimeoutMs: config.otp.freshTimeoutMs,
      },
    );

    const pacer = new RequestPacer({
      minDelayMs: config.scraping.minDelayMs,
      maxDelayMs: config.scraping.maxDelayMs,
    });

    return await fn({
      session: new SessionManager(new SessionStore(config.paths.sessionFile), portal, loginFlow, {
        maxAgeHours: config.session.maxAgeHours,
      }),
      harvester: new ListingHarvester(new PortalListingSource(page, config.portal.searchUrl), pacer, {
        category: config.portal.category,
        maxRecords: config.scraping.maxRecords,
      }),
      enricher: new DetailEnricher(pacer, {
        baseUrl: config.portal.baseUrl,
        maxRetries: config.scraping.maxRetries,
        retryBaseDelayMs: config.scraping.retryBaseDelayMs,
        maxConsecutiveFailures: config.scraping.maxConsecutiveFailures,
      }),
      detailSource: new PortalDetailSource(page, config.portal.baseUrl),
      snapshots: new SnapshotStore(config.paths.snapshotFile),
      exporter: config.supabase ? TenderExportService.fromConfig(config.supabase) : undefined,
      notifier: new HealthNotifier(config.healthWebhookUrl),
    });
  } finally {
    await browser.close();
    if (webhook.kind === 'listening') await stopOtpWebhookServer(webhook.server);
  }
}
