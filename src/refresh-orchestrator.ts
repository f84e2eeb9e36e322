import { v4 as uuidv4 } from 'uuid';
import logger from './logger';
import { AdvisorError, MalformedCatalogError, RefreshInProgressError, describeError } from './errors';
import type { AdvisorErrorCode } from './errors';
import { buildIndexDocuments, findExpiredCards, parseCatalog, toIsoDate } from './catalog-parser';
import type { CardRecord } from './catalog-parser';
import type { CatalogVersionStore } from './version-store';
import type { IndexHandle, KnowledgeIndex } from './knowledge-index';
import type { RecommendationEngine } from './recommendation-engine';
import type { CatalogSource } from './remote-source';

export interface RemoteOutcome {
  attempted: boolean;
  fetched: boolean;
  source: string | null;
  error: string | null;
}

interface RefreshReportBase {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  remote: RemoteOutcome;
  backupCount: number;
}

export interface RefreshSucceeded extends RefreshReportBase {
  status: 'succeeded';
  versionId: string;
  indexId: string;
  documentCount: number;
  expiredCardsCount: number;
}

export interface RefreshFailed extends RefreshReportBase {
  status: 'failed';
  errorCode: AdvisorErrorCode | 'INTERNAL';
  reason: string;
  row: number | null;
}

export type RefreshReport = RefreshSucceeded | RefreshFailed;

export interface RefreshOptions {
  /** Ask the remote source for a newer catalog first. Defaults to true when a source is configured. */
  fetchRemote?: boolean;
}

export interface CatalogStatus {
  healthy: boolean;
  documentCount: number;
  expiredCardsCount: number;
  currentVersionId: string | null;
  indexId: string | null;
  builtAt: string | null;
  backupCount: number;
  refreshInProgress: boolean;
  lastRefresh: RefreshReport | null;
}

export interface RefreshOrchestratorOptions {
  versionStore: CatalogVersionStore;
  index: KnowledgeIndex;
  engine: RecommendationEngine;
  remoteSource?: CatalogSource | null;
  now?: () => Date;
}

/**
 * Runs the whole catalog replacement: fetch, promote, parse, build, swap. Only
 * one refresh runs at a time; queries keep using the previous index until the
 * new one is complete.
 */
export class RefreshOrchestrator {
  private readonly versionStore: CatalogVersionStore;
  private readonly index: KnowledgeIndex;
  private readonly engine: RecommendationEngine;
  private readonly remoteSource: CatalogSource | null;
  private readonly now: () => Date;
  private runningId: string | null = null;
  private lastReport: RefreshReport | null = null;

  constructor(options: RefreshOrchestratorOptions) {
    this.versionStore = options.versionStore;
    this.index = options.index;
    this.engine = options.engine;
    this.remoteSource = options.remoteSource ?? null;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Loads the catalog at start-up. A persisted index built from the current
   * version is reused; otherwise this is an ordinary refresh.
   */
  async initialize(options: RefreshOptions = { fetchRemote: false }): Promise<RefreshReport | null> {
    await this.versionStore.open();
    const current = this.versionStore.currentMeta();
    if (current && !options.fetchRemote) {
      const persisted = await this.index.loadLatest(current.id);
      if (persisted) {
        this.engine.swapIndex(persisted);
        await this.pruneIndexFiles(persisted);
        return null;
      }
    }
    return this.refresh(options);
  }

  async refresh(options: RefreshOptions = {}): Promise<RefreshReport> {
    if (this.runningId) {
      throw new RefreshInProgressError(this.runningId);
    }
    const runId = uuidv4();
    this.runningId = runId;
    const startedAt = this.now();
    const remote: RemoteOutcome = { attempted: false, fetched: false, source: null, error: null };
    logger.info(`[REFRESH] Run ${runId} started`, { fetchRemote: options.fetchRemote ?? null });

    try {
      const { versionId, records } = await this.loadCatalog(options, remote);
      const handle = await this.index.build(buildIndexDocuments(records), versionId);
      this.engine.swapIndex(handle);
      await this.pruneIndexFiles(handle);

      const report: RefreshSucceeded = {
        ...this.envelope(runId, startedAt, remote),
        status: 'succeeded',
        versionId,
        indexId: handle.id,
        documentCount: this.index.documentCount(handle),
        expiredCardsCount: findExpiredCards(records, toIsoDate(this.now())).length
      };
      logger.info(`[REFRESH] Run ${runId} succeeded`, {
        versionId,
        documentCount: report.documentCount,
        durationMs: report.durationMs
      });
      this.lastReport = report;
      return report;
    } catch (error) {
      const report: RefreshFailed = {
        ...this.envelope(runId, startedAt, remote),
        status: 'failed',
        errorCode: error instanceof AdvisorError ? error.code : 'INTERNAL',
        reason: describeError(error),
        row: error instanceof MalformedCatalogError ? error.row : null
      };
      logger.error(`[REFRESH] Run ${runId} failed; the previous index stays active`, { error });
      this.lastReport = report;
      return report;
    } finally {
      this.runningId = null;
    }
  }

  status(): CatalogStatus {
    const handle = this.engine.activeHandle();
    return {
      healthy: handle !== null,
      documentCount: handle ? this.index.documentCount(handle) : 0,
      expiredCardsCount: this.engine.countExpired(handle),
      currentVersionId: handle?.sourceVersionId ?? null,
      indexId: handle?.id ?? null,
      builtAt: handle?.builtAt ?? null,
      backupCount: this.versionStore.backupCount(),
      refreshInProgress: this.runningId !== null,
      lastRefresh: this.lastReport
    };
  }

  isRefreshing(): boolean {
    return this.runningId !== null;
  }

  /**
   * Fetched content is parsed before it is promoted, so a malformed download
   * never becomes the current version.
   */
  private async loadCatalog(
    options: RefreshOptions,
    remote: RemoteOutcome
  ): Promise<{ versionId: string; records: CardRecord[] }> {
    const shouldFetch = options.fetchRemote ?? this.remoteSource !== null;
    if (shouldFetch && this.remoteSource) {
      remote.attempted = true;
      remote.source = this.remoteSource.name;
      const outcome = await this.remoteSource.fetchLatestFile();
      if (outcome.status === 'fetched') {
        const records = await parseCatalog(outcome.content);
        const version = await this.versionStore.promote(outcome.content);
        remote.fetched = true;
        return { versionId: version.id, records };
      }
      remote.error = outcome.error.message;
      logger.warn('[REFRESH] Remote catalog unavailable; rebuilding from the current version');
    } else if (shouldFetch) {
      remote.error = 'no remote catalog source is configured';
    }

    const current = await this.versionStore.getCurrent();
    return { versionId: current.id, records: await parseCatalog(current.content) };
  }

  // Only the active handle's file survives; the swapped-out handle stays usable in memory.
  private async pruneIndexFiles(active: IndexHandle) {
    try {
      await this.index.prune(active);
    } catch (error) {
      logger.warn(`[REFRESH] Could not prune index files beside ${active.id}`, { error });
    }
  }

  private envelope(runId: string, startedAt: Date, remote: RemoteOutcome): RefreshReportBase {
    const finishedAt = this.now();
    return {
      runId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      remote,
      backupCount: this.versionStore.backupCount()
    };
  }
}
