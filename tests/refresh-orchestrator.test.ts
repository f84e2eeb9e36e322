import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HashingEmbedder } from '../src/embeddings';
import type { Embedder } from '../src/embeddings';
import { RefreshInProgressError } from '../src/errors';
import { KnowledgeIndex } from '../src/knowledge-index';
import { RecommendationEngine } from '../src/recommendation-engine';
import { RefreshOrchestrator } from '../src/refresh-orchestrator';
import type { CatalogSource, FetchOutcome } from '../src/remote-source';
import { CatalogVersionStore } from '../src/version-store';
import {
  FUEL_CATALOG,
  FakeCatalogSource,
  SwitchableEmbedder,
  deferred,
  fetched,
  makeTempDir,
  removeDir,
  unavailable
} from './helpers';

const NEW_CATALOG = [
  'card_name,category,rate,activation_required',
  'CardA,fuel,3%,no',
  'CardN,fuel,4%,no'
].join('\n');

interface Rig {
  versionStore: CatalogVersionStore;
  index: KnowledgeIndex;
  engine: RecommendationEngine;
  orchestrator: RefreshOrchestrator;
}

describe('RefreshOrchestrator', () => {
  let dir: string;
  let bundledCatalogPath: string;

  beforeEach(async () => {
    dir = await makeTempDir('refresh');
    bundledCatalogPath = path.join(dir, 'bundled.csv');
    await fs.writeFile(bundledCatalogPath, FUEL_CATALOG);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const rig = (remoteSource: CatalogSource | null = null, embedder: Embedder = new HashingEmbedder()): Rig => {
    const versionStore = new CatalogVersionStore({
      catalogDir: path.join(dir, 'catalog'),
      maxBackups: 3,
      bundledCatalogPath
    });
    const index = new KnowledgeIndex({ indexDir: path.join(dir, 'index'), embedder });
    const engine = new RecommendationEngine({ index, generator: null });
    const orchestrator = new RefreshOrchestrator({ versionStore, index, engine, remoteSource });
    return { versionStore, index, engine, orchestrator };
  };

  it('loads the bundled catalog on first start', async () => {
    const { orchestrator } = rig();

    const report = await orchestrator.initialize();

    expect(report).toMatchObject({ status: 'succeeded', versionId: 'bundled', documentCount: 2 });
    expect(orchestrator.status()).toMatchObject({
      healthy: true,
      documentCount: 2,
      currentVersionId: 'bundled',
      refreshInProgress: false,
      backupCount: 0
    });
  });

  it('reports unhealthy before anything is loaded', () => {
    const { orchestrator } = rig();
    expect(orchestrator.status()).toMatchObject({ healthy: false, documentCount: 0, currentVersionId: null });
  });

  it('promotes a fetched catalog and swaps the engine onto it', async () => {
    const source = new FakeCatalogSource(async () => fetched(NEW_CATALOG));
    const { orchestrator, engine, versionStore } = rig(source);
    await orchestrator.initialize();

    const report = await orchestrator.refresh();

    expect(report.status).toBe('succeeded');
    expect(report.remote).toEqual({ attempted: true, fetched: true, source: 'fake', error: null });
    expect(report.status === 'succeeded' && report.versionId).toBe(versionStore.currentMeta()?.id);
    const result = await engine.recommend('need gas', ['CardA', 'CardN']);
    expect(result.recommendations.map((entry) => entry.cardName)).toEqual(['CardN', 'CardA']);
  });

  it('carries on with the current catalog when the remote fetch fails', async () => {
    const source = new FakeCatalogSource(async () => unavailable('timed out'));
    const { orchestrator } = rig(source);

    const report = await orchestrator.refresh();

    expect(report).toMatchObject({
      status: 'succeeded',
      versionId: 'bundled',
      remote: { attempted: true, fetched: false, source: 'fake', error: 'fake: timed out' }
    });
  });

  it('notes a requested fetch when no remote source is configured', async () => {
    const { orchestrator } = rig();

    const report = await orchestrator.refresh({ fetchRemote: true });

    expect(report.remote).toEqual({
      attempted: false,
      fetched: false,
      source: null,
      error: 'no remote catalog source is configured'
    });
  });

  it('does not promote a malformed download and keeps the previous index', async () => {
    let next: FetchOutcome = fetched(NEW_CATALOG);
    const source = new FakeCatalogSource(async () => next);
    const { orchestrator, engine, versionStore } = rig(source);
    await orchestrator.refresh();
    const goodVersion = versionStore.currentMeta();
    const goodHandle = engine.activeHandle();

    next = fetched(['card_name,category,rate,activation_required', 'CardZ,fuel,-1,no'].join('\n'));
    const report = await orchestrator.refresh();

    expect(report).toMatchObject({ status: 'failed', errorCode: 'MALFORMED_CATALOG', row: 2 });
    expect(versionStore.currentMeta()).toEqual(goodVersion);
    expect(engine.activeHandle()).toBe(goodHandle);
    expect(orchestrator.status().currentVersionId).toBe(goodVersion?.id);
    expect(orchestrator.status().lastRefresh).toBe(report);
  });

  it('keeps the previous index when the rebuild fails', async () => {
    const embedder = new SwitchableEmbedder();
    const { orchestrator, engine } = rig(null, embedder);
    await orchestrator.initialize();
    const before = engine.activeHandle();
    expect(orchestrator.status().currentVersionId).toBe('bundled');

    embedder.failDocuments = true;
    const report = await orchestrator.refresh();

    expect(report).toMatchObject({ status: 'failed', errorCode: 'INDEX_BUILD_FAILED', row: null });
    expect(engine.activeHandle()).toBe(before);
    expect(orchestrator.status().currentVersionId).toBe('bundled');
    expect(orchestrator.status().healthy).toBe(true);
  });

  it('rejects a second refresh while one is running', async () => {
    const gate = deferred<FetchOutcome>();
    const source = new FakeCatalogSource(() => gate.promise);
    const { orchestrator } = rig(source);

    const first = orchestrator.refresh();
    expect(orchestrator.isRefreshing()).toBe(true);
    expect(orchestrator.status().refreshInProgress).toBe(true);
    await expect(orchestrator.refresh()).rejects.toBeInstanceOf(RefreshInProgressError);

    gate.resolve(fetched(NEW_CATALOG));
    expect((await first).status).toBe('succeeded');
    expect(orchestrator.isRefreshing()).toBe(false);
    expect(source.calls).toBe(1);
  });

  it('reuses the persisted index of the current version after a restart', async () => {
    const first = rig(new FakeCatalogSource(async () => fetched(NEW_CATALOG)));
    await first.orchestrator.refresh();
    const builtId = first.engine.activeHandle()?.id;

    const second = rig();
    const report = await second.orchestrator.initialize();

    expect(report).toBeNull();
    expect(second.engine.activeHandle()?.id).toBe(builtId);
  });

  it('deletes the retired index file after a swap', async () => {
    const { orchestrator } = rig(new FakeCatalogSource(async () => fetched(NEW_CATALOG)));
    await orchestrator.initialize();
    await orchestrator.refresh();

    const files = (await fs.readdir(path.join(dir, 'index'))).filter((file) => file.endsWith('.json'));
    expect(files).toHaveLength(1);
  });

  it('keeps one index file across restarts that rebuild', async () => {
    let last: Rig | null = null;
    for (let start = 0; start < 3; start++) {
      last = rig();
      expect(await last.orchestrator.initialize()).toMatchObject({ status: 'succeeded', versionId: 'bundled' });
    }
    await fs.writeFile(path.join(dir, 'index', 'index-crashed.json.0000.tmp'), '{');
    await last?.orchestrator.refresh();

    const files = await fs.readdir(path.join(dir, 'index'));
    expect(files).toEqual([path.basename(last?.engine.activeHandle()?.filePath ?? '')]);
  });

  it('prunes index files of older versions when reusing a persisted index', async () => {
    const first = rig(new FakeCatalogSource(async () => fetched(NEW_CATALOG)));
    await first.orchestrator.initialize();
    await fs.writeFile(path.join(dir, 'index', 'index-00000000T000000-old.json'), '{}');

    const second = rig();
    expect(await second.orchestrator.initialize()).toBeNull();

    const files = await fs.readdir(path.join(dir, 'index'));
    expect(files).toEqual([path.basename(second.engine.activeHandle()?.filePath ?? '')]);
  });
});
